/**
 * Conservative limits for statement execution.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on rows a statement may produce */
  maxRows: 5000,
  /** Wall-clock budget per statement in milliseconds */
  statementTimeoutMs: 15_000,
  /** How long to wait on a locked database file */
  busyTimeoutMs: 5_000,
} as const;
