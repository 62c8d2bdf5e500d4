/**
 * Execution-side types for the query pipeline.
 */

import type { ValidatedStatement } from '../policy/validate.js';
import type { SchemaDescriptor } from '../schema/descriptor.js';

/** Values as better-sqlite3 returns them */
export type SqliteValue = null | number | bigint | string | Buffer;

export interface ResultSet {
  columns: string[];
  rows: SqliteValue[][];
}

/** Values after normalization: NULL, integer or text */
export type CanonicalValue = null | number | string;

export interface NormalizedResult {
  columns: string[];
  rows: CanonicalValue[][];
  rowCount: number;
}

export interface ExecuteLimits {
  /** Maximum rows a statement may produce */
  maxRows: number;
  /** Wall-clock budget for one statement in milliseconds */
  timeoutMs: number;
}

export interface HealthStatus {
  ok: boolean;
  schemaLoaded: boolean;
  /** Row count per descriptor table */
  tables: Record<string, number>;
  /** ISO-8601 timestamp */
  checkedAt: string;
  error?: string;
}

/**
 * Runs validated statements. Implementations hold no connection between
 * calls.
 */
export interface QueryExecutor {
  execute(stmt: ValidatedStatement, signal?: AbortSignal): Promise<ResultSet>;
  health(schema: SchemaDescriptor): Promise<HealthStatus>;
}
