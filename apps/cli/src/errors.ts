import { ConfigError, type ErrorKind, type PipelineFailure } from '@sqlbridge/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_INVALID'
  | 'INVALID_QUESTION'
  | 'MODEL_UNAVAILABLE'
  | 'NO_SQL_FOUND'
  | 'MULTIPLE_STATEMENTS'
  | 'UNSAFE_STATEMENT'
  | 'UNKNOWN_SCHEMA_REFERENCE'
  | 'EXECUTION_FAILED'
  | 'RESOURCE_LIMIT'
  | 'CANCELLED'
  | 'HEALTH_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function policyError(message: string, code: CliErrorCode, details?: unknown): CliError {
  return new CliError('policy', code, message, details);
}

const FAILURE_MAP: Record<ErrorKind, { kind: CliErrorKind; code: CliErrorCode }> = {
  InvalidQuestion: { kind: 'usage', code: 'INVALID_QUESTION' },
  ModelUnavailable: { kind: 'runtime', code: 'MODEL_UNAVAILABLE' },
  NoSqlFound: { kind: 'policy', code: 'NO_SQL_FOUND' },
  MultipleStatementsFound: { kind: 'policy', code: 'MULTIPLE_STATEMENTS' },
  UnsafeStatement: { kind: 'policy', code: 'UNSAFE_STATEMENT' },
  UnknownSchemaReference: { kind: 'policy', code: 'UNKNOWN_SCHEMA_REFERENCE' },
  ExecutionError: { kind: 'runtime', code: 'EXECUTION_FAILED' },
  ResourceLimitExceeded: { kind: 'runtime', code: 'RESOURCE_LIMIT' },
  Cancelled: { kind: 'runtime', code: 'CANCELLED' },
};

/** Map a pipeline failure to the CLI error that reports it. */
export function fromFailure(failure: PipelineFailure): CliError {
  const { kind, code } = FAILURE_MAP[failure.kind];
  return new CliError(kind, code, failure.message, {
    requestId: failure.requestId,
    stage: failure.stage,
    kind: failure.kind,
  });
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'policy') return EXIT_CODE_POLICY;
    return EXIT_CODE_RUNTIME;
  }
  if (error instanceof ConfigError) return EXIT_CODE_USAGE;
  return EXIT_CODE_RUNTIME;
}
