/**
 * Error taxonomy for the query pipeline.
 *
 * Every failure a stage can produce is a PipelineError carrying a stable
 * kind. `message` is safe to show to end users; `details` is for logs only.
 */

export type ErrorKind =
  | 'InvalidQuestion'
  | 'ModelUnavailable'
  | 'NoSqlFound'
  | 'MultipleStatementsFound'
  | 'UnsafeStatement'
  | 'UnknownSchemaReference'
  | 'ExecutionError'
  | 'ResourceLimitExceeded'
  | 'Cancelled';

export type ErrorCategory =
  | 'invalid-input'
  | 'service-unavailable'
  | 'translation-failure'
  | 'rejected-input'
  | 'internal-error'
  | 'resource-limit'
  | 'cancelled';

export const ERROR_CATEGORIES: Readonly<Record<ErrorKind, ErrorCategory>> = {
  InvalidQuestion: 'invalid-input',
  ModelUnavailable: 'service-unavailable',
  NoSqlFound: 'translation-failure',
  MultipleStatementsFound: 'translation-failure',
  UnsafeStatement: 'rejected-input',
  UnknownSchemaReference: 'rejected-input',
  ExecutionError: 'internal-error',
  ResourceLimitExceeded: 'resource-limit',
  Cancelled: 'cancelled',
};

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.details = details;
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.kind];
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function invalidQuestion(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('InvalidQuestion', message, details);
}

export function modelUnavailable(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('ModelUnavailable', message, details);
}

export function noSqlFound(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('NoSqlFound', message, details);
}

export function multipleStatements(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('MultipleStatementsFound', message, details);
}

export function unsafeStatement(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('UnsafeStatement', message, details);
}

export function unknownReference(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('UnknownSchemaReference', message, details);
}

export function executionError(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('ExecutionError', message, details);
}

export function resourceLimit(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('ResourceLimitExceeded', message, details);
}

export function cancelled(message = 'The request was cancelled.', details?: Record<string, unknown>): PipelineError {
  return new PipelineError('Cancelled', message, details);
}

const GENERIC_MESSAGES: Partial<Record<ErrorKind, string>> = {
  ModelUnavailable: 'The language model service is unavailable. Try again later.',
  ExecutionError: 'The database could not run the generated query.',
};

/**
 * User-facing message for an error. Backend kinds get a fixed message so
 * engine and transport internals never reach the caller.
 */
export function publicMessage(error: PipelineError): string {
  return GENERIC_MESSAGES[error.kind] ?? error.message;
}

/** Thrown by loadConfig() when the environment does not validate. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
