/**
 * @sqlbridge/core — barrel export
 *
 * Natural-language question to validated, read-only SQLite query.
 */

// Errors
export {
  PipelineError,
  ConfigError,
  ERROR_CATEGORIES,
  isPipelineError,
  publicMessage,
  invalidQuestion,
  modelUnavailable,
  noSqlFound,
  multipleStatements,
  unsafeStatement,
  unknownReference,
  executionError,
  resourceLimit,
  cancelled,
} from './errors.js';
export type { ErrorKind, ErrorCategory } from './errors.js';

// Configuration and logging
export { loadConfig } from './config.js';
export type { Config, LlmConfig, DatabaseConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Schema descriptor
export {
  CUSTOMERS_SCHEMA,
  defineSchema,
  loadSchemaDescriptor,
  findTable,
  findColumn,
} from './schema/descriptor.js';
export type {
  SchemaDescriptor,
  SchemaDescriptorInput,
  TableDescriptor,
  ColumnDescriptor,
  ColumnType,
  QueryExample,
} from './schema/descriptor.js';

// LLM module
export * from './llm/index.js';

// Safety validator
export {
  validate,
  ValidatedStatement,
  FORBIDDEN_KEYWORDS,
  DEFAULT_VALIDATION_LIMITS,
} from './policy/validate.js';
export type { ValidationLimits } from './policy/validate.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind } from './policy/parse.js';

// Execution
export { SAFE_DEFAULTS } from './db/defaults.js';
export { SqliteExecutor, createSqliteExecutor } from './db/sqlite.js';
export type { SqliteExecutorOptions } from './db/sqlite.js';
export { normalizeResult, normalizeValue, toRecords } from './db/normalize.js';
export type {
  SqliteValue,
  ResultSet,
  CanonicalValue,
  NormalizedResult,
  ExecuteLimits,
  HealthStatus,
  QueryExecutor,
} from './db/types.js';

// Orchestration
export { QueryPipeline, createQueryPipeline } from './pipeline.js';
export type {
  Stage,
  PipelineContext,
  PipelineLimits,
  PipelineOutcome,
  PipelineSuccess,
  PipelineFailure,
  TranslateOptions,
  CreatePipelineOptions,
} from './pipeline.js';
