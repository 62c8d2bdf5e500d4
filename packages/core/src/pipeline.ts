/**
 * Query pipeline orchestration.
 *
 * Runs question → prompt → model → extraction → validation → execution →
 * normalization as a fixed sequence of stages. Each stage either advances
 * or ends the request with a PipelineError; nothing is retried here.
 */

import { randomUUID } from 'node:crypto';
import type { Config } from './config.js';
import {
  cancelled,
  executionError,
  invalidQuestion,
  isPipelineError,
  modelUnavailable,
  publicMessage,
  type ErrorKind,
  type PipelineError,
} from './errors.js';
import type { Logger } from './logger.js';
import { OpenAIModelClient } from './llm/client.js';
import { extractSql } from './llm/extract.js';
import { buildPrompt } from './llm/prompt.js';
import type { ModelClient } from './llm/types.js';
import { validate } from './policy/validate.js';
import { SqliteExecutor } from './db/sqlite.js';
import { normalizeResult } from './db/normalize.js';
import type { HealthStatus, NormalizedResult, QueryExecutor } from './db/types.js';
import { CUSTOMERS_SCHEMA, loadSchemaDescriptor, type SchemaDescriptor } from './schema/descriptor.js';

export type Stage =
  | 'Received'
  | 'Prompted'
  | 'Translated'
  | 'Extracted'
  | 'Validated'
  | 'Executed'
  | 'Normalized'
  | 'Done';

export interface PipelineLimits {
  maxSqlLength: number;
  maxQuestionLength: number;
}

/** Collaborators shared by every request. */
export interface PipelineContext {
  schema: SchemaDescriptor;
  model: ModelClient;
  executor: QueryExecutor;
  logger: Logger;
  limits: PipelineLimits;
}

export interface TranslateOptions {
  /** Correlation id; generated when absent */
  requestId?: string;
  signal?: AbortSignal;
}

export interface PipelineSuccess {
  ok: true;
  requestId: string;
  question: string;
  sql: string;
  result: NormalizedResult;
  message: string;
  elapsedMs: number;
}

export interface PipelineFailure {
  ok: false;
  requestId: string;
  /** Stage that was being attempted when the request failed */
  stage: Stage;
  kind: ErrorKind;
  message: string;
  elapsedMs: number;
}

export type PipelineOutcome = PipelineSuccess | PipelineFailure;

function resultMessage(rowCount: number): string {
  return `Found ${rowCount} result(s)`;
}

function asPipelineError(err: unknown): PipelineError {
  if (isPipelineError(err)) return err;
  return executionError('Unexpected internal failure.', {
    error: err instanceof Error ? err.message : String(err),
  });
}

export class QueryPipeline {
  constructor(private readonly ctx: PipelineContext) {}

  get schema(): SchemaDescriptor {
    return this.ctx.schema;
  }

  async translateAndRun(
    question: string,
    caseSensitive: boolean,
    opts: TranslateOptions = {},
  ): Promise<PipelineOutcome> {
    const requestId = opts.requestId ?? randomUUID();
    const log = this.ctx.logger.child({ requestId });
    const { signal } = opts;
    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);

    let stage: Stage = 'Received';
    let sql: string | undefined;

    const enter = (next: Stage) => {
      if (signal?.aborted) throw cancelled();
      stage = next;
    };
    const reached = () => log.info({ event: 'stage', stage }, `stage ${stage}`);

    try {
      enter('Received');
      const trimmed = question.trim();
      if (!trimmed) {
        throw invalidQuestion('The question is empty.');
      }
      if (trimmed.length > this.ctx.limits.maxQuestionLength) {
        throw invalidQuestion(
          `The question is longer than ${this.ctx.limits.maxQuestionLength} characters.`,
          { length: trimmed.length },
        );
      }
      reached();

      enter('Prompted');
      const prompt = buildPrompt(trimmed, caseSensitive, this.ctx.schema);
      reached();

      enter('Translated');
      const response = await this.ctx.model.translate(prompt, signal);
      reached();

      enter('Extracted');
      const candidate = extractSql(response);
      sql = candidate.sql;
      reached();

      enter('Validated');
      const statement = validate(candidate, this.ctx.schema, {
        maxSqlLength: this.ctx.limits.maxSqlLength,
      });
      sql = statement.sql;
      reached();

      enter('Executed');
      const rs = await this.ctx.executor.execute(statement, signal);
      reached();

      enter('Normalized');
      const result = normalizeResult(rs);
      reached();

      enter('Done');
      reached();
      const message = resultMessage(result.rowCount);
      const elapsedMs = elapsed();
      log.info(
        { event: 'outcome', ok: true, stage, rowCount: result.rowCount, sql, elapsedMs },
        message,
      );
      return { ok: true, requestId, question, sql: statement.sql, result, message, elapsedMs };
    } catch (err: unknown) {
      const error = asPipelineError(err);
      const elapsedMs = elapsed();
      log.warn(
        {
          event: 'outcome',
          ok: false,
          stage,
          kind: error.kind,
          category: error.category,
          reason: error.message,
          sql,
          details: error.details,
          elapsedMs,
        },
        `request failed at ${stage}: ${error.kind}`,
      );
      return {
        ok: false,
        requestId,
        stage,
        kind: error.kind,
        message: publicMessage(error),
        elapsedMs,
      };
    }
  }

  /** Database reachability and descriptor status; never throws. */
  async health(): Promise<HealthStatus> {
    const status = await this.ctx.executor.health(this.ctx.schema);
    this.ctx.logger.info({ event: 'health', ok: status.ok, tables: status.tables }, 'health check');
    return status;
  }
}

export interface CreatePipelineOptions {
  logger: Logger;
  /** Overrides config.schemaPath and the built-in descriptor */
  schema?: SchemaDescriptor;
  model?: ModelClient;
  executor?: QueryExecutor;
}

/**
 * Wire a pipeline from configuration. The model client is created lazily
 * only when none is given, so health and schema commands work without an
 * API key.
 */
export function createQueryPipeline(config: Config, opts: CreatePipelineOptions): QueryPipeline {
  const schema =
    opts.schema ?? (config.schemaPath ? loadSchemaDescriptor(config.schemaPath) : CUSTOMERS_SCHEMA);

  const executor =
    opts.executor ??
    new SqliteExecutor({
      path: config.database.path,
      maxRows: config.database.maxRows,
      timeoutMs: config.database.timeoutMs,
    });

  return new QueryPipeline({
    schema,
    model: opts.model ?? lazyModelClient(config, opts.logger),
    executor,
    logger: opts.logger,
    limits: {
      maxSqlLength: config.maxSqlLength,
      maxQuestionLength: config.maxQuestionLength,
    },
  });
}

function lazyModelClient(config: Config, logger: Logger): ModelClient {
  let client: OpenAIModelClient | undefined;
  return {
    async translate(prompt, signal) {
      if (!client) {
        const { apiKey } = config.llm;
        if (!apiKey) {
          throw modelUnavailable('No language model API key is configured (LLM_API_KEY).');
        }
        client = new OpenAIModelClient({
          apiKey,
          baseURL: config.llm.baseURL,
          model: config.llm.model,
          timeoutMs: config.llm.timeoutMs,
          maxAttempts: config.llm.maxAttempts,
          temperature: config.llm.temperature,
          maxTokens: config.llm.maxTokens,
          logger,
        });
      }
      return client.translate(prompt, signal);
    },
  };
}
