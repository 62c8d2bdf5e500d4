/**
 * SQLite executor backed by better-sqlite3.
 *
 * Every call opens its own read-only connection and closes it before
 * returning. better-sqlite3 is synchronous, so the row and time budgets
 * are enforced between rows of a lazily iterated statement.
 */

import Database from 'better-sqlite3';
import {
  cancelled,
  executionError,
  isPipelineError,
  resourceLimit,
  type PipelineError,
} from '../errors.js';
import type { ValidatedStatement } from '../policy/validate.js';
import type { SchemaDescriptor } from '../schema/descriptor.js';
import { SAFE_DEFAULTS } from './defaults.js';
import type {
  ExecuteLimits,
  HealthStatus,
  QueryExecutor,
  ResultSet,
  SqliteValue,
} from './types.js';

export interface SqliteExecutorOptions extends Partial<ExecuteLimits> {
  /** Path to an existing database file */
  path: string;
  busyTimeoutMs?: number;
  /** Millisecond clock, replaceable in tests */
  now?: () => number;
}

function toSqliteValue(value: unknown): SqliteValue {
  if (
    value === null ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw executionError('Unexpected value type returned by the database.', {
    valueType: typeof value,
  });
}

function toRow(raw: unknown): SqliteValue[] {
  if (!Array.isArray(raw)) {
    throw executionError('Unexpected row shape returned by the database.');
  }
  return raw.map(toSqliteValue);
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function engineError(err: unknown, context: Record<string, unknown>): PipelineError {
  if (isPipelineError(err)) return err;
  const engineMessage = err instanceof Error ? err.message : String(err);
  const code = err instanceof Database.SqliteError ? err.code : undefined;
  return executionError('The database could not run the statement.', {
    ...context,
    engineMessage,
    code,
  });
}

export class SqliteExecutor implements QueryExecutor {
  private readonly path: string;
  private readonly limits: ExecuteLimits;
  private readonly busyTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: SqliteExecutorOptions) {
    if (!options.path.trim()) {
      throw new Error('SQLite database path is required.');
    }
    this.path = options.path;
    this.limits = {
      maxRows: options.maxRows ?? SAFE_DEFAULTS.maxRows,
      timeoutMs: options.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs,
    };
    this.busyTimeoutMs = options.busyTimeoutMs ?? SAFE_DEFAULTS.busyTimeoutMs;
    this.now = options.now ?? (() => performance.now());
  }

  private open(): Database.Database {
    return new Database(this.path, {
      readonly: true,
      fileMustExist: true,
      timeout: this.busyTimeoutMs,
    });
  }

  async execute(stmt: ValidatedStatement, signal?: AbortSignal): Promise<ResultSet> {
    if (signal?.aborted) throw cancelled();

    const { maxRows, timeoutMs } = this.limits;
    let db: Database.Database | undefined;
    try {
      db = this.open();
      const prepared = db.prepare(stmt.sql);
      if (!prepared.reader || !prepared.readonly) {
        throw executionError('The database refused a statement that is not read-only.', {
          sql: stmt.sql,
        });
      }
      prepared.raw(true);

      const columns = prepared.columns().map((c) => c.name);
      const rows: SqliteValue[][] = [];
      const start = this.now();

      const overBudget = () => this.now() - start > timeoutMs;
      const timedOut = () => resourceLimit(`The query ran longer than ${timeoutMs} ms.`, { timeoutMs });

      for (const raw of prepared.iterate()) {
        if (signal?.aborted) throw cancelled();
        if (rows.length >= maxRows) {
          throw resourceLimit(`The query returned more than ${maxRows} rows.`, { maxRows });
        }
        if (overBudget()) throw timedOut();
        rows.push(toRow(raw));
      }
      // The final step (or a scan that matched nothing) also counts.
      if (overBudget()) throw timedOut();

      return { columns, rows };
    } catch (err: unknown) {
      throw engineError(err, { sql: stmt.sql });
    } finally {
      db?.close();
    }
  }

  /** Opens the file read-only and counts the rows of every descriptor table. */
  async health(schema: SchemaDescriptor): Promise<HealthStatus> {
    const checkedAt = new Date().toISOString();
    const tables: Record<string, number> = {};
    let db: Database.Database | undefined;
    try {
      db = this.open();
      for (const table of schema.tables) {
        const count: unknown = db
          .prepare(`SELECT COUNT(*) FROM ${quoteIdent(table.name)}`)
          .pluck()
          .get();
        tables[table.name] = typeof count === 'bigint' ? Number(count) : Number(count ?? 0);
      }
      return { ok: true, schemaLoaded: schema.tables.length > 0, tables, checkedAt };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        schemaLoaded: schema.tables.length > 0,
        tables,
        checkedAt,
        error: message,
      };
    } finally {
      db?.close();
    }
  }
}

export function createSqliteExecutor(options: SqliteExecutorOptions): SqliteExecutor {
  return new SqliteExecutor(options);
}
