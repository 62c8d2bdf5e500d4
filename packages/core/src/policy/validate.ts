/**
 * SQL safety validator.
 *
 * The only way to obtain a ValidatedStatement, and the executor accepts
 * nothing else. Checks run in a fixed order and the first failure wins.
 */

import { unsafeStatement } from '../errors.js';
import type { CandidateStatement } from '../llm/types.js';
import type { SchemaDescriptor } from '../schema/descriptor.js';
import { checkGrammar } from './grammar.js';
import { tokenize } from './lexer.js';
import { parseSql } from './parse.js';

export const FORBIDDEN_KEYWORDS: readonly string[] = [
  'insert',
  'update',
  'delete',
  'drop',
  'alter',
  'create',
  'replace',
  'truncate',
  'attach',
  'detach',
  'pragma',
  'exec',
  'execute',
  'vacuum',
  'reindex',
  'analyze',
  'grant',
  'revoke',
  'merge',
  'upsert',
  'begin',
  'commit',
  'rollback',
  'savepoint',
  'release',
  'transaction',
  'load_extension',
];

const FORBIDDEN_RE = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'i');
const COMMENT_MARKERS = ['--', '/*', '*/'];

export interface ValidationLimits {
  maxSqlLength: number;
}

export const DEFAULT_VALIDATION_LIMITS: ValidationLimits = {
  maxSqlLength: 2000,
};

/**
 * A statement that passed every validator check. Immutable, and only
 * constructible through validate().
 */
export class ValidatedStatement {
  /** Nominal marker; a structurally identical object literal is not a ValidatedStatement */
  readonly #validated = true;

  private constructor(
    readonly sql: string,
    readonly tables: readonly string[],
    readonly columns: readonly string[],
  ) {
    Object.freeze(this);
  }

  get validated(): boolean {
    return this.#validated;
  }

  /** @internal used by validate() */
  static accept(
    candidate: CandidateStatement,
    schema: SchemaDescriptor,
    limits: ValidationLimits,
  ): ValidatedStatement {
    const sql = candidate.sql.trim();
    const reject = (message: string, extra?: Record<string, unknown>) =>
      unsafeStatement(message, { sql, ...extra });

    if (candidate.kind !== 'select') {
      throw reject('Only SELECT statements are allowed.');
    }

    if (sql.length > limits.maxSqlLength) {
      throw reject(`Statement exceeds the maximum length of ${limits.maxSqlLength} characters.`, {
        length: sql.length,
      });
    }

    const marker = COMMENT_MARKERS.find((m) => sql.includes(m));
    if (marker) {
      throw reject(`Comments are not allowed (found "${marker}").`);
    }

    const semicolon = sql.indexOf(';');
    if (semicolon !== -1 && semicolon !== sql.length - 1) {
      throw reject('Only a single statement is allowed; ";" may only end the statement.');
    }
    const body = semicolon === -1 ? sql : sql.slice(0, -1).trimEnd();

    const forbidden = FORBIDDEN_RE.exec(body);
    if (forbidden) {
      throw reject(`Forbidden keyword "${forbidden[1].toUpperCase()}".`, {
        keyword: forbidden[1].toLowerCase(),
      });
    }

    const parsed = parseSql(body);
    if (!parsed.ok) {
      throw reject('Statement could not be parsed as SQLite.', { parseError: parsed.error });
    }
    if (parsed.statementCount !== 1 || parsed.kind !== 'select') {
      throw reject('Statement must be exactly one SELECT.', {
        statementCount: parsed.statementCount,
        statementType: parsed.statementType,
      });
    }

    const { tables, columns } = checkGrammar(tokenize(body), schema, body);
    return new ValidatedStatement(body, Object.freeze(tables), Object.freeze(columns));
  }
}

export function validate(
  candidate: CandidateStatement,
  schema: SchemaDescriptor,
  limits: ValidationLimits = DEFAULT_VALIDATION_LIMITS,
): ValidatedStatement {
  return ValidatedStatement.accept(candidate, schema, limits);
}
