/**
 * Structural gate using node-sql-parser with the SQLite dialect.
 *
 * Only answers two questions: how many statements the text holds and
 * whether the first one is a SELECT. The allow-list grammar in grammar.ts
 * decides what is permitted; this gate never widens what passes.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const SQLITE_OPT = { database: 'Sqlite' } as const;

export type SqlKind = 'select' | 'other';

export interface ParseResult {
  statementCount: number;
  kind: SqlKind;
  /** Type of the first statement as node-sql-parser names it, e.g. "delete" */
  statementType: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | { ok: false; error: string };

function typeOf(node: unknown): string {
  if (node && typeof node === 'object' && 'type' in node && typeof node.type === 'string') {
    return node.type.toLowerCase();
  }
  return '';
}

export function parseSql(sql: string): ParseOutcome {
  if (!sql.trim()) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  let ast: unknown;
  try {
    ast = parser.astify(sql, SQLITE_OPT);
  } catch (err: unknown) {
    return { ok: false, error: `SQL parse error: ${err instanceof Error ? err.message : String(err)}` };
  }

  const statements: unknown[] = Array.isArray(ast) ? ast : [ast];
  const [first] = statements;
  if (first === undefined) {
    return { ok: false, error: 'No statements found' };
  }

  const statementType = typeOf(first);
  return {
    ok: true,
    statementCount: statements.length,
    kind: statementType === 'select' ? 'select' : 'other',
    statementType,
  };
}
