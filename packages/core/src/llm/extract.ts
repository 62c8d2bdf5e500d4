/**
 * Isolate a single SQL statement from raw model output.
 *
 * Only locates and classifies. Every safety decision belongs to the
 * validator, so non-read statements are passed through tagged 'other'.
 */

import { multipleStatements, noSqlFound } from '../errors.js';
import type { CandidateStatement, ModelResponse, StatementKind } from './types.js';

const FENCE_RE = /```([\s\S]*?)```/g;
// A tag is only a tag when the line ends after it; "```sql SELECT ..." is the one inline form.
const TAG_LINE_RE = /^[ \t]*([A-Za-z0-9_-]+)[ \t]*\r?\n/;
const INLINE_TAG_RE = /^[ \t]*(sql|sqlite)[ \t]+/i;
const READ_LEAD_RE = /^select\b/i;
const STATEMENT_LEAD_RE =
  /^(?:select|with|values|insert|update|delete|replace|drop|alter|create|truncate|attach|detach|pragma|vacuum|reindex|analyze|begin|commit|rollback|savepoint|release|grant|revoke|merge|upsert|exec|execute)\b/i;
// Title-case words that can start a continuation line of a query
const CLAUSE_WORDS = new Set([
  'select', 'from', 'where', 'and', 'or', 'not', 'group', 'having', 'order', 'limit', 'offset',
  'case', 'when', 'then', 'else', 'end', 'in', 'like', 'between', 'is', 'as', 'distinct', 'exists',
]);
const PROSE_LINE_RE = /^([A-Z][a-z]+)(?:\s+\S+){2,}[.!?:]$/;

function openingTag(inner: string): { tag: string; body: string } {
  const line = TAG_LINE_RE.exec(inner);
  if (line && !READ_LEAD_RE.test(line[1])) {
    return { tag: line[1].toLowerCase(), body: inner.slice(line[0].length) };
  }
  const inline = INLINE_TAG_RE.exec(inner);
  if (inline) {
    return { tag: inline[1].toLowerCase(), body: inner.slice(inline[0].length) };
  }
  return { tag: '', body: inner };
}

function fencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  for (const match of text.matchAll(FENCE_RE)) {
    const { tag, body } = openingTag(match[1] ?? '');
    if (tag !== '' && tag !== 'sql' && tag !== 'sqlite') continue;
    blocks.push(body.trim());
  }
  return blocks;
}

function isProseLine(line: string): boolean {
  const match = PROSE_LINE_RE.exec(line.trim());
  return match !== null && !CLAUSE_WORDS.has(match[1].toLowerCase());
}

/** Split on ';' outside string literals. */
function splitStatements(sql: string): string[] {
  const parts: string[] = [];
  let quoted = false;
  let start = 0;
  for (let i = 0; i < sql.length; i++) {
    if (sql[i] === "'") quoted = !quoted;
    else if (sql[i] === ';' && !quoted) {
      parts.push(sql.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(sql.slice(start));
  return parts;
}

/**
 * Trim explanation that follows a bare statement: everything after the
 * first blank line, from the first prose sentence line, and after a ';'
 * unless another statement follows it.
 */
function bareStatement(raw: string): string {
  const paragraph = raw.split(/\r?\n\s*\r?\n/)[0];
  const lines = paragraph.split(/\r?\n/);
  const prose = lines.findIndex((line, i) => i > 0 && isProseLine(line));
  const sql = prose === -1 ? paragraph : lines.slice(0, prose).join('\n');

  const [head, ...tail] = splitStatements(sql);
  if (tail.length === 0) return sql;
  const rest = tail.join(';').trim();
  // A statement after the ';' is stacking; keep it so it gets rejected.
  return STATEMENT_LEAD_RE.test(rest) ? sql : head;
}

function stripTerminators(sql: string): string {
  return sql.trim().replace(/(?:\s*;)+\s*$/, '').trim();
}

export function classifyLead(sql: string): StatementKind {
  return READ_LEAD_RE.test(sql.trimStart()) ? 'select' : 'other';
}

export function extractSql(response: ModelResponse): CandidateStatement {
  const raw = response.text.trim();
  if (!raw) {
    throw noSqlFound('The model returned an empty response.');
  }

  let sql: string;
  const blocks = fencedBlocks(raw);

  if (blocks.length > 1) {
    throw multipleStatements(`The model returned ${blocks.length} SQL blocks; expected one.`, {
      response: raw,
    });
  }

  if (blocks.length === 1) {
    sql = blocks[0];
  } else if (READ_LEAD_RE.test(raw)) {
    sql = bareStatement(raw);
  } else {
    throw noSqlFound('No SQL statement was found in the model response.', { response: raw });
  }

  sql = stripTerminators(sql);
  if (!sql) {
    throw noSqlFound('The model returned an empty SQL block.', { response: raw });
  }

  const segments = splitStatements(sql)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  if (segments.length > 1) {
    if (segments.every((s) => classifyLead(s) === 'select')) {
      throw multipleStatements(`The model returned ${segments.length} statements; expected one.`, {
        sql,
      });
    }
    // Stacked non-read statement: hand over as-is, the validator rejects it.
    return { sql, kind: 'other' };
  }

  return { sql, kind: classifyLead(sql) };
}
