/**
 * Tokenizer for the allow-listed SQLite subset.
 *
 * Anything outside the known token set (bind parameters, bitwise
 * operators, stray quotes) is rejected here rather than later.
 */

import { unsafeStatement } from '../errors.js';

export type TokenType = 'word' | 'identifier' | 'string' | 'number' | 'op' | 'punct' | 'eof';

export interface Token {
  type: TokenType;
  /** Unquoted text; keywords and words keep their original case */
  value: string;
  /** Offset in the source text */
  pos: number;
}

const TWO_CHAR_OPS = new Set(['<=', '>=', '<>', '!=', '==', '||']);
const ONE_CHAR_OPS = new Set(['=', '<', '>', '+', '-', '*', '/', '%']);
const PUNCT = new Set(['(', ')', ',', '.', ';']);

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isWordPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function readQuoted(sql: string, start: number, close: string): { value: string; end: number } {
  let value = '';
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === close) {
      // Doubled closing quote is an escaped quote ('' or "")
      if (close !== ']' && sql[i + 1] === close) {
        value += close;
        i += 2;
        continue;
      }
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }
  throw unsafeStatement(`Unterminated quoted text starting at offset ${start}.`, { sql });
}

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (/[ \t\r\n\f]/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "'") {
      const { value, end } = readQuoted(sql, i, "'");
      tokens.push({ type: 'string', value, pos: i });
      i = end;
      continue;
    }

    if (ch === '"' || ch === '`' || ch === '[') {
      const close = ch === '[' ? ']' : ch;
      const { value, end } = readQuoted(sql, i, close);
      if (!value) {
        throw unsafeStatement(`Empty quoted identifier at offset ${i}.`, { sql });
      }
      tokens.push({ type: 'identifier', value, pos: i });
      i = end;
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(sql[i + 1] ?? ''))) {
      const match = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/.exec(sql.slice(i));
      const text = match ? match[0] : ch;
      if (isWordPart(sql[i + text.length] ?? '')) {
        throw unsafeStatement(`Malformed number at offset ${i}.`, { sql });
      }
      tokens.push({ type: 'number', value: text, pos: i });
      i += text.length;
      continue;
    }

    if (isWordStart(ch)) {
      let j = i + 1;
      while (j < sql.length && isWordPart(sql[j])) j++;
      tokens.push({ type: 'word', value: sql.slice(i, j), pos: i });
      i = j;
      continue;
    }

    const two = sql.slice(i, i + 2);
    if (TWO_CHAR_OPS.has(two)) {
      tokens.push({ type: 'op', value: two, pos: i });
      i += 2;
      continue;
    }

    if (ONE_CHAR_OPS.has(ch)) {
      tokens.push({ type: 'op', value: ch, pos: i });
      i++;
      continue;
    }

    if (PUNCT.has(ch)) {
      tokens.push({ type: 'punct', value: ch, pos: i });
      i++;
      continue;
    }

    throw unsafeStatement(`Unsupported character "${ch}" at offset ${i}.`, { sql });
  }

  tokens.push({ type: 'eof', value: '', pos: sql.length });
  return tokens;
}
