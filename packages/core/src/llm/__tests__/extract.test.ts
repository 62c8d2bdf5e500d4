import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isPipelineError, type ErrorKind } from '../../errors.js';
import { classifyLead, extractSql } from '../extract.js';
import type { ModelResponse } from '../types.js';

function response(text: string): ModelResponse {
  return { text, latencyMs: 1, model: 'test-model', attempts: 1 };
}

function fails(text: string, kind: ErrorKind) {
  assert.throws(
    () => extractSql(response(text)),
    (err: unknown) => isPipelineError(err) && err.kind === kind,
  );
}

describe('extractSql', () => {
  it('takes the body of a sql fenced block', () => {
    const text = "Here you go:\n```sql\nSELECT name FROM customers WHERE location = 'Mumbai'\n```\nThis lists names.";
    assert.deepEqual(extractSql(response(text)), {
      sql: "SELECT name FROM customers WHERE location = 'Mumbai'",
      kind: 'select',
    });
  });

  it('accepts untagged and sqlite-tagged fences', () => {
    assert.equal(extractSql(response('```\nSELECT 1 FROM customers\n```')).sql, 'SELECT 1 FROM customers');
    assert.equal(extractSql(response('```sqlite\nSELECT 1 FROM customers\n```')).sql, 'SELECT 1 FROM customers');
  });

  it('ignores fences in other languages', () => {
    const text = '```js\nconsole.log(1)\n```\n```sql\nSELECT name FROM customers\n```';
    assert.equal(extractSql(response(text)).sql, 'SELECT name FROM customers');
  });

  it('reads a fenced statement written on the opening line', () => {
    assert.deepEqual(extractSql(response('```sql SELECT name FROM customers```')), {
      sql: 'SELECT name FROM customers',
      kind: 'select',
    });
    assert.deepEqual(extractSql(response('```SELECT name FROM customers```')), {
      sql: 'SELECT name FROM customers',
      kind: 'select',
    });
  });

  it('does not mistake a leading SELECT line for a language tag', () => {
    assert.equal(extractSql(response('```SELECT\nname FROM customers\n```')).sql, 'SELECT\nname FROM customers');
  });

  it('strips trailing terminators', () => {
    assert.equal(extractSql(response('```sql\nSELECT name FROM customers;;\n```')).sql, 'SELECT name FROM customers');
  });

  it('uses a bare SELECT up to the first blank line', () => {
    const text = 'SELECT name\nFROM customers;\n\nThis returns every name.';
    assert.deepEqual(extractSql(response(text)), { sql: 'SELECT name\nFROM customers', kind: 'select' });
  });

  it('drops commentary after the terminator of a bare statement', () => {
    const text = "SELECT name FROM customers WHERE location = 'Paris';\nThis query returns customers in Paris.";
    assert.deepEqual(extractSql(response(text)), {
      sql: "SELECT name FROM customers WHERE location = 'Paris'",
      kind: 'select',
    });
    assert.deepEqual(extractSql(response('SELECT name FROM customers; these are all the names')), {
      sql: 'SELECT name FROM customers',
      kind: 'select',
    });
  });

  it('drops a commentary line that directly follows a bare statement', () => {
    const text = "SELECT name\nFROM customers\nWHERE location = 'Paris'\nThis returns Paris customers.";
    assert.deepEqual(extractSql(response(text)), {
      sql: "SELECT name\nFROM customers\nWHERE location = 'Paris'",
      kind: 'select',
    });
  });

  it('keeps semicolons inside string literals', () => {
    assert.deepEqual(extractSql(response("SELECT name FROM customers WHERE name = 'a;b'; done")), {
      sql: "SELECT name FROM customers WHERE name = 'a;b'",
      kind: 'select',
    });
  });

  it('still passes a bare stacked write through as "other"', () => {
    assert.deepEqual(extractSql(response('SELECT * FROM customers; DROP TABLE customers')), {
      sql: 'SELECT * FROM customers; DROP TABLE customers',
      kind: 'other',
    });
  });

  it('fails with NoSqlFound for prose, empty output and empty blocks', () => {
    fails('I cannot help with that.', 'NoSqlFound');
    fails('   ', 'NoSqlFound');
    fails('```sql\n\n```', 'NoSqlFound');
    fails('```sql\n;\n```', 'NoSqlFound');
  });

  it('fails with MultipleStatementsFound for two blocks', () => {
    fails('```sql\nSELECT 1 FROM customers\n```\nor\n```sql\nSELECT 2 FROM customers\n```', 'MultipleStatementsFound');
  });

  it('fails with MultipleStatementsFound for stacked reads', () => {
    fails('```sql\nSELECT name FROM customers; SELECT location FROM customers\n```', 'MultipleStatementsFound');
  });

  it('passes stacked writes through as "other" for the validator to reject', () => {
    const candidate = extractSql(response('```sql\nSELECT * FROM customers; DROP TABLE customers;\n```'));
    assert.deepEqual(candidate, { sql: 'SELECT * FROM customers; DROP TABLE customers', kind: 'other' });
  });

  it('classifies a non-read block as "other"', () => {
    assert.equal(extractSql(response('```sql\nDELETE FROM customers\n```')).kind, 'other');
  });
});

describe('classifyLead', () => {
  it('recognizes SELECT in any case', () => {
    assert.equal(classifyLead('  select name from customers'), 'select');
    assert.equal(classifyLead('WITH x AS (SELECT 1) SELECT * FROM x'), 'other');
    assert.equal(classifyLead('SELECTED'), 'other');
  });
});
