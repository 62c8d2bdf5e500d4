import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isPipelineError } from '../../errors.js';
import { tokenize } from '../lexer.js';

function shape(sql: string): string[] {
  return tokenize(sql).map((t) => `${t.type}:${t.value}`);
}

function rejectsUnsafe(sql: string) {
  assert.throws(
    () => tokenize(sql),
    (err: unknown) => isPipelineError(err) && err.kind === 'UnsafeStatement',
    sql,
  );
}

describe('tokenize', () => {
  it('splits a simple query into typed tokens', () => {
    assert.deepEqual(shape("SELECT name FROM customers WHERE location = 'Mumbai'"), [
      'word:SELECT',
      'word:name',
      'word:FROM',
      'word:customers',
      'word:WHERE',
      'word:location',
      'op:=',
      'string:Mumbai',
      'eof:',
    ]);
  });

  it('records source offsets', () => {
    const tokens = tokenize('SELECT  name');
    assert.equal(tokens[1].pos, 8);
    assert.equal(tokens[2].pos, 12);
  });

  it('unescapes doubled quotes in strings', () => {
    assert.deepEqual(shape("'O''Brien'"), ["string:O'Brien", 'eof:']);
  });

  it('reads quoted identifiers in all three styles', () => {
    assert.deepEqual(shape('"first name" `gender` [location]'), [
      'identifier:first name',
      'identifier:gender',
      'identifier:location',
      'eof:',
    ]);
  });

  it('prefers two-character operators', () => {
    assert.deepEqual(shape('a<=b||c<>d'), [
      'word:a',
      'op:<=',
      'word:b',
      'op:||',
      'word:c',
      'op:<>',
      'word:d',
      'eof:',
    ]);
  });

  it('reads decimal and exponent numbers', () => {
    assert.deepEqual(shape('1 2.5 .5 1e3'), ['number:1', 'number:2.5', 'number:.5', 'number:1e3', 'eof:']);
  });

  it('keeps a dot between names as punctuation', () => {
    assert.deepEqual(shape('c.name'), ['word:c', 'punct:.', 'word:name', 'eof:']);
  });

  it('rejects bind parameters', () => {
    rejectsUnsafe('SELECT name FROM customers WHERE customer_id = ?');
    rejectsUnsafe('SELECT name FROM customers WHERE customer_id = :id');
    rejectsUnsafe('SELECT name FROM customers WHERE customer_id = @id');
    rejectsUnsafe('SELECT name FROM customers WHERE customer_id = $id');
  });

  it('rejects unsupported operators', () => {
    rejectsUnsafe('SELECT customer_id & 1 FROM customers');
    rejectsUnsafe('SELECT ~customer_id FROM customers');
  });

  it('rejects unterminated quotes and empty identifiers', () => {
    rejectsUnsafe("SELECT name FROM customers WHERE name = 'abc");
    rejectsUnsafe('SELECT "" FROM customers');
  });

  it('treats only ASCII blanks as whitespace', () => {
    assert.deepEqual(shape('SELECT\tname\r\nFROM\fcustomers'), [
      'word:SELECT',
      'word:name',
      'word:FROM',
      'word:customers',
      'eof:',
    ]);
    rejectsUnsafe('SELECT\u00a0name FROM customers');
    rejectsUnsafe('SELECT name\u2028FROM customers');
  });

  it('rejects numbers glued to words', () => {
    rejectsUnsafe('SELECT 1abc FROM customers');
  });
});
