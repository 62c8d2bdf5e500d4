import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { normalizeResult, normalizeValue, toRecords } from '../normalize.js';

describe('normalizeValue', () => {
  it('keeps null, text and safe integers', () => {
    assert.equal(normalizeValue(null), null);
    assert.equal(normalizeValue('Mumbai'), 'Mumbai');
    assert.equal(normalizeValue(42), 42);
    assert.equal(normalizeValue(-7), -7);
  });

  it('renders non-integer numbers as text', () => {
    assert.equal(normalizeValue(2.5), '2.5');
  });

  it('narrows bigints to numbers when they fit', () => {
    assert.equal(normalizeValue(12n), 12);
    assert.equal(normalizeValue(9007199254740993n), '9007199254740993');
  });

  it('renders blobs as hex text', () => {
    assert.equal(normalizeValue(Buffer.from([0xde, 0xad, 0x01])), 'dead01');
  });
});

describe('normalizeResult', () => {
  it('treats an empty row set as a result with zero rows', () => {
    const result = normalizeResult({ columns: ['name'], rows: [] });
    assert.deepEqual(result, { columns: ['name'], rows: [], rowCount: 0 });
  });

  it('normalizes every cell and counts rows', () => {
    const result = normalizeResult({
      columns: ['customer_id', 'avg_len'],
      rows: [
        [1, 3.5],
        [2n, null],
      ],
    });
    assert.deepEqual(result, {
      columns: ['customer_id', 'avg_len'],
      rows: [
        [1, '3.5'],
        [2, null],
      ],
      rowCount: 2,
    });
  });

  it('is idempotent', () => {
    const once = normalizeResult({ columns: ['a', 'b'], rows: [[1.25, 'x']] });
    const twice = normalizeResult(once);
    assert.deepEqual(twice, once);
  });
});

describe('toRecords', () => {
  it('keys each row by column name', () => {
    const records = toRecords({
      columns: ['name', 'location'],
      rows: [['Jane Smith', 'Mumbai']],
      rowCount: 1,
    });
    assert.deepEqual(records, [{ name: 'Jane Smith', location: 'Mumbai' }]);
  });
});
