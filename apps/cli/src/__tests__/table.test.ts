import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatTable } from '../util/table.js';

describe('formatTable', () => {
  it('pads columns to the widest value', () => {
    const out = formatTable(
      ['name', 'city'],
      [
        ['Jane Smith', 'Mumbai'],
        ['Bob', null],
      ],
    );
    assert.deepEqual(out.split('\n'), [
      'name       | city  ',
      '-----------+-------',
      'Jane Smith | Mumbai',
      'Bob        | NULL  ',
    ]);
  });

  it('truncates values wider than the column cap', () => {
    const out = formatTable(['v'], [['x'.repeat(70)]]);
    const lines = out.split('\n');
    assert.equal(lines[2], 'x'.repeat(59) + '…');
    assert.equal(lines[1], '-'.repeat(60));
  });

  it('renders objects as JSON', () => {
    const out = formatTable(['data'], [[{ a: 1 }]]);
    assert.equal(out.split('\n')[2], '{"a":1}');
  });

  it('reports empty inputs', () => {
    assert.equal(formatTable([], []), '(no columns)');
    assert.equal(formatTable(['name'], []), '(0 rows)');
  });
});
