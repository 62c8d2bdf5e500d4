import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CUSTOMERS_SCHEMA,
  defineSchema,
  findColumn,
  findTable,
  loadSchemaDescriptor,
} from '../descriptor.js';

describe('CUSTOMERS_SCHEMA', () => {
  it('describes the customers table in column order', () => {
    assert.equal(CUSTOMERS_SCHEMA.tables.length, 1);
    const table = CUSTOMERS_SCHEMA.tables[0];
    assert.equal(table.name, 'customers');
    assert.deepEqual(
      table.columns.map((c) => [c.name, c.type]),
      [
        ['customer_id', 'integer'],
        ['name', 'text'],
        ['gender', 'text'],
        ['location', 'text'],
      ],
    );
    assert.equal(CUSTOMERS_SCHEMA.examples.length, 4);
  });

  it('is deeply frozen', () => {
    assert.ok(Object.isFrozen(CUSTOMERS_SCHEMA));
    assert.ok(Object.isFrozen(CUSTOMERS_SCHEMA.tables));
    assert.ok(Object.isFrozen(CUSTOMERS_SCHEMA.tables[0].columns));
    assert.ok(Object.isFrozen(CUSTOMERS_SCHEMA.tables[0].columns[0]));
  });
});

describe('findTable / findColumn', () => {
  it('match case-insensitively', () => {
    const table = findTable(CUSTOMERS_SCHEMA, 'CUSTOMERS');
    assert.equal(table?.name, 'customers');
    assert.equal(table && findColumn(table, 'Location')?.name, 'location');
    assert.equal(findTable(CUSTOMERS_SCHEMA, 'orders'), undefined);
  });
});

describe('defineSchema', () => {
  it('defaults examples to an empty list', () => {
    const schema = defineSchema({ tables: [{ name: 't', columns: [{ name: 'a', type: 'text' }] }] });
    assert.deepEqual(schema.examples, []);
  });

  it('rejects malformed identifiers', () => {
    assert.throws(
      () => defineSchema({ tables: [{ name: 'bad name', columns: [{ name: 'a', type: 'text' }] }] }),
      /Invalid schema descriptor/,
    );
  });

  it('rejects unknown column types', () => {
    assert.throws(
      () => defineSchema({ tables: [{ name: 't', columns: [{ name: 'a', type: 'real' }] }] }),
      /Invalid schema descriptor/,
    );
  });

  it('rejects duplicate tables and columns regardless of case', () => {
    assert.throws(
      () =>
        defineSchema({
          tables: [
            { name: 't', columns: [{ name: 'a', type: 'text' }] },
            { name: 'T', columns: [{ name: 'b', type: 'text' }] },
          ],
        }),
      /duplicate table "T"/,
    );
    assert.throws(
      () =>
        defineSchema({
          tables: [{ name: 't', columns: [{ name: 'a', type: 'text' }, { name: 'A', type: 'integer' }] }],
        }),
      /duplicate column "A" in table "t"/,
    );
  });

  it('rejects tables without columns', () => {
    assert.throws(() => defineSchema({ tables: [{ name: 't', columns: [] }] }), /Invalid schema descriptor/);
  });
});

describe('loadSchemaDescriptor', () => {
  it('reads and validates a JSON file', () => {
    const dir = mkdtempSync(join(tmpdir(), 'sqlbridge-schema-'));
    try {
      const file = join(dir, 'schema.json');
      writeFileSync(
        file,
        JSON.stringify({
          tables: [{ name: 'orders', columns: [{ name: 'order_id', type: 'integer' }] }],
          examples: [{ question: 'all orders', sql: 'SELECT * FROM orders' }],
        }),
      );
      const schema = loadSchemaDescriptor(file);
      assert.equal(schema.tables[0].name, 'orders');
      assert.equal(schema.examples[0].sql, 'SELECT * FROM orders');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('reports invalid JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'sqlbridge-schema-'));
    try {
      const file = join(dir, 'schema.json');
      writeFileSync(file, '{ tables: ');
      assert.throws(() => loadSchemaDescriptor(file), /is not valid JSON/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
