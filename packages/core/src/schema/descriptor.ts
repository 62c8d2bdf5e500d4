/**
 * Schema descriptor: the authoritative list of queryable tables and columns.
 *
 * Used both to build prompts and to resolve identifiers in generated SQL.
 * Descriptors are deep-frozen once defined and never change while the
 * process runs; a different schema means a restart with a new descriptor.
 */

import { readFileSync } from 'node:fs';
import { Ajv } from 'ajv';
import { schemaDescriptorJsonSchema } from './schema_json.js';

export type ColumnType = 'integer' | 'text';

export interface ColumnDescriptor {
  readonly name: string;
  readonly type: ColumnType;
  readonly description?: string;
}

export interface TableDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly columns: readonly ColumnDescriptor[];
}

/** Few-shot translation shown to the model */
export interface QueryExample {
  readonly question: string;
  readonly sql: string;
}

export interface SchemaDescriptor {
  readonly tables: readonly TableDescriptor[];
  readonly examples: readonly QueryExample[];
}

/** Shape accepted from JSON files (examples optional) */
export interface SchemaDescriptorInput {
  tables: Array<{
    name: string;
    description?: string;
    columns: Array<{ name: string; type: ColumnType; description?: string }>;
  }>;
  examples?: Array<{ question: string; sql: string }>;
}

const ajv = new Ajv({ allErrors: true });
const validateInput = ajv.compile<SchemaDescriptorInput>(schemaDescriptorJsonSchema);

/**
 * Validate and freeze a descriptor definition.
 * Throws when names collide or the structure is malformed.
 */
export function defineSchema(input: unknown): SchemaDescriptor {
  if (!validateInput(input)) {
    const errors = (validateInput.errors ?? [])
      .map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new Error(`Invalid schema descriptor: ${errors}`);
  }

  const seenTables = new Set<string>();
  const tables: TableDescriptor[] = input.tables.map((table) => {
    const tableKey = table.name.toLowerCase();
    if (seenTables.has(tableKey)) {
      throw new Error(`Invalid schema descriptor: duplicate table "${table.name}"`);
    }
    seenTables.add(tableKey);

    const seenColumns = new Set<string>();
    const columns = table.columns.map((column) => {
      const columnKey = column.name.toLowerCase();
      if (seenColumns.has(columnKey)) {
        throw new Error(
          `Invalid schema descriptor: duplicate column "${column.name}" in table "${table.name}"`,
        );
      }
      seenColumns.add(columnKey);
      return Object.freeze({ ...column });
    });

    return Object.freeze({ ...table, columns: Object.freeze(columns) });
  });

  const examples = (input.examples ?? []).map((example) => Object.freeze({ ...example }));

  return Object.freeze({
    tables: Object.freeze(tables),
    examples: Object.freeze(examples),
  });
}

/** Read a descriptor from a JSON file. */
export function loadSchemaDescriptor(path: string): SchemaDescriptor {
  const text = readFileSync(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Schema descriptor ${path} is not valid JSON: ${msg}`);
  }
  return defineSchema(parsed);
}

/** Case-insensitive table lookup (SQLite identifiers ignore case). */
export function findTable(schema: SchemaDescriptor, name: string): TableDescriptor | undefined {
  const key = name.toLowerCase();
  return schema.tables.find((t) => t.name.toLowerCase() === key);
}

export function findColumn(table: TableDescriptor, name: string): ColumnDescriptor | undefined {
  const key = name.toLowerCase();
  return table.columns.find((c) => c.name.toLowerCase() === key);
}

/** The fixed customer schema the service starts with. */
export const CUSTOMERS_SCHEMA: SchemaDescriptor = defineSchema({
  tables: [
    {
      name: 'customers',
      description: 'One row per customer',
      columns: [
        { name: 'customer_id', type: 'integer', description: 'Primary key' },
        { name: 'name', type: 'text', description: 'Full name' },
        { name: 'gender', type: 'text', description: "'Male' or 'Female'" },
        { name: 'location', type: 'text', description: "City, e.g. 'Mumbai' or 'New York'" },
      ],
    },
  ],
  examples: [
    {
      question: 'show me all female customer from location mumbai',
      sql: "SELECT * FROM customers WHERE gender = 'Female' AND location = 'Mumbai'",
    },
    {
      question: 'show me all male customer from newyork',
      sql: "SELECT * FROM customers WHERE gender = 'Male' AND location = 'New York'",
    },
    {
      question: 'find customers in mumbai or london',
      sql: "SELECT * FROM customers WHERE location IN ('Mumbai', 'London')",
    },
    {
      question: 'list female customers from mumbai and male from paris',
      sql:
        "SELECT * FROM customers WHERE (gender = 'Female' AND location = 'Mumbai') " +
        "OR (gender = 'Male' AND location = 'Paris')",
    },
  ],
});
