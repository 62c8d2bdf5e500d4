/**
 * Prompt construction for SQL translation.
 *
 * The answer convention here (one ```sql fenced block) is the one
 * extractSql() looks for; change both together.
 */

import type { SchemaDescriptor, TableDescriptor } from '../schema/descriptor.js';
import type { PromptText } from './types.js';

export const SQL_FENCE_TAG = 'sql';

const ANSWER_FORMAT = `Answer format:
- Reply with exactly one fenced code block tagged sql, like:
\`\`\`${SQL_FENCE_TAG}
SELECT ...
\`\`\`
- Put nothing else inside the block.`;

function describeTable(table: TableDescriptor): string {
  const lines = [`TABLE ${table.name}${table.description ? ` -- ${table.description}` : ''}`];
  for (const column of table.columns) {
    const note = column.description ? ` -- ${column.description}` : '';
    lines.push(`  ${column.name} ${column.type.toUpperCase()}${note}`);
  }
  return lines.join('\n');
}

function caseRule(caseSensitive: boolean): string {
  if (caseSensitive) {
    return (
      'Text comparisons are CASE-SENSITIVE: compare text columns with = or IN using the value ' +
      "exactly as the user wrote it, e.g. location = 'mumbai'. Do not use LOWER, UPPER or LIKE for matching."
    );
  }
  return (
    'Text comparisons are CASE-INSENSITIVE: wrap both sides in LOWER, e.g. ' +
    "LOWER(location) = LOWER('Mumbai'), or LOWER(location) IN ('mumbai', 'london'). " +
    'This rule overrides how the examples compare text.'
  );
}

/**
 * Lower-case the question, collapse whitespace, drop words naming a table
 * ("customer", "customers") and turn "from <column>" into "from".
 */
export function normalizeQuestion(question: string, schema: SchemaDescriptor): string {
  let processed = question.toLowerCase().replace(/\s+/g, ' ');

  for (const table of schema.tables) {
    const name = table.name.toLowerCase();
    const singular = name.endsWith('s') ? name.slice(0, -1) : name;
    processed = processed.replace(new RegExp(`\\b(?:${escapeRegExp(singular)}|${escapeRegExp(name)})\\b`, 'g'), '');

    for (const column of table.columns) {
      processed = processed.replace(
        new RegExp(`\\bfrom ${escapeRegExp(column.name.toLowerCase())}\\b`, 'g'),
        'from',
      );
    }
  }

  return processed.replace(/\s+/g, ' ').trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function buildPrompt(
  question: string,
  caseSensitive: boolean,
  schema: SchemaDescriptor,
): PromptText {
  const tableNames = schema.tables.map((t) => t.name).join(', ');

  const system = `You translate questions into SQL for a SQLite database.

CONSTRAINTS:
- Generate exactly ONE SELECT statement. Never more than one statement.
- Read-only: never INSERT, UPDATE, DELETE, DROP, ALTER, CREATE, REPLACE, ATTACH, PRAGMA or any DDL.
- Only use these tables: ${tableNames}. Only use the columns listed in the schema; never invent columns.
- No joins, no WITH clauses, no UNION.
- Do not write comments and do not end the statement with a semicolon.
- Write string literals in single quotes. Do not use bind parameters.
- ${caseRule(caseSensitive)}

${ANSWER_FORMAT}`;

  const schemaText = ['-- Database Schema', ...schema.tables.map(describeTable)].join('\n');

  const examples =
    schema.examples.length > 0
      ? '\n\nExamples:\n' +
        schema.examples.map((e) => `- "${e.question}"\n  -> ${e.sql}`).join('\n')
      : '';

  const user = `${schemaText}${examples}

Original question: "${question}"
Processed question: "${normalizeQuestion(question, schema)}"

Write the SQL query.`;

  return { system, user };
}
