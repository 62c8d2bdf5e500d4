/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and array rows.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: readonly string[], rows: ReadonlyArray<ReadonlyArray<unknown>>): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      widths[i] = Math.min(Math.max(widths[i], formatValue(row[i]).length), MAX_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    lines.push(columns.map((_, i) => fit(formatValue(row[i]), widths[i])).join(' | '));
  }

  return lines.join('\n');
}

function fit(text: string, width: number): string {
  return text.length > width ? text.slice(0, width - 1) + '…' : text.padEnd(width);
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
