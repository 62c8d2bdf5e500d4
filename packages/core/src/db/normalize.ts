/**
 * Convert engine-native values to the canonical NULL / integer / text set.
 */

import type { CanonicalValue, NormalizedResult, ResultSet, SqliteValue } from './types.js';

export function normalizeValue(value: SqliteValue): CanonicalValue {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : String(value);
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  return value.toString('hex');
}

export function normalizeResult(rs: ResultSet): NormalizedResult {
  const rows = rs.rows.map((row) => row.map(normalizeValue));
  return { columns: [...rs.columns], rows, rowCount: rows.length };
}

/**
 * Column-keyed objects, one per row. Duplicate column names keep the
 * rightmost value.
 */
export function toRecords(result: NormalizedResult): Record<string, CanonicalValue>[] {
  return result.rows.map((row) => {
    const record: Record<string, CanonicalValue> = {};
    result.columns.forEach((column, i) => {
      record[column] = row[i] ?? null;
    });
    return record;
  });
}
