import type { Row } from '../ports/RowParser.js';
import type { SqlValue } from '../ports/SqlDatabase.js';
import { ColumnType } from '../model/ColumnType.js';
import { parseIntegerLiteral, parseRealLiteral } from './NumericLiteral.js';

/** Pad a short row with `null` and cut a long one, so it has exactly `width` fields. */
export function normalizeRow(row: Row, width: number): (string | null)[] {
  const normalized: (string | null)[] = row.slice(0, width);
  while (normalized.length < width) {
    normalized.push(null);
  }
  return normalized;
}

/**
 * Convert a raw field to the value stored for a column of `type`.
 * Empty and missing values become `null`; a value that does not parse as the
 * column's type is kept as the original text.
 */
export function coerceValue(value: string | null, type: ColumnType): SqlValue {
  if (value === null || value === '') return null;

  switch (type) {
    case ColumnType.INTEGER:
      return parseIntegerLiteral(value) ?? value;
    case ColumnType.REAL:
      return parseRealLiteral(value) ?? value;
    case ColumnType.TEXT:
      return value;
  }
}

export function coerceRow(row: Row, types: readonly ColumnType[]): SqlValue[] {
  return normalizeRow(row, types.length).map((value, i) => coerceValue(value, types[i] ?? ColumnType.TEXT));
}
