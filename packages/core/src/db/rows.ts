/**
 * @module db/rows
 * Narrowing helpers for raw `mssql` result rows.
 *
 * `mssql` returns BIGINT and DECIMAL values as strings, and NULL as
 * `null`, so row values are read through these helpers instead of
 * being cast.
 */

/**
 * Reads a string column. Returns null for NULL or a non-string value.
 */
export function ReadString(row: Record<string, unknown>, column: string): string | null {
  const value = row[column];
  return typeof value === 'string' ? value : null;
}

/**
 * Reads a numeric column, accepting numbers and numeric strings.
 * Returns `fallback` for NULL or anything non-numeric.
 */
export function ReadNumber(row: Record<string, unknown>, column: string, fallback: number = 0): number {
  const value = row[column];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? fallback : parsed;
  }
  return fallback;
}

/**
 * Reads a BIT column. NULL reads as false.
 */
export function ReadBoolean(row: Record<string, unknown>, column: string): boolean {
  const value = row[column];
  return value === true || value === 1;
}

/**
 * Reads a date column. Returns null for NULL.
 */
export function ReadDate(row: Record<string, unknown>, column: string): Date | null {
  const value = row[column];
  return value instanceof Date ? value : null;
}
