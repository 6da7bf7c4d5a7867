/**
 * @module bulk/table-schema
 * Infers destination column types from in-memory rows, for writing
 * into a table that does not exist yet.
 */

import * as sql from 'mssql';
import { SqlStewardError } from '../core/errors';
import { INT32_MAX } from './progress';
import { Row } from './types';

/**
 * A destination column inferred from row values.
 */
export interface ColumnSpec {
  /** Column name, taken from the row key */
  Name: string;

  /** `mssql` type used for the bulk load and CREATE TABLE */
  Type: sql.ISqlType | (() => sql.ISqlType);

  /** T-SQL spelling of `Type`, for messages and tests */
  SqlTypeName: string;
}

const INT32_MIN = -INT32_MAX - 1;

/**
 * Infers one column per key of the first row.
 *
 * Each column's type comes from the first non-null value found for that
 * key across all rows. Columns that are null everywhere become
 * NVARCHAR(MAX). Every inferred column is nullable.
 *
 * | JS value                       | SQL type        |
 * |--------------------------------|-----------------|
 * | string                         | NVARCHAR(MAX)   |
 * | integer within 32 bits         | INT             |
 * | larger integer, or bigint      | BIGINT          |
 * | other number                   | FLOAT           |
 * | boolean                        | BIT             |
 * | Date                           | DATETIME2       |
 * | Buffer / Uint8Array            | VARBINARY(MAX)  |
 *
 * @throws SqlStewardError (`NO_ROWS`) when there is nothing to infer from
 */
export function InferColumns(rows: Row[]): ColumnSpec[] {
  if (rows.length === 0) {
    throw new SqlStewardError('NO_ROWS', 'Cannot infer table columns from an empty row set');
  }

  return Object.keys(rows[0]).map((name) => {
    const sample = rows.find((row) => row[name] !== null && row[name] !== undefined);
    return inferColumn(name, sample?.[name]);
  });
}

function inferColumn(name: string, value: unknown): ColumnSpec {
  if (typeof value === 'bigint') {
    return { Name: name, Type: sql.BigInt, SqlTypeName: 'BIGINT' };
  }
  if (typeof value === 'number') {
    if (Number.isInteger(value)) {
      return value >= INT32_MIN && value <= INT32_MAX
        ? { Name: name, Type: sql.Int, SqlTypeName: 'INT' }
        : { Name: name, Type: sql.BigInt, SqlTypeName: 'BIGINT' };
    }
    return { Name: name, Type: sql.Float, SqlTypeName: 'FLOAT' };
  }
  if (typeof value === 'boolean') {
    return { Name: name, Type: sql.Bit, SqlTypeName: 'BIT' };
  }
  if (value instanceof Date) {
    return { Name: name, Type: sql.DateTime2(), SqlTypeName: 'DATETIME2' };
  }
  if (value instanceof Uint8Array) {
    return { Name: name, Type: sql.VarBinary(sql.MAX), SqlTypeName: 'VARBINARY(MAX)' };
  }
  return { Name: name, Type: sql.NVarChar(sql.MAX), SqlTypeName: 'NVARCHAR(MAX)' };
}

/**
 * Builds an empty `sql.Table` with the given columns.
 *
 * @param tableName - Bracketed, schema-qualified destination name
 * @param columns - Columns in load order
 * @param create - Whether the bulk load should create the table when missing
 */
export function BuildTable(tableName: string, columns: ColumnSpec[], create: boolean): sql.Table {
  const table = new sql.Table(tableName);
  table.create = create;
  for (const column of columns) {
    table.columns.add(column.Name, column.Type, { nullable: true });
  }
  return table;
}
