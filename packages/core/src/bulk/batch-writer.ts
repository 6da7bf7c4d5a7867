/**
 * @module bulk/batch-writer
 * `BulkBatchWriter` implementation over `mssql` bulk loads.
 */

import * as sql from 'mssql';
import { BulkCopyError, toError } from '../core/errors';
import { ObjectName, QualifiedName, QuoteName } from '../db/identifiers';
import { BuildTable, ColumnSpec } from './table-schema';
import { BulkBatchWriter, Row } from './types';

/**
 * Bulk load flags, named after the `SqlBulkCopy` options they mirror.
 */
export interface BulkLoadOptions {
  KeepNulls: boolean;
  CheckConstraints: boolean;
  FireTriggers: boolean;
  TableLock: boolean;
}

/**
 * Writes batches with `sql.Request.bulk`, one load per batch.
 *
 * Rows are matched to destination columns by name. A destination column
 * missing from a row is loaded as NULL.
 */
export class SqlBatchWriter implements BulkBatchWriter {
  private readonly pool: sql.ConnectionPool;
  private readonly tableName: string;
  private readonly createTable: (isFirstBatch: boolean) => sql.Table;
  private readonly bulkOptions: sql.IBulkOptions;
  private batchesWritten = 0;

  private constructor(
    pool: sql.ConnectionPool,
    tableName: string,
    createTable: (isFirstBatch: boolean) => sql.Table,
    options: BulkLoadOptions
  ) {
    this.pool = pool;
    this.tableName = tableName;
    this.createTable = createTable;
    this.bulkOptions = {
      keepNulls: options.KeepNulls,
      checkConstraints: options.CheckConstraints,
      fireTriggers: options.FireTriggers,
      tableLock: options.TableLock,
    };
  }

  /**
   * Creates a writer for an existing table.
   *
   * Identity, computed and rowversion columns are skipped: the server
   * fills those in itself.
   *
   * @throws BulkCopyError if the table does not exist or has no writable columns
   */
  static async ForExistingTable(
    pool: sql.ConnectionPool,
    table: ObjectName,
    options: BulkLoadOptions
  ): Promise<SqlBatchWriter> {
    const qualified = QualifiedName(table);
    const columns = await GetWritableColumns(pool, qualified);
    if (columns.length === 0) {
      throw new BulkCopyError(
        qualified,
        `Destination table ${qualified} does not exist or has no writable columns`
      );
    }

    const template = await new sql.Request(pool).query(
      `SELECT TOP 0 ${columns.map(QuoteName).join(', ')} FROM ${qualified}`
    );
    return new SqlBatchWriter(pool, qualified, () => template.recordset.toTable(qualified), options);
  }

  /**
   * Creates a writer whose first batch creates the table from `columns`.
   */
  static ForNewTable(
    pool: sql.ConnectionPool,
    table: ObjectName,
    columns: ColumnSpec[],
    options: BulkLoadOptions
  ): SqlBatchWriter {
    const qualified = QualifiedName(table);
    return new SqlBatchWriter(
      pool,
      qualified,
      (isFirstBatch) => BuildTable(qualified, columns, isFirstBatch),
      options
    );
  }

  async WriteBatch(rows: Row[]): Promise<number> {
    const table = this.createTable(this.batchesWritten === 0);
    const names = table.columns.map((column) => column.name);

    for (const row of rows) {
      table.rows.add(...names.map((name) => toBulkValue(row[name])));
    }

    try {
      const result = await new sql.Request(this.pool).bulk(table, this.bulkOptions);
      this.batchesWritten++;
      return result.rowsAffected;
    } catch (err) {
      throw new BulkCopyError(
        this.tableName,
        `Bulk load of batch ${this.batchesWritten + 1} into ${this.tableName} failed: ${toError(err).message}`,
        toError(err)
      );
    }
  }
}

/**
 * Returns the names of the columns a bulk load may write, in column order.
 *
 * @param tableName - Bracketed, schema-qualified table name
 */
export async function GetWritableColumns(pool: sql.ConnectionPool, tableName: string): Promise<string[]> {
  const request = new sql.Request(pool);
  request.input('table', sql.NVarChar(776), tableName);
  const result = await request.query(`
    SELECT c.name
    FROM sys.columns c
    WHERE c.object_id = OBJECT_ID(@table)
      AND c.is_identity = 0
      AND c.is_computed = 0
      AND c.system_type_id <> 189
    ORDER BY c.column_id
  `);
  return result.recordset
    .map((row: Record<string, unknown>) => row.name)
    .filter((name: unknown): name is string => typeof name === 'string');
}

/**
 * Returns true if a user table with this name exists.
 *
 * @param tableName - Bracketed, schema-qualified table name
 */
export async function TableExists(pool: sql.ConnectionPool, tableName: string): Promise<boolean> {
  const request = new sql.Request(pool);
  request.input('table', sql.NVarChar(776), tableName);
  const result = await request.query(`SELECT OBJECT_ID(@table, 'U') AS object_id`);
  return result.recordset[0]?.object_id != null;
}

function toBulkValue(value: unknown): unknown {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
}
