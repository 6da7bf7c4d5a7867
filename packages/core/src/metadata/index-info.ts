/**
 * @module metadata/index-info
 * Index and statistics metadata for the tables and views of a database.
 *
 * One query returns one row per index with its key and included columns,
 * row count, usage counters since the last restart and the date its
 * statistics were last updated. Requires SQL Server 2017 or later
 * (`STRING_AGG ... WITHIN GROUP`).
 */

import { ReadBoolean, ReadDate, ReadNumber, ReadString } from '../db/rows';

/**
 * Metadata for a single index.
 */
export interface IndexInfo {
  Database: string;
  Schema: string;
  Object: string;

  /** Null for a heap */
  Index: string | null;

  /** `sys.indexes.type_desc`, e.g. `CLUSTERED`, `NONCLUSTERED`, `HEAP` */
  IndexType: string;

  /** Key columns in key order */
  KeyColumns: string[];

  /** Included (non-key) columns */
  IncludedColumns: string[];

  IsUnique: boolean;
  IsPrimaryKey: boolean;
  IsDisabled: boolean;

  /** 0 means the server default */
  FillFactor: number;

  RowCount: number;
  UserSeeks: number;
  UserScans: number;
  UserLookups: number;
  UserUpdates: number;

  /** When the index statistics were last updated; null when not requested or never built */
  StatsLastUpdated: Date | null;
}

/**
 * Options for `BuildIndexInfoQuery`.
 */
export interface IndexInfoQueryOptions {
  /** Restrict to one table or view, e.g. `dbo.Orders` */
  ObjectName?: string;

  /** Include heap entries (index_id 0). Defaults to false */
  IncludeHeaps?: boolean;

  /** Include `STATS_DATE` for each index. Defaults to true */
  IncludeStats?: boolean;
}

/**
 * A query plus the value for its `@objectName` parameter.
 */
export interface IndexInfoQuery {
  SQL: string;

  /** Value to bind to `@objectName`, or null when the query has no filter */
  ObjectName: string | null;
}

/** Separator for aggregated column lists: `NCHAR(31)`, the ASCII unit separator */
export const COLUMN_LIST_SEPARATOR = '\u001f';

/**
 * Builds the index metadata query.
 */
export function BuildIndexInfoQuery(options: IndexInfoQueryOptions = {}): IndexInfoQuery {
  const includeStats = options.IncludeStats ?? true;
  const filters = ['o.is_ms_shipped = 0', "o.type IN ('U', 'V')"];

  if (!options.IncludeHeaps) {
    filters.push('i.index_id > 0');
  }
  if (options.ObjectName) {
    filters.push('i.object_id = OBJECT_ID(@objectName)');
  }

  const statsColumn = includeStats
    ? 'STATS_DATE(i.object_id, i.index_id) AS stats_last_updated'
    : 'CAST(NULL AS DATETIME) AS stats_last_updated';

  const sql = `
    SELECT
      SCHEMA_NAME(o.schema_id) AS schema_name,
      o.name AS object_name,
      i.name AS index_name,
      i.type_desc AS index_type,
      i.is_unique,
      i.is_primary_key,
      i.is_disabled,
      i.fill_factor,
      (
        SELECT STRING_AGG(c.name, NCHAR(31)) WITHIN GROUP (ORDER BY ic.key_ordinal)
        FROM sys.index_columns ic
        JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
        WHERE ic.object_id = i.object_id AND ic.index_id = i.index_id
          AND ic.is_included_column = 0 AND ic.key_ordinal > 0
      ) AS key_columns,
      (
        SELECT STRING_AGG(c.name, NCHAR(31)) WITHIN GROUP (ORDER BY ic.index_column_id)
        FROM sys.index_columns ic
        JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
        WHERE ic.object_id = i.object_id AND ic.index_id = i.index_id
          AND ic.is_included_column = 1
      ) AS included_columns,
      (
        SELECT SUM(ps.row_count)
        FROM sys.dm_db_partition_stats ps
        WHERE ps.object_id = i.object_id AND ps.index_id = i.index_id
      ) AS row_count,
      us.user_seeks,
      us.user_scans,
      us.user_lookups,
      us.user_updates,
      ${statsColumn}
    FROM sys.indexes i
    JOIN sys.objects o ON o.object_id = i.object_id
    LEFT JOIN sys.dm_db_index_usage_stats us
      ON us.database_id = DB_ID() AND us.object_id = i.object_id AND us.index_id = i.index_id
    WHERE ${filters.join('\n      AND ')}
    ORDER BY schema_name, object_name, i.index_id
  `;

  return { SQL: sql, ObjectName: options.ObjectName ?? null };
}

/**
 * Maps a raw row of the index metadata query to an `IndexInfo`.
 * NULL counters (no usage since restart) read as 0.
 */
export function MapIndexInfoRow(row: Record<string, unknown>, database: string): IndexInfo {
  return {
    Database: database,
    Schema: ReadString(row, 'schema_name') ?? '',
    Object: ReadString(row, 'object_name') ?? '',
    Index: ReadString(row, 'index_name'),
    IndexType: ReadString(row, 'index_type') ?? 'UNKNOWN',
    KeyColumns: splitColumnList(ReadString(row, 'key_columns')),
    IncludedColumns: splitColumnList(ReadString(row, 'included_columns')),
    IsUnique: ReadBoolean(row, 'is_unique'),
    IsPrimaryKey: ReadBoolean(row, 'is_primary_key'),
    IsDisabled: ReadBoolean(row, 'is_disabled'),
    FillFactor: ReadNumber(row, 'fill_factor'),
    RowCount: ReadNumber(row, 'row_count'),
    UserSeeks: ReadNumber(row, 'user_seeks'),
    UserScans: ReadNumber(row, 'user_scans'),
    UserLookups: ReadNumber(row, 'user_lookups'),
    UserUpdates: ReadNumber(row, 'user_updates'),
    StatsLastUpdated: ReadDate(row, 'stats_last_updated'),
  };
}

function splitColumnList(value: string | null): string[] {
  if (value === null || value === '') {
    return [];
  }
  return value.split(COLUMN_LIST_SEPARATOR);
}
