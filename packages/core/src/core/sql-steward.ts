/**
 * @module core/sql-steward
 * Main orchestrator for SqlSteward operations.
 *
 * The `SqlSteward` class is the primary public API for programmatic usage.
 * It owns the connection manager and runs table copies, definition
 * recovery and index metadata queries against the configured server.
 *
 * @example
 * ```typescript
 * import { SqlSteward } from '@sqlsteward/core';
 *
 * const steward = new SqlSteward({
 *   Database: { Server: 'localhost', Database: 'Sales', User: 'sa', Password: 'test-secret' },
 * });
 *
 * const result = await steward.CopyTableData({
 *   SourceTable: 'dbo.Orders',
 *   DestinationTable: 'archive.Orders',
 * });
 * console.log(`Copied ${result.RowsCopied} rows`);
 *
 * await steward.Close();
 * ```
 */

import * as sql from 'mssql';
import { SqlStewardConfig, ResolvedConfig, resolveConfig, DecryptConfig } from './config';
import { BulkCopyError, SqlStewardError, toError } from './errors';
import { ConnectionManager } from '../db/connection';
import { DatabaseConfig } from '../db/types';
import { ObjectName, ParseObjectName, QualifiedName, QuoteName } from '../db/identifiers';
import { BulkLoadOptions, SqlBatchWriter, TableExists } from '../bulk/batch-writer';
import { CopyProgressTracker, CopyRows } from '../bulk/copier';
import { StreamQueryRows } from '../bulk/row-stream';
import { InferColumns } from '../bulk/table-schema';
import { BulkCopyResult, Row, RowsCopiedNotification } from '../bulk/types';
import { SqlDefinitionStore } from '../decrypt/definition-store';
import { FilterObjects, ObjectDecryptor } from '../decrypt/decryptor';
import { DecryptionResult } from '../decrypt/types';
import { BuildIndexInfoQuery, IndexInfo, MapIndexInfoRow } from '../metadata/index-info';

/**
 * Callback interface for observing operation progress.
 */
export interface SqlStewardCallbacks {
  /** Called for informational log messages */
  OnLog?: (message: string) => void;

  /** Called after every bulk copy batch */
  OnRowsCopied?: (notification: RowsCopiedNotification) => void;

  /** Called after every object a decryption run processes */
  OnObjectDecrypted?: (result: DecryptionResult) => void;
}

/**
 * Bulk copy flags an operation may override.
 */
export interface BulkCopyOverrides {
  BatchSize?: number;
  KeepNulls?: boolean;
  CheckConstraints?: boolean;
  FireTriggers?: boolean;
  TableLock?: boolean;
  /** Truncate the destination before loading */
  Truncate?: boolean;
}

/**
 * Options for `CopyTableData()`.
 */
export interface CopyTableDataOptions extends BulkCopyOverrides {
  /** Source table, e.g. `dbo.Orders`. Ignored when `Query` is set */
  SourceTable?: string;

  /** Custom source query. Column names must match the destination's */
  Query?: string;

  /** Source database. Defaults to the configured database */
  SourceDatabase?: string;

  /** Destination table, e.g. `archive.Orders` */
  DestinationTable: string;

  /** Destination database. Defaults to the source database */
  DestinationDatabase?: string;

  /** Connection for a destination on another server. Defaults to the configured server */
  DestinationConnection?: DatabaseConfig;
}

/**
 * Options for `WriteTableData()`.
 */
export interface WriteTableDataOptions extends BulkCopyOverrides {
  /** Destination table, e.g. `dbo.Imported` */
  Table: string;

  /** Destination database. Defaults to the configured database */
  Database?: string;

  /** Rows to write, keyed by column name */
  Rows: Row[];

  /** Create the table from the rows' value types when it does not exist */
  AutoCreateTable?: boolean;
}

/**
 * Result of a `CopyTableData()` or `WriteTableData()` operation.
 */
export interface TableCopyResult extends BulkCopyResult {
  /** Whether the copy completed. On failure, `RowsCopied` counts the batches already loaded */
  Success: boolean;

  /** Where rows were read from */
  Source: string;

  /** Where rows were written to */
  Destination: string;

  /** Error message if the copy failed */
  ErrorMessage?: string;
}

/**
 * Options for `DecryptObjects()`.
 */
export interface DecryptObjectsOptions extends DecryptConfig {
  /** Databases to scan. Defaults to the configured database */
  Databases?: string[];

  /** Restrict to these objects (`name` or `schema.name`). Defaults to all */
  Objects?: string[];
}

/**
 * Result of a `DecryptObjects()` operation.
 */
export interface DecryptObjectsResult {
  /** True when every database was reached and every object recovered */
  Success: boolean;

  /** One entry per object attempted */
  Results: DecryptionResult[];

  /** Number of objects recovered */
  Decrypted: number;

  /** Number of objects that could not be recovered */
  Failed: number;

  /** Database-level failures (connection, listing) */
  Errors: string[];
}

/**
 * Options for `GetIndexInfo()`.
 */
export interface IndexInfoOptions {
  /** Databases to query. Defaults to the configured database */
  Databases?: string[];

  /** Restrict to one table or view */
  ObjectName?: string;

  /** Include heaps. Defaults to false */
  IncludeHeaps?: boolean;

  /** Include statistics dates. Defaults to true */
  IncludeStats?: boolean;
}

/**
 * The SqlSteward administration engine.
 *
 * - `CopyTableData()`: Bulk-copy rows between tables, databases or servers
 * - `WriteTableData()`: Bulk-write in-memory rows into a table
 * - `DecryptObjects()`: Recover definitions created `WITH ENCRYPTION`
 * - `GetIndexInfo()`: Report index and statistics metadata
 */
export class SqlSteward {
  private readonly config: ResolvedConfig;
  private readonly connectionManager: ConnectionManager;
  private callbacks: SqlStewardCallbacks = {};

  /**
   * @param config - Connection and operation settings
   * @param connectionManager - Pool source; defaults to one built from `config.Database`
   */
  constructor(config: SqlStewardConfig, connectionManager?: ConnectionManager) {
    this.config = resolveConfig(config);
    this.connectionManager = connectionManager ?? new ConnectionManager(this.config.Database);
  }

  /**
   * Registers callbacks for observing progress.
   * Returns `this` for chaining.
   *
   * @example
   * ```typescript
   * steward
   *   .OnProgress({
   *     OnLog: (msg) => console.log(msg),
   *     OnRowsCopied: (n) => console.log(`${n.Total} rows`),
   *   })
   *   .CopyTableData({ SourceTable: 'dbo.A', DestinationTable: 'dbo.B' });
   * ```
   */
  OnProgress(callbacks: SqlStewardCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Copies rows from a table or query into another table.
   *
   * The workflow:
   * 1. Connect to the source and destination databases
   * 2. Optionally truncate the destination
   * 3. Read the destination's writable columns
   * 4. Stream source rows and bulk-load them batch by batch
   *
   * @returns Copy result with corrected row count and timing
   */
  async CopyTableData(options: CopyTableDataOptions): Promise<TableCopyResult> {
    const startTime = Date.now();
    const sourceDatabase = options.SourceDatabase ?? this.config.Database.Database;
    const destinationDatabase = options.DestinationDatabase ?? sourceDatabase;
    const pools: sql.ConnectionPool[] = [];
    const tracker = new CopyProgressTracker((n) => this.callbacks.OnRowsCopied?.(n));
    let source = options.Query ? '(query)' : options.SourceTable ?? '(none)';
    let destination = options.DestinationTable;

    try {
      const destinationTable = ParseObjectName(options.DestinationTable);
      destination = `${QuoteName(destinationDatabase)}.${QualifiedName(destinationTable)}`;

      const sourceQuery = this.buildSourceQuery(options, sourceDatabase, destinationDatabase, destinationTable);
      if (!options.Query && options.SourceTable) {
        source = `${QuoteName(sourceDatabase)}.${QualifiedName(ParseObjectName(options.SourceTable))}`;
      }

      const sourcePool = await this.connectionManager.ConnectToDatabase(sourceDatabase);
      pools.push(sourcePool);

      const destinationPool = await this.connectionManager.ConnectToDatabase(destinationDatabase, {
        Connection: options.DestinationConnection,
      });
      pools.push(destinationPool);

      if (options.Truncate) {
        await this.truncate(destinationPool, destinationTable);
      }

      const writer = await SqlBatchWriter.ForExistingTable(
        destinationPool,
        destinationTable,
        this.bulkLoadOptions(options)
      );

      this.callbacks.OnLog?.(`Copying ${source} to ${destination}`);
      const result = await CopyRows(
        StreamQueryRows(new sql.Request(sourcePool), sourceQuery),
        writer,
        { BatchSize: options.BatchSize ?? this.config.BulkCopy.BatchSize },
        { OnRowsCopied: tracker.OnRowsCopied }
      );

      this.callbacks.OnLog?.(`Copied ${result.RowsCopied} row(s) to ${destination} (${result.ElapsedMS}ms)`);
      return { ...result, Success: true, Source: source, Destination: destination };
    } catch (err) {
      return this.failedCopy(source, destination, startTime, tracker, err);
    } finally {
      await this.releasePools(pools);
    }
  }

  /**
   * Bulk-writes in-memory rows into a table.
   *
   * With `AutoCreateTable`, a missing table is created from the rows'
   * value types (see `InferColumns`).
   */
  async WriteTableData(options: WriteTableDataOptions): Promise<TableCopyResult> {
    const startTime = Date.now();
    const database = options.Database ?? this.config.Database.Database;
    const source = `${options.Rows.length} in-memory row(s)`;
    const pools: sql.ConnectionPool[] = [];
    const tracker = new CopyProgressTracker((n) => this.callbacks.OnRowsCopied?.(n));
    let destination = options.Table;

    try {
      const table = ParseObjectName(options.Table);
      destination = `${QuoteName(database)}.${QualifiedName(table)}`;

      const pool = await this.connectionManager.ConnectToDatabase(database);
      pools.push(pool);

      const exists = await TableExists(pool, QualifiedName(table));
      if (!exists && !options.AutoCreateTable) {
        throw new BulkCopyError(destination, `Table ${destination} does not exist; use AutoCreateTable to create it`);
      }

      let writer: SqlBatchWriter;
      if (exists) {
        if (options.Truncate) {
          await this.truncate(pool, table);
        }
        writer = await SqlBatchWriter.ForExistingTable(pool, table, this.bulkLoadOptions(options));
      } else {
        const columns = InferColumns(options.Rows);
        this.callbacks.OnLog?.(
          `Creating ${destination} (${columns.map((c) => `${c.Name} ${c.SqlTypeName}`).join(', ')})`
        );
        writer = SqlBatchWriter.ForNewTable(pool, table, columns, this.bulkLoadOptions(options));
      }

      const result = await CopyRows(
        options.Rows,
        writer,
        { BatchSize: options.BatchSize ?? this.config.BulkCopy.BatchSize },
        { OnRowsCopied: tracker.OnRowsCopied }
      );

      this.callbacks.OnLog?.(`Wrote ${result.RowsCopied} row(s) to ${destination} (${result.ElapsedMS}ms)`);
      return { ...result, Success: true, Source: source, Destination: destination };
    } catch (err) {
      return this.failedCopy(source, destination, startTime, tracker, err);
    } finally {
      await this.releasePools(pools);
    }
  }

  /**
   * Recovers the definitions of objects created `WITH ENCRYPTION`.
   *
   * Databases are processed one after another over the Dedicated Admin
   * Connection. Within a database, objects are processed one at a time;
   * a failure on one object is recorded and the rest are still attempted.
   */
  async DecryptObjects(options: DecryptObjectsOptions = {}): Promise<DecryptObjectsResult> {
    const databases = options.Databases ?? [this.config.Database.Database];
    const encoding = options.Encoding ?? this.config.Decrypt.Encoding;
    const dacPort = options.DacPort ?? this.config.Decrypt.DacPort;
    const exportDestination = options.ExportDestination ?? this.config.Decrypt.ExportDestination;

    const results: DecryptionResult[] = [];
    const errors: string[] = [];

    for (const database of databases) {
      let pool: sql.ConnectionPool | null = null;
      try {
        pool = await this.connectionManager.ConnectToDatabase(database, {
          DedicatedAdmin: true,
          DacPort: dacPort,
        });

        const store = new SqlDefinitionStore(pool, database);
        const objects = FilterObjects(await store.ListEncryptedObjects(), options.Objects);
        this.callbacks.OnLog?.(`Found ${objects.length} encrypted object(s) in ${QuoteName(database)}`);

        const decryptor = new ObjectDecryptor(store, {
          Encoding: encoding,
          ExportDestination: exportDestination,
          Server: this.config.Database.Server,
          OnObjectDecrypted: this.callbacks.OnObjectDecrypted,
          OnLog: this.callbacks.OnLog,
        });
        results.push(...(await decryptor.DecryptObjects(objects)));
      } catch (err) {
        const message = `${QuoteName(database)}: ${toError(err).message}`;
        errors.push(message);
        this.callbacks.OnLog?.(`Skipping ${message}`);
      } finally {
        if (pool) {
          await this.releasePools([pool]);
        }
      }
    }

    const decrypted = results.filter((r) => r.Success).length;
    return {
      Success: errors.length === 0 && decrypted === results.length,
      Results: results,
      Decrypted: decrypted,
      Failed: results.length - decrypted,
      Errors: errors,
    };
  }

  /**
   * Returns index and statistics metadata for each requested database.
   */
  async GetIndexInfo(options: IndexInfoOptions = {}): Promise<IndexInfo[]> {
    const databases = options.Databases ?? [this.config.Database.Database];
    const query = BuildIndexInfoQuery({
      ObjectName: options.ObjectName ? QualifiedName(ParseObjectName(options.ObjectName)) : undefined,
      IncludeHeaps: options.IncludeHeaps,
      IncludeStats: options.IncludeStats,
    });

    const indexes: IndexInfo[] = [];
    for (const database of databases) {
      const pool = await this.connectionManager.ConnectToDatabase(database);
      try {
        const request = new sql.Request(pool);
        if (query.ObjectName !== null) {
          request.input('objectName', sql.NVarChar(776), query.ObjectName);
        }
        const result = await request.query(query.SQL);
        for (const row of result.recordset) {
          indexes.push(MapIndexInfoRow(row, database));
        }
      } finally {
        await this.connectionManager.Release(pool);
      }
    }
    return indexes;
  }

  /**
   * Closes any connection pool still open.
   * Should be called when done with the SqlSteward instance.
   */
  async Close(): Promise<void> {
    await this.connectionManager.Disconnect();
  }

  // ─── Private Methods ──────────────────────────────────────────────

  /**
   * Returns the query that reads the source rows, rejecting a copy of a
   * table onto itself.
   */
  private buildSourceQuery(
    options: CopyTableDataOptions,
    sourceDatabase: string,
    destinationDatabase: string,
    destinationTable: ObjectName
  ): string {
    if (options.Query) {
      return options.Query;
    }
    if (!options.SourceTable) {
      throw new SqlStewardError('MISSING_SOURCE', 'Either SourceTable or Query is required');
    }

    const sourceTable = ParseObjectName(options.SourceTable);
    const sameTable =
      !options.DestinationConnection &&
      sourceDatabase.toLowerCase() === destinationDatabase.toLowerCase() &&
      QualifiedName(sourceTable).toLowerCase() === QualifiedName(destinationTable).toLowerCase();
    if (sameTable) {
      throw new BulkCopyError(
        QualifiedName(destinationTable),
        `Source and destination are the same table: ${QuoteName(sourceDatabase)}.${QualifiedName(sourceTable)}`
      );
    }

    return `SELECT * FROM ${QualifiedName(sourceTable)}`;
  }

  private bulkLoadOptions(overrides: BulkCopyOverrides): BulkLoadOptions {
    return {
      KeepNulls: overrides.KeepNulls ?? this.config.BulkCopy.KeepNulls,
      CheckConstraints: overrides.CheckConstraints ?? this.config.BulkCopy.CheckConstraints,
      FireTriggers: overrides.FireTriggers ?? this.config.BulkCopy.FireTriggers,
      TableLock: overrides.TableLock ?? this.config.BulkCopy.TableLock,
    };
  }

  private async truncate(pool: sql.ConnectionPool, table: ObjectName): Promise<void> {
    this.callbacks.OnLog?.(`Truncating ${QualifiedName(table)}`);
    await new sql.Request(pool).batch(`TRUNCATE TABLE ${QualifiedName(table)}`);
  }

  /**
   * Closes the pools an operation opened. A failure to close is logged
   * rather than thrown, so it never replaces the operation's result.
   */
  private async releasePools(pools: sql.ConnectionPool[]): Promise<void> {
    try {
      await this.connectionManager.Release(...pools);
    } catch (err) {
      this.callbacks.OnLog?.(`Failed to close connection pool: ${toError(err).message}`);
    }
  }

  private failedCopy(
    source: string,
    destination: string,
    startTime: number,
    progress: CopyProgressTracker,
    err: unknown
  ): TableCopyResult {
    return {
      Success: false,
      Source: source,
      Destination: destination,
      RowsCopied: progress.RowsCopied,
      Batches: progress.Batches,
      ElapsedMS: Date.now() - startTime,
      RowsPerSecond: 0,
      ErrorMessage: toError(err).message,
    };
  }
}
