/**
 * @module db/connection
 * SQL Server connection pool management for SqlSteward.
 *
 * Every pool is single-connection: work runs sequentially, and a
 * transaction and the requests made inside it must share one connection.
 */

import * as sql from 'mssql';
import { DatabaseConfig, PoolOptions } from './types';
import { ConnectionError, toError } from '../core/errors';

/**
 * Opens and tracks the connection pools used by SqlSteward operations.
 *
 * Each operation opens the pools it needs and releases them when done.
 * `Disconnect()` closes whatever is still open.
 */
export class ConnectionManager {
  private readonly pools = new Set<sql.ConnectionPool>();
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /** Number of pools opened and not yet released */
  get OpenPoolCount(): number {
    return this.pools.size;
  }

  /**
   * Opens a pool against a database on the configured server, or on
   * `options.Connection` when given. The pool stays tracked until
   * `Release()` or `Disconnect()`.
   */
  async ConnectToDatabase(database: string, options: PoolOptions = {}): Promise<sql.ConnectionPool> {
    const pool = await this.openPool(database, options);
    this.pools.add(pool);
    return pool;
  }

  /**
   * Closes the given pools. Every pool gets a close attempt; the first
   * failure is rethrown afterwards. Pools this manager did not open are ignored.
   */
  async Release(...pools: sql.ConnectionPool[]): Promise<void> {
    let firstError: Error | null = null;
    for (const pool of pools) {
      if (!this.pools.delete(pool)) {
        continue;
      }
      try {
        await pool.close();
      } catch (err) {
        firstError ??= toError(err);
      }
    }
    if (firstError) {
      throw firstError;
    }
  }

  /**
   * Closes every pool still open.
   * Safe to call multiple times.
   */
  async Disconnect(): Promise<void> {
    await this.Release(...this.pools);
  }

  private async openPool(database: string, options: PoolOptions = {}): Promise<sql.ConnectionPool> {
    const config = options.Connection ?? this.config;
    const port = options.DedicatedAdmin
      ? options.DacPort ?? 1434
      : config.Port ?? 1433;

    const pool = new sql.ConnectionPool(BuildPoolConfig(config, database, port));
    try {
      await pool.connect();
    } catch (err) {
      const endpoint = options.DedicatedAdmin ? 'dedicated admin connection' : 'connection';
      throw new ConnectionError(
        `Failed to open ${endpoint} to ${config.Server}:${port}/${database}: ${toError(err).message}`,
        toError(err)
      );
    }
    return pool;
  }
}

/**
 * Builds the `mssql` pool configuration for one database and port.
 */
export function BuildPoolConfig(config: DatabaseConfig, database: string, port: number): sql.config {
  return {
    server: config.Server,
    port,
    user: config.User,
    password: config.Password,
    database,
    options: {
      encrypt: config.Options?.Encrypt ?? false,
      trustServerCertificate: config.Options?.TrustServerCertificate ?? true,
      enableArithAbort: config.Options?.EnableArithAbort ?? true,
    },
    pool: {
      max: 1,
      min: 1,
    },
    requestTimeout: config.Options?.RequestTimeout ?? 300_000,
    connectionTimeout: config.Options?.ConnectionTimeout ?? 30_000,
  };
}
