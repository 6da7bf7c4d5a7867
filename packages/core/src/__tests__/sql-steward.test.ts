import * as sql from 'mssql';
import { describe, it, expect, vi } from 'vitest';
import { SqlSteward } from '../core/sql-steward';
import { SqlStewardConfig } from '../core/config';
import { ConnectionManager } from '../db/connection';
import { ConnectionError } from '../core/errors';

const config: SqlStewardConfig = {
  Database: {
    Server: 'localhost',
    Database: 'Sales',
    User: 'sa',
    Password: 'test-secret',
  },
};

describe('SqlSteward.CopyTableData', () => {
  it('fails without a source table or query', async () => {
    const steward = new SqlSteward(config);
    const result = await steward.CopyTableData({ DestinationTable: 'archive.Orders' });

    expect(result.Success).toBe(false);
    expect(result.ErrorMessage).toBe('Either SourceTable or Query is required');
    expect(result.Source).toBe('(none)');
    expect(result.Destination).toBe('[Sales].[archive].[Orders]');
    expect(result.RowsCopied).toBe(0);
  });

  it('refuses to copy a table onto itself', async () => {
    const steward = new SqlSteward(config);
    const result = await steward.CopyTableData({ SourceTable: 'dbo.Orders', DestinationTable: 'DBO.orders' });

    expect(result.Success).toBe(false);
    expect(result.ErrorMessage).toBe('Source and destination are the same table: [Sales].[dbo].[Orders]');
  });

  it('reports a malformed destination name', async () => {
    const steward = new SqlSteward(config);
    const result = await steward.CopyTableData({ SourceTable: 'dbo.Orders', DestinationTable: 'a.b.c' });

    expect(result.Success).toBe(false);
    expect(result.Destination).toBe('a.b.c');
    expect(result.ErrorMessage).toBe('Invalid object name "a.b.c": expected at most two parts (schema.name)');
  });
});

/** Opens one unconnected pool, fails every later connect, and never closes cleanly */
class UnclosableConnectionManager extends ConnectionManager {
  readonly Released: sql.ConnectionPool[] = [];
  private opened = 0;

  async ConnectToDatabase(database: string): Promise<sql.ConnectionPool> {
    this.opened++;
    if (this.opened > 1) {
      throw new ConnectionError(`Failed to open connection to ${database}`);
    }
    return new sql.ConnectionPool({ server: 'localhost', database, user: 'sa', password: 'test-secret' });
  }

  async Release(...pools: sql.ConnectionPool[]): Promise<void> {
    this.Released.push(...pools);
    throw new Error('socket hang up');
  }
}

describe('SqlSteward connection cleanup', () => {
  it('keeps the copy result when a pool fails to close', async () => {
    const manager = new UnclosableConnectionManager(config.Database);
    const logs: string[] = [];
    const steward = new SqlSteward(config, manager).OnProgress({ OnLog: (message) => logs.push(message) });

    const result = await steward.CopyTableData({
      Query: 'SELECT 1 AS ID',
      DestinationTable: 'archive.Orders',
      DestinationDatabase: 'Archive',
    });

    expect(result.Success).toBe(false);
    expect(result.Source).toBe('(query)');
    expect(result.Destination).toBe('[Archive].[archive].[Orders]');
    expect(result.ErrorMessage).toBe('Failed to open connection to Archive');
    expect(result.RowsCopied).toBe(0);
    expect(result.Batches).toBe(0);
    expect(manager.Released).toHaveLength(1);
    expect(logs).toEqual(['Failed to close connection pool: socket hang up']);
  });
});

describe('SqlSteward.WriteTableData', () => {
  it('reports a malformed table name', async () => {
    const steward = new SqlSteward(config);
    const result = await steward.WriteTableData({ Table: '[broken', Rows: [{ ID: 1 }] });

    expect(result.Success).toBe(false);
    expect(result.Source).toBe('1 in-memory row(s)');
    expect(result.ErrorMessage).toBe('Invalid object name "[broken": unterminated "["');
  });
});

describe('SqlSteward.OnProgress', () => {
  it('returns the instance for chaining', () => {
    const steward = new SqlSteward(config);
    expect(steward.OnProgress({ OnLog: vi.fn() })).toBe(steward);
  });
});

describe('SqlSteward.Close', () => {
  it('succeeds when nothing was opened', async () => {
    const steward = new SqlSteward(config);
    await expect(steward.Close()).resolves.toBeUndefined();
  });
});
