#!/usr/bin/env node
/**
 * @module bin/sqlsteward
 * CLI entry point for SqlSteward.
 *
 * Usage:
 *   sqlsteward copy-table [options]
 *   sqlsteward write-table [options]
 *   sqlsteward decrypt [options]
 *   sqlsteward index-info [options]
 */

import { Command } from 'commander';
import { LoadConfig, CLIOptions, ParseEncoding } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunCopyTable } from '../commands/copy-table';
import { RunWriteTable } from '../commands/write-table';
import { RunDecrypt } from '../commands/decrypt';
import { RunIndexInfo } from '../commands/index-info';
import { BulkCopyOverrides } from '@sqlsteward/core';

type CommandOptions = Record<string, unknown>;

const program = new Command();

program
  .name('sqlsteward')
  .description('SqlSteward: SQL Server administration from TypeScript')
  .version('0.1.0');

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option('-s, --server <host>', 'SQL Server hostname')
    .option('-p, --port <port>', 'SQL Server port', parseInteger)
    .option('-d, --database <name>', 'Database name')
    .option('-u, --user <user>', 'Database user')
    .option('-P, --password <password>', 'Database password')
    .option('--trust-server-certificate', 'Trust self-signed certificates')
    .option('--config <path>', 'Path to config file');
}

function addBulkCopyOptions(cmd: Command): Command {
  return cmd
    .option('--batch-size <rows>', 'Rows per bulk load batch', parseInteger)
    .option('--truncate', 'Truncate the destination before loading')
    .option('--keep-nulls', 'Keep NULLs instead of applying column defaults')
    .option('--check-constraints', 'Check constraints while loading')
    .option('--fire-triggers', 'Fire insert triggers on the destination')
    .option('--table-lock', 'Take a table lock for each batch')
    .option('-q, --quiet', 'Suppress per-batch output, show summary only');
}

// ─── Commands ───────────────────────────────────────────────────────

addBulkCopyOptions(
  addSharedOptions(
    program
      .command('copy-table')
      .description('Bulk-copy rows from a table or query into another table')
      .option('--source-table <name>', 'Source table, e.g. dbo.Orders')
      .option('--query <sql>', 'Custom source query (instead of --source-table)')
      .requiredOption('--destination-table <name>', 'Destination table, e.g. archive.Orders')
      .option('--source-database <name>', 'Source database (defaults to --database)')
      .option('--destination-database <name>', 'Destination database (defaults to the source database)')
      .option('--destination-server <host>', 'Destination server (defaults to --server)')
      .option('--destination-port <port>', 'Destination server port', parseInteger)
  )
).action(async (opts: CommandOptions) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const destinationServer = optString(opts, 'destinationServer');
  const success = await RunCopyTable(
    config,
    {
      ...mapBulkCopyOptions(opts),
      SourceTable: optString(opts, 'sourceTable'),
      Query: optString(opts, 'query'),
      SourceDatabase: optString(opts, 'sourceDatabase'),
      DestinationTable: requireString(opts, 'destinationTable'),
      DestinationDatabase: optString(opts, 'destinationDatabase'),
      DestinationConnection: destinationServer
        ? { ...config.Database, Server: destinationServer, Port: optNumber(opts, 'destinationPort') ?? 1433 }
        : undefined,
    },
    optBoolean(opts, 'quiet') ?? false
  );
  process.exit(success ? 0 : 1);
});

addBulkCopyOptions(
  addSharedOptions(
    program
      .command('write-table')
      .description('Bulk-write the rows of a JSON file into a table')
      .requiredOption('--file <path>', 'JSON file holding an array of row objects')
      .requiredOption('--table <name>', 'Destination table, e.g. dbo.Imported')
      .option('--auto-create', 'Create the table from the row values when it does not exist')
  )
).action(async (opts: CommandOptions) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const success = await RunWriteTable(config, requireString(opts, 'file'), {
    ...mapBulkCopyOptions(opts),
    Table: requireString(opts, 'table'),
    AutoCreateTable: optBoolean(opts, 'autoCreate') ?? false,
  });
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('decrypt')
    .description('Recover the definitions of objects created WITH ENCRYPTION')
    .option('--databases <names>', 'Databases to scan (comma-separated, defaults to --database)')
    .option('--object <name>', 'Only recover this object, e.g. dbo.usp_Payroll (repeatable)', collect, [])
    .option('--encoding <encoding>', 'Definition encoding: ascii or utf8')
    .option('--export <dir>', 'Write each recovered definition to <dir>/<server>/<database>/<schema>.<name>.sql')
    .option('--dac-port <port>', 'Dedicated Admin Connection port', parseInteger)
).action(async (opts: CommandOptions) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const objects = optStringList(opts, 'object');
  const success = await RunDecrypt(config, {
    Databases: splitList(optString(opts, 'databases')),
    Objects: objects.length > 0 ? objects : undefined,
  });
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('index-info')
    .description('Show index and statistics metadata')
    .option('--databases <names>', 'Databases to report on (comma-separated, defaults to --database)')
    .option('--object <name>', 'Only report on this table or view')
    .option('--include-heaps', 'Include heap entries')
    .option('--no-stats', 'Skip statistics dates')
).action(async (opts: CommandOptions) => {
  PrintBanner();
  const config = LoadConfig(mapOptions(opts));
  const success = await RunIndexInfo(config, {
    Databases: splitList(optString(opts, 'databases')),
    ObjectName: optString(opts, 'object'),
    IncludeHeaps: optBoolean(opts, 'includeHeaps') ?? false,
    IncludeStats: optBoolean(opts, 'stats') ?? true,
  });
  process.exit(success ? 0 : 1);
});

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Maps commander options to CLIOptions.
 */
function mapOptions(opts: CommandOptions): CLIOptions {
  const encoding = optString(opts, 'encoding');
  return {
    Server: optString(opts, 'server'),
    Port: optNumber(opts, 'port'),
    Database: optString(opts, 'database'),
    User: optString(opts, 'user'),
    Password: optString(opts, 'password'),
    TrustServerCertificate: optBoolean(opts, 'trustServerCertificate'),
    Config: optString(opts, 'config'),
    BatchSize: optNumber(opts, 'batchSize'),
    Encoding: encoding !== undefined ? ParseEncoding(encoding) : undefined,
    DacPort: optNumber(opts, 'dacPort'),
    Export: optString(opts, 'export'),
  };
}

/**
 * Maps the bulk copy flags. Unset flags fall back to the configured defaults.
 */
function mapBulkCopyOptions(opts: CommandOptions): BulkCopyOverrides {
  return {
    Truncate: optBoolean(opts, 'truncate'),
    KeepNulls: optBoolean(opts, 'keepNulls'),
    CheckConstraints: optBoolean(opts, 'checkConstraints'),
    FireTriggers: optBoolean(opts, 'fireTriggers'),
    TableLock: optBoolean(opts, 'tableLock'),
  };
}

function optString(opts: CommandOptions, key: string): string | undefined {
  const value = opts[key];
  return typeof value === 'string' ? value : undefined;
}

function requireString(opts: CommandOptions, key: string): string {
  const value = optString(opts, key);
  if (value === undefined) {
    throw new Error(`Missing required option --${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`);
  }
  return value;
}

function optNumber(opts: CommandOptions, key: string): number | undefined {
  const value = opts[key];
  return typeof value === 'number' ? value : undefined;
}

function optBoolean(opts: CommandOptions, key: string): boolean | undefined {
  const value = opts[key];
  return typeof value === 'boolean' ? value : undefined;
}

function optStringList(opts: CommandOptions, key: string): string[] {
  const value = opts[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  const items = value.split(',').map((v) => v.trim()).filter((v) => v !== '');
  return items.length > 0 ? items : undefined;
}

/**
 * Commander argument parser for integer options.
 */
function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Commander option collector for repeatable options.
 */
function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
