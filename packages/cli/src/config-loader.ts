/**
 * @module config-loader
 * Loads SqlSteward configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables
 * 3. .env file (via dotenv)
 * 4. Config file (sqlsteward.json or sqlsteward.config.json)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import {
  BulkCopyConfig,
  DatabaseConfig,
  DatabaseConnectionOptions,
  DecryptConfig,
  DefinitionEncoding,
  SqlStewardConfig,
} from '@sqlsteward/core';

/**
 * Configuration file names searched in order.
 */
const CONFIG_FILE_NAMES = ['sqlsteward.json', 'sqlsteward.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Database server hostname */
  Server?: string;

  /** Database server port */
  Port?: number;

  /** Database name */
  Database?: string;

  /** Database user */
  User?: string;

  /** Database password */
  Password?: string;

  /** Trust server certificate */
  TrustServerCertificate?: boolean;

  /** Path to config file */
  Config?: string;

  /** Rows per bulk copy batch */
  BatchSize?: number;

  /** Encoding for recovered definitions */
  Encoding?: string;

  /** Dedicated Admin Connection port */
  DacPort?: number;

  /** Directory to export recovered definitions into */
  Export?: string;
}

/**
 * Config file contents after key normalization. Every field is optional.
 */
export interface FileConfig {
  Database?: Partial<DatabaseConfig>;
  BulkCopy?: BulkCopyConfig;
  Decrypt?: DecryptConfig;
}

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file and .env discovery
 * @param env - Environment to read; defaults to `process.env` after loading .env
 * @returns Merged SqlStewardConfig
 * @throws Error if required configuration is missing or invalid
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = loadEnv(cwd)
): SqlStewardConfig {
  const fileConfig = loadConfigFile(cliOptions.Config, cwd);

  // Merge: CLI > env > file > defaults
  const server = cliOptions.Server
    ?? env.SQLSTEWARD_SERVER ?? env.DB_HOST
    ?? fileConfig?.Database?.Server;

  const port = cliOptions.Port
    ?? parseIntEnv(env, 'SQLSTEWARD_PORT')
    ?? parseIntEnv(env, 'DB_PORT')
    ?? fileConfig?.Database?.Port
    ?? 1433;

  const database = cliOptions.Database
    ?? env.SQLSTEWARD_DATABASE ?? env.DB_DATABASE
    ?? fileConfig?.Database?.Database;

  const user = cliOptions.User
    ?? env.SQLSTEWARD_USER ?? env.DB_USER
    ?? fileConfig?.Database?.User;

  const password = cliOptions.Password
    ?? env.SQLSTEWARD_PASSWORD ?? env.DB_PASSWORD
    ?? fileConfig?.Database?.Password;

  if (!server) {
    throw new Error('Server is required. Set via --server, SQLSTEWARD_SERVER env var, or config file.');
  }
  if (!database) {
    throw new Error('Database name is required. Set via --database, SQLSTEWARD_DATABASE env var, or config file.');
  }
  if (!user) {
    throw new Error('Database user is required. Set via --user, SQLSTEWARD_USER env var, or config file.');
  }
  if (!password) {
    throw new Error('Database password is required. Set via --password, SQLSTEWARD_PASSWORD env var, or config file.');
  }

  const encoding = cliOptions.Encoding ?? env.SQLSTEWARD_ENCODING;

  return {
    Database: {
      Server: server,
      Port: port,
      Database: database,
      User: user,
      Password: password,
      Options: {
        ...fileConfig?.Database?.Options,
        TrustServerCertificate: cliOptions.TrustServerCertificate
          ?? fileConfig?.Database?.Options?.TrustServerCertificate
          ?? true,
        Encrypt: fileConfig?.Database?.Options?.Encrypt ?? false,
        RequestTimeout: fileConfig?.Database?.Options?.RequestTimeout ?? 300_000,
      },
    },
    BulkCopy: {
      ...fileConfig?.BulkCopy,
      BatchSize: cliOptions.BatchSize
        ?? parseIntEnv(env, 'SQLSTEWARD_BATCH_SIZE')
        ?? fileConfig?.BulkCopy?.BatchSize,
    },
    Decrypt: {
      Encoding: encoding !== undefined ? ParseEncoding(encoding) : fileConfig?.Decrypt?.Encoding,
      DacPort: cliOptions.DacPort
        ?? parseIntEnv(env, 'SQLSTEWARD_DAC_PORT')
        ?? fileConfig?.Decrypt?.DacPort,
      ExportDestination: cliOptions.Export
        ?? env.SQLSTEWARD_EXPORT_PATH
        ?? fileConfig?.Decrypt?.ExportDestination,
    },
  };
}

/**
 * Validates a definition encoding name.
 * @throws Error for anything but `ascii` or `utf8`
 */
export function ParseEncoding(value: string): DefinitionEncoding {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'ascii') {
    return 'ascii';
  }
  if (normalized === 'utf8' || normalized === 'utf-8') {
    return 'utf8';
  }
  throw new Error(`Unsupported encoding "${value}". Use ascii or utf8.`);
}

/**
 * Loads `.env` from `cwd` into `process.env`. Existing variables win.
 */
function loadEnv(cwd: string): NodeJS.ProcessEnv {
  dotenv.config({ path: path.join(cwd, '.env') });
  return process.env;
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Searches for and loads a config file.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig | null {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new Error(`Config file not found: ${fullPath}`);
  }

  // Search for config files
  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return null;
}

/**
 * Loads a single JSON config file.
 */
function loadFile(filePath: string): FileConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return ToFileConfig(NormalizeConfigKeys(raw), filePath);
}

/**
 * Known config key mappings from camelCase to PascalCase.
 * Supports both casings in JSON config files.
 */
const KEY_MAP: Record<string, string> = {
  database: 'Database',
  server: 'Server',
  port: 'Port',
  user: 'User',
  password: 'Password',
  options: 'Options',
  encrypt: 'Encrypt',
  trustServerCertificate: 'TrustServerCertificate',
  enableArithAbort: 'EnableArithAbort',
  requestTimeout: 'RequestTimeout',
  connectionTimeout: 'ConnectionTimeout',
  bulkCopy: 'BulkCopy',
  batchSize: 'BatchSize',
  keepNulls: 'KeepNulls',
  checkConstraints: 'CheckConstraints',
  fireTriggers: 'FireTriggers',
  tableLock: 'TableLock',
  decrypt: 'Decrypt',
  encoding: 'Encoding',
  dacPort: 'DacPort',
  exportDestination: 'ExportDestination',
};

/**
 * Recursively normalizes config object keys from camelCase to PascalCase.
 * Keys already in PascalCase are left unchanged. Unknown keys are preserved as-is.
 */
export function NormalizeConfigKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(NormalizeConfigKeys);
  }
  if (!isRecord(value)) {
    return value;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    normalized[KEY_MAP[key] ?? key] = NormalizeConfigKeys(child);
  }
  return normalized;
}

/**
 * Picks the known settings out of a normalized config object,
 * rejecting values of the wrong type.
 */
export function ToFileConfig(raw: unknown, source: string): FileConfig {
  if (!isRecord(raw)) {
    throw new Error(`Config file ${source} must contain a JSON object`);
  }

  const reader = new FieldReader(source);
  const config: FileConfig = {};

  const database = reader.ReadSection(raw, 'Database');
  if (database) {
    const options = reader.ReadSection(database, 'Options');
    config.Database = {
      Server: reader.ReadString(database, 'Server'),
      Port: reader.ReadNumber(database, 'Port'),
      Database: reader.ReadString(database, 'Database'),
      User: reader.ReadString(database, 'User'),
      Password: reader.ReadString(database, 'Password'),
      Options: options ? readConnectionOptions(reader, options) : undefined,
    };
  }

  const bulkCopy = reader.ReadSection(raw, 'BulkCopy');
  if (bulkCopy) {
    config.BulkCopy = {
      BatchSize: reader.ReadNumber(bulkCopy, 'BatchSize'),
      KeepNulls: reader.ReadBoolean(bulkCopy, 'KeepNulls'),
      CheckConstraints: reader.ReadBoolean(bulkCopy, 'CheckConstraints'),
      FireTriggers: reader.ReadBoolean(bulkCopy, 'FireTriggers'),
      TableLock: reader.ReadBoolean(bulkCopy, 'TableLock'),
    };
  }

  const decrypt = reader.ReadSection(raw, 'Decrypt');
  if (decrypt) {
    const encoding = reader.ReadString(decrypt, 'Encoding');
    config.Decrypt = {
      Encoding: encoding !== undefined ? ParseEncoding(encoding) : undefined,
      DacPort: reader.ReadNumber(decrypt, 'DacPort'),
      ExportDestination: reader.ReadString(decrypt, 'ExportDestination'),
    };
  }

  return config;
}

function readConnectionOptions(reader: FieldReader, options: Record<string, unknown>): DatabaseConnectionOptions {
  return {
    Encrypt: reader.ReadBoolean(options, 'Encrypt'),
    TrustServerCertificate: reader.ReadBoolean(options, 'TrustServerCertificate'),
    EnableArithAbort: reader.ReadBoolean(options, 'EnableArithAbort'),
    RequestTimeout: reader.ReadNumber(options, 'RequestTimeout'),
    ConnectionTimeout: reader.ReadNumber(options, 'ConnectionTimeout'),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed field access for config objects. Missing or null fields read as
 * undefined; a field of the wrong type is an error naming the file and key.
 */
class FieldReader {
  constructor(private readonly source: string) {}

  ReadSection(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = obj[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!isRecord(value)) {
      throw this.typeError(key, 'an object');
    }
    return value;
  }

  ReadString(obj: Record<string, unknown>, key: string): string | undefined {
    const value = obj[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw this.typeError(key, 'a string');
    }
    return value;
  }

  ReadNumber(obj: Record<string, unknown>, key: string): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number') {
      throw this.typeError(key, 'a number');
    }
    return value;
  }

  ReadBoolean(obj: Record<string, unknown>, key: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      throw this.typeError(key, 'true or false');
    }
    return value;
  }

  private typeError(key: string, expected: string): Error {
    return new Error(`Config file ${this.source}: "${key}" must be ${expected}`);
  }
}
