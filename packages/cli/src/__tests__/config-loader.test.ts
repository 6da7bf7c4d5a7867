import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CLIOptions, LoadConfig, NormalizeConfigKeys, ParseEncoding, ToFileConfig } from '../config-loader';

const credentials = {
  Server: 'localhost',
  Database: 'Sales',
  User: 'sa',
  Password: 'test-secret',
};

describe('LoadConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'sqlsteward-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): void {
    fs.writeFileSync(path.join(cwd, name), JSON.stringify(content), 'utf-8');
  }

  it('applies connection defaults', () => {
    const config = LoadConfig(credentials, cwd, {});

    expect(config.Database).toEqual({
      Server: 'localhost',
      Port: 1433,
      Database: 'Sales',
      User: 'sa',
      Password: 'test-secret',
      Options: { TrustServerCertificate: true, Encrypt: false, RequestTimeout: 300_000 },
    });
  });

  it('prefers CLI flags over env over the config file', () => {
    writeConfig('sqlsteward.json', {
      Database: { Server: 'file-host', Port: 1500, Database: 'FileDb', User: 'file-user', Password: 'file-pass' },
    });

    const config = LoadConfig({ Server: 'cli-host' }, cwd, {
      SQLSTEWARD_SERVER: 'env-host',
      SQLSTEWARD_USER: 'env-user',
    });

    expect(config.Database.Server).toBe('cli-host');
    expect(config.Database.User).toBe('env-user');
    expect(config.Database.Database).toBe('FileDb');
    expect(config.Database.Password).toBe('file-pass');
    expect(config.Database.Port).toBe(1500);
  });

  it('falls back to DB_* variables', () => {
    const config = LoadConfig({}, cwd, {
      DB_HOST: 'db-host',
      DB_PORT: '1444',
      DB_DATABASE: 'Archive',
      DB_USER: 'loader',
      DB_PASSWORD: 'test-secret',
    });

    expect(config.Database.Server).toBe('db-host');
    expect(config.Database.Port).toBe(1444);
    expect(config.Database.Database).toBe('Archive');
    expect(config.Database.User).toBe('loader');
  });

  it('prefers SQLSTEWARD_* over DB_* variables', () => {
    const config = LoadConfig(credentials, cwd, { SQLSTEWARD_PORT: '2433', DB_PORT: '1444' });
    expect(config.Database.Port).toBe(2433);
  });

  it('reads camelCase keys from sqlsteward.config.json', () => {
    writeConfig('sqlsteward.config.json', {
      database: {
        server: 'file-host',
        database: 'FileDb',
        user: 'file-user',
        password: 'test-secret',
        options: { encrypt: true, connectionTimeout: 5000 },
      },
      bulkCopy: { batchSize: 2000, tableLock: true },
      decrypt: { encoding: 'utf8', dacPort: 51434, exportDestination: './recovered' },
    });

    const config = LoadConfig({}, cwd, {});

    expect(config.Database.Server).toBe('file-host');
    expect(config.Database.Options?.Encrypt).toBe(true);
    expect(config.Database.Options?.ConnectionTimeout).toBe(5000);
    expect(config.BulkCopy?.BatchSize).toBe(2000);
    expect(config.BulkCopy?.TableLock).toBe(true);
    expect(config.Decrypt).toEqual({ Encoding: 'utf8', DacPort: 51434, ExportDestination: './recovered' });
  });

  it('lets flags override file decryption settings', () => {
    writeConfig('sqlsteward.json', { Decrypt: { Encoding: 'utf8', DacPort: 51434 } });

    const config = LoadConfig({ ...credentials, Encoding: 'ascii', DacPort: 1434, Export: '/tmp/out' }, cwd, {});

    expect(config.Decrypt).toEqual({ Encoding: 'ascii', DacPort: 1434, ExportDestination: '/tmp/out' });
  });

  it('reads batch size from the environment', () => {
    const config = LoadConfig(credentials, cwd, { SQLSTEWARD_BATCH_SIZE: '750' });
    expect(config.BulkCopy?.BatchSize).toBe(750);
  });

  it('loads an explicit config file path', () => {
    fs.mkdirSync(path.join(cwd, 'conf'));
    fs.writeFileSync(
      path.join(cwd, 'conf', 'prod.json'),
      JSON.stringify({ Database: { ...credentials, Server: 'prod-host' } }),
      'utf-8'
    );

    const config = LoadConfig({ Config: 'conf/prod.json' }, cwd, {});
    expect(config.Database.Server).toBe('prod-host');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => LoadConfig({ ...credentials, Config: 'missing.json' }, cwd, {})).toThrow(
      `Config file not found: ${path.join(cwd, 'missing.json')}`
    );
  });

  it('rejects a config file that is not JSON', () => {
    fs.writeFileSync(path.join(cwd, 'sqlsteward.json'), '{ not json', 'utf-8');
    expect(() => LoadConfig(credentials, cwd, {})).toThrow(
      `Config file ${path.join(cwd, 'sqlsteward.json')} is not valid JSON`
    );
  });

  it.each<[CLIOptions, string]>([
    [{ Database: 'Sales', User: 'sa', Password: 'test-secret' }, 'Server is required. Set via --server, SQLSTEWARD_SERVER env var, or config file.'],
    [{ Server: 'localhost', User: 'sa', Password: 'test-secret' }, 'Database name is required. Set via --database, SQLSTEWARD_DATABASE env var, or config file.'],
    [{ Server: 'localhost', Database: 'Sales', Password: 'test-secret' }, 'Database user is required. Set via --user, SQLSTEWARD_USER env var, or config file.'],
    [{ Server: 'localhost', Database: 'Sales', User: 'sa' }, 'Database password is required. Set via --password, SQLSTEWARD_PASSWORD env var, or config file.'],
  ])('rejects incomplete credentials %#', (options: CLIOptions, message: string) => {
    expect(() => LoadConfig(options, cwd, {})).toThrow(message);
  });

  it('rejects a non-numeric port variable', () => {
    expect(() => LoadConfig(credentials, cwd, { SQLSTEWARD_PORT: 'abc' })).toThrow(
      'SQLSTEWARD_PORT must be an integer, got "abc"'
    );
  });
});

describe('ParseEncoding', () => {
  it('accepts ascii and utf8 spellings', () => {
    expect(ParseEncoding('ascii')).toBe('ascii');
    expect(ParseEncoding('UTF8')).toBe('utf8');
    expect(ParseEncoding('utf-8')).toBe('utf8');
  });

  it('rejects other encodings', () => {
    expect(() => ParseEncoding('latin1')).toThrow('Unsupported encoding "latin1". Use ascii or utf8.');
  });
});

describe('NormalizeConfigKeys', () => {
  it('maps known camelCase keys and keeps unknown ones', () => {
    expect(NormalizeConfigKeys({ database: { server: 'x', custom: 1 }, Other: [{ port: 1 }] })).toEqual({
      Database: { Server: 'x', custom: 1 },
      Other: [{ Port: 1 }],
    });
  });

  it('leaves scalars alone', () => {
    expect(NormalizeConfigKeys('text')).toBe('text');
    expect(NormalizeConfigKeys(null)).toBeNull();
  });
});

describe('ToFileConfig', () => {
  it('rejects a value of the wrong type', () => {
    expect(() => ToFileConfig({ Database: { Port: '1433' } }, 'sqlsteward.json')).toThrow(
      'Config file sqlsteward.json: "Port" must be a number'
    );
  });

  it('rejects a file that is not an object', () => {
    expect(() => ToFileConfig([1, 2], 'sqlsteward.json')).toThrow(
      'Config file sqlsteward.json must contain a JSON object'
    );
  });

  it('treats null sections as absent', () => {
    expect(ToFileConfig({ Database: null }, 'sqlsteward.json')).toEqual({});
  });
});
