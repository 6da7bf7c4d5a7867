/**
 * @module core/config
 * SqlSteward configuration types and defaults.
 */

import { DatabaseConfig } from '../db/types';
import { DefinitionEncoding } from '../decrypt/types';

/**
 * Complete configuration for a SqlSteward instance.
 */
export interface SqlStewardConfig {
  /** SQL Server connection settings */
  Database: DatabaseConfig;

  /** Defaults for bulk copy operations */
  BulkCopy?: BulkCopyConfig;

  /** Settings for recovering encrypted object definitions */
  Decrypt?: DecryptConfig;
}

/**
 * Bulk copy defaults. Individual operations may override any of these.
 */
export interface BulkCopyConfig {
  /**
   * Rows sent to the server per bulk load.
   * A row-copied notification fires after every batch.
   *
   * Defaults to 50000.
   */
  BatchSize?: number;

  /** Preserve NULLs instead of applying column defaults. Defaults to false */
  KeepNulls?: boolean;

  /** Check constraints on the destination while loading. Defaults to false */
  CheckConstraints?: boolean;

  /** Fire insert triggers on the destination. Defaults to false */
  FireTriggers?: boolean;

  /** Take a table lock for the duration of each batch. Defaults to false */
  TableLock?: boolean;
}

/**
 * Settings for the known-plaintext decryptor.
 */
export interface DecryptConfig {
  /**
   * Encoding applied to both the real and the stand-in definitions.
   * Defaults to `'ascii'`.
   */
  Encoding?: DefinitionEncoding;

  /**
   * Port of the Dedicated Admin Connection.
   * Defaults to 1434.
   */
  DacPort?: number;

  /**
   * Directory to write recovered definitions into, one `.sql` file per
   * object. Nothing is written when null.
   */
  ExportDestination?: string | null;
}

/**
 * Fully-defaulted configuration, as used internally.
 */
export interface ResolvedConfig {
  Database: DatabaseConfig;
  BulkCopy: Required<BulkCopyConfig>;
  Decrypt: Required<DecryptConfig>;
}

/**
 * Merges user-provided config with defaults.
 * @param config - Partial configuration provided by the user
 * @returns Complete configuration with all defaults applied
 */
export function resolveConfig(config: SqlStewardConfig): ResolvedConfig {
  return {
    Database: config.Database,
    BulkCopy: {
      BatchSize: config.BulkCopy?.BatchSize ?? 50_000,
      KeepNulls: config.BulkCopy?.KeepNulls ?? false,
      CheckConstraints: config.BulkCopy?.CheckConstraints ?? false,
      FireTriggers: config.BulkCopy?.FireTriggers ?? false,
      TableLock: config.BulkCopy?.TableLock ?? false,
    },
    Decrypt: {
      Encoding: config.Decrypt?.Encoding ?? 'ascii',
      DacPort: config.Decrypt?.DacPort ?? 1434,
      ExportDestination: config.Decrypt?.ExportDestination ?? null,
    },
  };
}
