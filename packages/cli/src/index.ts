/**
 * @module @sqlsteward/cli
 *
 * CLI package for SqlSteward.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, ParseEncoding, NormalizeConfigKeys, ToFileConfig } from './config-loader';
export type { CLIOptions, FileConfig } from './config-loader';
export { RunCopyTable } from './commands/copy-table';
export { RunWriteTable, ReadRowsFile } from './commands/write-table';
export { RunDecrypt } from './commands/decrypt';
export { RunIndexInfo } from './commands/index-info';
