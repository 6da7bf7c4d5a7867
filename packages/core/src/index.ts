/**
 * @module @sqlsteward/core
 *
 * SqlSteward: TypeScript administration tooling for SQL Server.
 * Bulk table copies with correct progress past two billion rows, recovery
 * of definitions created `WITH ENCRYPTION`, and index metadata reports.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { SqlSteward } from '@sqlsteward/core';
 *
 * const steward = new SqlSteward({
 *   Database: {
 *     Server: 'localhost',
 *     Database: 'Sales',
 *     User: 'sa',
 *     Password: 'test-secret',
 *   },
 *   Decrypt: { Encoding: 'ascii', ExportDestination: './recovered' },
 * });
 *
 * const result = await steward.DecryptObjects();
 * console.log(`Recovered ${result.Decrypted} of ${result.Results.length} objects`);
 *
 * await steward.Close();
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { SqlSteward } from './core/sql-steward';
export type {
  SqlStewardCallbacks,
  BulkCopyOverrides,
  CopyTableDataOptions,
  WriteTableDataOptions,
  TableCopyResult,
  DecryptObjectsOptions,
  DecryptObjectsResult,
  IndexInfoOptions,
} from './core/sql-steward';

// ─── Configuration ───────────────────────────────────────────────────
export { resolveConfig } from './core/config';
export type { SqlStewardConfig, BulkCopyConfig, DecryptConfig, ResolvedConfig } from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type { DatabaseConfig, DatabaseConnectionOptions, PoolOptions } from './db/types';
export { ConnectionManager, BuildPoolConfig } from './db/connection';
export { QuoteName, QualifiedName, ParseObjectName } from './db/identifiers';
export type { ObjectName } from './db/identifiers';
export { WithRollback } from './db/transaction';
export type { RollbackTransaction } from './db/transaction';

// ─── Bulk Copy ───────────────────────────────────────────────────────
export {
  INT32_MAX,
  CreateBulkCopyProgress,
  ComputeRowsCopiedDelta,
  AdvanceBulkCopyProgress,
  AdvanceRowsCopiedCounter,
} from './bulk/progress';
export type { BulkCopyProgress } from './bulk/progress';
export { CopyRows, CopyProgressTracker, ComputeRowsPerSecond } from './bulk/copier';
export type { CopyRowsOptions } from './bulk/copier';
export { StreamQueryRows } from './bulk/row-stream';
export type { StreamingRequest } from './bulk/row-stream';
export { SqlBatchWriter, GetWritableColumns, TableExists } from './bulk/batch-writer';
export type { BulkLoadOptions } from './bulk/batch-writer';
export { InferColumns, BuildTable } from './bulk/table-schema';
export type { ColumnSpec } from './bulk/table-schema';
export type {
  Row,
  RowsCopiedNotification,
  BulkBatchWriter,
  BulkCopyCallbacks,
  BulkCopyResult,
} from './bulk/types';

// ─── Decryption ──────────────────────────────────────────────────────
export { EncodeKnownPlain, DecryptWithKnownPlaintext } from './decrypt/known-plaintext';
export { BuildStandInDefinition, BuildKnownPlainText } from './decrypt/templates';
export { SqlDefinitionStore, MapEncryptedObjectRow } from './decrypt/definition-store';
export { ObjectDecryptor, FilterObjects } from './decrypt/decryptor';
export type { ObjectDecryptorOptions } from './decrypt/decryptor';
export { ExportDefinition, GetExportPath, SafePathSegment } from './decrypt/export';
export { ENCRYPTED_OBJECT_TYPES } from './decrypt/types';
export type {
  DefinitionEncoding,
  EncryptedObjectType,
  EncryptedObject,
  DecryptionResult,
  EncryptedDefinitionStore,
} from './decrypt/types';

// ─── Metadata ────────────────────────────────────────────────────────
export { BuildIndexInfoQuery, MapIndexInfoRow, COLUMN_LIST_SEPARATOR } from './metadata/index-info';
export type { IndexInfo, IndexInfoQuery, IndexInfoQueryOptions } from './metadata/index-info';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  SqlStewardError,
  BulkCopyError,
  BulkCopyProgressError,
  DecryptionError,
  DecryptionLengthError,
  TransactionError,
  ConnectionError,
  toError,
} from './core/errors';
