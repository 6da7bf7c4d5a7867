/**
 * @module bulk/types
 * Type definitions for bulk copy operations.
 */

/**
 * A single row as read from a query or supplied by the caller,
 * keyed by column name.
 */
export type Row = Record<string, unknown>;

/**
 * Fired after every batch is loaded.
 */
export interface RowsCopiedNotification {
  /**
   * Raw rows-copied counter, as the driver reports it. Wraps after
   * `INT32_MAX`, so it is only useful for diagnostics.
   */
  RowsCopied: number;

  /** Corrected total rows copied so far */
  Total: number;

  /** 1-based number of the batch that just finished */
  Batch: number;

  /** Milliseconds since the copy started */
  ElapsedMS: number;

  /** Average throughput since the copy started */
  RowsPerSecond: number;
}

/**
 * Loads one batch of rows into the destination.
 * Implemented over `mssql` bulk loads by `SqlBatchWriter`.
 */
export interface BulkBatchWriter {
  /**
   * Writes the rows and resolves with the number of rows the server
   * reported as affected.
   */
  WriteBatch(rows: Row[]): Promise<number>;
}

/**
 * Callbacks for observing a running copy.
 */
export interface BulkCopyCallbacks {
  /** Called synchronously after each batch, before the next is read */
  OnRowsCopied?: (notification: RowsCopiedNotification) => void;
}

/**
 * Outcome of a completed copy.
 */
export interface BulkCopyResult {
  /** Corrected total rows copied */
  RowsCopied: number;

  /** Number of batches sent */
  Batches: number;

  /** Total execution time in milliseconds */
  ElapsedMS: number;

  /** Average throughput over the whole copy */
  RowsPerSecond: number;
}
