/**
 * @module bulk/copier
 * Batches rows from any source into a bulk writer and reports progress.
 *
 * The loop is driver-agnostic: rows come from an (async) iterable and go
 * to a `BulkBatchWriter`. After each batch the writer's affected-row count
 * advances a 32-bit rows-copied counter, exactly as the bulk-copy driver
 * would report it, and the counter is corrected into a running total
 * before callbacks see it.
 */

import { SqlStewardError } from '../core/errors';
import {
  AdvanceBulkCopyProgress,
  AdvanceRowsCopiedCounter,
  CreateBulkCopyProgress,
} from './progress';
import { BulkBatchWriter, BulkCopyCallbacks, BulkCopyResult, Row, RowsCopiedNotification } from './types';

/**
 * Options for a single `CopyRows` run.
 */
export interface CopyRowsOptions {
  /** Rows per batch. Must be a positive integer */
  BatchSize: number;
}

/**
 * Copies every row from `source` into `writer`, `BatchSize` rows at a time.
 *
 * Batches run strictly one after another. `OnRowsCopied` fires on the
 * same call stack once each batch has been written, so the progress
 * state never needs synchronization.
 *
 * @param source - Rows to copy
 * @param writer - Destination for each batch
 * @param options - Batch sizing
 * @param callbacks - Optional progress callbacks
 * @returns Totals for the whole copy
 * @throws SqlStewardError (`INVALID_BATCH_SIZE`) for a non-positive batch size.
 *   Errors from the source or writer propagate unchanged.
 */
export async function CopyRows(
  source: AsyncIterable<Row> | Iterable<Row>,
  writer: BulkBatchWriter,
  options: CopyRowsOptions,
  callbacks: BulkCopyCallbacks = {}
): Promise<BulkCopyResult> {
  if (!Number.isInteger(options.BatchSize) || options.BatchSize < 1) {
    throw new SqlStewardError(
      'INVALID_BATCH_SIZE',
      `Batch size must be a positive integer, got ${options.BatchSize}`
    );
  }

  const startTime = Date.now();
  let progress = CreateBulkCopyProgress();
  let rowsCopiedCounter = 0;
  let batches = 0;
  let buffer: Row[] = [];

  const flush = async (): Promise<void> => {
    const rowsAffected = await writer.WriteBatch(buffer);
    buffer = [];
    batches++;

    rowsCopiedCounter = AdvanceRowsCopiedCounter(rowsCopiedCounter, rowsAffected);
    progress = AdvanceBulkCopyProgress(progress, rowsCopiedCounter);

    const elapsedMS = Date.now() - startTime;
    callbacks.OnRowsCopied?.({
      RowsCopied: rowsCopiedCounter,
      Total: progress.Total,
      Batch: batches,
      ElapsedMS: elapsedMS,
      RowsPerSecond: ComputeRowsPerSecond(progress.Total, elapsedMS),
    });
  };

  for await (const row of source) {
    buffer.push(row);
    if (buffer.length >= options.BatchSize) {
      await flush();
    }
  }
  if (buffer.length > 0) {
    await flush();
  }

  const elapsedMS = Date.now() - startTime;
  return {
    RowsCopied: progress.Total,
    Batches: batches,
    ElapsedMS: elapsedMS,
    RowsPerSecond: ComputeRowsPerSecond(progress.Total, elapsedMS),
  };
}

/**
 * Remembers the latest batch notification of a copy while forwarding it,
 * so a copy that fails part-way can still report how far it got.
 */
export class CopyProgressTracker {
  private latest: RowsCopiedNotification | null = null;

  constructor(private readonly forward?: (notification: RowsCopiedNotification) => void) {}

  /** Pass as `BulkCopyCallbacks.OnRowsCopied` */
  readonly OnRowsCopied = (notification: RowsCopiedNotification): void => {
    this.latest = notification;
    this.forward?.(notification);
  };

  /** Corrected rows copied by the batches that completed */
  get RowsCopied(): number {
    return this.latest?.Total ?? 0;
  }

  /** Batches that completed */
  get Batches(): number {
    return this.latest?.Batch ?? 0;
  }
}

/**
 * Average rows per second, rounded. Zero when no time has elapsed.
 */
export function ComputeRowsPerSecond(rows: number, elapsedMS: number): number {
  if (elapsedMS <= 0) {
    return 0;
  }
  return Math.round((rows * 1000) / elapsedMS);
}
