/**
 * @module bulk/progress
 * Turns the bulk-copy driver's 32-bit rows-copied counter into a
 * monotonically increasing total.
 *
 * The driver reports cumulative rows copied as a signed 32-bit integer.
 * Once a copy passes `INT32_MAX` rows the reported value wraps back to a
 * small number, so a naive reader would see progress go backwards. The
 * helpers here keep the last raw value and a running total side by side
 * and correct for the wrap.
 */

import { BulkCopyProgressError } from '../core/errors';

/** Largest value the driver's rows-copied counter can hold */
export const INT32_MAX = 2_147_483_647;

/**
 * Running state for one bulk copy.
 * Owned by the call performing the copy; never shared.
 */
export interface BulkCopyProgress {
  /** Last raw value reported by the driver (not corrected) */
  PreviousReported: number;

  /** Corrected total rows copied so far */
  Total: number;
}

/**
 * Returns the starting progress state for a new copy.
 */
export function CreateBulkCopyProgress(): BulkCopyProgress {
  return { PreviousReported: 0, Total: 0 };
}

/**
 * Computes how many rows were copied since the previous notification.
 *
 * - `reported >= previous`: normal progress, delta is the difference.
 * - `reported < previous`: the counter wrapped past `INT32_MAX` and kept
 *   counting from zero, so the delta is what remained before the wrap
 *   plus what was counted after it.
 *
 * @param reportedRowsCopied - Raw counter value from this notification
 * @param previousRowsCopied - Raw counter value from the previous notification (0 on the first)
 * @throws BulkCopyProgressError if either value is outside `0..INT32_MAX`, which would
 *   make the delta negative
 *
 * @example
 * ```typescript
 * ComputeRowsCopiedDelta(1500, 1000);           // 500
 * ComputeRowsCopiedDelta(50, INT32_MAX - 10);   // 60
 * ```
 */
export function ComputeRowsCopiedDelta(reportedRowsCopied: number, previousRowsCopied: number): number {
  if (!isCounterValue(reportedRowsCopied) || !isCounterValue(previousRowsCopied)) {
    throw new BulkCopyProgressError(reportedRowsCopied, previousRowsCopied);
  }

  return reportedRowsCopied >= previousRowsCopied
    ? reportedRowsCopied - previousRowsCopied
    : INT32_MAX - previousRowsCopied + reportedRowsCopied;
}

function isCounterValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= INT32_MAX;
}

/**
 * Applies one driver notification to the progress state.
 * Returns a new state; the input is not modified.
 */
export function AdvanceBulkCopyProgress(progress: BulkCopyProgress, reportedRowsCopied: number): BulkCopyProgress {
  const delta = ComputeRowsCopiedDelta(reportedRowsCopied, progress.PreviousReported);
  return {
    PreviousReported: reportedRowsCopied,
    Total: progress.Total + delta,
  };
}

/**
 * Advances a driver-side rows-copied counter by one batch, wrapping the
 * same way the driver does once the counter passes `INT32_MAX`.
 */
export function AdvanceRowsCopiedCounter(counter: number, rowsInBatch: number): number {
  const next = counter + rowsInBatch;
  return next > INT32_MAX ? next - INT32_MAX : next;
}
