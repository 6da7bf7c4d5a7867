/**
 * @module bulk/row-stream
 * Adapts an `mssql` streaming request to an async iterable of rows.
 *
 * `mssql` streams rows as `row` events. The adapter buffers them, pauses
 * the request once `highWaterMark` rows are waiting, and resumes it when
 * the consumer has drained the buffer, so a slow bulk load never lets an
 * entire source table pile up in memory.
 */

import { toError } from '../core/errors';
import { Row } from './types';

/**
 * The streaming surface of an `mssql` `Request` that the adapter uses.
 */
export interface StreamingRequest {
  stream: boolean;
  on(event: 'row', listener: (row: Row) => void): unknown;
  on(event: 'error', listener: (err: unknown) => void): unknown;
  on(event: 'done', listener: () => void): unknown;
  pause(): boolean;
  resume(): unknown;
  cancel(): unknown;
  query(command: string): unknown;
}

interface StreamState {
  Finished: boolean;
  Failure: Error | null;
  Paused: boolean;
}

/**
 * Runs `query` on `request` in streaming mode and yields each row.
 *
 * If the consumer stops early (breaks out of its loop or throws), the
 * request is cancelled before the generator returns.
 *
 * @param request - A fresh request bound to the source pool, e.g. `new sql.Request(pool)`
 * @param query - Query producing the rows
 * @param highWaterMark - Buffered rows at which the request is paused
 * @throws The first error the request emits
 */
export async function* StreamQueryRows(
  request: StreamingRequest,
  query: string,
  highWaterMark: number = 5000
): AsyncGenerator<Row, void, undefined> {
  const buffered: Row[] = [];
  const state: StreamState = { Finished: false, Failure: null, Paused: false };
  let wake: (() => void) | null = null;

  const notify = (): void => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  request.stream = true;
  request.on('row', (row: Row) => {
    buffered.push(row);
    if (!state.Paused && buffered.length >= highWaterMark) {
      state.Paused = request.pause();
    }
    notify();
  });
  request.on('error', (err: unknown) => {
    state.Failure ??= toError(err);
    notify();
  });

  const completion = new Promise<void>((resolve) => {
    request.on('done', () => {
      state.Finished = true;
      notify();
      resolve();
    });
  });

  // In streaming mode the request reports through its events; the
  // returned value carries no rows and never rejects.
  void request.query(query);

  try {
    for (;;) {
      if (state.Failure) {
        throw state.Failure;
      }

      const row = buffered.shift();
      if (row !== undefined) {
        if (state.Paused && buffered.length === 0) {
          request.resume();
          state.Paused = false;
        }
        yield row;
        continue;
      }

      if (state.Finished) {
        return;
      }
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
    }
  } finally {
    if (!state.Finished) {
      request.cancel();
    }
    await completion;
  }
}
