/**
 * @module db/transaction
 * Scoped transactions that never commit.
 */

import { TransactionError, toError } from '../core/errors';

/**
 * The part of `mssql`'s `Transaction` a rolled-back scope relies on.
 * The driver emits `rollback` both for an explicit rollback and when
 * the server aborts the transaction on its own.
 */
export interface RollbackTransaction {
  begin(): Promise<unknown>;
  rollback(): Promise<void>;
  on(event: 'rollback', listener: (aborted: boolean) => void): unknown;
}

/**
 * Runs `work` inside a transaction that is always rolled back, whether
 * `work` resolves or throws.
 *
 * If the server already aborted the transaction (a batch error with
 * XACT_ABORT, for example), no second rollback is attempted.
 *
 * @param transaction - A new, not yet begun transaction, e.g. `new sql.Transaction(pool)`
 * @param work - Statements to run; every request must be bound to the given transaction
 * @returns Whatever `work` resolved with
 * @throws TransactionError if the rollback itself fails, since the changes
 *   made by `work` may then still be in place. Otherwise the error thrown by `work`.
 */
export async function WithRollback<T, TTransaction extends RollbackTransaction>(
  transaction: TTransaction,
  work: (transaction: TTransaction) => Promise<T>
): Promise<T> {
  let rolledBack = false;
  transaction.on('rollback', () => {
    rolledBack = true;
  });

  await transaction.begin();

  const rollback = async (): Promise<void> => {
    if (rolledBack) {
      return;
    }
    try {
      await transaction.rollback();
    } catch (rollbackErr) {
      throw new TransactionError(
        'Failed to roll back a temporary change; it may still be in effect',
        toError(rollbackErr)
      );
    }
  };

  const result = await work(transaction).catch(async (err: unknown) => {
    await rollback();
    throw err;
  });
  await rollback();
  return result;
}
