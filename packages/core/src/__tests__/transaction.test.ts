import { EventEmitter } from 'events';
import { describe, it, expect } from 'vitest';
import { WithRollback } from '../db/transaction';
import { TransactionError } from '../core/errors';

/** Stands in for an `mssql` transaction, recording begin and rollback calls */
class FakeTransaction extends EventEmitter {
  readonly Calls: string[] = [];

  constructor(private readonly rollbackFailure?: Error) {
    super();
  }

  async begin(): Promise<this> {
    this.Calls.push('begin');
    return this;
  }

  async rollback(): Promise<void> {
    this.Calls.push('rollback');
    if (this.rollbackFailure) {
      throw this.rollbackFailure;
    }
    this.emit('rollback', false);
  }

  /** What the driver reports when the server aborts the transaction itself */
  Abort(): void {
    this.emit('rollback', true);
  }
}

describe('WithRollback', () => {
  it('rolls back after the work resolves', async () => {
    const transaction = new FakeTransaction();

    const result = await WithRollback(transaction, async (tx) => {
      tx.Calls.push('work');
      return 42;
    });

    expect(result).toBe(42);
    expect(transaction.Calls).toEqual(['begin', 'work', 'rollback']);
  });

  it('rolls back and rethrows when the work throws', async () => {
    const transaction = new FakeTransaction();

    await expect(
      WithRollback(transaction, async () => {
        throw new Error('Invalid column name');
      })
    ).rejects.toThrow('Invalid column name');
    expect(transaction.Calls).toEqual(['begin', 'rollback']);
  });

  it('skips the rollback once the server has aborted the transaction', async () => {
    const transaction = new FakeTransaction();

    await expect(
      WithRollback(transaction, async (tx) => {
        tx.Abort();
        throw new Error('Transaction was aborted');
      })
    ).rejects.toThrow('Transaction was aborted');
    expect(transaction.Calls).toEqual(['begin']);
  });

  it('reports a failed rollback as a TransactionError', async () => {
    const cause = new Error('connection lost');
    const transaction = new FakeTransaction(cause);

    const promise = WithRollback(transaction, async () => 'done');

    await expect(promise).rejects.toThrow(TransactionError);
    await expect(promise).rejects.toThrow('Failed to roll back a temporary change; it may still be in effect');
    await expect(promise).rejects.toHaveProperty('cause', cause);
    await expect(promise).rejects.toHaveProperty('Code', 'TRANSACTION_FAILED');
  });

  it('prefers the rollback failure over the work error', async () => {
    const transaction = new FakeTransaction(new Error('connection lost'));

    await expect(
      WithRollback(transaction, async () => {
        throw new Error('Invalid column name');
      })
    ).rejects.toThrow(TransactionError);
    expect(transaction.Calls).toEqual(['begin', 'rollback']);
  });
});
