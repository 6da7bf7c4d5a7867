/**
 * @module core/errors
 * Custom error types for SqlSteward operations.
 */

/**
 * Base error class for all SqlSteward errors.
 * Provides a consistent error hierarchy with error codes for programmatic handling.
 */
export class SqlStewardError extends Error {
  /** Machine-readable error code for programmatic handling */
  readonly Code: string;

  constructor(code: string, message: string, cause?: Error) {
    super(message);
    this.name = 'SqlStewardError';
    this.Code = code;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when a bulk copy cannot be started or a batch fails to load.
 */
export class BulkCopyError extends SqlStewardError {
  /** Destination table of the failed copy */
  readonly DestinationTable: string;

  constructor(destinationTable: string, message: string, cause?: Error) {
    super('BULK_COPY_FAILED', message, cause);
    this.name = 'BulkCopyError';
    this.DestinationTable = destinationTable;
  }
}

/**
 * Thrown when the rows-copied correction would move the running total
 * backwards. Only reachable with out-of-range counter values.
 */
export class BulkCopyProgressError extends SqlStewardError {
  readonly ReportedRowsCopied: number;
  readonly PreviousRowsCopied: number;

  constructor(reported: number, previous: number) {
    super(
      'BULK_COPY_PROGRESS_INVARIANT',
      `Rows-copied counter went from ${previous} to ${reported}, ` +
        `which does not fit a 32-bit wrapping counter`
    );
    this.name = 'BulkCopyProgressError';
    this.ReportedRowsCopied = reported;
    this.PreviousRowsCopied = previous;
  }
}

/**
 * Thrown when an encrypted object definition cannot be recovered.
 * Always names the object it belongs to.
 */
export class DecryptionError extends SqlStewardError {
  /** Schema-qualified object name, e.g. `[dbo].[usp_Payroll]` */
  readonly ObjectName: string;

  constructor(objectName: string, message: string, cause?: Error, code: string = 'DECRYPTION_FAILED') {
    super(code, message, cause);
    this.name = 'DecryptionError';
    this.ObjectName = objectName;
  }
}

/**
 * Thrown when the known plaintext or known ciphertext is shorter than
 * the secret, or when a stand-in definition cannot be padded to size.
 */
export class DecryptionLengthError extends DecryptionError {
  readonly RequiredLength: number;
  readonly ActualLength: number;

  constructor(objectName: string, message: string, required: number, actual: number) {
    super(objectName, message, undefined, 'DECRYPTION_LENGTH_MISMATCH');
    this.name = 'DecryptionLengthError';
    this.RequiredLength = required;
    this.ActualLength = actual;
  }
}

/**
 * Thrown when a transaction fails to commit or rollback.
 */
export class TransactionError extends SqlStewardError {
  constructor(message: string, cause?: Error) {
    super('TRANSACTION_FAILED', message, cause);
    this.name = 'TransactionError';
  }
}

/**
 * Thrown when the connection to SQL Server cannot be established.
 */
export class ConnectionError extends SqlStewardError {
  constructor(message: string, cause?: Error) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
