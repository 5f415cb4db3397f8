/**
 * Campaign Ledger - Error Types
 *
 * Every LedgerError is raised BEFORE state is committed, or after the
 * partial effects of the failed operation have been rolled back.
 * None of them are retried by the ledger itself.
 */

export type LedgerErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'INACTIVE'
  | 'INSUFFICIENT_FUNDS'
  | 'TRANSFER_FAILED';

export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * TransferFailedError - The Value Transfer Mechanism could not deliver funds
 * raised_amount has already been restored when this is thrown.
 */
export class TransferFailedError extends LedgerError {
  constructor(
    public readonly recipient: string,
    public readonly amount: bigint,
    public readonly reason: string,
    public readonly retryable: boolean
  ) {
    super('TRANSFER_FAILED', `Transfer of ${amount} to ${recipient} failed: ${reason}`);
    this.name = 'TransferFailedError';
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
