/**
 * Campaign Ledger - Value Transfer Port
 *
 * The ledger never moves value itself. It books the movement, then hands a
 * PaymentInstruction to a ValueTransferGateway and waits for the result.
 *
 * Input: PaymentInstruction (Who, Amount, Why)
 * Output: TransferReceipt (Proof of movement)
 */

import { Identity } from '../../shared/types';

/**
 * Result type for gateway operations
 */
export type GatewayResult<T> =
  | { success: true; value: T }
  | { success: false; error: string; retryable: boolean };

/**
 * PaymentInstruction - What to pay
 */
export interface PaymentInstruction {
  readonly recipient: Identity;
  readonly amount: bigint;
  readonly reference_id: string;        // Withdrawal ID for reconciliation
  readonly memo?: string;
}

/**
 * TransferReceipt - Proof of payment
 */
export interface TransferReceipt {
  readonly tx_ref: string;
  readonly gateway: string;
  readonly recipient: Identity;
  readonly amount: bigint;
  readonly reference_id: string;
  readonly processed_at: Date;
  readonly status: 'CLEARED' | 'REVERSED';
}

/**
 * ValueTransferGateway - Moves value out of ledger custody
 *
 * transfer() may call back into the ledger before it resolves.
 * reverse() undoes a CLEARED transfer when a later leg of the same
 * withdrawal fails.
 */
export interface ValueTransferGateway {
  readonly name: string;

  transfer(instruction: PaymentInstruction): Promise<GatewayResult<TransferReceipt>>;

  reverse(txRef: string, reason: string): Promise<GatewayResult<TransferReceipt>>;
}

/**
 * GatewayError - Thrown by gateway implementations
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * InsufficientCustodyError - Gateway holds less value than the instruction asks for
 */
export class InsufficientCustodyError extends GatewayError {
  constructor(
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(
      `Custody balance too low: requested ${requested}, available ${available}`,
      'INSUFFICIENT_CUSTODY',
      false
    );
    this.name = 'InsufficientCustodyError';
  }
}
