/**
 * Campaign Ledger - Mock Custody Gateway
 * In-process implementation of the Value Transfer Mechanism
 *
 * DESIGN:
 * - Holds the value escrowed by donations (deposit)
 * - Pays recipients out of that custody balance (transfer)
 * - Can undo a cleared payment (reverse)
 * - Optional interceptor runs mid-transfer, to simulate a recipient that calls back into the ledger
 */

import { v4 as uuidv4 } from 'uuid';
import { Identity } from '../../shared/types';
import {
  GatewayResult,
  InsufficientCustodyError,
  PaymentInstruction,
  TransferReceipt,
  ValueTransferGateway,
} from './transfer.port';

export interface MockCustodyOptions {
  /** Recipients whose transfers are refused */
  rejectRecipients?: Iterable<Identity>;
  /** Runs after custody is debited and before the receipt is returned */
  onTransfer?: (instruction: PaymentInstruction) => Promise<void>;
  /** Suppress per-transfer logging */
  quiet?: boolean;
}

export class MockCustodyGateway implements ValueTransferGateway {
  readonly name = 'CUSTODY_MOCK';

  private custodyBalance = 0n;
  private readonly paidOut = new Map<Identity, bigint>();
  private readonly transferHistory = new Map<string, TransferReceipt>();
  private readonly rejectRecipients: Set<Identity>;

  constructor(private readonly options: MockCustodyOptions = {}) {
    this.rejectRecipients = new Set(options.rejectRecipients ?? []);
  }

  /**
   * Escrow value attached to a donation
   */
  deposit(from: Identity, amount: bigint): void {
    if (amount <= 0n) {
      throw new RangeError(`Deposit must be positive: ${amount}`);
    }
    this.custodyBalance += amount;
    this.log(`Escrowed ${amount} from ${from} (custody=${this.custodyBalance})`);
  }

  async transfer(instruction: PaymentInstruction): Promise<GatewayResult<TransferReceipt>> {
    this.log(`Transferring ${instruction.amount} to ${instruction.recipient} (ref ${instruction.reference_id})`);

    if (this.rejectRecipients.has(instruction.recipient)) {
      console.error(`[Custody] REJECTED: recipient ${instruction.recipient} refused the transfer`);
      return { success: false, error: `Recipient ${instruction.recipient} rejected transfer`, retryable: false };
    }

    if (instruction.amount > this.custodyBalance) {
      throw new InsufficientCustodyError(instruction.amount, this.custodyBalance);
    }

    this.custodyBalance -= instruction.amount;
    this.paidOut.set(instruction.recipient, this.getPaidOut(instruction.recipient) + instruction.amount);

    if (this.options.onTransfer) {
      await this.options.onTransfer(instruction);
    }

    const receipt: TransferReceipt = {
      tx_ref: `tx_custody_${uuidv4()}`,
      gateway: this.name,
      recipient: instruction.recipient,
      amount: instruction.amount,
      reference_id: instruction.reference_id,
      processed_at: new Date(),
      status: 'CLEARED',
    };
    this.transferHistory.set(receipt.tx_ref, receipt);

    this.log(`SUCCESS: ${receipt.tx_ref}`);
    return { success: true, value: receipt };
  }

  async reverse(txRef: string, reason: string): Promise<GatewayResult<TransferReceipt>> {
    const receipt = this.transferHistory.get(txRef);
    if (!receipt) {
      return { success: false, error: `Transfer not found: ${txRef}`, retryable: false };
    }
    if (receipt.status === 'REVERSED') {
      return { success: true, value: receipt };
    }

    this.custodyBalance += receipt.amount;
    this.paidOut.set(receipt.recipient, this.getPaidOut(receipt.recipient) - receipt.amount);

    const reversed: TransferReceipt = { ...receipt, status: 'REVERSED', processed_at: new Date() };
    this.transferHistory.set(txRef, reversed);

    this.log(`REVERSED ${txRef}: ${reason}`);
    return { success: true, value: reversed };
  }

  getCustodyBalance(): bigint {
    return this.custodyBalance;
  }

  getPaidOut(recipient: Identity): bigint {
    return this.paidOut.get(recipient) ?? 0n;
  }

  /**
   * Get all transfer history (for testing)
   */
  getTransferHistory(): TransferReceipt[] {
    return Array.from(this.transferHistory.values());
  }

  private log(message: string): void {
    if (!this.options.quiet) {
      console.log(`[Custody] ${message}`);
    }
  }
}

/**
 * FailingTransferGateway - For testing failure scenarios
 */
export class FailingTransferGateway implements ValueTransferGateway {
  readonly name = 'CUSTODY_FAILING';

  constructor(private readonly failureMessage: string = 'Simulated transfer failure') {}

  async transfer(_instruction: PaymentInstruction): Promise<GatewayResult<TransferReceipt>> {
    return { success: false, error: this.failureMessage, retryable: true };
  }

  async reverse(_txRef: string, _reason: string): Promise<GatewayResult<TransferReceipt>> {
    return { success: false, error: 'Gateway unavailable', retryable: true };
  }
}
