/**
 * Campaign Ledger - Transfers Module Export
 * THE AIR GAP: the ledger books value, gateways move it
 */

export {
  ValueTransferGateway,
  PaymentInstruction,
  TransferReceipt,
  GatewayResult,
  GatewayError,
  InsufficientCustodyError,
} from './transfer.port';

export { MockCustodyGateway, MockCustodyOptions, FailingTransferGateway } from './custody.mock';
