/**
 * Campaign Ledger - Ledger Module Export
 * THE BOOKS: Campaign accounting engine
 */

export {
  LedgerService,
  LedgerServiceOptions,
  LedgerIntegrityReport,
  Clock,
  systemClock,
} from './ledger.service';
export { LedgerError, LedgerErrorCode, TransferFailedError, isLedgerError } from './ledger.errors';
export { LedgerRepository, LedgerChange, PersistedLedger, RosterAppend } from './ledger.repository';
export { InMemoryLedgerRepository } from './memory.repository';
export { PostgresLedgerRepository } from './postgres.repository';
export { LedgerState } from './ledger.state';
export { SerialExecutor } from './serial-executor';
export { computeFeeSplit, isValidFeeBps, FeeSplit } from './fee';
