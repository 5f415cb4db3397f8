/**
 * Campaign Ledger - Repository Port
 *
 * The ledger keeps its working state in memory and writes every committed
 * change through this port. One commit = one operation; implementations must
 * apply a commit atomically (all rows or none).
 */

import {
  Campaign,
  DonationRecord,
  Identity,
  LedgerConfig,
  LedgerNotification,
  LedgerSnapshot,
  WithdrawalRecord,
} from '../../shared/types';

export interface RosterAppend {
  readonly campaign_id: number;
  readonly donor: Identity;
  readonly position: number;  // 0-based index in the roster
}

/**
 * LedgerChange - Rows written by a single successful operation
 */
export interface LedgerChange {
  readonly config?: LedgerConfig;
  readonly campaign?: Campaign;
  readonly donation?: DonationRecord;
  readonly roster_append?: RosterAppend;
  readonly withdrawal?: WithdrawalRecord;
  readonly notification?: LedgerNotification;
}

export interface PersistedLedger {
  readonly snapshot: LedgerSnapshot;
  readonly notifications: LedgerNotification[];
}

export interface LedgerRepository {
  /**
   * Load persisted state, or null if nothing has been written yet
   */
  load(): Promise<PersistedLedger | null>;

  /**
   * Persist one operation's changes atomically
   */
  commit(change: LedgerChange): Promise<void>;
}
