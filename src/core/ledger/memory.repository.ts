/**
 * Campaign Ledger - In-Memory Repository
 * Used in MOCK MODE (no DATABASE_URL) and in tests.
 */

import { LedgerNotification } from '../../shared/types';
import { LedgerState } from './ledger.state';
import { LedgerChange, LedgerRepository, PersistedLedger } from './ledger.repository';

export class InMemoryLedgerRepository implements LedgerRepository {
  private state: LedgerState | null = null;
  private readonly notifications: LedgerNotification[] = [];
  private readonly commits: LedgerChange[] = [];

  async load(): Promise<PersistedLedger | null> {
    if (!this.state) {
      return null;
    }
    return {
      snapshot: this.state.toSnapshot(),
      notifications: [...this.notifications],
    };
  }

  async commit(change: LedgerChange): Promise<void> {
    if (!this.state) {
      if (!change.config) {
        throw new Error('First commit must carry the ledger config');
      }
      this.state = new LedgerState(change.config);
    }

    if (change.config) this.state.setConfig(change.config);
    if (change.campaign) this.state.putCampaign(change.campaign);
    if (change.donation) this.state.putDonation(change.donation);
    if (change.roster_append) {
      this.state.appendToRoster(change.roster_append.campaign_id, change.roster_append.donor);
    }
    if (change.withdrawal) this.state.appendWithdrawal(change.withdrawal);
    if (change.notification) this.notifications.push(change.notification);

    this.commits.push(change);
  }

  /**
   * Get commit history (for testing)
   */
  getCommits(): LedgerChange[] {
    return [...this.commits];
  }
}
