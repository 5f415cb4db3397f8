/**
 * Campaign Ledger - In-Memory State
 *
 * Holds the full data model. Campaign, DonationRecord and LedgerConfig objects
 * are immutable and replaced wholesale, so any reader holding a reference sees
 * a consistent record.
 */

import {
  Campaign,
  DonationRecord,
  Identity,
  LedgerConfig,
  LedgerSnapshot,
  WithdrawalRecord,
} from '../../shared/types';

function donationKey(campaignId: number, donor: Identity): string {
  return `${campaignId}:${donor}`;
}

export class LedgerState {
  private config: LedgerConfig;
  private readonly campaigns = new Map<number, Campaign>();
  private readonly donations = new Map<string, DonationRecord>();
  private readonly rosters = new Map<number, Identity[]>();
  private readonly withdrawals: WithdrawalRecord[] = [];
  private readonly activeIds = new Set<number>();

  constructor(config: LedgerConfig) {
    this.config = config;
  }

  static fromSnapshot(snapshot: LedgerSnapshot): LedgerState {
    const state = new LedgerState(snapshot.config);
    for (const campaign of snapshot.campaigns) {
      state.putCampaign(campaign);
    }
    for (const record of snapshot.donations) {
      state.putDonation(record);
    }
    for (const roster of snapshot.rosters) {
      state.rosters.set(roster.campaign_id, [...roster.donors]);
    }
    for (const withdrawal of snapshot.withdrawals) {
      state.withdrawals.push(withdrawal);
    }
    return state;
  }

  // ============================================
  // CONFIG
  // ============================================

  getConfig(): LedgerConfig {
    return this.config;
  }

  setConfig(config: LedgerConfig): void {
    this.config = config;
  }

  // ============================================
  // CAMPAIGNS
  // ============================================

  getCampaign(id: number): Campaign | undefined {
    return this.campaigns.get(id);
  }

  putCampaign(campaign: Campaign): void {
    this.campaigns.set(campaign.id, campaign);
    // Active index follows is_active on every write
    if (campaign.is_active) {
      this.activeIds.add(campaign.id);
    } else {
      this.activeIds.delete(campaign.id);
    }
  }

  /**
   * Only used to undo a creation that failed to persist
   */
  removeCampaign(id: number): void {
    this.campaigns.delete(id);
    this.activeIds.delete(id);
    this.rosters.delete(id);
  }

  getActiveIds(): number[] {
    return [...this.activeIds].sort((a, b) => a - b);
  }

  // ============================================
  // DONATIONS & ROSTERS
  // ============================================

  getDonation(campaignId: number, donor: Identity): DonationRecord | undefined {
    return this.donations.get(donationKey(campaignId, donor));
  }

  putDonation(record: DonationRecord): void {
    this.donations.set(donationKey(record.campaign_id, record.donor), record);
  }

  removeDonation(campaignId: number, donor: Identity): void {
    this.donations.delete(donationKey(campaignId, donor));
  }

  getRoster(campaignId: number): readonly Identity[] {
    return this.rosters.get(campaignId) ?? [];
  }

  appendToRoster(campaignId: number, donor: Identity): void {
    const roster = this.rosters.get(campaignId);
    if (roster) {
      roster.push(donor);
    } else {
      this.rosters.set(campaignId, [donor]);
    }
  }

  /**
   * Undo the most recent append (rollback only)
   */
  popFromRoster(campaignId: number, donor: Identity): void {
    const roster = this.rosters.get(campaignId);
    if (roster && roster[roster.length - 1] === donor) {
      roster.pop();
    }
  }

  // ============================================
  // WITHDRAWALS
  // ============================================

  appendWithdrawal(record: WithdrawalRecord): void {
    this.withdrawals.push(record);
  }

  getWithdrawals(campaignId?: number): WithdrawalRecord[] {
    return campaignId === undefined
      ? [...this.withdrawals]
      : this.withdrawals.filter(w => w.campaign_id === campaignId);
  }

  // ============================================
  // INSPECTION
  // ============================================

  listCampaigns(): Campaign[] {
    return [...this.campaigns.values()].sort((a, b) => a.id - b.id);
  }

  listDonations(): DonationRecord[] {
    return [...this.donations.values()];
  }

  toSnapshot(): LedgerSnapshot {
    return {
      config: this.config,
      campaigns: this.listCampaigns(),
      donations: this.listDonations(),
      rosters: [...this.rosters.entries()]
        .sort(([a], [b]) => a - b)
        .map(([campaign_id, donors]) => ({ campaign_id, donors: [...donors] })),
      withdrawals: [...this.withdrawals],
    };
  }
}
