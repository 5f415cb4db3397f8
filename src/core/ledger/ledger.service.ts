/**
 * Campaign Ledger - Ledger Service
 * THE BOOKS: Campaigns, donations, withdrawals and the platform fee
 *
 * ACCOUNTING LAWS (checked on every call):
 * 1. CONSERVATION: raised_amount = SUM(donations) - SUM(withdrawn amounts)
 * 2. NO OVERDRAFT: a withdrawal larger than raised_amount is rejected in full
 * 3. ALL-OR-NOTHING: a failed call leaves the books exactly as they were
 *
 * WITHDRAWAL ORDER IS MANDATORY:
 *   debit raised_amount -> pay owner -> pay platform fee -> record
 * The debit happens BEFORE control leaves the ledger, so a gateway that
 * re-enters withdrawFunds() mid-transfer sees the reduced balance.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Campaign,
  CampaignView,
  CreateCampaignInput,
  Identity,
  LedgerConfig,
  LedgerNotification,
  LedgerSnapshot,
  MAX_PLATFORM_FEE_BPS,
  NotificationEvent,
  WithdrawalRecord,
  isValidIdentity,
} from '../../shared/types';
import { NotificationListener, NotificationLog } from '../notifications';
import {
  GatewayError,
  GatewayResult,
  PaymentInstruction,
  TransferReceipt,
  ValueTransferGateway,
} from '../../modules/transfers';
import { computeFeeSplit, isValidFeeBps } from './fee';
import { LedgerError, TransferFailedError } from './ledger.errors';
import { LedgerChange, LedgerRepository } from './ledger.repository';
import { LedgerState } from './ledger.state';
import { SerialExecutor } from './serial-executor';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface LedgerServiceOptions {
  readonly repository: LedgerRepository;
  readonly gateway: ValueTransferGateway;
  /** Used only when the repository holds no state yet */
  readonly platformOwner: Identity;
  readonly platformFeeBps: number;
  readonly clock?: Clock;
  readonly quiet?: boolean;
}

export interface LedgerIntegrityReport {
  valid: boolean;
  campaign_count: number;
  notification_count: number;
  errors: string[];
  verified_at: Date;
}

export class LedgerService {
  private readonly executor = new SerialExecutor();

  private constructor(
    private readonly state: LedgerState,
    private readonly notifications: NotificationLog,
    private readonly repository: LedgerRepository,
    private readonly gateway: ValueTransferGateway,
    private readonly clock: Clock,
    private readonly quiet: boolean
  ) {}

  /**
   * Open the ledger: restore persisted state, or initialize a fresh one
   */
  static async open(options: LedgerServiceOptions): Promise<LedgerService> {
    const clock = options.clock ?? systemClock;
    const quiet = options.quiet ?? false;
    const persisted = await options.repository.load();

    if (persisted) {
      const state = LedgerState.fromSnapshot(persisted.snapshot);
      const notifications = new NotificationLog(persisted.notifications);
      if (!quiet) {
        console.log(
          `[Ledger] Restored ${persisted.snapshot.config.campaign_count} campaigns, ` +
          `${notifications.size} notifications`
        );
      }
      return new LedgerService(state, notifications, options.repository, options.gateway, clock, quiet);
    }

    if (!isValidIdentity(options.platformOwner)) {
      throw new LedgerError('INVALID_ARGUMENT', `Invalid platform owner identity: "${options.platformOwner}"`);
    }
    if (!isValidFeeBps(options.platformFeeBps)) {
      throw new LedgerError('INVALID_ARGUMENT', `Platform fee cannot exceed 10% (${MAX_PLATFORM_FEE_BPS} bps)`);
    }

    const config: LedgerConfig = {
      campaign_count: 0,
      platform_owner: options.platformOwner,
      platform_fee_bps: options.platformFeeBps,
    };
    await options.repository.commit({ config });

    if (!quiet) {
      console.log(`[Ledger] Initialized (platform_owner=${config.platform_owner}, fee=${config.platform_fee_bps} bps)`);
    }
    return new LedgerService(
      new LedgerState(config),
      new NotificationLog(),
      options.repository,
      options.gateway,
      clock,
      quiet
    );
  }

  // ============================================
  // COMMANDS
  // ============================================

  /**
   * Create a campaign owned by the caller
   * @returns the new campaign id (1-based, sequential)
   */
  async createCampaign(input: CreateCampaignInput, caller: Identity, now?: Date): Promise<number> {
    this.requireIdentity(caller, 'caller');
    const title = input.title.trim();
    if (title.length === 0) {
      throw new LedgerError('INVALID_ARGUMENT', 'Title cannot be empty');
    }
    if (input.goal_amount <= 0n) {
      throw new LedgerError('INVALID_ARGUMENT', 'Goal amount must be positive');
    }

    return this.executor.run(async () => {
      const previousConfig = this.state.getConfig();
      const id = previousConfig.campaign_count + 1;
      const config: LedgerConfig = { ...previousConfig, campaign_count: id };
      const campaign: Campaign = {
        id,
        title,
        description: input.description,
        image_url: input.image_url,
        goal_amount: input.goal_amount,
        raised_amount: 0n,
        owner: caller,
        is_active: true,
        created_at: now ?? this.clock.now(),
      };

      this.state.setConfig(config);
      this.state.putCampaign(campaign);

      await this.commit(
        {
          config,
          campaign,
          notification: this.prepare({
            type: 'CAMPAIGN_CREATED',
            payload: { campaign_id: id, title, goal_amount: campaign.goal_amount, owner: caller },
          }),
        },
        () => {
          this.state.removeCampaign(id);
          this.state.setConfig(previousConfig);
        }
      );

      this.log(`Campaign #${id} created by ${caller} (goal=${campaign.goal_amount})`);
      return id;
    });
  }

  /**
   * Record a donation
   * The attached value is already escrowed by the transfer mechanism; it must equal amount.
   */
  async donate(
    campaignId: number,
    amount: bigint,
    donor: Identity,
    attachedValue: bigint = amount
  ): Promise<void> {
    this.requireIdentity(donor, 'donor');

    return this.executor.run(async () => {
      const campaign = this.requireCampaign(campaignId);
      if (!campaign.is_active) {
        throw new LedgerError('INACTIVE', `Campaign ${campaignId} is not active`);
      }
      if (amount <= 0n) {
        throw new LedgerError('INVALID_ARGUMENT', 'Donation amount must be positive');
      }
      if (attachedValue !== amount) {
        throw new LedgerError(
          'INVALID_ARGUMENT',
          `Attached value ${attachedValue} does not match donation amount ${amount}`
        );
      }

      const previousRecord = this.state.getDonation(campaignId, donor);
      const firstDonation = !previousRecord || previousRecord.amount === 0n;
      const rosterPosition = this.state.getRoster(campaignId).length;

      const donation = {
        campaign_id: campaignId,
        donor,
        amount: (previousRecord?.amount ?? 0n) + amount,
      };
      const updated: Campaign = { ...campaign, raised_amount: campaign.raised_amount + amount };

      this.state.putDonation(donation);
      this.state.putCampaign(updated);
      if (firstDonation) {
        this.state.appendToRoster(campaignId, donor);
      }

      await this.commit(
        {
          campaign: updated,
          donation,
          roster_append: firstDonation
            ? { campaign_id: campaignId, donor, position: rosterPosition }
            : undefined,
          notification: this.prepare({
            type: 'DONATION_RECEIVED',
            payload: { campaign_id: campaignId, donor, amount },
          }),
        },
        () => {
          this.adjustRaised(campaignId, -amount);
          if (previousRecord) {
            this.state.putDonation(previousRecord);
          } else {
            this.state.removeDonation(campaignId, donor);
          }
          if (firstDonation) {
            this.state.popFromRoster(campaignId, donor);
          }
        }
      );

      this.log(`Donation ${amount} -> campaign #${campaignId} from ${donor}`);
    });
  }

  /**
   * Withdraw raised funds to the campaign owner, minus the platform fee
   *
   * fee = floor(amount * platform_fee_bps / 10000), net = amount - fee
   * The fee rate is the one in force at withdrawal time.
   */
  async withdrawFunds(campaignId: number, amount: bigint, caller: Identity): Promise<WithdrawalRecord> {
    return this.executor.run(async () => {
      const campaign = this.requireCampaign(campaignId);
      if (caller !== campaign.owner) {
        throw new LedgerError('UNAUTHORIZED', `Only the campaign owner can withdraw from campaign ${campaignId}`);
      }
      if (amount <= 0n) {
        throw new LedgerError('INVALID_ARGUMENT', 'Withdrawal amount must be positive');
      }
      if (amount > campaign.raised_amount) {
        throw new LedgerError(
          'INSUFFICIENT_FUNDS',
          `Requested ${amount} exceeds raised amount ${campaign.raised_amount} on campaign ${campaignId}`
        );
      }

      const config = this.state.getConfig();
      const split = computeFeeSplit(amount, config.platform_fee_bps);
      const withdrawalId = uuidv4();

      // STEP 1: Debit BEFORE any value leaves custody
      this.adjustRaised(campaignId, -amount);

      // STEP 2: Pay owner, then platform
      let ownerReceipt: TransferReceipt;
      let feeReceipt: TransferReceipt | null = null;
      try {
        ownerReceipt = await this.pay({
          recipient: campaign.owner,
          amount: split.net,
          reference_id: withdrawalId,
          memo: `Campaign #${campaignId} withdrawal`,
        });

        if (split.fee > 0n) {
          try {
            feeReceipt = await this.pay({
              recipient: config.platform_owner,
              amount: split.fee,
              reference_id: withdrawalId,
              memo: `Platform fee on campaign #${campaignId} withdrawal`,
            });
          } catch (error) {
            await this.reverse(ownerReceipt, 'platform fee transfer failed');
            throw error;
          }
        }
      } catch (error) {
        this.adjustRaised(campaignId, amount);
        // A re-entrant call may have persisted the campaign while it carried this debit
        await this.persistCampaign(campaignId);
        console.error(`[Ledger] Withdrawal ${withdrawalId} on campaign #${campaignId} rolled back`);
        throw error;
      }

      // STEP 3: Record
      const withdrawal: WithdrawalRecord = {
        id: withdrawalId,
        campaign_id: campaignId,
        amount: split.amount,
        fee: split.fee,
        net: split.net,
        fee_bps: split.fee_bps,
        owner: campaign.owner,
        fee_recipient: config.platform_owner,
        owner_tx_ref: ownerReceipt.tx_ref,
        fee_tx_ref: feeReceipt ? feeReceipt.tx_ref : null,
        created_at: this.clock.now(),
      };
      this.state.appendWithdrawal(withdrawal);

      const change: LedgerChange = {
        campaign: this.requireCampaign(campaignId),
        withdrawal,
        notification: this.prepare({
          type: 'FUNDS_WITHDRAWN',
          payload: {
            campaign_id: campaignId,
            owner: caller,
            net: split.net,
            amount: split.amount,
            fee: split.fee,
          },
        }),
      };

      try {
        await this.repository.commit(change);
      } catch (error) {
        // Value has already left custody: the in-memory books stay debited
        console.error(`[Ledger] CRITICAL: withdrawal ${withdrawalId} paid out but not persisted:`, error);
        if (change.notification) this.notifications.publish(change.notification);
        throw error;
      }
      if (change.notification) this.notifications.publish(change.notification);

      this.log(
        `Withdrawal ${amount} from campaign #${campaignId}: net ${split.net} -> ${campaign.owner}, ` +
        `fee ${split.fee} -> ${config.platform_owner}`
      );
      return withdrawal;
    });
  }

  /**
   * Flip a campaign's active flag
   * @returns the new is_active value
   */
  async toggleCampaignStatus(campaignId: number, caller: Identity): Promise<boolean> {
    return this.executor.run(async () => {
      const campaign = this.requireCampaign(campaignId);
      if (caller !== campaign.owner) {
        throw new LedgerError('UNAUTHORIZED', `Only the campaign owner can change campaign ${campaignId}`);
      }

      const updated: Campaign = { ...campaign, is_active: !campaign.is_active };
      this.state.putCampaign(updated);

      await this.commit(
        {
          campaign: updated,
          notification: this.prepare({
            type: 'CAMPAIGN_STATUS_CHANGED',
            payload: { campaign_id: campaignId, is_active: updated.is_active },
          }),
        },
        () => {
          const current = this.requireCampaign(campaignId);
          this.state.putCampaign({ ...current, is_active: campaign.is_active });
        }
      );

      this.log(`Campaign #${campaignId} is now ${updated.is_active ? 'ACTIVE' : 'INACTIVE'}`);
      return updated.is_active;
    });
  }

  async updatePlatformFee(newFeeBps: number, caller: Identity): Promise<void> {
    return this.executor.run(async () => {
      const previous = this.state.getConfig();
      if (caller !== previous.platform_owner) {
        throw new LedgerError('UNAUTHORIZED', 'Only the platform owner can update the platform fee');
      }
      if (!isValidFeeBps(newFeeBps)) {
        throw new LedgerError('INVALID_ARGUMENT', `Platform fee cannot exceed 10% (${MAX_PLATFORM_FEE_BPS} bps)`);
      }

      const config: LedgerConfig = { ...previous, platform_fee_bps: newFeeBps };
      this.state.setConfig(config);

      await this.commit(
        {
          config,
          notification: this.prepare({
            type: 'PLATFORM_FEE_UPDATED',
            payload: { previous_fee_bps: previous.platform_fee_bps, fee_bps: newFeeBps },
          }),
        },
        () => this.state.setConfig(previous)
      );

      this.log(`Platform fee ${previous.platform_fee_bps} -> ${newFeeBps} bps`);
    });
  }

  async transferPlatformOwnership(newOwner: Identity, caller: Identity): Promise<void> {
    return this.executor.run(async () => {
      const previous = this.state.getConfig();
      if (caller !== previous.platform_owner) {
        throw new LedgerError('UNAUTHORIZED', 'Only the platform owner can transfer platform ownership');
      }
      this.requireIdentity(newOwner, 'new platform owner');

      const config: LedgerConfig = { ...previous, platform_owner: newOwner };
      this.state.setConfig(config);

      await this.commit(
        {
          config,
          notification: this.prepare({
            type: 'PLATFORM_OWNERSHIP_TRANSFERRED',
            payload: { previous_owner: previous.platform_owner, new_owner: newOwner },
          }),
        },
        () => this.state.setConfig(previous)
      );

      this.log(`Platform ownership ${previous.platform_owner} -> ${newOwner}`);
    });
  }

  // ============================================
  // QUERIES
  // ============================================

  getCampaign(campaignId: number): CampaignView {
    return this.requireCampaign(campaignId);
  }

  /**
   * Active campaign ids, ascending
   */
  getActiveCampaigns(): number[] {
    return this.state.getActiveIds();
  }

  getDonationAmount(campaignId: number, donor: Identity): bigint {
    this.requireCampaign(campaignId);
    return this.state.getDonation(campaignId, donor)?.amount ?? 0n;
  }

  /**
   * Donors in first-donation order
   */
  getDonors(campaignId: number): Identity[] {
    this.requireCampaign(campaignId);
    return [...this.state.getRoster(campaignId)];
  }

  getDonorCount(campaignId: number): number {
    this.requireCampaign(campaignId);
    return this.state.getRoster(campaignId).length;
  }

  getCampaignCount(): number {
    return this.state.getConfig().campaign_count;
  }

  getPlatformConfig(): LedgerConfig {
    return this.state.getConfig();
  }

  getWithdrawals(campaignId: number): WithdrawalRecord[] {
    this.requireCampaign(campaignId);
    return this.state.getWithdrawals(campaignId);
  }

  getNotifications(afterSequence = 0): LedgerNotification[] {
    return this.notifications.list(afterSequence);
  }

  /**
   * Listeners run outside the mutation that published: ledger calls they make are queued
   */
  subscribe(listener: NotificationListener): () => void {
    return this.notifications.subscribe(notification =>
      this.executor.detached(() => listener(notification))
    );
  }

  /**
   * Full data model, for inspection
   */
  exportState(): LedgerSnapshot {
    return this.state.toSnapshot();
  }

  /**
   * Audit the books
   * Runs in the serial queue so it never observes a withdrawal mid-flight.
   */
  async verifyIntegrity(): Promise<LedgerIntegrityReport> {
    return this.executor.run(async () => {
      const snapshot = this.state.toSnapshot();
      const errors: string[] = [];
      const { config } = snapshot;

      if (config.platform_fee_bps > MAX_PLATFORM_FEE_BPS || config.platform_fee_bps < 0) {
        errors.push(`Platform fee out of range: ${config.platform_fee_bps} bps`);
      }

      if (snapshot.campaigns.length !== config.campaign_count) {
        errors.push(`campaign_count=${config.campaign_count} but ${snapshot.campaigns.length} campaigns stored`);
      }
      snapshot.campaigns.forEach((campaign, index) => {
        if (campaign.id !== index + 1) {
          errors.push(`Campaign ids not dense: expected ${index + 1}, found ${campaign.id}`);
        }
      });

      for (const campaign of snapshot.campaigns) {
        const donated = snapshot.donations
          .filter(d => d.campaign_id === campaign.id)
          .reduce((acc, d) => acc + d.amount, 0n);
        const withdrawn = snapshot.withdrawals
          .filter(w => w.campaign_id === campaign.id)
          .reduce((acc, w) => acc + w.amount, 0n);

        if (campaign.raised_amount < 0n) {
          errors.push(`Campaign ${campaign.id} has negative raised_amount ${campaign.raised_amount}`);
        }
        if (campaign.raised_amount !== donated - withdrawn) {
          errors.push(
            `Campaign ${campaign.id} unbalanced: raised=${campaign.raised_amount}, ` +
            `donated=${donated}, withdrawn=${withdrawn}`
          );
        }

        const roster = snapshot.rosters.find(r => r.campaign_id === campaign.id)?.donors ?? [];
        if (new Set(roster).size !== roster.length) {
          errors.push(`Campaign ${campaign.id} roster has duplicate donors`);
        }
        const donorsWithValue = snapshot.donations
          .filter(d => d.campaign_id === campaign.id && d.amount > 0n)
          .map(d => d.donor);
        const rosterSet = new Set(roster);
        if (donorsWithValue.length !== rosterSet.size || donorsWithValue.some(d => !rosterSet.has(d))) {
          errors.push(`Campaign ${campaign.id} roster does not match donation records`);
        }
      }

      for (const withdrawal of snapshot.withdrawals) {
        if (withdrawal.fee + withdrawal.net !== withdrawal.amount) {
          errors.push(`Withdrawal ${withdrawal.id} split does not add up`);
        }
      }

      return {
        valid: errors.length === 0,
        campaign_count: config.campaign_count,
        notification_count: this.notifications.size,
        errors,
        verified_at: this.clock.now(),
      };
    });
  }

  // ============================================
  // INTERNALS
  // ============================================

  private requireCampaign(campaignId: number): Campaign {
    const count = this.state.getConfig().campaign_count;
    const campaign =
      Number.isInteger(campaignId) && campaignId >= 1 && campaignId <= count
        ? this.state.getCampaign(campaignId)
        : undefined;
    if (!campaign) {
      throw new LedgerError('NOT_FOUND', `Campaign ${campaignId} not found`);
    }
    return campaign;
  }

  private requireIdentity(identity: Identity, role: string): void {
    if (!isValidIdentity(identity)) {
      throw new LedgerError('INVALID_ARGUMENT', `Invalid ${role} identity: "${identity}"`);
    }
  }

  /**
   * Apply a delta to the CURRENT campaign record
   * Re-reads the campaign: a re-entrant call may have replaced it since.
   */
  private adjustRaised(campaignId: number, delta: bigint): void {
    const current = this.requireCampaign(campaignId);
    this.state.putCampaign({ ...current, raised_amount: current.raised_amount + delta });
  }

  private prepare(event: NotificationEvent): LedgerNotification {
    return this.notifications.prepare(event, this.clock.now());
  }

  /**
   * Persist a change already applied in memory; undo it if persistence fails
   */
  private async commit(change: LedgerChange, undo: () => void): Promise<void> {
    try {
      await this.repository.commit(change);
    } catch (error) {
      undo();
      console.error('[Ledger] Commit failed, change rolled back:', error);
      throw error;
    }
    if (change.notification) {
      this.notifications.publish(change.notification);
    }
  }

  /**
   * Write the in-memory campaign record back to the repository
   */
  private async persistCampaign(campaignId: number): Promise<void> {
    try {
      await this.repository.commit({ campaign: this.requireCampaign(campaignId) });
    } catch (error) {
      console.error(`[Ledger] CRITICAL: campaign #${campaignId} could not be re-persisted after rollback:`, error);
    }
  }

  private async pay(instruction: PaymentInstruction): Promise<TransferReceipt> {
    let result: GatewayResult<TransferReceipt>;
    try {
      result = await this.gateway.transfer(instruction);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const retryable = error instanceof GatewayError ? error.retryable : false;
      throw new TransferFailedError(instruction.recipient, instruction.amount, reason, retryable);
    }

    if (!result.success) {
      throw new TransferFailedError(instruction.recipient, instruction.amount, result.error, result.retryable);
    }
    return result.value;
  }

  private async reverse(receipt: TransferReceipt, reason: string): Promise<void> {
    try {
      const result = await this.gateway.reverse(receipt.tx_ref, reason);
      if (!result.success) {
        console.error(`[Ledger] CRITICAL: could not reverse ${receipt.tx_ref}: ${result.error}`);
      }
    } catch (error) {
      console.error(`[Ledger] CRITICAL: could not reverse ${receipt.tx_ref}:`, error);
    }
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[Ledger] ${message}`);
    }
  }
}
