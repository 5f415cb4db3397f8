/**
 * Campaign Ledger - Notification Types
 * Append-only record of completed state changes.
 */

import { Identity } from './campaign.types';

export interface CampaignCreatedPayload {
  readonly campaign_id: number;
  readonly title: string;
  readonly goal_amount: bigint;
  readonly owner: Identity;
}

export interface DonationReceivedPayload {
  readonly campaign_id: number;
  readonly donor: Identity;
  readonly amount: bigint;
}

export interface FundsWithdrawnPayload {
  readonly campaign_id: number;
  readonly owner: Identity;
  readonly net: bigint;
  readonly amount: bigint;
  readonly fee: bigint;
}

export interface CampaignStatusChangedPayload {
  readonly campaign_id: number;
  readonly is_active: boolean;
}

export interface PlatformFeeUpdatedPayload {
  readonly previous_fee_bps: number;
  readonly fee_bps: number;
}

export interface PlatformOwnershipTransferredPayload {
  readonly previous_owner: Identity;
  readonly new_owner: Identity;
}

/**
 * NotificationEvent - What happened, discriminated by type
 */
export type NotificationEvent =
  | { type: 'CAMPAIGN_CREATED'; payload: CampaignCreatedPayload }
  | { type: 'DONATION_RECEIVED'; payload: DonationReceivedPayload }
  | { type: 'FUNDS_WITHDRAWN'; payload: FundsWithdrawnPayload }
  | { type: 'CAMPAIGN_STATUS_CHANGED'; payload: CampaignStatusChangedPayload }
  | { type: 'PLATFORM_FEE_UPDATED'; payload: PlatformFeeUpdatedPayload }
  | { type: 'PLATFORM_OWNERSHIP_TRANSFERRED'; payload: PlatformOwnershipTransferredPayload };

export type NotificationType = NotificationEvent['type'];

/**
 * LedgerNotification - A sequenced, immutable log entry
 *
 * INVARIANT: sequence is 1-based and gap-free, in commit order
 */
export type LedgerNotification = NotificationEvent & {
  readonly id: string;
  readonly sequence: number;
  readonly emitted_at: Date;
};
