/**
 * Campaign Ledger - Core Types
 *
 * ACCOUNTING LAWS:
 * 1. NO FLOATING POINT: All value is carried as BigInt minor units.
 * 2. CONSERVATION: raised_amount = SUM(donations) - SUM(withdrawals), per campaign.
 * 3. NO NEGATIVE BALANCE: A withdrawal larger than raised_amount is rejected in full.
 */

/**
 * Identity - Opaque, comparable caller reference
 * Comparisons are plain string equality.
 */
export type Identity = string;

export const MAX_IDENTITY_LENGTH = 128;

/**
 * Fee rates are expressed in basis points of 10000.
 * The platform fee may never exceed 1000 bps (10%).
 */
export const BPS_DENOMINATOR = 10_000n;
export const MAX_PLATFORM_FEE_BPS = 1_000;

/**
 * Campaign - A fundraising target with an owner and a running total
 *
 * Immutable after creation: id, owner, goal_amount, created_at
 * Replaced wholesale on every change (readers never observe a half-updated campaign)
 */
export interface Campaign {
  readonly id: number;                 // 1-based, sequential, never reused
  readonly title: string;
  readonly description: string;
  readonly image_url: string;
  readonly goal_amount: bigint;
  readonly raised_amount: bigint;
  readonly owner: Identity;
  readonly is_active: boolean;
  readonly created_at: Date;
}

/**
 * CampaignView - Read-only projection returned to callers
 */
export type CampaignView = Readonly<Campaign>;

export interface CreateCampaignInput {
  readonly title: string;
  readonly description: string;
  readonly image_url: string;
  readonly goal_amount: bigint;
}

/**
 * DonationRecord - Cumulative amount a donor has given to a campaign
 * Monotonically non-decreasing. Only donate() writes it.
 */
export interface DonationRecord {
  readonly campaign_id: number;
  readonly donor: Identity;
  readonly amount: bigint;
}

/**
 * LedgerConfig - Platform-wide settings
 * campaign_count doubles as the id generator.
 */
export interface LedgerConfig {
  readonly campaign_count: number;
  readonly platform_owner: Identity;
  readonly platform_fee_bps: number;
}

/**
 * WithdrawalRecord - Journal entry for a completed withdrawal
 * amount = fee + net; amount is what left raised_amount.
 */
export interface WithdrawalRecord {
  readonly id: string;
  readonly campaign_id: number;
  readonly amount: bigint;
  readonly fee: bigint;
  readonly net: bigint;
  readonly fee_bps: number;
  readonly owner: Identity;
  readonly fee_recipient: Identity;
  readonly owner_tx_ref: string;
  readonly fee_tx_ref: string | null;  // null when no fee was charged
  readonly created_at: Date;
}

/**
 * LedgerSnapshot - The complete data model, for persistence and inspection
 */
export interface LedgerSnapshot {
  readonly config: LedgerConfig;
  readonly campaigns: Campaign[];
  readonly donations: DonationRecord[];
  readonly rosters: Array<{ campaign_id: number; donors: Identity[] }>;
  readonly withdrawals: WithdrawalRecord[];
}

/**
 * Validate an identity string
 * Non-empty, bounded, no whitespace.
 */
export function isValidIdentity(value: unknown): value is Identity {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length <= MAX_IDENTITY_LENGTH &&
    !/\s/.test(value)
  );
}
