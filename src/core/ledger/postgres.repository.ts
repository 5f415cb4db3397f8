/**
 * Campaign Ledger - PostgreSQL Repository
 * Persistence layer for the campaign ledger (schema: db/schema.sql)
 *
 * ATOMICITY: Each commit runs in its own BEGIN/COMMIT block.
 * Amount columns are NUMERIC(78,0); pg returns them as strings.
 */

import { Pool, PoolClient } from 'pg';
import {
  Campaign,
  DonationRecord,
  LedgerConfig,
  LedgerNotification,
  WithdrawalRecord,
} from '../../shared/types';
import { decodeNotification, encodeNotificationPayload } from '../notifications';
import { LedgerChange, LedgerRepository, PersistedLedger } from './ledger.repository';

type ConfigRow = {
  campaign_count: number;
  platform_owner: string;
  platform_fee_bps: number;
};

type CampaignRow = {
  id: number;
  title: string;
  description: string;
  image_url: string;
  goal_amount: string;
  raised_amount: string;
  owner: string;
  is_active: boolean;
  created_at: Date;
};

type DonationRow = {
  campaign_id: number;
  donor: string;
  amount: string;
};

type RosterRow = {
  campaign_id: number;
  position: number;
  donor: string;
};

type WithdrawalRow = {
  id: string;
  campaign_id: number;
  amount: string;
  fee: string;
  net: string;
  fee_bps: number;
  owner: string;
  fee_recipient: string;
  owner_tx_ref: string;
  fee_tx_ref: string | null;
  created_at: Date;
};

type NotificationRow = {
  id: string;
  sequence: number;
  type: string;
  payload: unknown;
  emitted_at: Date;
};

export class PostgresLedgerRepository implements LedgerRepository {
  constructor(private readonly pool: Pool) {}

  async load(): Promise<PersistedLedger | null> {
    const configResult = await this.pool.query<ConfigRow>(
      `SELECT campaign_count, platform_owner, platform_fee_bps
       FROM ledger_config
       WHERE id = 1`
    );
    const configRow = configResult.rows[0];
    if (!configRow) {
      return null;
    }

    const [campaigns, donations, rosters, withdrawals, notifications] = await Promise.all([
      this.pool.query<CampaignRow>(`SELECT * FROM campaigns ORDER BY id`),
      this.pool.query<DonationRow>(`SELECT campaign_id, donor, amount FROM donations`),
      this.pool.query<RosterRow>(
        `SELECT campaign_id, position, donor FROM donor_rosters ORDER BY campaign_id, position`
      ),
      this.pool.query<WithdrawalRow>(`SELECT * FROM withdrawals ORDER BY seq`),
      this.pool.query<NotificationRow>(`SELECT * FROM notifications ORDER BY sequence`),
    ]);

    const rosterMap = new Map<number, string[]>();
    for (const row of rosters.rows) {
      const donors = rosterMap.get(row.campaign_id) ?? [];
      donors.push(row.donor);
      rosterMap.set(row.campaign_id, donors);
    }

    return {
      snapshot: {
        config: this.mapRowToConfig(configRow),
        campaigns: campaigns.rows.map(row => this.mapRowToCampaign(row)),
        donations: donations.rows.map(row => this.mapRowToDonation(row)),
        rosters: [...rosterMap.entries()].map(([campaign_id, donors]) => ({ campaign_id, donors })),
        withdrawals: withdrawals.rows.map(row => this.mapRowToWithdrawal(row)),
      },
      notifications: notifications.rows.map(row => decodeNotification(row)),
    };
  }

  async commit(change: LedgerChange): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');

      if (change.config) await this.upsertConfig(client, change.config);
      if (change.campaign) await this.upsertCampaign(client, change.campaign);
      if (change.donation) await this.upsertDonation(client, change.donation);
      if (change.roster_append) {
        await client.query(
          `INSERT INTO donor_rosters (campaign_id, position, donor) VALUES ($1, $2, $3)`,
          [change.roster_append.campaign_id, change.roster_append.position, change.roster_append.donor]
        );
      }
      if (change.withdrawal) await this.insertWithdrawal(client, change.withdrawal);
      if (change.notification) await this.insertNotification(client, change.notification);

      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private async upsertConfig(client: PoolClient, config: LedgerConfig): Promise<void> {
    await client.query(
      `INSERT INTO ledger_config (id, campaign_count, platform_owner, platform_fee_bps)
       VALUES (1, $1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET
         campaign_count = EXCLUDED.campaign_count,
         platform_owner = EXCLUDED.platform_owner,
         platform_fee_bps = EXCLUDED.platform_fee_bps`,
      [config.campaign_count, config.platform_owner, config.platform_fee_bps]
    );
  }

  private async upsertCampaign(client: PoolClient, campaign: Campaign): Promise<void> {
    // goal_amount, owner and created_at are never updated
    await client.query(
      `INSERT INTO campaigns
       (id, title, description, image_url, goal_amount, raised_amount, owner, is_active, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO UPDATE SET
         raised_amount = EXCLUDED.raised_amount,
         is_active = EXCLUDED.is_active`,
      [
        campaign.id,
        campaign.title,
        campaign.description,
        campaign.image_url,
        campaign.goal_amount.toString(),
        campaign.raised_amount.toString(),
        campaign.owner,
        campaign.is_active,
        campaign.created_at,
      ]
    );
  }

  private async upsertDonation(client: PoolClient, record: DonationRecord): Promise<void> {
    await client.query(
      `INSERT INTO donations (campaign_id, donor, amount)
       VALUES ($1, $2, $3)
       ON CONFLICT (campaign_id, donor) DO UPDATE SET amount = EXCLUDED.amount`,
      [record.campaign_id, record.donor, record.amount.toString()]
    );
  }

  private async insertWithdrawal(client: PoolClient, record: WithdrawalRecord): Promise<void> {
    await client.query(
      `INSERT INTO withdrawals
       (id, campaign_id, amount, fee, net, fee_bps, owner, fee_recipient,
        owner_tx_ref, fee_tx_ref, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        record.id,
        record.campaign_id,
        record.amount.toString(),
        record.fee.toString(),
        record.net.toString(),
        record.fee_bps,
        record.owner,
        record.fee_recipient,
        record.owner_tx_ref,
        record.fee_tx_ref,
        record.created_at,
      ]
    );
  }

  private async insertNotification(client: PoolClient, notification: LedgerNotification): Promise<void> {
    await client.query(
      `INSERT INTO notifications (id, sequence, type, payload, emitted_at)
       VALUES ($1, $2, $3, $4, $5)`,
      [
        notification.id,
        notification.sequence,
        notification.type,
        JSON.stringify(encodeNotificationPayload(notification)),
        notification.emitted_at,
      ]
    );
  }

  private mapRowToConfig(row: ConfigRow): LedgerConfig {
    return {
      campaign_count: Number(row.campaign_count),
      platform_owner: row.platform_owner,
      platform_fee_bps: Number(row.platform_fee_bps),
    };
  }

  private mapRowToCampaign(row: CampaignRow): Campaign {
    return {
      id: Number(row.id),
      title: row.title,
      description: row.description,
      image_url: row.image_url,
      goal_amount: BigInt(row.goal_amount),
      raised_amount: BigInt(row.raised_amount),
      owner: row.owner,
      is_active: row.is_active,
      created_at: new Date(row.created_at),
    };
  }

  private mapRowToDonation(row: DonationRow): DonationRecord {
    return {
      campaign_id: Number(row.campaign_id),
      donor: row.donor,
      amount: BigInt(row.amount),
    };
  }

  private mapRowToWithdrawal(row: WithdrawalRow): WithdrawalRecord {
    return {
      id: row.id,
      campaign_id: Number(row.campaign_id),
      amount: BigInt(row.amount),
      fee: BigInt(row.fee),
      net: BigInt(row.net),
      fee_bps: Number(row.fee_bps),
      owner: row.owner,
      fee_recipient: row.fee_recipient,
      owner_tx_ref: row.owner_tx_ref,
      fee_tx_ref: row.fee_tx_ref,
      created_at: new Date(row.created_at),
    };
  }
}
