import { describe, it, expect } from '@jest/globals';
import { InMemoryLedgerRepository, LedgerService } from '../src/core/ledger';
import { MockCustodyGateway } from '../src/modules/transfers';
import { DONOR_X, DONOR_Y, OWNER, PLATFORM, campaignInput, openTestLedger } from './helpers/ledger';

describe('LedgerService.open', () => {
  it('restores state and notifications from the repository', async () => {
    const repository = new InMemoryLedgerRepository();
    const first = await openTestLedger({ repository, feeBps: 250 });
    await first.ledger.createCampaign(campaignInput(), OWNER);
    await first.ledger.donate(1, 300n, DONOR_X);
    await first.ledger.donate(1, 200n, DONOR_Y);
    await first.ledger.withdrawFunds(1, 100n, OWNER);
    await first.ledger.toggleCampaignStatus(1, OWNER);

    // Options only seed an empty repository
    const second = await openTestLedger({ repository, feeBps: 0 });

    expect(second.ledger.exportState()).toEqual(first.ledger.exportState());
    expect(second.ledger.getNotifications()).toEqual(first.ledger.getNotifications());
    expect(second.ledger.getPlatformConfig()).toEqual({
      campaign_count: 1,
      platform_owner: PLATFORM,
      platform_fee_bps: 250,
    });
    expect(second.ledger.getDonors(1)).toEqual([DONOR_X, DONOR_Y]);
    expect(second.ledger.getActiveCampaigns()).toEqual([]);
    expect(repository.getCommits()).toHaveLength(6);
  });

  it('continues ids and sequence numbers after a restart', async () => {
    const repository = new InMemoryLedgerRepository();
    const first = await openTestLedger({ repository });
    await first.ledger.createCampaign(campaignInput(), OWNER);
    await first.ledger.donate(1, 50n, DONOR_X);

    const second = await openTestLedger({ repository });
    const id = await second.ledger.createCampaign(campaignInput(200n, 'Library roof'), OWNER);

    expect(id).toBe(2);
    expect(second.ledger.getActiveCampaigns()).toEqual([1, 2]);
    expect(second.ledger.getNotifications(2)).toMatchObject([
      { sequence: 3, type: 'CAMPAIGN_CREATED', payload: { campaign_id: 2, title: 'Library roof' } },
    ]);
  });

  it('rejects an out-of-range initial fee without persisting anything', async () => {
    const repository = new InMemoryLedgerRepository();

    await expect(
      LedgerService.open({
        repository,
        gateway: new MockCustodyGateway({ quiet: true }),
        platformOwner: PLATFORM,
        platformFeeBps: 1001,
        quiet: true,
      })
    ).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    expect(await repository.load()).toBeNull();
  });

  it('rejects a malformed platform owner', async () => {
    await expect(
      LedgerService.open({
        repository: new InMemoryLedgerRepository(),
        gateway: new MockCustodyGateway({ quiet: true }),
        platformOwner: 'has space',
        platformFeeBps: 0,
        quiet: true,
      })
    ).rejects.toThrow('Invalid platform owner identity: "has space"');
  });
});

describe('InMemoryLedgerRepository', () => {
  it('requires the config on the first commit', async () => {
    const repository = new InMemoryLedgerRepository();
    await expect(repository.commit({})).rejects.toThrow('First commit must carry the ledger config');
  });
});
