import { describe, it, expect } from '@jest/globals';
import { isLedgerError } from '../src/core/ledger';
import { DONOR_X, DONOR_Y, OWNER, PLATFORM, campaignInput, openTestLedger } from './helpers/ledger';

function nextTick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Park-Miller generator, deterministic across runs
function seeded(seed: number): (max: number) => number {
  let state = seed;
  return (max: number) => {
    state = (state * 48271) % 2147483647;
    return state % max;
  };
}

describe('serialized mutations', () => {
  it('queues a donation behind an in-flight withdrawal', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = resolve; });
    let gated = false;

    const { ledger } = await openTestLedger({
      custody: {
        onTransfer: async () => {
          if (gated) return;
          gated = true;
          await gate;
        },
      },
    });
    await ledger.createCampaign(campaignInput(), OWNER);
    await ledger.donate(1, 500n, DONOR_X);

    const withdrawal = ledger.withdrawFunds(1, 100n, OWNER);
    const donation = ledger.donate(1, 10n, DONOR_Y);
    const audit = ledger.verifyIntegrity();
    await nextTick();

    // The debit is visible while the transfer is pending; the donation is not applied yet
    expect(ledger.getCampaign(1).raised_amount).toBe(400n);
    expect(ledger.getDonationAmount(1, DONOR_Y)).toBe(0n);

    release();
    await Promise.all([withdrawal, donation]);

    expect(ledger.getCampaign(1).raised_amount).toBe(410n);
    expect(ledger.getNotifications(2).map(n => n.type)).toEqual(['FUNDS_WITHDRAWN', 'DONATION_RECEIVED']);
    expect(await audit).toMatchObject({ valid: true, notification_count: 4 });
  });

  it('queues ledger calls deferred by a subscriber behind an in-flight withdrawal', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = resolve; });
    let gated = false;

    const { ledger } = await openTestLedger({
      custody: {
        onTransfer: async () => {
          if (gated) return;
          gated = true;
          await gate;
        },
      },
    });
    await ledger.createCampaign(campaignInput(), OWNER);

    const deferred: Promise<void>[] = [];
    const unsubscribe = ledger.subscribe((notification) => {
      if (notification.type === 'DONATION_RECEIVED' && notification.payload.donor === DONOR_X) {
        setTimeout(() => deferred.push(ledger.donate(1, 10n, DONOR_Y)), 5);
      }
    });
    await ledger.donate(1, 500n, DONOR_X);
    unsubscribe();

    const withdrawal = ledger.withdrawFunds(1, 100n, OWNER);
    await sleep(20);

    expect(deferred).toHaveLength(1);
    expect(ledger.getCampaign(1).raised_amount).toBe(400n);
    expect(ledger.getDonationAmount(1, DONOR_Y)).toBe(0n);

    release();
    await withdrawal;
    await Promise.all(deferred);

    expect(ledger.getCampaign(1).raised_amount).toBe(410n);
    expect(ledger.getNotifications(2).map(n => n.type)).toEqual(['FUNDS_WITHDRAWN', 'DONATION_RECEIVED']);
  });

  it('queues a ledger call made synchronously by a subscriber', async () => {
    const { ledger } = await openTestLedger();
    await ledger.createCampaign(campaignInput(), OWNER);

    const followUps: Promise<void>[] = [];
    ledger.subscribe((notification) => {
      if (notification.type === 'DONATION_RECEIVED' && notification.payload.donor === DONOR_X) {
        followUps.push(ledger.donate(1, 1n, DONOR_Y));
      }
    });

    await ledger.donate(1, 5n, DONOR_X);
    await Promise.all(followUps);

    expect(followUps).toHaveLength(1);
    expect(ledger.getDonors(1)).toEqual([DONOR_X, DONOR_Y]);
    expect(ledger.getNotifications().map(n => n.sequence)).toEqual([1, 2, 3]);
  });

  it('runs queued calls after a failed one', async () => {
    const { ledger } = await openTestLedger();
    await ledger.createCampaign(campaignInput(), OWNER);

    const results = await Promise.allSettled([
      ledger.withdrawFunds(1, 1n, OWNER),
      ledger.donate(1, 5n, DONOR_X),
    ]);

    expect(results[0]).toMatchObject({ status: 'rejected', reason: { code: 'INSUFFICIENT_FUNDS' } });
    expect(results[1]).toEqual({ status: 'fulfilled', value: undefined });
    expect(ledger.getCampaign(1).raised_amount).toBe(5n);
  });

  it('conserves value across interleaved donations and withdrawals', async () => {
    const { ledger, custody } = await openTestLedger({ feeBps: 250 });
    for (let i = 0; i < 3; i++) {
      await ledger.createCampaign(campaignInput(1_000n, `Campaign ${i + 1}`), OWNER);
    }

    const random = seeded(20260101);
    const donors = ['donor-a', 'donor-b', 'donor-c', 'donor-d'];
    const ops: { kind: 'donate' | 'withdraw'; campaignId: number; amount: bigint; donor: string }[] = [];
    for (let i = 0; i < 60; i++) {
      ops.push({
        kind: random(10) < 7 ? 'donate' : 'withdraw',
        campaignId: random(3) + 1,
        amount: BigInt(random(300) + 1),
        donor: donors[random(donors.length)],
      });
    }

    const results = await Promise.allSettled(
      ops.map(op =>
        op.kind === 'donate'
          ? ledger.donate(op.campaignId, op.amount, op.donor)
          : ledger.withdrawFunds(op.campaignId, op.amount, OWNER)
      )
    );

    const expectedRaised = new Map<number, bigint>([[1, 0n], [2, 0n], [3, 0n]]);
    const expectedRoster = new Map<number, string[]>([[1, []], [2, []], [3, []]]);
    let totalDonated = 0n;

    results.forEach((result, index) => {
      const op = ops[index];
      if (result.status === 'rejected') {
        expect(op.kind).toBe('withdraw');
        expect(isLedgerError(result.reason) && result.reason.code).toBe('INSUFFICIENT_FUNDS');
        return;
      }
      const raised = expectedRaised.get(op.campaignId) ?? 0n;
      if (op.kind === 'donate') {
        expectedRaised.set(op.campaignId, raised + op.amount);
        totalDonated += op.amount;
        const roster = expectedRoster.get(op.campaignId) ?? [];
        if (!roster.includes(op.donor)) roster.push(op.donor);
      } else {
        expectedRaised.set(op.campaignId, raised - op.amount);
      }
    });

    for (const id of [1, 2, 3]) {
      expect(ledger.getCampaign(id).raised_amount).toBe(expectedRaised.get(id));
      expect(ledger.getDonors(id)).toEqual(expectedRoster.get(id));
    }

    const held = [1, 2, 3].reduce((acc, id) => acc + ledger.getCampaign(id).raised_amount, 0n);
    expect(custody.getCustodyBalance()).toBe(held);
    expect(custody.getCustodyBalance() + custody.getPaidOut(OWNER) + custody.getPaidOut(PLATFORM)).toBe(totalDonated);

    expect(await ledger.verifyIntegrity()).toMatchObject({ valid: true, errors: [] });
    const sequences = ledger.getNotifications().map(n => n.sequence);
    expect(sequences).toEqual(sequences.map((_, i) => i + 1));
  });
});
