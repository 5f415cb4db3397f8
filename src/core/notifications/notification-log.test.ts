import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { LedgerNotification } from '../../shared/types';
import { NotificationLog } from './notification-log';
import { decodeNotification, toJsonSafe } from './notification.codec';

const at = new Date('2026-01-01T00:00:00.000Z');

function created(log: NotificationLog, campaignId: number): LedgerNotification {
  return log.prepare(
    {
      type: 'CAMPAIGN_CREATED',
      payload: { campaign_id: campaignId, title: `Campaign ${campaignId}`, goal_amount: 100n, owner: 'owner-alice' },
    },
    at
  );
}

describe('NotificationLog', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stamps the next sequence without publishing', () => {
    const log = new NotificationLog();
    const notification = created(log, 1);

    expect(notification.sequence).toBe(1);
    expect(notification.emitted_at).toBe(at);
    expect(log.size).toBe(0);

    log.publish(notification);
    expect(log.list()).toEqual([notification]);
  });

  it('refuses to publish out of order', () => {
    const log = new NotificationLog();
    log.publish(created(log, 1));
    const stale = { ...created(log, 2), sequence: 5 };

    expect(() => log.publish(stale)).toThrow('Out-of-order notification: sequence=5, expected=2');
  });

  it('lists entries after a sequence number', () => {
    const log = new NotificationLog();
    for (const id of [1, 2, 3]) {
      log.publish(created(log, id));
    }

    expect(log.list(1).map(n => n.sequence)).toEqual([2, 3]);
    expect(log.list(3)).toEqual([]);
  });

  it('delivers to subscribers until they unsubscribe', () => {
    const log = new NotificationLog();
    const seen: number[] = [];
    const unsubscribe = log.subscribe(n => seen.push(n.sequence));

    log.publish(created(log, 1));
    unsubscribe();
    log.publish(created(log, 2));

    expect(seen).toEqual([1]);
  });

  it('keeps publishing when a subscriber throws', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const log = new NotificationLog();
    const seen: number[] = [];
    log.subscribe(() => {
      throw new Error('listener down');
    });
    log.subscribe(n => seen.push(n.sequence));

    log.publish(created(log, 1));

    expect(seen).toEqual([1]);
    expect(log.size).toBe(1);
  });

  it('rejects history with gaps', () => {
    const source = new NotificationLog();
    const first = created(source, 1);
    const third = { ...created(source, 3), sequence: 3 };

    expect(() => new NotificationLog([first, third])).toThrow('Notification history has a gap at sequence 2');
  });
});

describe('notification codec', () => {
  it('converts bigint and dates to strings', () => {
    expect(toJsonSafe({ amount: 25n, at, nested: [1n, 'x'], skipped: undefined })).toEqual({
      amount: '25',
      at: '2026-01-01T00:00:00.000Z',
      nested: ['1', 'x'],
    });
  });

  it('decodes a stored row', () => {
    const notification = decodeNotification({
      id: 'n-1',
      sequence: 7,
      type: 'DONATION_RECEIVED',
      payload: { campaign_id: 2, donor: 'donor-x', amount: '25' },
      emitted_at: at,
    });

    expect(notification).toEqual({
      id: 'n-1',
      sequence: 7,
      type: 'DONATION_RECEIVED',
      payload: { campaign_id: 2, donor: 'donor-x', amount: 25n },
      emitted_at: at,
    });
  });

  it('rejects rows with malformed amounts', () => {
    expect(() =>
      decodeNotification({
        id: 'n-1',
        sequence: 1,
        type: 'DONATION_RECEIVED',
        payload: { campaign_id: 2, donor: 'donor-x', amount: '-5' },
        emitted_at: at,
      })
    ).toThrow();
  });
});
