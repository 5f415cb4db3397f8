/**
 * Campaign Ledger - Notification Log
 *
 * Explicit append-only channel for ledger notifications.
 * Two-step emission so a notification is only published once its state change is persisted:
 *   1. prepare()  - stamp the next sequence number (nothing is visible yet)
 *   2. publish()  - append and fan out to subscribers
 */

import { v4 as uuidv4 } from 'uuid';
import { LedgerNotification, NotificationEvent } from '../../shared/types';

export type NotificationListener = (notification: LedgerNotification) => void;

export class NotificationLog {
  private readonly entries: LedgerNotification[] = [];
  private readonly listeners = new Set<NotificationListener>();

  constructor(history: LedgerNotification[] = []) {
    for (const entry of [...history].sort((a, b) => a.sequence - b.sequence)) {
      if (entry.sequence !== this.entries.length + 1) {
        throw new Error(`Notification history has a gap at sequence ${this.entries.length + 1}`);
      }
      this.entries.push(entry);
    }
  }

  prepare(event: NotificationEvent, now: Date = new Date()): LedgerNotification {
    return {
      ...event,
      id: uuidv4(),
      sequence: this.entries.length + 1,
      emitted_at: now,
    };
  }

  publish(notification: LedgerNotification): void {
    const expected = this.entries.length + 1;
    if (notification.sequence !== expected) {
      throw new Error(`Out-of-order notification: sequence=${notification.sequence}, expected=${expected}`);
    }

    this.entries.push(notification);

    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        // A subscriber must not undo a committed change
        console.error(`[Notifications] Listener failed on #${notification.sequence}:`, error);
      }
    }
  }

  subscribe(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Entries with sequence > afterSequence, in order
   */
  list(afterSequence = 0): LedgerNotification[] {
    return this.entries.slice(Math.max(0, afterSequence));
  }

  get size(): number {
    return this.entries.length;
  }
}
