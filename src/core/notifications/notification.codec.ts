/**
 * Campaign Ledger - Notification Codec
 * JSON has no BigInt: amounts travel as decimal strings and are parsed back with zod.
 */

import { z } from 'zod';
import { LedgerNotification, NotificationEvent } from '../../shared/types';

export const AmountStringSchema = z.string().regex(/^\d+$/).transform(value => BigInt(value));

const NotificationEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('CAMPAIGN_CREATED'),
    payload: z.object({
      campaign_id: z.number().int().positive(),
      title: z.string(),
      goal_amount: AmountStringSchema,
      owner: z.string(),
    }),
  }),
  z.object({
    type: z.literal('DONATION_RECEIVED'),
    payload: z.object({
      campaign_id: z.number().int().positive(),
      donor: z.string(),
      amount: AmountStringSchema,
    }),
  }),
  z.object({
    type: z.literal('FUNDS_WITHDRAWN'),
    payload: z.object({
      campaign_id: z.number().int().positive(),
      owner: z.string(),
      net: AmountStringSchema,
      amount: AmountStringSchema,
      fee: AmountStringSchema,
    }),
  }),
  z.object({
    type: z.literal('CAMPAIGN_STATUS_CHANGED'),
    payload: z.object({
      campaign_id: z.number().int().positive(),
      is_active: z.boolean(),
    }),
  }),
  z.object({
    type: z.literal('PLATFORM_FEE_UPDATED'),
    payload: z.object({
      previous_fee_bps: z.number().int(),
      fee_bps: z.number().int(),
    }),
  }),
  z.object({
    type: z.literal('PLATFORM_OWNERSHIP_TRANSFERRED'),
    payload: z.object({
      previous_owner: z.string(),
      new_owner: z.string(),
    }),
  }),
]);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Convert bigint fields to strings, recursively
 */
export function toJsonSafe(value: unknown): JsonValue {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(toJsonSafe);
  }
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      if (inner !== undefined) {
        out[key] = toJsonSafe(inner);
      }
    }
    return out;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

export function encodeNotificationPayload(notification: LedgerNotification): JsonValue {
  return toJsonSafe(notification.payload);
}

export function decodeNotification(row: {
  id: string;
  sequence: number;
  type: string;
  payload: unknown;
  emitted_at: Date;
}): LedgerNotification {
  const event: NotificationEvent = NotificationEventSchema.parse({ type: row.type, payload: row.payload });
  return {
    ...event,
    id: row.id,
    sequence: row.sequence,
    emitted_at: row.emitted_at,
  };
}
