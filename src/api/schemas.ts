/**
 * Campaign Ledger - Request Schemas
 * JSON has no BigInt: amounts arrive as decimal strings or safe integers.
 */

import { z } from 'zod';
import { LedgerError } from '../core/ledger';

export const AmountInputSchema = z
  .union([z.string().regex(/^\d+$/, 'must be a non-negative integer string'), z.number().int().nonnegative().safe()])
  .transform(value => BigInt(value));

export const CampaignIdParamSchema = z.string().regex(/^\d+$/).transform(value => Number(value));

/**
 * Campaign ids from the path. Anything that is not a campaign id is simply not found.
 */
export function parseCampaignId(raw: string): number {
  const parsed = CampaignIdParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LedgerError('NOT_FOUND', `Campaign ${raw} not found`);
  }
  return parsed.data;
}

export const CreateCampaignBodySchema = z.object({
  title: z.string().max(200),
  description: z.string().max(5000).default(''),
  image_url: z.string().max(2048).default(''),
  goal_amount: AmountInputSchema,
});

export const AmountBodySchema = z.object({
  amount: AmountInputSchema,
});

export const AttachedValueHeaderSchema = AmountInputSchema;

export const UpdateFeeBodySchema = z.object({
  fee_bps: z.number().int(),
});

export const TransferOwnershipBodySchema = z.object({
  new_owner: z.string(),
});

export const NotificationsQuerySchema = z.object({
  after: z.coerce.number().int().nonnegative().default(0),
});
