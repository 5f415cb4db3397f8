/**
 * Campaign Ledger - Platform Fee Math
 * Integer basis-point arithmetic. Division truncates toward zero (floor for non-negative inputs).
 */

import { BPS_DENOMINATOR, MAX_PLATFORM_FEE_BPS } from '../../shared/types';

export interface FeeSplit {
  readonly amount: bigint;
  readonly fee: bigint;
  readonly net: bigint;
  readonly fee_bps: number;
}

export function isValidFeeBps(feeBps: number): boolean {
  return Number.isInteger(feeBps) && feeBps >= 0 && feeBps <= MAX_PLATFORM_FEE_BPS;
}

/**
 * Split a gross withdrawal into platform fee and owner net
 * fee = floor(amount * feeBps / 10000), net = amount - fee
 */
export function computeFeeSplit(amount: bigint, feeBps: number): FeeSplit {
  if (amount < 0n) {
    throw new RangeError(`Amount must be non-negative: ${amount}`);
  }
  if (!isValidFeeBps(feeBps)) {
    throw new RangeError(`Fee must be an integer in [0, ${MAX_PLATFORM_FEE_BPS}] bps: ${feeBps}`);
  }

  const fee = (amount * BigInt(feeBps)) / BPS_DENOMINATOR;
  return { amount, fee, net: amount - fee, fee_bps: feeBps };
}
