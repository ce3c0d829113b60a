/**
 * AccessTier
 *
 * Totally ordered access level derived from asset ownership.
 * Numeric values carry the ordering: `Free` is the ceiling.
 */
export enum AccessTier {
  Denied = 0,
  Paid = 1,
  Free = 2,
}

export type AccessTierName = 'denied' | 'paid' | 'free';

const TIER_NAMES: Record<AccessTier, AccessTierName> = {
  [AccessTier.Denied]: 'denied',
  [AccessTier.Paid]: 'paid',
  [AccessTier.Free]: 'free',
};

export function tierName(tier: AccessTier): AccessTierName {
  return TIER_NAMES[tier];
}

export function maxTier(a: AccessTier, b: AccessTier): AccessTier {
  return a >= b ? a : b;
}
