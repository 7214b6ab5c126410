import { LoyaltyTier } from "@tapau/types";

export interface TierRule {
  tier: LoyaltyTier;
  minLifetimePoints: number;
  /** Earn rate in percent of the base rate. */
  multiplierPercent: number;
}

export const LOYALTY_TIERS: readonly TierRule[] = [
  { tier: "BRONZE", minLifetimePoints: 0, multiplierPercent: 100 },
  { tier: "SILVER", minLifetimePoints: 1000, multiplierPercent: 120 },
  { tier: "GOLD", minLifetimePoints: 5000, multiplierPercent: 150 },
  { tier: "PLATINUM", minLifetimePoints: 15000, multiplierPercent: 200 },
  { tier: "DIAMOND", minLifetimePoints: 50000, multiplierPercent: 300 },
];

export function tierFor(lifetimePoints: number): TierRule {
  let current = LOYALTY_TIERS[0];
  for (const rule of LOYALTY_TIERS) {
    if (lifetimePoints >= rule.minLifetimePoints) current = rule;
  }
  return current;
}

export function nextTierFor(lifetimePoints: number): { tier: LoyaltyTier; pointsNeeded: number } | null {
  const next = LOYALTY_TIERS.find((rule) => rule.minLifetimePoints > lifetimePoints);
  return next ? { tier: next.tier, pointsNeeded: next.minLifetimePoints - lifetimePoints } : null;
}

/** One point per whole ringgit paid, scaled by the tier rate and rounded down. */
export function pointsForOrder(totalCents: number, multiplierPercent: number): number {
  const wholeRinggit = Math.floor(Math.max(0, totalCents) / 100);
  return Math.floor((wholeRinggit * multiplierPercent) / 100);
}
