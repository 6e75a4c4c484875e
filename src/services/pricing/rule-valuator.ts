/**
 * Rule-based market value, independent of any external price source.
 *
 * | Condition score | Multiplier |
 * |-----------------|------------|
 * | >= 0.9          | 1.60       |
 * | >= 0.7          | 1.40       |
 * | >= 0.5          | 1.25       |
 * | >= 0.3          | 1.10       |
 * | < 0.3           | 0.80       |
 */

export const CONDITION_MULTIPLIERS: readonly { minScore: number; multiplier: number }[] = [
  { minScore: 0.9, multiplier: 1.6 },
  { minScore: 0.7, multiplier: 1.4 },
  { minScore: 0.5, multiplier: 1.25 },
  { minScore: 0.3, multiplier: 1.1 },
];

export const FLOOR_MULTIPLIER = 0.8;

export interface RuleValuation {
  marketValue: number;
  profit: number;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export function conditionMultiplier(conditionScore: number): number {
  const score = Math.min(1, Math.max(0, conditionScore));
  for (const band of CONDITION_MULTIPLIERS) {
    if (score >= band.minScore) return band.multiplier;
  }
  return FLOOR_MULTIPLIER;
}

export function estimateMarketValue(localPrice: number, conditionScore: number): RuleValuation {
  if (!Number.isFinite(localPrice) || localPrice < 0) {
    throw new RangeError(`Local price must be a non-negative number, got ${localPrice}`);
  }
  if (!Number.isFinite(conditionScore)) {
    throw new RangeError(`Condition score must be a number, got ${conditionScore}`);
  }

  const marketValue = roundCents(localPrice * conditionMultiplier(conditionScore));
  return { marketValue, profit: roundCents(marketValue - localPrice) };
}
