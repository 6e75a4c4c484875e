import type { DealCandidate } from './types.js';

export interface DealThresholds {
  minProfit: number;
  minMarginPct: number;
}

/**
 * Keep candidates whose external profit and margin meet both thresholds.
 *
 * With both thresholds at zero this is the identity: raw mode passes every
 * candidate through, including ones with a negative external profit.
 */
export function filterDeals<T extends DealCandidate>(deals: readonly T[], thresholds: DealThresholds): T[] {
  const { minProfit, minMarginPct } = thresholds;
  if (minProfit === 0 && minMarginPct === 0) return [...deals];

  return deals.filter(
    (deal) => deal.estimatedProfit >= minProfit && deal.profitMarginPct >= minMarginPct,
  );
}
