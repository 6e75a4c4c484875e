import type { EnrichedDeal, RankedDeal } from '../deals/types.js';

export interface TermResults {
  term: string;
  deals: readonly EnrichedDeal[];
}

/** Descending on a nullable key; null sorts after every number. */
function compareDesc(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

export function compareDeals(a: EnrichedDeal, b: EnrichedDeal): number {
  return (
    compareDesc(a.demandScore, b.demandScore) ||
    compareDesc(a.effectiveProfit, b.effectiveProfit)
  );
}

/**
 * Order by demand score, then effective profit, both descending.
 * Array.prototype.sort is stable, so rows tied on both keys keep their
 * input order.
 */
export function rankDeals<T extends EnrichedDeal>(deals: readonly T[]): T[] {
  return [...deals].sort(compareDeals);
}

/** Tag rows with a single-search provenance (no term) and rank them. */
export function rankSingleSearch(deals: readonly EnrichedDeal[]): RankedDeal[] {
  return rankDeals(deals.map((deal) => ({ ...deal, searchTerm: null })));
}

/**
 * Merge per-term results: every row is tagged with its originating term
 * before the combined two-key sort. No row is dropped.
 */
export function aggregateResults(results: readonly TermResults[]): RankedDeal[] {
  const tagged: RankedDeal[] = results.flatMap(({ term, deals }) =>
    deals.map((deal) => ({ ...deal, searchTerm: term })),
  );
  return rankDeals(tagged);
}
