import { describe, expect, it } from 'vitest';
import { filterDeals } from '../../services/deals/deal-filter.js';
import type { DealCandidate } from '../../services/deals/types.js';
import { makeListing } from '../fixtures.js';

function candidate(estimatedProfit: number, profitMarginPct: number): DealCandidate {
  return {
    listing: makeListing(),
    market: { averageSoldPrice: 0, sampleSize: 0 },
    localPrice: 100,
    estimatedProfit,
    profitMarginPct,
  };
}

describe('filterDeals', () => {
  it('passes everything through at zero thresholds, including losses', () => {
    const deals = [candidate(-40, -40), candidate(0, 0), candidate(25, 25)];
    const result = filterDeals(deals, { minProfit: 0, minMarginPct: 0 });
    expect(result).toEqual(deals);
    expect(result).not.toBe(deals);
  });

  it('keeps deals exactly at the thresholds', () => {
    const deals = [candidate(49.99, 50), candidate(50, 20), candidate(50, 19.9)];
    expect(filterDeals(deals, { minProfit: 50, minMarginPct: 20 })).toEqual([candidate(50, 20)]);
  });

  it('applies a single non-zero threshold', () => {
    const deals = [candidate(10, 5), candidate(-5, 30), candidate(80, 40)];
    expect(filterDeals(deals, { minProfit: 0, minMarginPct: 30 })).toEqual([candidate(80, 40)]);
  });

  it('preserves input order', () => {
    const deals = [candidate(90, 90), candidate(60, 60), candidate(70, 70)];
    expect(filterDeals(deals, { minProfit: 50, minMarginPct: 0 }).map((d) => d.estimatedProfit)).toEqual([90, 60, 70]);
  });
});
