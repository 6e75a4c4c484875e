import type { RawListing } from '../services/marketplace/types.js';
import type { EnrichedDeal, RankedDeal } from '../services/deals/types.js';

export function makeListing(overrides: Partial<RawListing> = {}): RawListing {
  return {
    source: 'craigslist',
    title: 'PS5 console good condition',
    price: 250,
    location: 'Redding',
    url: 'https://example.test/listing/1',
    body: null,
    ...overrides,
  };
}

export function makeEnriched(overrides: Partial<EnrichedDeal> = {}): EnrichedDeal {
  return {
    listing: makeListing(),
    market: { averageSoldPrice: 0, sampleSize: 0 },
    localPrice: 250,
    estimatedProfit: 0,
    profitMarginPct: 0,
    conditionLabel: 'Good',
    conditionScore: 0.7,
    conditionMatches: ['good condition', 'good'],
    sellerRating: 50,
    sellerRedFlags: [],
    sellerGreenFlags: [],
    ruleMarketValue: 350,
    ruleProfit: 100,
    travelCost: 20.45,
    effectiveProfit: 79.55,
    demandScore: 82.93,
    ...overrides,
  };
}

export function makeRanked(overrides: Partial<RankedDeal> = {}): RankedDeal {
  return { ...makeEnriched(overrides), searchTerm: overrides.searchTerm ?? null };
}
