import { describe, expect, it, vi } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import { DEFAULT_STAGES, enrichDeal } from '../../services/deals/enrichment.js';
import { buildDealCandidate } from '../../services/deals/deal-builder.js';
import type { DealCandidate } from '../../services/deals/types.js';
import { makeListing } from '../fixtures.js';

function ps5Candidate(body: string | null = null): DealCandidate {
  const candidate = buildDealCandidate(makeListing({ body }), null);
  if (!candidate) throw new Error('fixture listing must be priced');
  return candidate;
}

const ctx = { query: 'ps5', travelCost: 20.45 };

function failing(): never {
  throw new Error('stage exploded');
}

describe('enrichDeal', () => {
  it('annotates every derived field', () => {
    expect(enrichDeal(ps5Candidate(), ctx)).toMatchObject({
      localPrice: 250,
      estimatedProfit: 0,
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
    });
  });

  it('reads the listing body as well as the title', () => {
    const deal = enrichDeal(ps5Candidate('Tested, comes with warranty'), ctx);
    expect(deal.sellerRating).toBe(75);
    expect(deal.sellerGreenFlags).toEqual(['warranty', 'tested']);
  });

  it('leaves the candidate untouched', () => {
    const candidate = ps5Candidate();
    const before = { ...candidate };
    enrichDeal(candidate, ctx);
    expect(candidate).toEqual(before);
  });

  it('nulls a failed stage and everything that depends on it', () => {
    const deal = enrichDeal(ps5Candidate(), ctx, { ...DEFAULT_STAGES, condition: failing });
    expect(deal).toMatchObject({
      conditionLabel: null,
      conditionScore: null,
      conditionMatches: [],
      ruleMarketValue: null,
      ruleProfit: null,
      effectiveProfit: null,
      demandScore: null,
      sellerRating: 50,
      travelCost: 20.45,
    });
  });

  it('keeps independent stages when the seller stage fails', () => {
    const deal = enrichDeal(ps5Candidate(), ctx, { ...DEFAULT_STAGES, seller: failing });
    expect(deal.sellerRating).toBeNull();
    expect(deal.conditionLabel).toBe('Good');
    expect(deal.demandScore).toBe(82.93);
  });

  it('omits only the demand score when scoring fails', () => {
    const deal = enrichDeal(ps5Candidate(), ctx, { ...DEFAULT_STAGES, demand: failing });
    expect(deal.demandScore).toBeNull();
    expect(deal.effectiveProfit).toBe(79.55);
  });
});
