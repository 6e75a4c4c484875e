import type { RawListing } from '../marketplace/types.js';
import type { MarketPriceEstimate } from '../market-price/types.js';
import type { ConditionLabel } from '../extraction/condition-extractor.js';

export interface DealCandidate {
  readonly listing: Readonly<RawListing>;
  /** Normalized estimate: zeros when the lookup had no data */
  readonly market: Readonly<MarketPriceEstimate>;
  readonly localPrice: number;
  /** Average sold price minus local price; 0 without market data */
  readonly estimatedProfit: number;
  /** Profit as a percent of local price; 0 without market data */
  readonly profitMarginPct: number;
}

/**
 * Derived fields appended by enrichment. A field is null when its stage
 * (or a stage it depends on) failed for this listing.
 */
export interface DealAnnotations {
  readonly conditionLabel: ConditionLabel | null;
  readonly conditionScore: number | null;
  readonly conditionMatches: readonly string[];
  readonly sellerRating: number | null;
  readonly sellerRedFlags: readonly string[];
  readonly sellerGreenFlags: readonly string[];
  readonly ruleMarketValue: number | null;
  readonly ruleProfit: number | null;
  readonly travelCost: number;
  readonly effectiveProfit: number | null;
  readonly demandScore: number | null;
}

export type EnrichedDeal = DealCandidate & DealAnnotations;

export type RankedDeal = EnrichedDeal & {
  /** Originating saved-search term; null for a single search */
  readonly searchTerm: string | null;
};
