import type { RawListing } from '../marketplace/types.js';
import { EMPTY_ESTIMATE, type MarketPriceEstimate } from '../market-price/types.js';
import type { DealCandidate } from './types.js';

/** Usable asking price, or null when the listing cannot be priced. */
export function usablePrice(listing: RawListing): number | null {
  const { price } = listing;
  if (price === null || !Number.isFinite(price) || price < 0) return null;
  return price;
}

/**
 * An estimate with no samples or no positive average carries no
 * information and is treated exactly like an absent one.
 */
export function normalizeEstimate(estimate: MarketPriceEstimate | null | undefined): MarketPriceEstimate {
  if (!estimate || !(estimate.sampleSize > 0) || !(estimate.averageSoldPrice > 0)) {
    return EMPTY_ESTIMATE;
  }
  return { averageSoldPrice: estimate.averageSoldPrice, sampleSize: Math.floor(estimate.sampleSize) };
}

/**
 * Pair a listing with whatever market data is available.
 * Returns null only when the listing has no usable price.
 */
export function buildDealCandidate(
  listing: RawListing,
  estimate: MarketPriceEstimate | null | undefined,
): DealCandidate | null {
  const localPrice = usablePrice(listing);
  if (localPrice === null) return null;

  const market = normalizeEstimate(estimate);
  const hasMarketData = market.sampleSize > 0;

  const estimatedProfit = hasMarketData ? market.averageSoldPrice - localPrice : 0;
  const profitMarginPct = hasMarketData && localPrice > 0 ? (estimatedProfit / localPrice) * 100 : 0;

  return { listing, market, localPrice, estimatedProfit, profitMarginPct };
}
