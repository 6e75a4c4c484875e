import type { MarketPriceEstimate, MarketPriceLookup } from './types.js';

/**
 * Raw mode: no external pricing configured. Every listing gets zero
 * external-profit fields and is ranked on rule-based signals alone.
 */
export class NoDataPriceLookup implements MarketPriceLookup {
  readonly name = 'none';

  async estimate(_title: string): Promise<MarketPriceEstimate | null> {
    return null;
  }
}
