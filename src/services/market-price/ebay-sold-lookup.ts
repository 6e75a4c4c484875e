import pino from 'pino';
import { searchSoldItems } from '../ebay/index.js';
import type { EbayCredentials, EbayItemSalesResponse } from '../ebay/index.js';
import type { MarketPriceEstimate, MarketPriceLookup } from './types.js';

const log = pino({ name: 'ebay-sold-lookup' });

type SoldItemSearch = (query: string, credentials: EbayCredentials, limit?: number) => Promise<EbayItemSalesResponse>;

/** Average of the sold prices in a response; null when none are usable. */
export function averageSoldPrice(response: EbayItemSalesResponse): MarketPriceEstimate | null {
  const prices = (response.itemSales ?? [])
    .map((sale) => parseFloat(sale.lastSoldPrice?.value ?? ''))
    .filter((p) => Number.isFinite(p) && p > 0);

  if (prices.length === 0) return null;

  const total = prices.reduce((sum, p) => sum + p, 0);
  return {
    averageSoldPrice: Math.round((total / prices.length) * 100) / 100,
    sampleSize: prices.length,
  };
}

/**
 * Market price from eBay Marketplace Insights sold-item search.
 */
export class EbaySoldPriceLookup implements MarketPriceLookup {
  readonly name = 'ebay-sold';

  constructor(
    private readonly credentials: EbayCredentials,
    private readonly sampleLimit = 50,
    private readonly search: SoldItemSearch = searchSoldItems,
  ) {}

  async estimate(title: string): Promise<MarketPriceEstimate | null> {
    const response = await this.search(title, this.credentials, this.sampleLimit);
    const estimate = averageSoldPrice(response);
    log.debug({ title, estimate }, 'Sold price estimate');
    return estimate;
  }
}
