import pino from 'pino';
import type { AppConfig } from '../../config/index.js';
import { EbaySoldPriceLookup } from './ebay-sold-lookup.js';
import { NoDataPriceLookup } from './no-data-lookup.js';
import type { MarketPriceLookup } from './types.js';

const log = pino({ name: 'market-price' });

export function createPriceLookup(
  config: Pick<AppConfig, 'EBAY_CLIENT_ID' | 'EBAY_CLIENT_SECRET' | 'EBAY_MARKETPLACE_ID'>,
): MarketPriceLookup {
  if (config.EBAY_CLIENT_ID && config.EBAY_CLIENT_SECRET) {
    log.info({ marketplace: config.EBAY_MARKETPLACE_ID }, 'Using eBay sold-price lookup');
    return new EbaySoldPriceLookup({
      clientId: config.EBAY_CLIENT_ID,
      clientSecret: config.EBAY_CLIENT_SECRET,
      marketplaceId: config.EBAY_MARKETPLACE_ID,
    });
  }

  log.info('eBay credentials not set, running in raw mode without market price data');
  return new NoDataPriceLookup();
}

export { EbaySoldPriceLookup, averageSoldPrice } from './ebay-sold-lookup.js';
export { NoDataPriceLookup } from './no-data-lookup.js';
export { EMPTY_ESTIMATE } from './types.js';
export type { MarketPriceEstimate, MarketPriceLookup } from './types.js';
