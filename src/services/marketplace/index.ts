import { CraigslistAdapter } from './craigslist.js';
import type { MarketplaceAdapter } from './types.js';

/**
 * Adapters available to the search runner. A Facebook Marketplace adapter
 * registers here with source 'facebook' and is only queried when a search
 * sets includeFacebook.
 */
export function createMarketplaceAdapters(): MarketplaceAdapter[] {
  return [new CraigslistAdapter()];
}

export { CraigslistAdapter, parseCraigslistResponse, parsePriceText } from './craigslist.js';
export type { ListingSource, MarketplaceAdapter, MarketplaceQuery, RawListing } from './types.js';
