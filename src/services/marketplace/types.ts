export type ListingSource = 'craigslist' | 'facebook';

export interface RawListing {
  source: ListingSource;
  title: string;
  /** Asking price in dollars; null when the post carries none */
  price: number | null;
  location: string | null;
  url: string;
  body?: string | null;
}

export interface MarketplaceQuery {
  query: string;
  /** Marketplace region, e.g. a Craigslist subdomain */
  region: string;
  postalCode: string;
  radiusMiles: number;
  maxResults: number;
  maxPrice: number | null;
}

export interface MarketplaceAdapter {
  readonly source: ListingSource;
  search(query: MarketplaceQuery): Promise<RawListing[]>;
}
