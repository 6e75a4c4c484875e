export interface MarketPriceEstimate {
  /** Average sold price in dollars; 0 when unknown */
  averageSoldPrice: number;
  /** Number of sold items behind the average; 0 means no data */
  sampleSize: number;
}

export interface MarketPriceLookup {
  readonly name: string;
  /** Resolves to null when no estimate is available for the title. */
  estimate(title: string): Promise<MarketPriceEstimate | null>;
}

export const EMPTY_ESTIMATE: MarketPriceEstimate = Object.freeze({
  averageSoldPrice: 0,
  sampleSize: 0,
});
