import type { RankedDeal } from '../deals/types.js';

/**
 * Flat, sink-facing view of a ranked deal. Column order and presence are
 * fixed so CSV and sheet consumers can diff runs reliably.
 */
export interface ExportRecord {
  searchTerm: string;
  source: string;
  title: string;
  location: string;
  localPrice: number;
  ebayAvgSold: number;
  estProfitEbay: number;
  profitPctEbay: number;
  samples: number;
  conditionGuess: string;
  conditionScore: number | null;
  sellerRating: number | null;
  ruleMarketValue: number | null;
  ruleProfitEst: number | null;
  travelCostEst: number;
  effectiveProfitRule: number | null;
  demandScore: number | null;
  listingLink: string;
  ebaySearch: string;
}

export const EXPORT_COLUMNS: readonly { key: keyof ExportRecord; header: string }[] = [
  { key: 'searchTerm', header: 'Search Term' },
  { key: 'source', header: 'Source' },
  { key: 'title', header: 'Title' },
  { key: 'location', header: 'Location' },
  { key: 'localPrice', header: 'Local Price' },
  { key: 'ebayAvgSold', header: 'eBay Avg Sold' },
  { key: 'estProfitEbay', header: 'Est Profit (eBay)' },
  { key: 'profitPctEbay', header: 'Profit % (eBay)' },
  { key: 'samples', header: 'Samples' },
  { key: 'conditionGuess', header: 'Condition Guess' },
  { key: 'conditionScore', header: 'Condition Score' },
  { key: 'sellerRating', header: 'Seller Rating' },
  { key: 'ruleMarketValue', header: 'Rule Market Value' },
  { key: 'ruleProfitEst', header: 'Rule Profit Est' },
  { key: 'travelCostEst', header: 'Travel Cost Est' },
  { key: 'effectiveProfitRule', header: 'Effective Profit (Rule)' },
  { key: 'demandScore', header: 'Demand Score' },
  { key: 'listingLink', header: 'Listing Link' },
  { key: 'ebaySearch', header: 'eBay Search' },
];

export function ebaySearchUrl(title: string): string {
  return `https://www.ebay.com/sch/i.html?_nkw=${encodeURIComponent(title.trim()).replace(/%20/g, '+')}`;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

export function toExportRecord(deal: RankedDeal): ExportRecord {
  const { listing } = deal;
  return {
    searchTerm: deal.searchTerm ?? '',
    source: listing.source,
    title: listing.title,
    location: listing.location ?? '',
    localPrice: deal.localPrice,
    ebayAvgSold: deal.market.averageSoldPrice,
    estProfitEbay: round(deal.estimatedProfit, 2),
    profitPctEbay: round(deal.profitMarginPct, 1),
    samples: deal.market.sampleSize,
    conditionGuess: deal.conditionLabel ?? '',
    conditionScore: deal.conditionScore,
    sellerRating: deal.sellerRating,
    ruleMarketValue: deal.ruleMarketValue,
    ruleProfitEst: deal.ruleProfit,
    travelCostEst: round(deal.travelCost, 2),
    effectiveProfitRule: deal.effectiveProfit,
    demandScore: deal.demandScore,
    listingLink: listing.url,
    ebaySearch: ebaySearchUrl(listing.title),
  };
}

export function toExportRecords(deals: readonly RankedDeal[]): ExportRecord[] {
  return deals.map(toExportRecord);
}
