import pino from 'pino';
import type { MarketplaceAdapter, MarketplaceQuery, RawListing } from '../marketplace/types.js';
import type { MarketPriceEstimate, MarketPriceLookup } from '../market-price/types.js';
import type { DealCandidate, EnrichedDeal, RankedDeal } from '../deals/types.js';
import { buildDealCandidate } from '../deals/deal-builder.js';
import { filterDeals } from '../deals/deal-filter.js';
import { enrichDeal } from '../deals/enrichment.js';
import { computeTravelCost } from '../pricing/travel-cost.js';
import { aggregateResults, rankSingleSearch } from '../ranking/ranking-aggregator.js';
import type { TermResults } from '../ranking/ranking-aggregator.js';
import { createRunContext } from '../logger/correlation.js';
import type { RunContext } from '../logger/correlation.js';
import { parseSavedSearchConfig, parseSearchConfig } from './search-config.js';
import type { SearchConfig } from './search-config.js';

const log = pino({ name: 'search-runner' });

export interface SearchDependencies {
  adapters: readonly MarketplaceAdapter[];
  priceLookup: MarketPriceLookup;
}

export interface PricedListing {
  listing: RawListing;
  estimate: MarketPriceEstimate | null;
}

export interface SearchStats {
  listingsFetched: number;
  sourceFailures: number;
  priceLookupFailures: number;
  invalidListings: number;
  candidates: number;
  passedFilter: number;
}

export interface SearchRun {
  deals: RankedDeal[];
  stats: SearchStats;
}

type PipelineSettings = Pick<
  SearchConfig,
  'query' | 'radiusMiles' | 'mpg' | 'gasPrice' | 'minProfit' | 'minMarginPct'
>;

function emptyStats(): SearchStats {
  return {
    listingsFetched: 0,
    sourceFailures: 0,
    priceLookupFailures: 0,
    invalidListings: 0,
    candidates: 0,
    passedFilter: 0,
  };
}

function addStats(a: SearchStats, b: SearchStats): SearchStats {
  return {
    listingsFetched: a.listingsFetched + b.listingsFetched,
    sourceFailures: a.sourceFailures + b.sourceFailures,
    priceLookupFailures: a.priceLookupFailures + b.priceLookupFailures,
    invalidListings: a.invalidListings + b.invalidListings,
    candidates: a.candidates + b.candidates,
    passedFilter: a.passedFilter + b.passedFilter,
  };
}

/**
 * Builder → filter → enrichment for one search term. Pure apart from
 * logging; the result is unranked.
 */
export function buildEnrichedDeals(
  priced: readonly PricedListing[],
  settings: PipelineSettings,
  stats: SearchStats = emptyStats(),
  correlationId?: string,
): EnrichedDeal[] {
  const travelCost = computeTravelCost(settings);

  const candidates: DealCandidate[] = [];
  for (const { listing, estimate } of priced) {
    const candidate = buildDealCandidate(listing, estimate);
    if (candidate) {
      candidates.push(candidate);
    } else {
      stats.invalidListings++;
    }
  }
  stats.candidates += candidates.length;

  const passed = filterDeals(candidates, settings);
  stats.passedFilter += passed.length;

  return passed.map((deal) =>
    enrichDeal(deal, { query: settings.query, travelCost, correlationId }),
  );
}

/**
 * The pure core: (configuration, priced listings) → ranked result set.
 * Rows are tagged with `searchTerm` when one is given.
 */
export function runPipeline(
  priced: readonly PricedListing[],
  settings: PipelineSettings,
  searchTerm: string | null = null,
): RankedDeal[] {
  const deals = buildEnrichedDeals(priced, settings);
  return searchTerm === null ? rankSingleSearch(deals) : aggregateResults([{ term: searchTerm, deals }]);
}

function enabledAdapters(config: SearchConfig, adapters: readonly MarketplaceAdapter[]): MarketplaceAdapter[] {
  return adapters.filter((adapter) => adapter.source !== 'facebook' || config.includeFacebook);
}

async function collectListings(
  config: SearchConfig,
  deps: SearchDependencies,
  ctx: RunContext,
  stats: SearchStats,
): Promise<RawListing[]> {
  const query: MarketplaceQuery = {
    query: config.query,
    region: config.craigslistSite,
    postalCode: config.postalCode,
    radiusMiles: config.radiusMiles,
    maxResults: config.maxResultsPerSource,
    maxPrice: config.maxPrice,
  };

  const adapters = enabledAdapters(config, deps.adapters);
  // A synchronous throw inside search() settles as a rejection too
  const results = await Promise.allSettled(adapters.map(async (adapter) => adapter.search(query)));

  const listings: RawListing[] = [];
  results.forEach((result, i) => {
    const adapter = adapters[i];
    if (!adapter) return;

    if (result.status === 'rejected') {
      stats.sourceFailures++;
      log.warn({ ...ctx, source: adapter.source, err: result.reason }, 'Marketplace search failed, source skipped');
      return;
    }

    const fetched = result.value.slice(0, config.maxResultsPerSource);
    log.info({ ...ctx, source: adapter.source, count: fetched.length }, 'Marketplace search complete');
    // Adapters do not own the source tag
    for (const listing of fetched) {
      listings.push({ ...listing, source: adapter.source });
    }
  });

  stats.listingsFetched += listings.length;

  const { maxPrice } = config;
  if (maxPrice === null) return listings;
  return listings.filter((l) => l.price === null || l.price <= maxPrice);
}

async function priceListings(
  listings: readonly RawListing[],
  lookup: MarketPriceLookup,
  ctx: RunContext,
  stats: SearchStats,
): Promise<PricedListing[]> {
  return Promise.all(
    listings.map(async (listing): Promise<PricedListing> => {
      try {
        return { listing, estimate: await lookup.estimate(listing.title) };
      } catch (err) {
        stats.priceLookupFailures++;
        log.warn({ ...ctx, err, lookup: lookup.name, title: listing.title }, 'Price lookup failed, using no market data');
        return { listing, estimate: null };
      }
    }),
  );
}

async function searchTerm(
  config: SearchConfig,
  deps: SearchDependencies,
): Promise<{ deals: EnrichedDeal[]; stats: SearchStats }> {
  const ctx = createRunContext(config.query);
  const stats = emptyStats();
  const startTime = Date.now();

  log.info(
    { ...ctx, sources: enabledAdapters(config, deps.adapters).map((a) => a.source), lookup: deps.priceLookup.name },
    'Search started',
  );

  const listings = await collectListings(config, deps, ctx, stats);
  const priced = await priceListings(listings, deps.priceLookup, ctx, stats);
  const deals = buildEnrichedDeals(priced, config, stats, ctx.correlationId);

  log.info({ ...ctx, ...stats, deals: deals.length, durationMs: Date.now() - startTime }, 'Search complete');
  return { deals, stats };
}

/**
 * Run a single search. Configuration errors are raised before any
 * marketplace or price lookup call.
 */
export async function runSearch(input: unknown, deps: SearchDependencies): Promise<SearchRun> {
  const config = parseSearchConfig(input);

  const { deals, stats } = await searchTerm(config, deps);
  return { deals: rankSingleSearch(deals), stats };
}

/**
 * Run every saved term with the same settings and merge the results,
 * each row tagged with the term that found it.
 */
export async function runSavedSearches(
  input: unknown,
  terms: readonly string[],
  deps: SearchDependencies,
): Promise<SearchRun> {
  const base = parseSavedSearchConfig(input);

  const queries = terms.map((t) => t.trim()).filter(Boolean);
  const perTerm: TermResults[] = [];
  let stats = emptyStats();

  // Sequential: marketplace and pricing APIs are rate limited per account
  for (const term of queries) {
    const result = await searchTerm({ ...base, query: term }, deps);
    perTerm.push({ term, deals: result.deals });
    stats = addStats(stats, result.stats);
  }

  return { deals: aggregateResults(perTerm), stats };
}
