import pino from 'pino';
import { z } from 'zod';
import { ExternalApiError } from '../../utils/errors.js';
import type { MarketplaceAdapter, MarketplaceQuery, RawListing } from './types.js';

const log = pino({ name: 'craigslist' });

const API_URL = 'https://sapi.craigslist.org/web/v8/postings/search/full';
// "for sale, all categories"
const SEARCH_PATH = 'sss';
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

// Tagged sub-arrays inside each packed posting
const FIELD_SLUG = 6;
const FIELD_PRICE_TEXT = 10;

const responseSchema = z.object({
  data: z
    .object({
      decode: z
        .object({
          minPostingId: z.number().default(0),
          locations: z.array(z.array(z.unknown())).default([]),
          locationDescriptions: z.array(z.string().nullable()).default([]),
        })
        .default({}),
      items: z.array(z.array(z.unknown())).default([]),
    })
    .default({}),
});

export type CraigslistResponse = z.infer<typeof responseSchema>;

function asString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** "$1,250" → 1250; null when no digits. */
export function parsePriceText(text: string | null): number | null {
  if (!text) return null;
  const digits = text.replace(/[^0-9.]/g, '');
  if (!digits) return null;
  const value = parseFloat(digits);
  return Number.isFinite(value) ? value : null;
}

function taggedField(item: unknown[], tag: number): unknown {
  for (const field of item) {
    if (Array.isArray(field) && field[0] === tag && field.length >= 2) return field[1];
  }
  return undefined;
}

/**
 * Decode the packed search payload into listings.
 *
 * Each item is [postingIdOffset, postedOffset, ?, price, "area:neighborhood~...", ...tagged, title].
 * Area indexes point into decode.locations ([id, hostname, subarea]).
 */
export function parseCraigslistResponse(payload: unknown, site: string, limit: number): RawListing[] {
  const { data } = responseSchema.parse(payload);
  const { decode } = data;

  const listings: RawListing[] = [];
  for (const item of data.items.slice(0, limit)) {
    const title = asString(item[item.length - 1]);
    const offset = asNumber(item[0]);
    if (!title || offset === null) continue;

    const postingId = decode.minPostingId + offset;

    const locStr = asString(item[4]) ?? '';
    const areaIdx = parseInt(locStr.split('~')[0]?.split(':')[0] ?? '0', 10) || 0;
    const area = decode.locations[areaIdx];
    const hostname = asString(area?.[1]) ?? site;
    const subArea = asString(area?.[2]);

    const numericPrice = asNumber(item[3]);
    const price =
      numericPrice !== null && numericPrice > 0
        ? numericPrice
        : parsePriceText(asString(taggedField(item, FIELD_PRICE_TEXT)));

    const slug = asString(taggedField(item, FIELD_SLUG));
    const base = subArea
      ? `https://${hostname}.craigslist.org/${subArea}/${SEARCH_PATH}`
      : `https://${hostname}.craigslist.org/${SEARCH_PATH}`;
    const url = slug ? `${base}/d/${slug}/${postingId}.html` : `https://${hostname}.craigslist.org/${postingId}.html`;

    listings.push({
      source: 'craigslist',
      title,
      price,
      location: decode.locationDescriptions[areaIdx] ?? hostname,
      url,
      body: null,
    });
  }

  return listings;
}

export class CraigslistAdapter implements MarketplaceAdapter {
  readonly source = 'craigslist' as const;

  constructor(private readonly fetchFn: typeof fetch = fetch) {}

  async search(query: MarketplaceQuery): Promise<RawListing[]> {
    const params = new URLSearchParams({
      batch: '1-0-360-0-0',
      cc: 'US',
      lang: 'en',
      searchPath: SEARCH_PATH,
      query: query.query,
      postal: query.postalCode,
      search_distance: String(query.radiusMiles),
    });
    if (query.maxPrice !== null) params.set('max_price', String(Math.floor(query.maxPrice)));

    const res = await this.fetchFn(`${API_URL}?${params.toString()}`, {
      headers: { 'User-Agent': USER_AGENT },
    });

    if (!res.ok) {
      throw new ExternalApiError('craigslist', `search failed: ${await res.text()}`, { statusCode: res.status });
    }

    const listings = parseCraigslistResponse(await res.json(), query.region, query.maxResults);
    log.info({ site: query.region, query: query.query, count: listings.length }, 'Craigslist search complete');
    return listings;
  }
}
