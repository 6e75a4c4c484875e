import { describe, expect, it, vi } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import { CraigslistAdapter, parseCraigslistResponse, parsePriceText } from '../../services/marketplace/craigslist.js';
import type { MarketplaceQuery } from '../../services/marketplace/types.js';
import { ExternalApiError } from '../../utils/errors.js';

const payload = {
  data: {
    decode: {
      minPostingId: 7700000000,
      locations: [
        [1, 'redding'],
        [2, 'sfbay', 'eby'],
      ],
      locationDescriptions: ['Redding', 'oakland'],
    },
    items: [
      [12345, 100, 0, 250, '0:0~x', [6, 'ps5-console-good'], 'PS5 console good condition'],
      [5, 100, 0, -1, '1:0~y', [10, '$1,250'], [6, 'macbook-pro'], 'MacBook Pro'],
      [7, 100, 0, 0, '0', 'Free couch'],
      ['bad', 'not a posting'],
    ],
  },
};

describe('parsePriceText', () => {
  it('strips currency formatting', () => {
    expect(parsePriceText('$1,250')).toBe(1250);
    expect(parsePriceText('$19.99')).toBe(19.99);
  });

  it('returns null without digits', () => {
    expect(parsePriceText('free')).toBeNull();
    expect(parsePriceText(null)).toBeNull();
  });
});

describe('parseCraigslistResponse', () => {
  it('decodes packed postings', () => {
    expect(parseCraigslistResponse(payload, 'redding', 50)).toEqual([
      {
        source: 'craigslist',
        title: 'PS5 console good condition',
        price: 250,
        location: 'Redding',
        url: 'https://redding.craigslist.org/sss/d/ps5-console-good/7700012345.html',
        body: null,
      },
      {
        source: 'craigslist',
        title: 'MacBook Pro',
        price: 1250,
        location: 'oakland',
        url: 'https://sfbay.craigslist.org/eby/sss/d/macbook-pro/7700000005.html',
        body: null,
      },
      {
        source: 'craigslist',
        title: 'Free couch',
        price: null,
        location: 'Redding',
        url: 'https://redding.craigslist.org/7700000007.html',
        body: null,
      },
    ]);
  });

  it('respects the result limit', () => {
    expect(parseCraigslistResponse(payload, 'redding', 1)).toHaveLength(1);
  });

  it('returns no listings for an empty payload', () => {
    expect(parseCraigslistResponse({}, 'redding', 50)).toEqual([]);
  });
});

describe('CraigslistAdapter', () => {
  const query: MarketplaceQuery = {
    query: 'ps5',
    region: 'redding',
    postalCode: '96001',
    radiusMiles: 50,
    maxResults: 50,
    maxPrice: 300,
  };

  it('queries the search endpoint and parses the response', async () => {
    const urls: string[] = [];
    const fakeFetch: typeof fetch = async (input) => {
      urls.push(String(input));
      return new Response(JSON.stringify(payload), { status: 200 });
    };

    const listings = await new CraigslistAdapter(fakeFetch).search(query);

    expect(listings).toHaveLength(3);
    const url = new URL(urls[0] ?? '');
    expect(url.origin + url.pathname).toBe('https://sapi.craigslist.org/web/v8/postings/search/full');
    expect(url.searchParams.get('query')).toBe('ps5');
    expect(url.searchParams.get('postal')).toBe('96001');
    expect(url.searchParams.get('search_distance')).toBe('50');
    expect(url.searchParams.get('max_price')).toBe('300');
  });

  it('omits the price ceiling when unset', async () => {
    const urls: string[] = [];
    const fakeFetch: typeof fetch = async (input) => {
      urls.push(String(input));
      return new Response('{}', { status: 200 });
    };

    await new CraigslistAdapter(fakeFetch).search({ ...query, maxPrice: null });
    expect(new URL(urls[0] ?? '').searchParams.has('max_price')).toBe(false);
  });

  it('raises an ExternalApiError on a failed response', async () => {
    const fakeFetch: typeof fetch = async () => new Response('blocked', { status: 403 });
    await expect(new CraigslistAdapter(fakeFetch).search(query)).rejects.toBeInstanceOf(ExternalApiError);
  });
});
