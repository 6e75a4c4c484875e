import { describe, expect, it } from 'vitest';
import { parseSavedSearchConfig, parseSearchConfig } from '../../services/search/search-config.js';
import { ConfigurationError } from '../../utils/errors.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err.issues;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('parseSearchConfig', () => {
  it('fills defaults around the query', () => {
    expect(parseSearchConfig({ query: '  ps5 ' })).toEqual({
      craigslistSite: 'redding',
      postalCode: '96001',
      radiusMiles: 50,
      query: 'ps5',
      maxResultsPerSource: 50,
      maxPrice: null,
      minProfit: 0,
      minMarginPct: 0,
      mpg: 22,
      gasPrice: 4.5,
      includeFacebook: false,
    });
  });

  it('treats a non-positive price ceiling as none', () => {
    expect(parseSearchConfig({ query: 'ps5', maxPrice: 0 }).maxPrice).toBeNull();
    expect(parseSearchConfig({ query: 'ps5', maxPrice: -10 }).maxPrice).toBeNull();
    expect(parseSearchConfig({ query: 'ps5', maxPrice: 400 }).maxPrice).toBe(400);
  });

  it('rejects an empty query', () => {
    expect(issuesOf(() => parseSearchConfig({ query: '   ' }))).toEqual(['query: query must not be empty']);
  });

  it('rejects a missing query', () => {
    expect(issuesOf(() => parseSearchConfig({}))).toEqual(['query: Required']);
  });

  it('rejects out-of-range travel parameters', () => {
    expect(issuesOf(() => parseSearchConfig({ query: 'ps5', radiusMiles: 600 }))).toEqual([
      'radiusMiles: Number must be less than or equal to 500',
    ]);
    expect(issuesOf(() => parseSearchConfig({ query: 'ps5', mpg: 0 }))).toEqual([
      'mpg: Number must be greater than 0',
    ]);
  });

  it('rejects negative thresholds', () => {
    expect(issuesOf(() => parseSearchConfig({ query: 'ps5', minProfit: -1 }))).toEqual([
      'minProfit: Number must be greater than or equal to 0',
    ]);
  });
});

describe('parseSavedSearchConfig', () => {
  it('does not require a query', () => {
    const config = parseSavedSearchConfig({ radiusMiles: 10 });
    expect(config.radiusMiles).toBe(10);
    expect('query' in config).toBe(false);
  });
});
