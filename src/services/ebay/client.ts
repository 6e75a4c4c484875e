import pino from 'pino';
import { ExternalApiError } from '../../utils/errors.js';
import { getAccessToken, clearTokenCache } from './auth.js';
import { scheduleEbayCall, checkRateLimitHeaders } from './rate-limiter.js';
import { itemSalesResponseSchema } from './types.js';
import type { EbayCredentials, EbayItemSalesResponse } from './types.js';

const logger = pino({ name: 'ebay-client' });

const BASE_URL = 'https://api.ebay.com/buy/marketplace_insights/v1_beta';

async function ebayFetch(
  url: string,
  credentials: EbayCredentials,
  retry = true,
): Promise<EbayItemSalesResponse> {
  const token = await getAccessToken(credentials);

  const res = await fetch(url, {
    headers: {
      Authorization: `Bearer ${token}`,
      'X-EBAY-C-MARKETPLACE-ID': credentials.marketplaceId,
      'Content-Type': 'application/json',
    },
  });

  checkRateLimitHeaders(res.headers);

  if (res.status === 401 && retry) {
    logger.warn('Got 401 from eBay, clearing token cache and retrying');
    clearTokenCache(credentials.clientId);
    return ebayFetch(url, credentials, false);
  }

  if (res.status === 429 && retry) {
    const retryAfter = res.headers.get('Retry-After');
    const waitMs = retryAfter ? parseInt(retryAfter, 10) * 1000 : 5000;
    logger.warn('Got 429 from eBay, backing off %dms', waitMs);
    await new Promise((resolve) => setTimeout(resolve, waitMs));
    return ebayFetch(url, credentials, false);
  }

  if (!res.ok) {
    const body = await res.text();
    throw new ExternalApiError('ebay', body, { statusCode: res.status });
  }

  return itemSalesResponseSchema.parse(await res.json());
}

/**
 * Search recently sold items matching a free-text query.
 */
export async function searchSoldItems(
  query: string,
  credentials: EbayCredentials,
  limit = 50,
): Promise<EbayItemSalesResponse> {
  const params = new URLSearchParams({
    q: query,
    limit: String(limit),
  });

  const url = `${BASE_URL}/item_sales/search?${params.toString()}`;
  logger.debug({ query, limit }, 'Searching eBay sold items');

  return scheduleEbayCall(() => ebayFetch(url, credentials));
}
