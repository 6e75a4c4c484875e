export { getAccessToken, clearTokenCache } from './auth.js';
export { searchSoldItems } from './client.js';
export { scheduleEbayCall, checkRateLimitHeaders } from './rate-limiter.js';
export type {
  EbayCredentials,
  EbayItemSale,
  EbayItemSalesResponse,
} from './types.js';
