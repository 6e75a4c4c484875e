import Bottleneck from 'bottleneck';
import pino from 'pino';

const logger = pino({ name: 'ebay-rate-limiter' });

const LOW_REMAINING_THRESHOLD = 10;

// Every listing in a run triggers one sold-price search; cap the fan-out
const soldSearchLimiter = new Bottleneck({
  maxConcurrent: 5,
  minTime: 200,
});

export function scheduleEbayCall<T>(fn: () => Promise<T>): Promise<T> {
  return soldSearchLimiter.schedule(fn);
}

/**
 * Remaining calls reported by eBay, or null when the header is absent.
 * Logs a warning once the quota is nearly spent.
 */
export function checkRateLimitHeaders(headers: Headers): number | null {
  const header = headers.get('X-RateLimit-Remaining');
  if (header === null) return null;

  const remaining = parseInt(header, 10);
  if (Number.isNaN(remaining)) return null;

  if (remaining < LOW_REMAINING_THRESHOLD) {
    logger.warn(
      { remaining, limit: headers.get('X-RateLimit-Limit'), reset: headers.get('X-RateLimit-Reset') },
      'eBay sold-search quota running low',
    );
  }
  return remaining;
}
