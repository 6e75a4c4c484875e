import pino from 'pino';
import { ExternalApiError } from '../../utils/errors.js';
import { tokenResponseSchema } from './types.js';
import type { EbayCredentials } from './types.js';

const logger = pino({ name: 'ebay-auth' });

const TOKEN_URL = 'https://api.ebay.com/identity/v1/oauth2/token';
// Sold-item search lives behind the Marketplace Insights scope
const INSIGHTS_SCOPE = 'https://api.ebay.com/oauth/api_scope/buy.marketplace.insights';
const EARLY_REFRESH_MS = 5 * 60 * 1000;

interface CachedToken {
  token: string;
  expiresAtMs: number;
}

// Keyed by client id: a process may price against more than one app key
const tokens = new Map<string, CachedToken>();

function isFresh(entry: CachedToken | undefined): entry is CachedToken {
  return entry !== undefined && entry.expiresAtMs - Date.now() > EARLY_REFRESH_MS;
}

async function requestToken(credentials: EbayCredentials): Promise<CachedToken> {
  const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
  const body = new URLSearchParams({ grant_type: 'client_credentials', scope: INSIGHTS_SCOPE });

  const res = await fetch(TOKEN_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Authorization: `Basic ${basic}`,
    },
    body: body.toString(),
  });

  if (!res.ok) {
    throw new ExternalApiError('ebay-auth', `token request failed: ${await res.text()}`, { statusCode: res.status });
  }

  const data = tokenResponseSchema.parse(await res.json());
  logger.info({ clientId: credentials.clientId, expiresIn: data.expires_in }, 'eBay application token issued');
  return { token: data.access_token, expiresAtMs: Date.now() + data.expires_in * 1000 };
}

/** Application (client credentials) token, reused until five minutes before expiry. */
export async function getAccessToken(credentials: EbayCredentials): Promise<string> {
  const cached = tokens.get(credentials.clientId);
  if (isFresh(cached)) return cached.token;

  const fresh = await requestToken(credentials);
  tokens.set(credentials.clientId, fresh);
  return fresh.token;
}

/** Drop cached tokens; the next call requests a new one. */
export function clearTokenCache(clientId?: string): void {
  if (clientId === undefined) {
    tokens.clear();
  } else {
    tokens.delete(clientId);
  }
}
