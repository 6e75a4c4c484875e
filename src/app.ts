import express from 'express';
import type { Express } from 'express';
import helmet from 'helmet';
import type { Pool } from 'pg';
import pino from 'pino';
import { createHealthRouter } from './routes/health.js';
import { createSearchRouter } from './routes/search.js';
import { createSavedSearchRouter } from './routes/saved-searches.js';
import { createComposerRouter } from './routes/composer.js';
import type { MarketplaceAdapter } from './services/marketplace/types.js';
import type { MarketPriceLookup } from './services/market-price/types.js';
import type { SavedSearchStore } from './services/saved-searches/store.js';

const logger = pino({ name: 'http' });

export interface AppDependencies {
  adapters: readonly MarketplaceAdapter[];
  priceLookup: MarketPriceLookup;
  savedSearches: SavedSearchStore;
  exportDir: string;
  listingsDir: string;
  pool: Pool | null;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Security headers
  app.use(helmet());
  // Listing packages carry base64 photos
  app.use(express.json({ limit: '10mb' }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(createHealthRouter(deps.pool));
  app.use('/api/search', createSearchRouter(deps));
  app.use('/api/saved-searches', createSavedSearchRouter(deps.savedSearches));
  app.use('/api/composer', createComposerRouter({ listingsDir: deps.listingsDir }));

  return app;
}
