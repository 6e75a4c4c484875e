import pino from 'pino';
import { config } from './config/index.js';
import { pool } from './db/pool.js';
import { createApp } from './app.js';
import { createMarketplaceAdapters } from './services/marketplace/index.js';
import { createPriceLookup } from './services/market-price/index.js';
import { createSavedSearchStore } from './services/saved-searches/store.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info({ env: config.NODE_ENV }, 'Configuration validated');

  // Step 2: Test database connection, when one is configured
  if (pool) {
    logger.info('Connecting to database...');
    await pool.query('SELECT 1');
    logger.info('Database connected');
  }

  // Step 3: Wire collaborators
  const app = createApp({
    adapters: createMarketplaceAdapters(),
    priceLookup: createPriceLookup(config),
    savedSearches: createSavedSearchStore(pool),
    exportDir: config.EXPORT_DIR,
    listingsDir: config.LISTINGS_DIR,
    pool,
  });

  // Step 4: Start Express
  app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });
}

boot().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
