import pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'db' });

/** Null when DATABASE_URL is unset; callers fall back to in-memory storage. */
export const pool: pg.Pool | null = config.DATABASE_URL
  ? new pg.Pool({ connectionString: config.DATABASE_URL, max: 10 })
  : null;

pool?.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle database client');
});
