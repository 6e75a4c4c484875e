import { Router } from 'express';
import type { Pool } from 'pg';
import pino from 'pino';

const log = pino({ name: 'health' });

/** GET /healthz; a configured database must answer `SELECT 1`. */
export function createHealthRouter(pool: Pool | null): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    if (!pool) {
      res.json({ status: 'ok', database: 'disabled', timestamp: new Date().toISOString() });
      return;
    }
    try {
      await pool.query('SELECT 1');
      res.json({ status: 'ok', database: 'ok', timestamp: new Date().toISOString() });
    } catch (err) {
      log.warn({ err }, 'Health check database query failed');
      res.status(503).json({ status: 'error', database: 'unreachable' });
    }
  });

  return router;
}
