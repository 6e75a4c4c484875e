import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import pino from 'pino';
import { validate } from '../middleware/validation.js';
import type { SavedSearchStore } from '../services/saved-searches/store.js';
import { sendError } from './error-response.js';

const log = pino({ name: 'saved-searches-routes' });

const addTermSchema = z.object({
  term: z.string().trim().min(1, 'term must not be empty'),
});

export function createSavedSearchRouter(store: SavedSearchStore): Router {
  const router = Router();

  /**
   * GET /api/saved-searches — saved terms in insertion order.
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ terms: await store.list() });
    } catch (err) {
      sendError(res, err, log, 'Failed to list saved searches');
    }
  });

  /**
   * POST /api/saved-searches — add a term; duplicates are ignored.
   */
  router.post('/', validate(addTermSchema), async (req: Request, res: Response) => {
    try {
      const { term } = addTermSchema.parse(req.body);
      await store.add(term);
      res.status(201).json({ terms: await store.list() });
    } catch (err) {
      sendError(res, err, log, 'Failed to save search');
    }
  });

  return router;
}
