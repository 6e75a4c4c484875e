import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import pino from 'pino';
import { runSavedSearches, runSearch } from '../services/search/search-runner.js';
import type { SearchDependencies, SearchRun } from '../services/search/search-runner.js';
import type { SavedSearchStore } from '../services/saved-searches/store.js';
import { toExportRecords } from '../services/export/export-record.js';
import { toCsv, writeCsvExport } from '../services/export/csv-export.js';
import { sendError } from './error-response.js';

const log = pino({ name: 'search-routes' });

export interface SearchRouterDeps extends SearchDependencies {
  savedSearches: SavedSearchStore;
  exportDir: string;
}

const exportRequestSchema = z
  .object({ mode: z.enum(['single', 'saved']).default('single') })
  .passthrough();

function sendRun(req: Request, res: Response, run: SearchRun): void {
  if (req.query.format === 'csv') {
    res.type('text/csv').send(toCsv(run.deals));
    return;
  }
  res.json({ count: run.deals.length, stats: run.stats, deals: toExportRecords(run.deals) });
}

export function createSearchRouter(deps: SearchRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/search — one query across the enabled marketplaces.
   * `?format=csv` returns the export columns as CSV.
   */
  router.post('/', async (req: Request, res: Response) => {
    try {
      const run = await runSearch(req.body, deps);
      sendRun(req, res, run);
    } catch (err) {
      sendError(res, err, log, 'Search failed');
    }
  });

  /**
   * POST /api/search/saved — every saved term with the same settings.
   */
  router.post('/saved', async (req: Request, res: Response) => {
    try {
      const terms = await deps.savedSearches.list();
      const run = await runSavedSearches(req.body, terms, deps);
      sendRun(req, res, run);
    } catch (err) {
      sendError(res, err, log, 'Saved search failed');
    }
  });

  /**
   * POST /api/search/export — run a search (or the saved terms) and write
   * the result set to a CSV file under the export directory.
   */
  router.post('/export', async (req: Request, res: Response) => {
    const parsed = exportRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.flatten() });
      return;
    }

    try {
      const { mode } = parsed.data;
      const run =
        mode === 'saved'
          ? await runSavedSearches(parsed.data, await deps.savedSearches.list(), deps)
          : await runSearch(parsed.data, deps);
      const filePath = await writeCsvExport(run.deals, mode, deps.exportDir);
      res.status(201).json({ path: filePath, rows: run.deals.length, stats: run.stats });
    } catch (err) {
      sendError(res, err, log, 'Export failed');
    }
  });

  return router;
}
