import type { Pool } from 'pg';
import pino from 'pino';
import { ValidationError } from '../../utils/errors.js';

const log = pino({ name: 'saved-searches' });

/**
 * Saved search terms. The search pipeline only ever calls `list()`.
 */
export interface SavedSearchStore {
  list(): Promise<string[]>;
  /** Trims the term; an existing term is left as is. */
  add(term: string): Promise<void>;
}

function normalizeTerm(term: string): string {
  const trimmed = term.trim();
  if (!trimmed) throw new ValidationError('Saved search term must not be empty');
  return trimmed;
}

export class MemorySavedSearchStore implements SavedSearchStore {
  private readonly terms: string[] = [];

  constructor(initial: readonly string[] = []) {
    for (const term of initial) {
      const trimmed = term.trim();
      if (trimmed && !this.terms.includes(trimmed)) this.terms.push(trimmed);
    }
  }

  async list(): Promise<string[]> {
    return [...this.terms];
  }

  async add(term: string): Promise<void> {
    const trimmed = normalizeTerm(term);
    if (!this.terms.includes(trimmed)) this.terms.push(trimmed);
  }
}

export class PgSavedSearchStore implements SavedSearchStore {
  private schemaReady: Promise<void> | null = null;

  constructor(private readonly pool: Pool) {}

  private ensureSchema(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = this.pool
        .query(
          `CREATE TABLE IF NOT EXISTS saved_searches (
             id SERIAL PRIMARY KEY,
             term TEXT NOT NULL UNIQUE,
             created_at TIMESTAMPTZ NOT NULL DEFAULT now()
           )`,
        )
        .then(() => {
          log.info('saved_searches table ready');
        })
        .catch((err: unknown) => {
          // Let the next call retry
          this.schemaReady = null;
          throw err;
        });
    }
    return this.schemaReady;
  }

  async list(): Promise<string[]> {
    await this.ensureSchema();
    const { rows } = await this.pool.query<{ term: string }>(
      'SELECT term FROM saved_searches ORDER BY id',
    );
    return rows.map((r) => r.term);
  }

  async add(term: string): Promise<void> {
    const trimmed = normalizeTerm(term);
    await this.ensureSchema();
    await this.pool.query(
      'INSERT INTO saved_searches (term) VALUES ($1) ON CONFLICT (term) DO NOTHING',
      [trimmed],
    );
    log.info({ term: trimmed }, 'Saved search added');
  }
}

export function createSavedSearchStore(pool: Pool | null): SavedSearchStore {
  if (pool) return new PgSavedSearchStore(pool);
  log.info('DATABASE_URL not set, saved searches are kept in memory');
  return new MemorySavedSearchStore();
}
