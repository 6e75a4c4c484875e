import { randomUUID } from 'crypto';

/** Eight hex chars are enough to tell concurrent search runs apart in logs. */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Spread into every log call made while a search term is being processed,
 * so adapter, pricing and enrichment lines can be grouped per run.
 */
export interface RunContext {
  correlationId: string;
  query: string;
  service: 'search';
}

export function createRunContext(query: string): RunContext {
  return { correlationId: generateCorrelationId(), query, service: 'search' };
}
