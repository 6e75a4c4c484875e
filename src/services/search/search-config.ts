import { z } from 'zod';
import { ConfigurationError } from '../../utils/errors.js';

/**
 * Search configuration, validated once per run before any I/O.
 * Defaults mirror a typical Northern California setup.
 */
export const searchConfigSchema = z.object({
  craigslistSite: z.string().trim().min(1).default('redding'),
  postalCode: z.string().trim().min(1).default('96001'),
  radiusMiles: z.number().min(0).max(500).default(50),
  query: z.string().trim().min(1, 'query must not be empty'),
  maxResultsPerSource: z.number().int().min(1).max(200).default(50),
  // 0 or less means no ceiling
  maxPrice: z
    .number()
    .nullable()
    .default(null)
    .transform((v) => (v !== null && v > 0 ? v : null)),
  minProfit: z.number().min(0).default(0),
  minMarginPct: z.number().min(0).default(0),
  mpg: z.number().positive().max(150).default(22),
  gasPrice: z.number().positive().max(20).default(4.5),
  includeFacebook: z.boolean().default(false),
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type SearchConfigInput = z.input<typeof searchConfigSchema>;

/** Saved-search runs supply the query per term. */
export const savedSearchConfigSchema = searchConfigSchema.omit({ query: true });
export type SavedSearchConfig = z.infer<typeof savedSearchConfigSchema>;

function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

export function parseSearchConfig(input: unknown): SearchConfig {
  const result = searchConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid search configuration', toIssues(result.error));
  }
  return result.data;
}

export function parseSavedSearchConfig(input: unknown): SavedSearchConfig {
  const result = savedSearchConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid search configuration', toIssues(result.error));
  }
  return result.data;
}
