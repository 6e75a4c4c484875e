/**
 * Demand score: a 0–100 ranking signal blending how well the title matches
 * the search hint, the listing's condition, and its rule-based profit.
 *
 * Weights (sum to 100):
 *   relevance 40, condition 30, profit 30
 *
 * Profit passes through 0.5 + 0.5·tanh(profit / PROFIT_SCALE), so a
 * break-even deal contributes half the profit weight, losses contribute
 * less, and gains saturate instead of letting one outlier dominate.
 * The transform is strictly increasing, which keeps the score monotonic
 * in profit; the other terms are linear in their inputs.
 */

export const DEMAND_WEIGHTS = {
  relevance: 40,
  condition: 30,
  profit: 30,
} as const;

/** Profit (in dollars) at which the profit signal reaches ~88% of its weight */
export const PROFIT_SCALE = 200;

/** Relevance used when the hint has no usable tokens */
export const NEUTRAL_RELEVANCE = 0.5;

export interface DemandInput {
  title: string;
  categoryHint: string;
  conditionScore: number;
  ruleProfit: number;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
}

/** Share of hint tokens that appear in the title, 0–1. */
export function scoreRelevance(title: string, categoryHint: string): number {
  const hintTokens = [...new Set(tokenize(categoryHint))];
  if (hintTokens.length === 0) return NEUTRAL_RELEVANCE;

  const titleTokens = new Set(tokenize(title));
  const hits = hintTokens.filter((t) => titleTokens.has(t)).length;
  return hits / hintTokens.length;
}

export function profitSignal(ruleProfit: number): number {
  return 0.5 + 0.5 * Math.tanh(ruleProfit / PROFIT_SCALE);
}

export function computeDemandScore(input: DemandInput): number {
  const relevance = scoreRelevance(input.title, input.categoryHint);
  const condition = Math.min(1, Math.max(0, input.conditionScore));
  const profit = profitSignal(input.ruleProfit);

  const score =
    DEMAND_WEIGHTS.relevance * relevance +
    DEMAND_WEIGHTS.condition * condition +
    DEMAND_WEIGHTS.profit * profit;

  return Math.round(score * 100) / 100;
}
