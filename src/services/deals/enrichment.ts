import pino from 'pino';
import { extractCondition, rateSeller } from '../extraction/index.js';
import type { ConditionResult, SellerTrustResult } from '../extraction/index.js';
import { estimateMarketValue } from '../pricing/rule-valuator.js';
import type { RuleValuation } from '../pricing/rule-valuator.js';
import { computeDemandScore } from '../scoring/demand-scorer.js';
import type { DealCandidate, EnrichedDeal } from './types.js';

const log = pino({ name: 'enrichment' });

export interface EnrichmentContext {
  /** Search keywords, used as the demand scorer's category hint */
  query: string;
  /** Round-trip travel cost for the run */
  travelCost: number;
  correlationId?: string;
}

/**
 * Stage hooks, overridable so a failing stage can be exercised in tests.
 */
export interface EnrichmentStages {
  condition: (text: string) => ConditionResult;
  seller: (text: string) => SellerTrustResult;
  valuation: (localPrice: number, conditionScore: number) => RuleValuation;
  demand: typeof computeDemandScore;
}

export const DEFAULT_STAGES: EnrichmentStages = {
  condition: extractCondition,
  seller: rateSeller,
  valuation: estimateMarketValue,
  demand: computeDemandScore,
};

function listingText(deal: DealCandidate): string {
  const body = deal.listing.body?.trim();
  return body ? `${deal.listing.title} ${body}` : deal.listing.title;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Run one stage; a throw degrades to null for this listing only.
 */
function attempt<T>(stage: string, deal: DealCandidate, ctx: EnrichmentContext, fn: () => T): T | null {
  try {
    return fn();
  } catch (err) {
    log.warn(
      { err, stage, title: deal.listing.title, url: deal.listing.url, correlationId: ctx.correlationId },
      'Enrichment stage failed, field omitted',
    );
    return null;
  }
}

/**
 * Build a new, fully annotated record from a candidate. The candidate is
 * not modified. Stages that depend on a failed stage are skipped.
 */
export function enrichDeal(
  deal: DealCandidate,
  ctx: EnrichmentContext,
  stages: EnrichmentStages = DEFAULT_STAGES,
): EnrichedDeal {
  const text = listingText(deal);

  const condition = attempt('condition', deal, ctx, () => stages.condition(text));
  const seller = attempt('seller', deal, ctx, () => stages.seller(text));

  const valuation = condition
    ? attempt('valuation', deal, ctx, () => stages.valuation(deal.localPrice, condition.score))
    : null;

  const demandScore =
    condition && valuation
      ? attempt('demand', deal, ctx, () =>
          stages.demand({
            title: deal.listing.title,
            categoryHint: ctx.query,
            conditionScore: condition.score,
            ruleProfit: valuation.profit,
          }),
        )
      : null;

  return {
    ...deal,
    conditionLabel: condition?.label ?? null,
    conditionScore: condition?.score ?? null,
    conditionMatches: condition?.matches ?? [],
    sellerRating: seller?.rating ?? null,
    sellerRedFlags: seller?.redFlags ?? [],
    sellerGreenFlags: seller?.greenFlags ?? [],
    ruleMarketValue: valuation?.marketValue ?? null,
    ruleProfit: valuation?.profit ?? null,
    travelCost: ctx.travelCost,
    effectiveProfit: valuation ? roundCents(valuation.profit - ctx.travelCost) : null,
    demandScore,
  };
}
