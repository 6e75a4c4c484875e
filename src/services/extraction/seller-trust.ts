/**
 * Seller trust heuristics. Scam and pressure language pulls the rating
 * down from a neutral baseline, professional or verifiable language pushes
 * it up. Only the text of the listing is used; there is no seller history.
 */

export interface TrustRule {
  phrase: string;
  pattern: RegExp;
  weight: number;
}

export interface SellerTrustResult {
  rating: number;
  redFlags: string[];
  greenFlags: string[];
}

export const BASELINE_RATING = 50;
export const MIN_RATING = 0;
export const MAX_RATING = 100;

export const RED_FLAG_RULES: readonly TrustRule[] = [
  { phrase: 'wire transfer', pattern: /\bwire transfer\b/, weight: -25 },
  { phrase: 'western union', pattern: /\bwestern union\b/, weight: -25 },
  { phrase: 'gift card', pattern: /\bgift cards?\b/, weight: -25 },
  { phrase: 'deposit', pattern: /\bdeposit\b/, weight: -15 },
  { phrase: 'shipping only', pattern: /\bship(?:ping)? only\b/, weight: -15 },
  { phrase: 'zelle only', pattern: /\bzelle only\b/, weight: -15 },
  { phrase: 'no questions', pattern: /\bno questions\b/, weight: -10 },
  { phrase: 'must go today', pattern: /\bmust go today\b/, weight: -10 },
  { phrase: 'need gone', pattern: /\bneed(?:s)? (?:it )?gone\b/, weight: -10 },
  { phrase: 'urgent', pattern: /\burgent\b/, weight: -10 },
  { phrase: 'no returns', pattern: /\bno returns\b/, weight: -5 },
  { phrase: 'cash only', pattern: /\bcash only\b/, weight: -5 },
];

export const GREEN_FLAG_RULES: readonly TrustRule[] = [
  { phrase: 'warranty', pattern: /\bwarranty\b/, weight: 15 },
  { phrase: 'receipt', pattern: /\breceipts?\b/, weight: 10 },
  { phrase: 'original box', pattern: /\boriginal (?:box|packaging)\b/, weight: 10 },
  { phrase: 'tested', pattern: /\btested\b/, weight: 10 },
  { phrase: 'serial number', pattern: /\bserial (?:number|#)\b/, weight: 10 },
  { phrase: 'meet in public', pattern: /\bmeet (?:in|at) (?:a )?public\b/, weight: 10 },
  { phrase: 'can demo', pattern: /\b(?:can|will) demo\b/, weight: 10 },
  { phrase: 'local pickup', pattern: /\blocal pick ?up\b/, weight: 5 },
  { phrase: 'smoke free', pattern: /\bsmoke[- ]free\b/, weight: 5 },
  { phrase: 'pet free', pattern: /\bpet[- ]free\b/, weight: 5 },
];

function matchRules(text: string, rules: readonly TrustRule[]): TrustRule[] {
  return rules.filter((rule) => rule.pattern.test(text));
}

export function rateSeller(text: string): SellerTrustResult {
  const lower = text.toLowerCase();
  const reds = matchRules(lower, RED_FLAG_RULES);
  const greens = matchRules(lower, GREEN_FLAG_RULES);

  const raw = [...reds, ...greens].reduce((sum, rule) => sum + rule.weight, BASELINE_RATING);

  return {
    rating: Math.min(MAX_RATING, Math.max(MIN_RATING, raw)),
    redFlags: reds.map((r) => r.phrase),
    greenFlags: greens.map((g) => g.phrase),
  };
}
