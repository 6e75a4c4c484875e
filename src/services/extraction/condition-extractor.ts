export type ConditionLabel = 'New' | 'Like New' | 'Good' | 'Fair' | 'For Parts' | 'Unknown';

export interface ConditionRule {
  phrase: string;
  pattern: RegExp;
  label: Exclude<ConditionLabel, 'Unknown'>;
  /** How strongly the phrase indicates its label; the highest match wins */
  confidence: number;
}

export interface ConditionResult {
  label: ConditionLabel;
  score: number;
  /** Matched phrases, in rule-table order */
  matches: string[];
}

export const CONDITION_SCORES: Record<ConditionLabel, number> = {
  'New': 1.0,
  'Like New': 0.9,
  'Good': 0.7,
  'Fair': 0.5,
  'For Parts': 0.2,
  'Unknown': 0.6,
};

// Patterns run against lowercased text
export const CONDITION_RULES: readonly ConditionRule[] = [
  { phrase: 'for parts', pattern: /\bfor parts\b/, label: 'For Parts', confidence: 0.95 },
  { phrase: 'not working', pattern: /\bnot working\b/, label: 'For Parts', confidence: 0.95 },
  { phrase: 'broken', pattern: /\bbroken\b/, label: 'For Parts', confidence: 0.9 },
  { phrase: 'sealed', pattern: /\b(?:factory )?sealed\b/, label: 'New', confidence: 0.95 },
  { phrase: 'brand new', pattern: /\bbrand new\b/, label: 'New', confidence: 0.9 },
  { phrase: 'new in box', pattern: /\b(?:new in box|nib|bnib)\b/, label: 'New', confidence: 0.9 },
  { phrase: 'like new', pattern: /\blike new\b/, label: 'Like New', confidence: 0.9 },
  { phrase: 'mint', pattern: /\bmint\b/, label: 'Like New', confidence: 0.8 },
  { phrase: 'excellent', pattern: /\bexcellent\b/, label: 'Like New', confidence: 0.75 },
  { phrase: 'barely used', pattern: /\bbarely used\b/, label: 'Like New', confidence: 0.75 },
  { phrase: 'good condition', pattern: /\bgood condition\b/, label: 'Good', confidence: 0.8 },
  { phrase: 'works great', pattern: /\bworks (?:great|perfectly)\b/, label: 'Good', confidence: 0.7 },
  { phrase: 'cracked', pattern: /\bcracked\b/, label: 'Fair', confidence: 0.7 },
  { phrase: 'as is', pattern: /\bas[- ]is\b/, label: 'Fair', confidence: 0.65 },
  { phrase: 'fair', pattern: /\bfair\b/, label: 'Fair', confidence: 0.6 },
  { phrase: 'good', pattern: /\bgood\b/, label: 'Good', confidence: 0.6 },
  { phrase: 'scratches', pattern: /\bscratch(?:es|ed)?\b/, label: 'Fair', confidence: 0.55 },
  { phrase: 'worn', pattern: /\bworn\b/, label: 'Fair', confidence: 0.5 },
  { phrase: 'new', pattern: /\bnew\b/, label: 'New', confidence: 0.5 },
  { phrase: 'used', pattern: /\bused\b/, label: 'Good', confidence: 0.4 },
];

export function extractCondition(text: string): ConditionResult {
  const lower = text.toLowerCase();

  let best: ConditionRule | null = null;
  const matches: string[] = [];

  for (const rule of CONDITION_RULES) {
    if (!rule.pattern.test(lower)) continue;
    matches.push(rule.phrase);
    // Strictly greater: earlier rows win ties
    if (!best || rule.confidence > best.confidence) best = rule;
  }

  if (!best) {
    return { label: 'Unknown', score: CONDITION_SCORES.Unknown, matches };
  }

  return { label: best.label, score: CONDITION_SCORES[best.label], matches };
}
