export { extractCondition, CONDITION_RULES, CONDITION_SCORES } from './condition-extractor.js';
export type { ConditionLabel, ConditionResult, ConditionRule } from './condition-extractor.js';
export { rateSeller, RED_FLAG_RULES, GREEN_FLAG_RULES, BASELINE_RATING } from './seller-trust.js';
export type { SellerTrustResult, TrustRule } from './seller-trust.js';
