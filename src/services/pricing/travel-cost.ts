import { ConfigurationError } from '../../utils/errors.js';

export interface TravelCostInput {
  radiusMiles: number;
  mpg: number;
  gasPrice: number;
}

/**
 * Fuel cost of a round trip to the edge of the search radius.
 * Computed once per search run and shared by every deal in it.
 */
export function computeTravelCost({ radiusMiles, mpg, gasPrice }: TravelCostInput): number {
  const issues: string[] = [];
  if (!Number.isFinite(radiusMiles) || radiusMiles < 0) issues.push('radiusMiles must be >= 0');
  if (!Number.isFinite(mpg) || mpg <= 0) issues.push('mpg must be > 0');
  if (!Number.isFinite(gasPrice) || gasPrice <= 0) issues.push('gasPrice must be > 0');
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid travel cost parameters', issues);
  }

  if (radiusMiles === 0) return 0;

  // Unrounded; export records round to cents
  const gallons = (radiusMiles * 2) / mpg;
  return gallons * gasPrice;
}
