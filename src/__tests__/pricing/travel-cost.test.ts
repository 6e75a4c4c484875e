import { describe, expect, it } from 'vitest';
import { computeTravelCost } from '../../services/pricing/travel-cost.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('computeTravelCost', () => {
  it('prices a round trip to the radius edge', () => {
    expect(computeTravelCost({ radiusMiles: 50, mpg: 22, gasPrice: 4.5 })).toBe((100 / 22) * 4.5);
  });

  it('handles exact values', () => {
    expect(computeTravelCost({ radiusMiles: 25, mpg: 25, gasPrice: 4 })).toBe(8);
  });

  it('does not round away small radius changes', () => {
    const base = computeTravelCost({ radiusMiles: 50, mpg: 22, gasPrice: 4.5 });
    expect(computeTravelCost({ radiusMiles: 50.001, mpg: 22, gasPrice: 4.5 })).toBeGreaterThan(base);
  });

  it('is strictly increasing in radius', () => {
    const costs = [0, 0.5, 1, 10, 49.99, 50, 120, 500].map((radiusMiles) =>
      computeTravelCost({ radiusMiles, mpg: 22, gasPrice: 4.5 }),
    );
    for (let i = 1; i < costs.length; i++) {
      expect(costs[i]).toBeGreaterThan(costs[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('is strictly increasing in gas price', () => {
    const costs = [0.01, 1, 3.999, 4, 4.5, 7.25, 20].map((gasPrice) =>
      computeTravelCost({ radiusMiles: 50, mpg: 22, gasPrice }),
    );
    for (let i = 1; i < costs.length; i++) {
      expect(costs[i]).toBeGreaterThan(costs[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('is zero for a zero radius', () => {
    expect(computeTravelCost({ radiusMiles: 0, mpg: 22, gasPrice: 4.5 })).toBe(0);
  });

  it('rejects a zero mpg with a ConfigurationError', () => {
    try {
      computeTravelCost({ radiusMiles: 50, mpg: 0, gasPrice: 4.5 });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual(['mpg must be > 0']);
        expect(err.statusCode).toBe(400);
      }
    }
  });

  it('reports every invalid parameter', () => {
    try {
      computeTravelCost({ radiusMiles: -1, mpg: 22, gasPrice: 0 });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual(['radiusMiles must be >= 0', 'gasPrice must be > 0']);
      }
    }
  });
});
