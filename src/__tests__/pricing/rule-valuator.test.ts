import { describe, expect, it } from 'vitest';
import { conditionMultiplier, estimateMarketValue } from '../../services/pricing/rule-valuator.js';

describe('conditionMultiplier', () => {
  it.each([
    [1.0, 1.6],
    [0.9, 1.6],
    [0.7, 1.4],
    [0.6, 1.25],
    [0.5, 1.25],
    [0.3, 1.1],
    [0.29, 0.8],
    [0, 0.8],
  ])('score %s → %s', (score, multiplier) => {
    expect(conditionMultiplier(score)).toBe(multiplier);
  });

  it('clamps scores outside [0, 1]', () => {
    expect(conditionMultiplier(1.5)).toBe(1.6);
    expect(conditionMultiplier(-1)).toBe(0.8);
  });
});

describe('estimateMarketValue', () => {
  it('values a good-condition listing at 1.4x', () => {
    expect(estimateMarketValue(250, 0.7)).toEqual({ marketValue: 350, profit: 100 });
  });

  it('produces a loss for parts-only items', () => {
    expect(estimateMarketValue(100, 0.2)).toEqual({ marketValue: 80, profit: -20 });
  });

  it('rounds to cents', () => {
    expect(estimateMarketValue(19.99, 0.9)).toEqual({ marketValue: 31.98, profit: 11.99 });
  });

  it('accepts a free listing', () => {
    expect(estimateMarketValue(0, 0.9)).toEqual({ marketValue: 0, profit: 0 });
  });

  it('rejects a negative price', () => {
    expect(() => estimateMarketValue(-1, 0.7)).toThrow(RangeError);
  });

  it('rejects a non-numeric score', () => {
    expect(() => estimateMarketValue(100, Number.NaN)).toThrow(RangeError);
  });

  it('is non-decreasing in condition score for a fixed price', () => {
    const values = [0, 0.2, 0.3, 0.5, 0.7, 0.9, 1].map((s) => estimateMarketValue(100, s).marketValue);
    for (let i = 1; i < values.length; i++) {
      expect(values[i]).toBeGreaterThanOrEqual(values[i - 1] ?? 0);
    }
  });
});
