import { describe, expect, it } from 'vitest';
import {
  computeDemandScore,
  NEUTRAL_RELEVANCE,
  profitSignal,
  scoreRelevance,
  tokenize,
} from '../../services/scoring/demand-scorer.js';

const base = {
  title: 'PS5 console good condition',
  categoryHint: 'ps5',
  conditionScore: 0.7,
  ruleProfit: 100,
};

describe('tokenize', () => {
  it('lowercases and splits on non-alphanumerics', () => {
    expect(tokenize('Sony PS5 - Disc/Edition!')).toEqual(['sony', 'ps5', 'disc', 'edition']);
  });
});

describe('scoreRelevance', () => {
  it('is the share of hint tokens found in the title', () => {
    expect(scoreRelevance('Sony PS5 Disc', 'ps5 disc edition')).toBeCloseTo(2 / 3);
  });

  it('is neutral for an empty hint', () => {
    expect(scoreRelevance('Anything', '  ')).toBe(NEUTRAL_RELEVANCE);
  });

  it('counts repeated hint tokens once', () => {
    expect(scoreRelevance('PS5', 'ps5 ps5')).toBe(1);
  });
});

describe('profitSignal', () => {
  it('is one half at break-even', () => {
    expect(profitSignal(0)).toBe(0.5);
  });
});

describe('computeDemandScore', () => {
  it('scores the reference PS5 listing', () => {
    expect(computeDemandScore(base)).toBe(82.93);
  });

  it('stays within [0, 100]', () => {
    expect(computeDemandScore({ ...base, conditionScore: 1, ruleProfit: 1e6 })).toBeLessThanOrEqual(100);
    expect(computeDemandScore({ title: 'x', categoryHint: 'y', conditionScore: 0, ruleProfit: -1e6 })).toBeGreaterThanOrEqual(0);
  });

  it('is monotonic in condition score', () => {
    const scores = [0.2, 0.5, 0.7, 0.9, 1].map((conditionScore) => computeDemandScore({ ...base, conditionScore }));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1] ?? 0);
    }
  });

  it('is monotonic in rule profit', () => {
    const scores = [-200, -20, 0, 50, 100, 500].map((ruleProfit) => computeDemandScore({ ...base, ruleProfit }));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThanOrEqual(scores[i - 1] ?? 0);
    }
  });
});
