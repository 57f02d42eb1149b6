import { describe, it, expect } from 'vitest';
import { aggregateQueryResults, createAggregation } from '../src/aggregate/aggregator.js';
import { applyCompositeScores, computeCompositeScore } from '../src/scoring/composite.js';
import { record } from './helpers.js';

const base = {
  dailyRank: undefined,
  weeklyRank: undefined,
  appearances: 1,
  dailyGrowthPercent: 0,
  weeklyGrowthPercent: 0,
};

describe('computeCompositeScore', () => {
  it('scores nothing without ranks, repeats or growth', () => {
    expect(computeCompositeScore(base)).toBe(0);
  });

  it('awards position points that decay with rank', () => {
    expect(computeCompositeScore({ ...base, dailyRank: 0, dailyGrowthPercent: 50 })).toBe(25);
    expect(computeCompositeScore({ ...base, dailyRank: 1, dailyGrowthPercent: 10 })).toBe(20);
  });

  it('gives no position points past the page size', () => {
    expect(computeCompositeScore({ ...base, weeklyRank: 25 })).toBe(0);
  });

  it('adds 15 per sighting after the first', () => {
    expect(computeCompositeScore({ ...base, dailyRank: 0, weeklyRank: 0, appearances: 2 })).toBe(55);
    expect(computeCompositeScore({ ...base, appearances: 3 })).toBe(30);
  });

  it('caps growth contributions at 10 points each', () => {
    expect(computeCompositeScore({ ...base, dailyGrowthPercent: 250 })).toBe(10);
    expect(computeCompositeScore({ ...base, weeklyGrowthPercent: 1000 })).toBe(10);
    expect(computeCompositeScore({ ...base, weeklyGrowthPercent: 100 })).toBe(2);
  });

  it('lets negative growth pull the score down', () => {
    expect(computeCompositeScore({ ...base, dailyRank: 0, dailyGrowthPercent: -50 })).toBe(15);
    expect(computeCompositeScore({ ...base, weeklyGrowthPercent: -100 })).toBe(-2);
  });

  it('is deterministic', () => {
    const sub = { ...base, dailyRank: 3, weeklyRank: 7, appearances: 4, dailyGrowthPercent: 12, weeklyGrowthPercent: 45 };
    expect(computeCompositeScore(sub)).toBe(computeCompositeScore({ ...sub }));
  });
});

describe('applyCompositeScores', () => {
  it('stores a score on every aggregated entry', () => {
    const agg = createAggregation();
    aggregateQueryResults(agg, 'medium', 'daily', [record('a'), record('b', { dailyGrowthPercentage: 30 })]);
    aggregateQueryResults(agg, 'medium', 'weekly', [record('a')]);

    applyCompositeScores(agg);

    // a: 20 daily + 20 weekly + 15 repeat
    expect(agg.subreddits.get('a')?.compositeScore).toBe(55);
    // b: 19 daily + 3 growth
    expect(agg.subreddits.get('b')?.compositeScore).toBe(22);
  });
});
