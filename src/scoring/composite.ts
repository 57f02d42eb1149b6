import type { AggregatedSubreddit, Aggregation } from '../aggregate/aggregator.js';

export const RESULTS_PER_QUERY = 20; // subriff page size

type ScoreInputs = Pick<
  AggregatedSubreddit,
  'dailyRank' | 'weeklyRank' | 'appearances' | 'dailyGrowthPercent' | 'weeklyGrowthPercent'
>;

/**
 * Composite ranking score for one subreddit.
 *
 * - Position: up to 20 points per period, decaying by rank
 * - Multi-appearance bonus: 15 points per sighting after the first
 * - Growth: daily capped at 100% (max 10 points), weekly capped at 500% (max 10 points).
 *   Negative growth is not floored and can pull the score down.
 */
export function computeCompositeScore(sub: ScoreInputs): number {
  let score = 0;

  if (sub.dailyRank !== undefined) {
    score += Math.max(0, RESULTS_PER_QUERY - sub.dailyRank);
  }
  if (sub.weeklyRank !== undefined) {
    score += Math.max(0, RESULTS_PER_QUERY - sub.weeklyRank);
  }

  if (sub.appearances >= 2) {
    score += 15 * (sub.appearances - 1);
  }

  score += Math.min(sub.dailyGrowthPercent, 100) / 10;
  score += Math.min(sub.weeklyGrowthPercent, 500) / 50;

  return score;
}

export function applyCompositeScores(aggregation: Aggregation): void {
  for (const entry of aggregation.subreddits.values()) {
    entry.compositeScore = computeCompositeScore(entry);
  }
}
