import type { Aggregation } from '../aggregate/aggregator.js';
import { SIZE_FILTERS } from '../scrapers/types.js';

export const TOP_PER_SIZE_CATEGORY = 5;
export const FINAL_OUTPUT_LIMIT = 30;

export interface SelectionOptions {
  topPerSizeCategory?: number;
  /** Size the fill phase tops up to. Category picks are always kept. */
  limit?: number;
}

/**
 * Diversified top-N: the best few from every size category first, then the
 * best remaining overall, with the whole list ordered by score.
 *
 * All sorts rely on Array.prototype.sort being stable, so equal scores keep
 * the order the names were first seen in.
 */
export function selectDiversified(aggregation: Aggregation, options: SelectionOptions = {}): string[] {
  const topPerSize = options.topPerSizeCategory ?? TOP_PER_SIZE_CATEGORY;
  const limit = options.limit ?? FINAL_OUTPUT_LIMIT;
  const { subreddits, bySize } = aggregation;

  const scoreOf = (name: string): number => subreddits.get(name)?.compositeScore ?? 0;
  const byScore = (a: string, b: string): number => scoreOf(b) - scoreOf(a);

  const selected = new Set<string>();
  const output: string[] = [];

  for (const sizeFilter of SIZE_FILTERS) {
    const ranked = [...(bySize.get(sizeFilter) ?? [])].sort(byScore);
    const picks = ranked.filter((name) => !selected.has(name)).slice(0, topPerSize);
    for (const name of picks) {
      selected.add(name);
      output.push(name);
    }
  }

  if (output.length < limit) {
    const overall = [...subreddits.keys()].sort(byScore);
    for (const name of overall) {
      if (output.length >= limit) break;
      if (selected.has(name)) continue;
      selected.add(name);
      output.push(name);
    }
  }

  return output.sort(byScore);
}
