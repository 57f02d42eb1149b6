import type { RawSubreddit, SizeFilter, SortPeriod } from '../scrapers/types.js';

export interface AggregatedSubreddit {
  name: string;
  subscribers: number;
  dailyGrowthPercent: number;
  weeklyGrowthPercent: number;
  dailyRank?: number; // best 0-indexed position in daily pages
  weeklyRank?: number;
  sizeFilter: SizeFilter; // first size filter it was seen under
  appearances: number;
  compositeScore: number;
}

export interface Aggregation {
  subreddits: Map<string, AggregatedSubreddit>;
  /** Names per size filter, in first-seen order. */
  bySize: Map<SizeFilter, string[]>;
}

export function createAggregation(): Aggregation {
  return { subreddits: new Map(), bySize: new Map() };
}

export function isNsfw(record: RawSubreddit): boolean {
  return record.isNsfw || record.internal_IsNsfw || record.suggested_Internal_IsNsfw;
}

/**
 * Fold one query's page into the aggregation. Page order is rank order.
 * Every raw sighting counts as an appearance, duplicates within a page included.
 */
export function aggregateQueryResults(
  aggregation: Aggregation,
  sizeFilter: SizeFilter,
  sortPeriod: SortPeriod,
  records: RawSubreddit[],
): void {
  records.forEach((record, rank) => {
    const name = record.displayName;
    if (!name) return;
    if (isNsfw(record)) return;

    let entry = aggregation.subreddits.get(name);
    if (!entry) {
      entry = {
        name,
        subscribers: record.subscribers,
        dailyGrowthPercent: record.dailyGrowthPercentage,
        weeklyGrowthPercent: record.weeklyGrowthPercentage,
        sizeFilter,
        appearances: 0,
        compositeScore: 0,
      };
      aggregation.subreddits.set(name, entry);

      const category = aggregation.bySize.get(sizeFilter);
      if (category) {
        category.push(name);
      } else {
        aggregation.bySize.set(sizeFilter, [name]);
      }
    }

    entry.appearances += 1;

    if (sortPeriod === 'daily') {
      if (entry.dailyRank === undefined || rank < entry.dailyRank) entry.dailyRank = rank;
    } else {
      if (entry.weeklyRank === undefined || rank < entry.weeklyRank) entry.weeklyRank = rank;
    }

    entry.dailyGrowthPercent = Math.max(entry.dailyGrowthPercent, record.dailyGrowthPercentage);
    entry.weeklyGrowthPercent = Math.max(entry.weeklyGrowthPercent, record.weeklyGrowthPercentage);
  });
}
