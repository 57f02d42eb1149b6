import { aggregateQueryResults, createAggregation, type Aggregation } from './aggregate/aggregator.js';
import { applyCompositeScores } from './scoring/composite.js';
import { selectDiversified, type SelectionOptions } from './selection/diversify.js';
import { fetchSubriff } from './scrapers/subriff.js';
import { SIZE_FILTERS, SORT_PERIODS, type SubriffFetcher } from './scrapers/types.js';

export interface BlendedTrendingOptions extends SelectionOptions {
  fetcher?: SubriffFetcher;
  /** Called with each failed query's message as soon as that query returns. */
  onError?: (message: string) => void;
}

export interface BlendedTrendingResult {
  names: string[];
  aggregation: Aggregation;
  errors: string[];
}

export async function generateBlendedTrending(options: BlendedTrendingOptions = {}): Promise<BlendedTrendingResult> {
  const { fetcher = fetchSubriff, onError, ...selection } = options;
  const aggregation = createAggregation();
  const errors: string[] = [];

  // One request at a time, size filter outer, period inner
  for (const sizeFilter of SIZE_FILTERS) {
    for (const sortPeriod of SORT_PERIODS) {
      const result = await fetcher(sizeFilter, sortPeriod);
      for (const err of result.errors) {
        errors.push(err);
        onError?.(err);
      }
      aggregateQueryResults(aggregation, sizeFilter, sortPeriod, result.records);
    }
  }

  applyCompositeScores(aggregation);

  return { names: selectDiversified(aggregation, selection), aggregation, errors };
}
