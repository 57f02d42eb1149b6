export { fetchSubriff, buildSubriffUrl, parseSubriffResponse } from './subriff.js';
export { fetchGummyTrending, parseGummyPage, GUMMY_SIZE_BINS } from './gummysearch.js';
export { SIZE_FILTERS, SORT_PERIODS, isSortPeriod } from './types.js';
export type { RawSubreddit, SizeFilter, SortPeriod, SubriffFetchResult, SubriffFetcher } from './types.js';
export type { GummySizeBin, GummyTrendingResult } from './gummysearch.js';
