export const SIZE_FILTERS = ['medium-small', 'medium', 'large', 'xlarge'] as const;
export const SORT_PERIODS = ['daily', 'weekly'] as const;

export type SizeFilter = (typeof SIZE_FILTERS)[number];
export type SortPeriod = (typeof SORT_PERIODS)[number];

/** One element of a subriff `subreddits` page, normalized at parse time. */
export interface RawSubreddit {
  displayName: string;
  subscribers: number;
  dailyGrowthPercentage: number;
  weeklyGrowthPercentage: number;
  isNsfw: boolean;
  internal_IsNsfw: boolean;
  suggested_Internal_IsNsfw: boolean;
}

export interface SubriffFetchResult {
  sizeFilter: SizeFilter;
  sortPeriod: SortPeriod;
  records: RawSubreddit[];
  errors: string[];
}

export type SubriffFetcher = (sizeFilter: SizeFilter, sortPeriod: SortPeriod) => Promise<SubriffFetchResult>;

export function isSortPeriod(value: string): value is SortPeriod {
  return SORT_PERIODS.some((period) => period === value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
