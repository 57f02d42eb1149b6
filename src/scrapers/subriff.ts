import { isRecord, type RawSubreddit, type SizeFilter, type SortPeriod, type SubriffFetchResult } from './types.js';

const BASE_URL = process.env.SUBRIFF_BASE_URL || 'https://subriff.com/Home/GetSubreddits';
const USER_AGENT = process.env.TRENDS_USER_AGENT || 'subreddit-trends/0.1.0';
const TIMEOUT_MS = Number(process.env.TRENDS_FETCH_TIMEOUT_MS) || 30_000;

export function buildSubriffUrl(sizeFilter: SizeFilter, sortPeriod: SortPeriod): string {
  const params = new URLSearchParams({
    page: '1',
    sizeFilter,
    searchTerm: '',
    sortBy: sortPeriod,
    growthType: 'percent',
    sortColumn: '',
    sortDirection: '',
    dateFilter: 'all',
    allowsPromotion: 'false',
    nsfw: 'false',
  });
  return `${BASE_URL}?${params.toString()}`;
}

function toGrowth(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** JSON truthiness: empty strings, arrays and objects are false, as are 0, NaN and null. */
export function isTruthy(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

function toDisplayName(value: unknown): string {
  if (typeof value === 'string') return value;
  return isTruthy(value) ? String(value) : '';
}

export function normalizeSubreddit(item: Record<string, unknown>): RawSubreddit {
  return {
    displayName: toDisplayName(item.displayName),
    subscribers: typeof item.subscribers === 'number' ? item.subscribers : 0,
    dailyGrowthPercentage: toGrowth(item.dailyGrowthPercentage),
    weeklyGrowthPercentage: toGrowth(item.weeklyGrowthPercentage),
    isNsfw: isTruthy(item.isNsfw),
    internal_IsNsfw: isTruthy(item.internal_IsNsfw),
    suggested_Internal_IsNsfw: isTruthy(item.suggested_Internal_IsNsfw),
  };
}

/**
 * Pull the `subreddits` page out of a GetSubreddits response body.
 * Throws when the body is not the expected object.
 */
export function parseSubriffResponse(body: unknown): RawSubreddit[] {
  if (!isRecord(body)) {
    throw new Error('response body is not a JSON object');
  }

  const page = body.subreddits ?? [];
  if (!Array.isArray(page)) {
    throw new Error('"subreddits" is not an array');
  }

  // One slot per element: the index is the rank, so malformed entries stay as nameless records
  return page.map((item) => normalizeSubreddit(isRecord(item) ? item : {}));
}

export async function fetchSubriff(sizeFilter: SizeFilter, sortPeriod: SortPeriod): Promise<SubriffFetchResult> {
  const errors: string[] = [];
  let records: RawSubreddit[] = [];

  try {
    const res = await fetch(buildSubriffUrl(sizeFilter, sortPeriod), {
      headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      signal: AbortSignal.timeout(TIMEOUT_MS),
    });

    if (!res.ok) {
      errors.push(`Subriff ${sizeFilter}/${sortPeriod} returned ${res.status}`);
      return { sizeFilter, sortPeriod, records, errors };
    }

    records = parseSubriffResponse(await res.json());
  } catch (err) {
    errors.push(`Subriff ${sizeFilter}/${sortPeriod} fetch failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { sizeFilter, sortPeriod, records, errors };
}
