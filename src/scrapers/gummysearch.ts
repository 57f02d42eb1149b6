import { isRecord, type SortPeriod } from './types.js';

export const GUMMY_SIZE_BINS = ['large', 'huge', 'massive'] as const;
export type GummySizeBin = (typeof GUMMY_SIZE_BINS)[number];

const USER_AGENT = process.env.TRENDS_USER_AGENT || 'subreddit-trends/0.1.0';
const TIMEOUT_MS = Number(process.env.TRENDS_FETCH_TIMEOUT_MS) || 30_000;

export interface GummyTrendingResult {
  period: SortPeriod;
  names: string[];
  errors: string[];
}

export function gummyPageUrl(bin: GummySizeBin): string {
  return `https://gummysearch.com/page-data/tools/top-subreddits/size-${bin}/page-data.json`;
}

/** Names from `result.pageContext.lists.growth_<period>`, in page order. */
export function parseGummyPage(body: unknown, period: SortPeriod): string[] {
  const result = isRecord(body) ? body.result : undefined;
  const pageContext = isRecord(result) ? result.pageContext : undefined;
  const lists = isRecord(pageContext) ? pageContext.lists : undefined;
  const growth = isRecord(lists) ? lists[`growth_${period}`] : undefined;

  if (!Array.isArray(growth)) {
    throw new Error(`growth_${period} list missing from page data`);
  }

  const names: string[] = [];
  for (const entry of growth) {
    if (isRecord(entry) && typeof entry.name === 'string' && entry.name) {
      names.push(entry.name);
    }
  }
  return names;
}

export async function fetchGummyTrending(
  period: SortPeriod,
  options: { limitPerBin?: number } = {},
): Promise<GummyTrendingResult> {
  const limitPerBin = options.limitPerBin ?? 7;
  const names: string[] = [];
  const errors: string[] = [];

  for (const bin of GUMMY_SIZE_BINS) {
    try {
      const res = await fetch(gummyPageUrl(bin), {
        headers: { 'User-Agent': USER_AGENT },
        signal: AbortSignal.timeout(TIMEOUT_MS),
      });

      if (!res.ok) {
        errors.push(`GummySearch size-${bin} returned ${res.status}`);
        continue;
      }

      names.push(...parseGummyPage(await res.json(), period).slice(0, limitPerBin));
    } catch (err) {
      errors.push(`GummySearch size-${bin} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { period, names, errors };
}
