import type { RawSubreddit } from '../src/scrapers/types.js';

export function record(displayName: string, overrides: Partial<RawSubreddit> = {}): RawSubreddit {
  return {
    displayName,
    subscribers: 1000,
    dailyGrowthPercentage: 0,
    weeklyGrowthPercentage: 0,
    isNsfw: false,
    internal_IsNsfw: false,
    suggested_Internal_IsNsfw: false,
    ...overrides,
  };
}
