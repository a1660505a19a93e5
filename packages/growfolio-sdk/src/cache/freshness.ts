const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;

/**
 * Freshness windows per cached resource, in milliseconds.
 * Each repository fixes its windows when it is constructed.
 */
export const FRESHNESS = {
  quote: 5 * SECOND_MS,
  fundingBalance: 30 * SECOND_MS,
  transfers: MINUTE_MS,
  portfolios: MINUTE_MS,
  holdings: MINUTE_MS,
  ledger: MINUTE_MS,
  goals: MINUTE_MS,
  dcaSchedules: MINUTE_MS,
  watchlist: MINUTE_MS,
  watchlistWithQuotes: MINUTE_MS,
  marketStatus: MINUTE_MS,
  family: 2 * MINUTE_MS,
  familyInvites: 2 * MINUTE_MS,
  user: 5 * MINUTE_MS,
  preferences: 5 * MINUTE_MS,
  stock: 5 * MINUTE_MS,
  stockHistory: 5 * MINUTE_MS,
  insights: 5 * MINUTE_MS,
  stockExplanation: 5 * MINUTE_MS,
  investingTips: HOUR_MS,
} as const satisfies Record<string, number>;

export type FreshnessPolicy = keyof typeof FRESHNESS;
