import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  HistoryPeriod,
  MarketStatus,
  Order,
  Stock,
  StockHistory,
  StockQuote,
  WatchlistEntry,
  WatchlistItem,
} from '../models/index.js';

/**
 * Market data, orders and the server-side watchlist. Symbols arrive uppercase.
 */
export interface StockRemote {
  readonly searchStocks: (query: string, limit: number) => Promise<Result<Stock[], RepositoryError>>;
  readonly getStock: (symbol: string) => Promise<Result<Stock, RepositoryError>>;
  readonly getQuote: (symbol: string) => Promise<Result<StockQuote, RepositoryError>>;
  readonly getHistory: (
    symbol: string,
    period: HistoryPeriod
  ) => Promise<Result<StockHistory, RepositoryError>>;
  readonly getMarketStatus: () => Promise<Result<MarketStatus, RepositoryError>>;
  readonly submitBuyOrder: (symbol: string, notionalUsd: number) => Promise<Result<Order, RepositoryError>>;
  readonly getWatchlist: () => Promise<Result<WatchlistItem[], RepositoryError>>;
  readonly addToWatchlist: (symbol: string) => Promise<Result<WatchlistItem, RepositoryError>>;
  readonly removeFromWatchlist: (symbol: string) => Promise<Result<void, RepositoryError>>;
}

export interface StockRepository {
  /** An empty query resolves to `[]` without a request. */
  readonly searchStocks: (query: string, limit?: number) => Promise<Result<Stock[], RepositoryError>>;
  readonly fetchStock: (symbol: string, options?: LoadOptions) => Promise<Result<Stock, RepositoryError>>;
  readonly fetchQuote: (symbol: string, options?: LoadOptions) => Promise<Result<StockQuote, RepositoryError>>;
  /** Quotes that could be loaded, in request order; failures are dropped. */
  readonly fetchQuotes: (symbols: readonly string[]) => Promise<StockQuote[]>;
  readonly fetchHistory: (
    symbol: string,
    period: HistoryPeriod,
    options?: LoadOptions
  ) => Promise<Result<StockHistory, RepositoryError>>;
  /**
   * Falls back to a status computed from regular New York hours when the
   * request fails. The fallback is not cached.
   */
  readonly fetchMarketStatus: (options?: LoadOptions) => Promise<Result<MarketStatus, RepositoryError>>;
  readonly submitBuyOrder: (symbol: string, notionalUsd: number) => Promise<Result<Order, RepositoryError>>;
  readonly fetchWatchlist: (options?: LoadOptions) => Promise<Result<WatchlistItem[], RepositoryError>>;
  /** No request when the symbol is already listed. */
  readonly addToWatchlist: (symbol: string) => Promise<Result<void, RepositoryError>>;
  readonly removeFromWatchlist: (symbol: string) => Promise<Result<void, RepositoryError>>;
  readonly isInWatchlist: (symbol: string) => Promise<Result<boolean, RepositoryError>>;
  /** Newest first. Entries whose stock or quote failed to load carry none. */
  readonly fetchWatchlistWithQuotes: (options?: LoadOptions) => Promise<Result<WatchlistEntry[], RepositoryError>>;
  readonly invalidateCache: () => void;
}
