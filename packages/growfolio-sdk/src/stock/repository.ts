import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import { createDomainRuleError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { timestampMs } from '../models/index.js';
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
import { computeMarketStatus } from './market-hours.js';
import type { StockRemote, StockRepository } from './types.js';

export interface StockRepositoryDeps {
  readonly remote: StockRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const ALL = 'all';
const MARKET = 'market';
const DEFAULT_SEARCH_LIMIT = 10;

export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

const invalidSymbol = (): RepositoryError => createDomainRuleError('INVALID_SYMBOL');

const byNewestFirst = (a: WatchlistEntry, b: WatchlistEntry): number =>
  timestampMs(b.dateAdded) - timestampMs(a.dateAdded);

/**
 * Creates the stock repository: metadata (5 min), quotes (5 s), history,
 * market status (1 min) and the watchlist.
 *
 * @example
 * ```typescript
 * const stocks = createStockRepository({ remote: createStockRemote(api), rules, logger });
 * const entries = await stocks.fetchWatchlistWithQuotes();
 * ```
 */
export const createStockRepository = (deps: StockRepositoryDeps): StockRepository => {
  const { remote, rules, logger } = deps;
  const now = deps.now ?? ((): number => Date.now());
  const log = logger.child({ repository: 'stock' });

  const stocks = createResourceCache<Stock>({ name: 'stock.stocks', freshForMs: FRESHNESS.stock, logger: log, now });
  const quotes = createResourceCache<StockQuote>({
    name: 'stock.quotes',
    freshForMs: FRESHNESS.quote,
    logger: log,
    now,
  });
  const histories = createResourceCache<StockHistory>({
    name: 'stock.history',
    freshForMs: FRESHNESS.stockHistory,
    logger: log,
    now,
  });
  const marketStatus = createResourceCache<MarketStatus>({
    name: 'stock.marketStatus',
    freshForMs: FRESHNESS.marketStatus,
    logger: log,
    now,
  });
  const watchlist = createResourceCache<WatchlistItem[]>({
    name: 'stock.watchlist',
    freshForMs: FRESHNESS.watchlist,
    logger: log,
    now,
  });
  const watchlistQuotes = createResourceCache<WatchlistEntry[]>({
    name: 'stock.watchlistQuotes',
    freshForMs: FRESHNESS.watchlistWithQuotes,
    logger: log,
    now,
  });

  rules.register('stock.watchlistQuotes', {
    clear: () => watchlistQuotes.invalidate(),
    remove: () => watchlistQuotes.invalidate(),
  });

  const fetchStock = (symbol: string, options?: LoadOptions): Promise<Result<Stock, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    return stocks.load(key, () => remote.getStock(key), options);
  };

  const fetchQuote = (symbol: string, options?: LoadOptions): Promise<Result<StockQuote, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    return quotes.load(key, () => remote.getQuote(key), options);
  };

  const fetchQuotes = async (symbols: readonly string[]): Promise<StockQuote[]> => {
    const results = await Promise.all(symbols.map((symbol) => fetchQuote(symbol)));
    return results.flatMap((result) => (result.isOk() ? [result.value] : []));
  };

  const fetchHistory = (
    symbol: string,
    period: HistoryPeriod,
    options?: LoadOptions
  ): Promise<Result<StockHistory, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    return histories.load(`${key}:${period}`, () => remote.getHistory(key, period), options);
  };

  const fetchMarketStatus = async (options?: LoadOptions): Promise<Result<MarketStatus, RepositoryError>> => {
    const result = await marketStatus.load(MARKET, () => remote.getMarketStatus(), options);
    if (result.isOk() || result.error.code === 'CANCELLED') {
      return result;
    }
    log.warn({ code: result.error.code }, 'market status unavailable, using local hours');
    return ok(computeMarketStatus(now()));
  };

  const submitBuyOrder = async (symbol: string, notionalUsd: number): Promise<Result<Order, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    if (key.length === 0) {
      return err(invalidSymbol());
    }
    if (!(notionalUsd > 0)) {
      return err(createDomainRuleError('INVALID_AMOUNT'));
    }

    const result = await remote.submitBuyOrder(key, notionalUsd);
    if (result.isOk()) {
      log.info({ symbol: key, orderId: result.value.id }, 'buy order submitted');
      rules.apply('order.buy', { symbol: key });
    }
    return result;
  };

  const fetchWatchlist = (options?: LoadOptions): Promise<Result<WatchlistItem[], RepositoryError>> =>
    watchlist.load(ALL, () => remote.getWatchlist(), options);

  const addToWatchlist = async (symbol: string): Promise<Result<void, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    if (key.length === 0) {
      return err(invalidSymbol());
    }
    if (watchlist.get(ALL)?.some((item) => item.symbol === key) === true) {
      return ok(undefined);
    }

    const result = await remote.addToWatchlist(key);
    return result.map((item) => {
      watchlist.update(ALL, (list) => (list.some((i) => i.symbol === item.symbol) ? list : [...list, item]));
      rules.apply('watchlist.add', { symbol: key });
    });
  };

  const removeFromWatchlist = async (symbol: string): Promise<Result<void, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    if (key.length === 0) {
      return err(invalidSymbol());
    }

    const result = await remote.removeFromWatchlist(key);
    return result.map(() => {
      watchlist.update(ALL, (list) => list.filter((item) => item.symbol !== key));
      rules.apply('watchlist.remove', { symbol: key });
    });
  };

  const isInWatchlist = async (symbol: string): Promise<Result<boolean, RepositoryError>> => {
    const key = normalizeSymbol(symbol);
    const list = await fetchWatchlist();
    return list.map((items) => items.some((item) => item.symbol === key));
  };

  const loadWatchlistEntries = async (): Promise<Result<WatchlistEntry[], RepositoryError>> => {
    const list = await fetchWatchlist();
    if (list.isErr()) {
      return err(list.error);
    }

    const entries = await Promise.all(
      list.value.map(async (item): Promise<WatchlistEntry> => {
        const [stock, quote] = await Promise.all([fetchStock(item.symbol), fetchQuote(item.symbol)]);
        return {
          symbol: item.symbol,
          dateAdded: item.dateAdded,
          stock: stock.isOk() ? stock.value : undefined,
          quote: quote.isOk() ? quote.value : undefined,
        };
      })
    );
    return ok(entries.sort(byNewestFirst));
  };

  return {
    searchStocks: async (query, limit = DEFAULT_SEARCH_LIMIT) => {
      const trimmed = query.trim();
      if (trimmed.length === 0) {
        return ok([]);
      }
      return remote.searchStocks(trimmed, limit);
    },
    fetchStock,
    fetchQuote,
    fetchQuotes,
    fetchHistory,
    fetchMarketStatus,
    submitBuyOrder,
    fetchWatchlist,
    addToWatchlist,
    removeFromWatchlist,
    isInWatchlist,
    fetchWatchlistWithQuotes: (options) => watchlistQuotes.load(ALL, loadWatchlistEntries, options),
    invalidateCache: () => {
      stocks.invalidate();
      quotes.invalidate();
      histories.invalidate();
      marketStatus.invalidate();
      watchlist.invalidate();
      watchlistQuotes.invalidate();
    },
  };
};
