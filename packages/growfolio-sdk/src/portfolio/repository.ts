import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import { createDomainRuleError, createNotFoundError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationContext, InvalidationRules, MutationKind } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { findById, removeById, upsertById } from '../repositories/collection.js';
import { DEFAULT_PERFORMANCE_PERIOD, MAX_PAGE_SIZE } from '../models/index.js';
import type {
  AllocationGrouping,
  Holding,
  LedgerEntry,
  LedgerEntryInput,
  PerformancePeriod,
  Portfolio,
  PortfolioAllocation,
  PortfolioPerformance,
} from '../models/index.js';
import { computeAllocation, summarizeHoldings, summarizePortfolios } from './allocation.js';
import { ledgerEntriesInRange, summarizeLedger } from './ledger.js';
import type { CashTransfer, PortfolioRemote, PortfolioRepository } from './types.js';

export interface PortfolioRepositoryDeps {
  readonly remote: PortfolioRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const ALL = 'all';

const invalidAmount = (): RepositoryError => createDomainRuleError('INVALID_AMOUNT');

/**
 * Creates the portfolio repository: the portfolio list, and holdings and
 * ledger entries per portfolio, each fresh for one minute.
 *
 * Portfolio writes merge into the cached list. Holding, ledger and cash
 * writes change the portfolio's totals, so the invalidation table drops its
 * holdings, ledger and the list instead.
 *
 * @example
 * ```typescript
 * const portfolios = createPortfolioRepository({ remote: createPortfolioRemote(api), rules, logger });
 * const allocation = await portfolios.fetchAllocation('portfolio-1', 'sector');
 * ```
 */
export const createPortfolioRepository = (deps: PortfolioRepositoryDeps): PortfolioRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'portfolio' });

  const portfolios = createResourceCache<Portfolio[]>({
    name: 'portfolio.list',
    freshForMs: FRESHNESS.portfolios,
    logger: log,
    now,
  });
  const portfolioItems = createResourceCache<Portfolio>({
    name: 'portfolio.items',
    freshForMs: FRESHNESS.portfolios,
    logger: log,
    now,
  });
  const holdings = createResourceCache<Holding[]>({
    name: 'portfolio.holdings',
    freshForMs: FRESHNESS.holdings,
    logger: log,
    now,
  });
  const ledger = createResourceCache<LedgerEntry[]>({
    name: 'portfolio.ledger',
    freshForMs: FRESHNESS.ledger,
    logger: log,
    now,
  });

  rules.register('portfolio.list', {
    clear: () => {
      portfolios.invalidate();
      portfolioItems.invalidate();
    },
    remove: (id) => {
      portfolios.invalidate();
      portfolioItems.invalidate(id);
    },
  });
  rules.register('portfolio.holdings', {
    clear: () => holdings.invalidate(),
    remove: (portfolioId) => holdings.invalidate(portfolioId),
  });
  rules.register('portfolio.ledger', {
    clear: () => ledger.invalidate(),
    remove: (portfolioId) => ledger.invalidate(portfolioId),
  });

  const cachedPortfolio = (id: string): Portfolio | undefined =>
    findById(portfolios.peek(ALL)?.value, id) ?? portfolioItems.peek(id)?.value;

  const mergePortfolio = (portfolio: Portfolio, kind: MutationKind): void => {
    portfolios.update(ALL, (list) => upsertById(list, portfolio));
    portfolioItems.put(portfolio.id, portfolio);
    rules.apply(kind, { id: portfolio.id, portfolioId: portfolio.id });
  };

  /** Remote call, then the table for `kind`; nothing is merged. */
  const mutate = async <T>(
    kind: MutationKind,
    context: InvalidationContext,
    call: () => Promise<Result<T, RepositoryError>>
  ): Promise<Result<T, RepositoryError>> => {
    const result = await call();
    if (result.isOk()) {
      rules.apply(kind, context);
      log.info({ mutation: kind, portfolioId: context.portfolioId }, 'portfolio contents changed');
    }
    return result;
  };

  const fetchPortfolios = (options?: LoadOptions): Promise<Result<Portfolio[], RepositoryError>> =>
    portfolios.load(ALL, () => remote.listPortfolios(), options);

  const fetchPortfolio = (id: string, options?: LoadOptions): Promise<Result<Portfolio, RepositoryError>> => {
    const listed = options?.force === true ? undefined : findById(portfolios.get(ALL), id);
    if (listed !== undefined) {
      return Promise.resolve(ok(listed));
    }
    return portfolioItems.load(id, () => remote.getPortfolio(id), options);
  };

  const fetchHoldings = (portfolioId: string, options?: LoadOptions): Promise<Result<Holding[], RepositoryError>> =>
    holdings.load(portfolioId, () => remote.listHoldings(portfolioId), options);

  const fetchLedgerEntries = (
    portfolioId: string,
    options?: LoadOptions
  ): Promise<Result<LedgerEntry[], RepositoryError>> =>
    ledger.load(
      portfolioId,
      async () => (await remote.listLedgerEntries(portfolioId, 1, MAX_PAGE_SIZE)).map((page) => page.data),
      options
    );

  const firstPortfolio = async (missing: string): Promise<Result<Portfolio, RepositoryError>> =>
    (await fetchPortfolios()).andThen((list): Result<Portfolio, RepositoryError> => {
      const [first] = list;
      return first === undefined ? err(createNotFoundError(missing)) : ok(first);
    });

  const fetchPerformance = (
    portfolioId: string,
    period: PerformancePeriod = DEFAULT_PERFORMANCE_PERIOD
  ): Promise<Result<PortfolioPerformance, RepositoryError>> => remote.getPerformance(portfolioId, period);

  const fetchAllocation = async (
    portfolioId: string,
    groupBy: AllocationGrouping
  ): Promise<Result<PortfolioAllocation, RepositoryError>> =>
    (await fetchHoldings(portfolioId)).map((list) => ({
      portfolioId,
      allocations: computeAllocation(list, groupBy),
    }));

  const postCashEntry = (
    kind: MutationKind,
    context: InvalidationContext,
    portfolioId: string,
    input: LedgerEntryInput
  ): Promise<Result<LedgerEntry, RepositoryError>> => {
    if (!(input.totalAmount > 0)) {
      return Promise.resolve(err(invalidAmount()));
    }
    return mutate(kind, context, () => remote.createLedgerEntry(portfolioId, input));
  };

  const transferCash = async (
    amount: number,
    fromPortfolioId: string,
    toPortfolioId: string,
    notes?: string
  ): Promise<Result<CashTransfer, RepositoryError>> => {
    if (!(amount > 0)) {
      return err(invalidAmount());
    }

    const withdrawal = await remote.createLedgerEntry(fromPortfolioId, {
      type: 'withdrawal',
      totalAmount: amount,
      notes: `Transfer to another portfolio - ${notes ?? ''}`,
    });
    if (withdrawal.isErr()) {
      return err(withdrawal.error);
    }

    const deposit = await remote.createLedgerEntry(toPortfolioId, {
      type: 'deposit',
      totalAmount: amount,
      notes: `Transfer from another portfolio - ${notes ?? ''}`,
    });
    if (deposit.isErr()) {
      log.warn(
        { fromPortfolioId, toPortfolioId, code: deposit.error.code },
        'transfer deposit failed after withdrawal'
      );
      rules.apply('cash.withdraw', { portfolioId: fromPortfolioId });
      return err(deposit.error);
    }

    rules.apply('cash.transfer', { portfolioId: fromPortfolioId, targetPortfolioId: toPortfolioId });
    return ok({ withdrawal: withdrawal.value, deposit: deposit.value });
  };

  return {
    fetchPortfolios,
    fetchPortfolio,
    fetchDefaultPortfolio: async () =>
      (await fetchPortfolios()).map((list) => list.find((portfolio) => portfolio.isDefault) ?? null),

    createPortfolio: async (input) => {
      const result = await remote.createPortfolio(input);
      if (result.isOk()) {
        mergePortfolio(result.value, 'portfolio.create');
      }
      return result;
    },

    updatePortfolio: async (id, update) => {
      const result = await remote.updatePortfolio(id, update);
      if (result.isOk()) {
        mergePortfolio(result.value, 'portfolio.update');
      }
      return result;
    },

    deletePortfolio: async (id) => {
      if (cachedPortfolio(id)?.isDefault === true) {
        return err(createDomainRuleError('CANNOT_DELETE_DEFAULT_PORTFOLIO'));
      }
      const result = await remote.deletePortfolio(id);
      if (result.isOk()) {
        portfolios.update(ALL, (list) => removeById(list, id));
        portfolioItems.invalidate(id);
        rules.apply('portfolio.delete', { id, portfolioId: id });
      }
      return result;
    },

    fetchHoldings,

    fetchHolding: async (holdingId, portfolioId) =>
      (await fetchHoldings(portfolioId)).andThen((list) => {
        const holding = findById(list, holdingId);
        return holding === undefined
          ? err(createNotFoundError(`Holding ${holdingId} not found in portfolio ${portfolioId}`))
          : ok(holding);
      }),

    addHolding: (portfolioId, input) =>
      mutate('holding.add', { portfolioId }, () =>
        remote.addHolding(portfolioId, { ...input, stockSymbol: input.stockSymbol.toUpperCase() })
      ),
    updateHolding: (portfolioId, holdingId, update) =>
      mutate('holding.update', { id: holdingId, portfolioId }, () =>
        remote.updateHolding(portfolioId, holdingId, update)
      ),
    removeHolding: (portfolioId, holdingId) =>
      mutate('holding.remove', { id: holdingId, portfolioId }, () => remote.removeHolding(portfolioId, holdingId)),

    refreshHoldingPrices: (portfolioId) => fetchHoldings(portfolioId, { force: true }),

    fetchAllocation,

    fetchCombinedAllocation: async (groupBy) => {
      const first = await firstPortfolio('No portfolio to allocate');
      return first.isErr() ? err(first.error) : fetchAllocation(first.value.id, groupBy);
    },

    fetchLedgerEntries,
    fetchLedgerEntriesByType: async (portfolioId, types) =>
      (await fetchLedgerEntries(portfolioId)).map((entries) =>
        entries.filter((entry) => types.includes(entry.type))
      ),
    fetchLedgerEntriesInRange: async (portfolioId, from, to) =>
      (await fetchLedgerEntries(portfolioId)).map((entries) => ledgerEntriesInRange(entries, from, to)),
    fetchLedgerSummary: async (portfolioId) => (await fetchLedgerEntries(portfolioId)).map(summarizeLedger),
    addLedgerEntry: (portfolioId, input) =>
      mutate('ledger.add', { portfolioId }, () => remote.createLedgerEntry(portfolioId, input)),
    updateLedgerEntry: (portfolioId, entryId, update) =>
      mutate('ledger.update', { id: entryId, portfolioId }, () =>
        remote.updateLedgerEntry(portfolioId, entryId, update)
      ),
    deleteLedgerEntry: (portfolioId, entryId) =>
      mutate('ledger.delete', { id: entryId, portfolioId }, () => remote.deleteLedgerEntry(portfolioId, entryId)),

    depositCash: (portfolioId, amount, notes) =>
      postCashEntry('cash.deposit', { portfolioId }, portfolioId, { type: 'deposit', totalAmount: amount, notes }),
    withdrawCash: (portfolioId, amount, notes) =>
      postCashEntry('cash.withdraw', { portfolioId }, portfolioId, {
        type: 'withdrawal',
        totalAmount: amount,
        notes,
      }),
    transferCash,

    fetchPerformance,
    fetchCombinedPerformance: async (period) => {
      const first = await firstPortfolio('No portfolio to measure');
      return first.isErr() ? err(first.error) : fetchPerformance(first.value.id, period);
    },

    fetchCostBasis: (symbol) => remote.getCostBasis(symbol.trim().toUpperCase()),

    selectPortfoliosSummary: () => summarizePortfolios(portfolios.peek(ALL)?.value ?? []),
    fetchHoldingsSummary: async (portfolioId) => (await fetchHoldings(portfolioId)).map(summarizeHoldings),

    invalidateCache: (portfolioId) => {
      if (portfolioId !== undefined) {
        holdings.invalidate(portfolioId);
        ledger.invalidate(portfolioId);
        return;
      }
      portfolios.invalidate();
      portfolioItems.invalidate();
      holdings.invalidate();
      ledger.invalidate();
    },
  };
};
