import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  AllocationGrouping,
  CostBasisSummary,
  Holding,
  HoldingInput,
  HoldingsSummary,
  LedgerEntry,
  LedgerEntryInput,
  LedgerEntryType,
  LedgerSummary,
  Page,
  PerformancePeriod,
  Portfolio,
  PortfolioAllocation,
  PortfolioInput,
  PortfolioPerformance,
  PortfoliosSummary,
} from '../models/index.js';

export interface PortfolioRemote {
  readonly listPortfolios: () => Promise<Result<Portfolio[], RepositoryError>>;
  readonly getPortfolio: (id: string) => Promise<Result<Portfolio, RepositoryError>>;
  readonly createPortfolio: (input: PortfolioInput) => Promise<Result<Portfolio, RepositoryError>>;
  readonly updatePortfolio: (
    id: string,
    update: Partial<PortfolioInput>
  ) => Promise<Result<Portfolio, RepositoryError>>;
  readonly deletePortfolio: (id: string) => Promise<Result<void, RepositoryError>>;

  readonly listHoldings: (portfolioId: string) => Promise<Result<Holding[], RepositoryError>>;
  readonly addHolding: (portfolioId: string, input: HoldingInput) => Promise<Result<Holding, RepositoryError>>;
  readonly updateHolding: (
    portfolioId: string,
    holdingId: string,
    update: Partial<HoldingInput>
  ) => Promise<Result<Holding, RepositoryError>>;
  readonly removeHolding: (portfolioId: string, holdingId: string) => Promise<Result<void, RepositoryError>>;

  readonly listLedgerEntries: (
    portfolioId: string,
    page: number,
    limit: number
  ) => Promise<Result<Page<LedgerEntry>, RepositoryError>>;
  readonly createLedgerEntry: (
    portfolioId: string,
    input: LedgerEntryInput
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  readonly updateLedgerEntry: (
    portfolioId: string,
    entryId: string,
    update: Partial<LedgerEntryInput>
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  readonly deleteLedgerEntry: (portfolioId: string, entryId: string) => Promise<Result<void, RepositoryError>>;

  readonly getPerformance: (
    portfolioId: string,
    period: PerformancePeriod
  ) => Promise<Result<PortfolioPerformance, RepositoryError>>;

  readonly getCostBasis: (symbol: string) => Promise<Result<CostBasisSummary, RepositoryError>>;
}

/**
 * The two ledger entries written by a cash transfer between portfolios.
 */
export interface CashTransfer {
  readonly withdrawal: LedgerEntry;
  readonly deposit: LedgerEntry;
}

export interface PortfolioRepository {
  readonly fetchPortfolios: (options?: LoadOptions) => Promise<Result<Portfolio[], RepositoryError>>;
  /** Served from the cached list when present, else fetched and cached on its own. */
  readonly fetchPortfolio: (id: string, options?: LoadOptions) => Promise<Result<Portfolio, RepositoryError>>;
  /** `null` when no portfolio is marked default. */
  readonly fetchDefaultPortfolio: () => Promise<Result<Portfolio | null, RepositoryError>>;
  readonly createPortfolio: (input: PortfolioInput) => Promise<Result<Portfolio, RepositoryError>>;
  readonly updatePortfolio: (
    id: string,
    update: Partial<PortfolioInput>
  ) => Promise<Result<Portfolio, RepositoryError>>;
  /** Fails with CANNOT_DELETE_DEFAULT_PORTFOLIO when the cached portfolio is the default one. */
  readonly deletePortfolio: (id: string) => Promise<Result<void, RepositoryError>>;

  readonly fetchHoldings: (portfolioId: string, options?: LoadOptions) => Promise<Result<Holding[], RepositoryError>>;
  readonly fetchHolding: (holdingId: string, portfolioId: string) => Promise<Result<Holding, RepositoryError>>;
  readonly addHolding: (portfolioId: string, input: HoldingInput) => Promise<Result<Holding, RepositoryError>>;
  readonly updateHolding: (
    portfolioId: string,
    holdingId: string,
    update: Partial<HoldingInput>
  ) => Promise<Result<Holding, RepositoryError>>;
  readonly removeHolding: (portfolioId: string, holdingId: string) => Promise<Result<void, RepositoryError>>;
  /** Reloads holdings regardless of freshness. */
  readonly refreshHoldingPrices: (portfolioId: string) => Promise<Result<Holding[], RepositoryError>>;

  readonly fetchAllocation: (
    portfolioId: string,
    groupBy: AllocationGrouping
  ) => Promise<Result<PortfolioAllocation, RepositoryError>>;
  /** Allocation of the first listed portfolio. */
  readonly fetchCombinedAllocation: (
    groupBy: AllocationGrouping
  ) => Promise<Result<PortfolioAllocation, RepositoryError>>;

  readonly fetchLedgerEntries: (
    portfolioId: string,
    options?: LoadOptions
  ) => Promise<Result<LedgerEntry[], RepositoryError>>;
  /** Cached entries of the given types, in server order. */
  readonly fetchLedgerEntriesByType: (
    portfolioId: string,
    types: readonly LedgerEntryType[]
  ) => Promise<Result<LedgerEntry[], RepositoryError>>;
  /** Cached entries dated within `[from, to]`, both ends included. */
  readonly fetchLedgerEntriesInRange: (
    portfolioId: string,
    from: string,
    to: string
  ) => Promise<Result<LedgerEntry[], RepositoryError>>;
  readonly fetchLedgerSummary: (portfolioId: string) => Promise<Result<LedgerSummary, RepositoryError>>;
  readonly addLedgerEntry: (
    portfolioId: string,
    input: LedgerEntryInput
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  readonly updateLedgerEntry: (
    portfolioId: string,
    entryId: string,
    update: Partial<LedgerEntryInput>
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  readonly deleteLedgerEntry: (portfolioId: string, entryId: string) => Promise<Result<void, RepositoryError>>;

  readonly depositCash: (
    portfolioId: string,
    amount: number,
    notes?: string
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  readonly withdrawCash: (
    portfolioId: string,
    amount: number,
    notes?: string
  ) => Promise<Result<LedgerEntry, RepositoryError>>;
  /**
   * Withdraws from the source, then deposits into the target. A failed
   * deposit leaves the withdrawal in place and is returned as the error.
   */
  readonly transferCash: (
    amount: number,
    fromPortfolioId: string,
    toPortfolioId: string,
    notes?: string
  ) => Promise<Result<CashTransfer, RepositoryError>>;

  /** Not cached. The period defaults to one month. */
  readonly fetchPerformance: (
    portfolioId: string,
    period?: PerformancePeriod
  ) => Promise<Result<PortfolioPerformance, RepositoryError>>;
  /** Performance of the first listed portfolio. */
  readonly fetchCombinedPerformance: (
    period?: PerformancePeriod
  ) => Promise<Result<PortfolioPerformance, RepositoryError>>;

  /** Not cached. */
  readonly fetchCostBasis: (symbol: string) => Promise<Result<CostBasisSummary, RepositoryError>>;

  /** Totals over the cached portfolio list, stale or not. Never fetches. */
  readonly selectPortfoliosSummary: () => PortfoliosSummary;
  readonly fetchHoldingsSummary: (portfolioId: string) => Promise<Result<HoldingsSummary, RepositoryError>>;

  /** Drops one portfolio's holdings and ledger, or everything. */
  readonly invalidateCache: (portfolioId?: string) => void;
}
