import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  FundingBalance,
  FxRate,
  Page,
  Transfer,
  TransferStatus,
  TransferSummary,
  TransferType,
} from '../models/index.js';

/**
 * Body of a deposit or withdrawal request. Amounts are in GBP.
 */
export interface TransferRequest {
  readonly amount: number;
  readonly currency: 'GBP';
  readonly notes?: string | undefined;
}

/**
 * Funding endpoints of the API.
 */
export interface FundingRemote {
  readonly getBalance: () => Promise<Result<FundingBalance, RepositoryError>>;
  readonly getFxRate: () => Promise<Result<FxRate, RepositoryError>>;
  readonly initiateDeposit: (request: TransferRequest) => Promise<Result<Transfer, RepositoryError>>;
  readonly confirmDeposit: (transferId: string, fxRate: number) => Promise<Result<Transfer, RepositoryError>>;
  readonly initiateWithdrawal: (request: TransferRequest) => Promise<Result<Transfer, RepositoryError>>;
  readonly confirmWithdrawal: (
    transferId: string,
    fxRate: number
  ) => Promise<Result<Transfer, RepositoryError>>;
  readonly getTransfer: (id: string) => Promise<Result<Transfer, RepositoryError>>;
  readonly cancelTransfer: (id: string) => Promise<Result<Transfer, RepositoryError>>;
  /** Narrowed to one portfolio's transfers when `portfolioId` is given. */
  readonly getTransferHistory: (
    page: number,
    limit: number,
    portfolioId?: string
  ) => Promise<Result<Page<Transfer>, RepositoryError>>;
}

/**
 * Cached access to the funding balance, FX rate and transfers.
 */
export interface FundingRepository {
  readonly fetchBalance: (options?: LoadOptions) => Promise<Result<FundingBalance, RepositoryError>>;

  /** Cached until the quoted rate expires. */
  readonly fetchFxRate: (options?: LoadOptions) => Promise<Result<FxRate, RepositoryError>>;

  readonly initiateDeposit: (
    amount: number,
    notes?: string
  ) => Promise<Result<Transfer, RepositoryError>>;
  readonly confirmDeposit: (transferId: string, fxRate: number) => Promise<Result<Transfer, RepositoryError>>;

  /**
   * Checks the amount against the available GBP balance before calling the API.
   */
  readonly initiateWithdrawal: (
    amount: number,
    notes?: string
  ) => Promise<Result<Transfer, RepositoryError>>;
  readonly confirmWithdrawal: (
    transferId: string,
    fxRate: number
  ) => Promise<Result<Transfer, RepositoryError>>;

  readonly fetchTransfer: (id: string, options?: LoadOptions) => Promise<Result<Transfer, RepositoryError>>;

  /** Fails with TRANSFER_NOT_CANCELLABLE when the cached transfer is already settled. */
  readonly cancelTransfer: (id: string) => Promise<Result<Transfer, RepositoryError>>;

  /** The first page replaces the cached transfer list. */
  readonly fetchTransferHistory: (
    page?: number,
    limit?: number
  ) => Promise<Result<Page<Transfer>, RepositoryError>>;
  /** One portfolio's transfers. Not cached, and leaves the cached transfer list alone. */
  readonly fetchPortfolioTransferHistory: (
    portfolioId: string,
    page?: number,
    limit?: number
  ) => Promise<Result<Page<Transfer>, RepositoryError>>;
  readonly fetchAllTransfers: (options?: LoadOptions) => Promise<Result<Transfer[], RepositoryError>>;
  readonly fetchTransfersByType: (type: TransferType) => Promise<Result<Transfer[], RepositoryError>>;
  readonly fetchTransfersByStatus: (status: TransferStatus) => Promise<Result<Transfer[], RepositoryError>>;
  readonly fetchPendingTransfers: () => Promise<Result<Transfer[], RepositoryError>>;
  readonly fetchTransferSummary: () => Promise<Result<TransferSummary, RepositoryError>>;

  /** Loads balance, transfers and FX rate together. */
  readonly prefetch: () => Promise<Result<void, RepositoryError>>;

  readonly invalidateCache: () => void;
}
