import { Result, ok, err } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import { createDomainRuleError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules, MutationKind } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { findById, upsertById } from '../repositories/collection.js';
import {
  MAX_PAGE_SIZE,
  canCancelTransfer,
  isTransferInProgress,
} from '../models/index.js';
import type { FundingBalance, FxRate, Page, Transfer, TransferSummary } from '../models/index.js';
import type { FundingRemote, FundingRepository } from './types.js';

export interface FundingRepositoryDeps {
  readonly remote: FundingRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const BALANCE = 'balance';
const FX_RATE = 'fx-rate';
const ALL = 'all';

const DEFAULT_HISTORY_LIMIT = 20;

const sumAmounts = (transfers: readonly Transfer[]): number =>
  transfers.reduce((total, transfer) => total + transfer.amount, 0);

/**
 * Totals over a transfer list. Completed transfers count toward the totals,
 * pending and processing ones toward the pending amounts.
 */
export const summarizeTransfers = (transfers: readonly Transfer[]): TransferSummary => {
  const completed = transfers.filter((t) => t.status === 'completed');
  const inProgress = transfers.filter(isTransferInProgress);
  const totalDeposits = sumAmounts(completed.filter((t) => t.type === 'deposit'));
  const totalWithdrawals = sumAmounts(completed.filter((t) => t.type === 'withdrawal'));

  return {
    totalDeposits,
    totalWithdrawals,
    pendingDeposits: sumAmounts(inProgress.filter((t) => t.type === 'deposit')),
    pendingWithdrawals: sumAmounts(inProgress.filter((t) => t.type === 'withdrawal')),
    netTransfers: totalDeposits - totalWithdrawals,
  };
};

/**
 * Creates the funding repository.
 *
 * Owns the balance (30 s), the FX rate (until `expiresAt`) and the transfer
 * list (1 min). Every transfer mutation drops the balance through the
 * invalidation rules.
 *
 * @example
 * ```typescript
 * const funding = createFundingRepository({ remote: createFundingRemote(api), rules, logger });
 * const transfer = await funding.initiateDeposit(250, 'Monthly top-up');
 * ```
 */
export const createFundingRepository = (deps: FundingRepositoryDeps): FundingRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'funding' });

  const balance = createResourceCache<FundingBalance>({
    name: 'funding.balance',
    freshForMs: FRESHNESS.fundingBalance,
    logger: log,
    now,
  });
  const fxRate = createResourceCache<FxRate>({
    name: 'funding.fxRate',
    freshForMs: 0,
    logger: log,
    now,
    freshForValue: (rate, at) => {
      // An unreadable expiry is treated as already expired
      const remaining = Date.parse(rate.expiresAt) - at;
      return Number.isFinite(remaining) ? Math.max(0, remaining) : 0;
    },
  });
  const transfers = createResourceCache<Transfer[]>({
    name: 'funding.transfers',
    freshForMs: FRESHNESS.transfers,
    logger: log,
    now,
  });
  const transferItems = createResourceCache<Transfer>({
    name: 'funding.transferItems',
    freshForMs: FRESHNESS.transfers,
    logger: log,
    now,
  });

  rules.register('funding.balance', {
    clear: () => balance.invalidate(),
    remove: () => balance.invalidate(),
  });

  const cachedTransfer = (id: string): Transfer | undefined =>
    findById(transfers.peek(ALL)?.value, id) ?? transferItems.peek(id)?.value;

  /** Newest first, replacing any copy with the same id */
  const mergeTransfer = (transfer: Transfer, kind: MutationKind): void => {
    transfers.update(ALL, (list) => upsertById(list, transfer, 'start'));
    if (transferItems.peek(transfer.id) !== undefined) {
      transferItems.put(transfer.id, transfer);
    }
    rules.apply(kind, { id: transfer.id, portfolioId: transfer.portfolioId });
  };

  const fetchBalance = (options?: LoadOptions): Promise<Result<FundingBalance, RepositoryError>> =>
    balance.load(BALANCE, () => remote.getBalance(), options);

  const fetchFxRate = (options?: LoadOptions): Promise<Result<FxRate, RepositoryError>> =>
    fxRate.load(FX_RATE, () => remote.getFxRate(), options);

  const initiateDeposit = async (
    amount: number,
    notes?: string
  ): Promise<Result<Transfer, RepositoryError>> => {
    if (!(amount > 0)) {
      return err(createDomainRuleError('INVALID_AMOUNT'));
    }
    const result = await remote.initiateDeposit({ amount, currency: 'GBP', notes });
    if (result.isOk()) {
      mergeTransfer(result.value, 'funding.deposit');
      log.info({ transferId: result.value.id }, 'deposit initiated');
    }
    return result;
  };

  const confirmDeposit = async (
    transferId: string,
    rate: number
  ): Promise<Result<Transfer, RepositoryError>> => {
    const result = await remote.confirmDeposit(transferId, rate);
    if (result.isOk()) {
      mergeTransfer(result.value, 'funding.depositConfirm');
    }
    return result;
  };

  const initiateWithdrawal = async (
    amount: number,
    notes?: string
  ): Promise<Result<Transfer, RepositoryError>> => {
    if (!(amount > 0)) {
      return err(createDomainRuleError('INVALID_AMOUNT'));
    }

    const current = await fetchBalance();
    if (current.isErr()) {
      return err(current.error);
    }
    if (amount > current.value.availableGbp) {
      return err(
        createDomainRuleError(
          'INSUFFICIENT_FUNDS',
          `Insufficient funds: ${current.value.availableGbp.toFixed(2)} GBP available, ${amount.toFixed(2)} GBP requested`
        )
      );
    }

    const result = await remote.initiateWithdrawal({ amount, currency: 'GBP', notes });
    if (result.isOk()) {
      mergeTransfer(result.value, 'funding.withdrawal');
      log.info({ transferId: result.value.id }, 'withdrawal initiated');
    }
    return result;
  };

  const confirmWithdrawal = async (
    transferId: string,
    rate: number
  ): Promise<Result<Transfer, RepositoryError>> => {
    const result = await remote.confirmWithdrawal(transferId, rate);
    if (result.isOk()) {
      mergeTransfer(result.value, 'funding.withdrawalConfirm');
    }
    return result;
  };

  const fetchTransfer = (id: string, options?: LoadOptions): Promise<Result<Transfer, RepositoryError>> => {
    if (options?.force !== true) {
      const listed = findById(transfers.get(ALL), id);
      if (listed !== undefined) {
        return Promise.resolve(ok(listed));
      }
    }
    return transferItems.load(id, () => remote.getTransfer(id), options);
  };

  const cancelTransfer = async (id: string): Promise<Result<Transfer, RepositoryError>> => {
    const cached = cachedTransfer(id);
    if (cached !== undefined && !canCancelTransfer(cached)) {
      return err(
        createDomainRuleError('TRANSFER_NOT_CANCELLABLE', `Transfer ${id} is ${cached.status} and cannot be cancelled`)
      );
    }

    const result = await remote.cancelTransfer(id);
    if (result.isOk()) {
      mergeTransfer(result.value, 'funding.transferCancel');
    }
    return result;
  };

  const fetchTransferHistory = async (
    page = 1,
    limit = DEFAULT_HISTORY_LIMIT
  ): Promise<Result<Page<Transfer>, RepositoryError>> => {
    const result = await remote.getTransferHistory(page, limit);
    if (result.isOk() && page === 1) {
      transfers.put(ALL, result.value.data);
    }
    return result;
  };

  const fetchAllTransfers = (options?: LoadOptions): Promise<Result<Transfer[], RepositoryError>> =>
    transfers.load(
      ALL,
      async () => {
        const page = await remote.getTransferHistory(1, MAX_PAGE_SIZE);
        return page.map((p) => p.data);
      },
      options
    );

  const fetchFiltered = async (
    predicate: (transfer: Transfer) => boolean
  ): Promise<Result<Transfer[], RepositoryError>> => {
    const all = await fetchAllTransfers();
    return all.map((list) => list.filter(predicate));
  };

  const prefetch = async (): Promise<Result<void, RepositoryError>> => {
    const [balanceResult, transfersResult, rateResult] = await Promise.all([
      fetchBalance(),
      fetchAllTransfers(),
      fetchFxRate(),
    ]);
    return Result.combine([balanceResult, transfersResult, rateResult]).map(() => undefined);
  };

  const invalidateCache = (): void => {
    balance.invalidate();
    fxRate.invalidate();
    transfers.invalidate();
    transferItems.invalidate();
  };

  return {
    fetchBalance,
    fetchFxRate,
    initiateDeposit,
    confirmDeposit,
    initiateWithdrawal,
    confirmWithdrawal,
    fetchTransfer,
    cancelTransfer,
    fetchTransferHistory,
    fetchPortfolioTransferHistory: (portfolioId, page = 1, limit = DEFAULT_HISTORY_LIMIT) =>
      remote.getTransferHistory(page, limit, portfolioId),
    fetchAllTransfers,
    fetchTransfersByType: (type) => fetchFiltered((t) => t.type === type),
    fetchTransfersByStatus: (status) => fetchFiltered((t) => t.status === status),
    fetchPendingTransfers: () => fetchFiltered(isTransferInProgress),
    fetchTransferSummary: async () => (await fetchAllTransfers()).map(summarizeTransfers),
    prefetch,
    invalidateCache,
  };
};
