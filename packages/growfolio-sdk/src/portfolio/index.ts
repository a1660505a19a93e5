export { createPortfolioRepository } from './repository.js';
export type { PortfolioRepositoryDeps } from './repository.js';
export { createPortfolioRemote } from './remote.js';
export { computeAllocation, summarizeHoldings, summarizePortfolios } from './allocation.js';
export { ledgerEntriesInRange, ledgerEntryNetAmount, summarizeLedger } from './ledger.js';
export type { CashTransfer, PortfolioRemote, PortfolioRepository } from './types.js';
