export { createFundingRepository, summarizeTransfers } from './repository.js';
export type { FundingRepositoryDeps } from './repository.js';
export { createFundingRemote } from './remote.js';
export type { FundingRemote, FundingRepository, TransferRequest } from './types.js';
