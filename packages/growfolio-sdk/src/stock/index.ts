export { createStockRepository, normalizeSymbol } from './repository.js';
export type { StockRepositoryDeps } from './repository.js';
export { createStockRemote } from './remote.js';
export { computeMarketStatus } from './market-hours.js';
export type { StockRemote, StockRepository } from './types.js';
