/**
 * Growfolio SDK - cache-aside repositories for the Growfolio API
 *
 * @packageDocumentation
 */

// ============================================================================
// CLIENT: Entry Points
// ============================================================================

export { createGrowfolioClient, createRepositoryContainer, createRemotes } from './client/index.js';
export type {
  GrowfolioClientOptions,
  GrowfolioRemotes,
  RepositoryContainer,
  RepositoryContainerOptions,
} from './client/index.js';

// ============================================================================
// CORE: Caching, Single-Flight and Invalidation
// ============================================================================

export { createKeyedCache, createCacheEntry, isStale, serializeKey, FRESHNESS } from './cache/index.js';
export type { CacheEntry, CacheKey, KeyedCache, KeyedCacheOptions, FreshnessPolicy } from './cache/index.js';

export { createSingleFlight } from './single-flight/index.js';
export type { SingleFlight, Producer, RunOptions } from './single-flight/index.js';

export { createResourceCache, findById, removeById, upsertById } from './repositories/index.js';
export type { LoadOptions, ResourceCache, ResourceCacheOptions } from './repositories/index.js';

export { createInvalidationRules, INVALIDATION_TABLE } from './invalidation/index.js';
export type {
  CacheTarget,
  MutationKind,
  InvalidationContext,
  InvalidationRulesOptions,
  KeyDerivation,
  InvalidationEdge,
  InvalidationTable,
  InvalidationHandle,
  InvalidationRules,
} from './invalidation/index.js';

// ============================================================================
// CORE: Errors and Logging
// ============================================================================

export {
  createRepositoryError,
  createNotFoundError,
  createDecodeError,
  createCancelledError,
  createDomainRuleError,
  fromHttpError,
  isRetryableError,
  requiresReauthentication,
  describeError,
} from './errors/index.js';
export type { RepositoryError, RepositoryErrorCode, DomainRule } from './errors/index.js';

export { createLogger, createSilentLogger } from './logging/index.js';
export type { Logger, LoggerOptions } from './logging/index.js';

// ============================================================================
// TRANSPORT: HTTP and API Client
// ============================================================================

export { createFetchClient } from './http/index.js';
export type { HttpClient, HttpClientOptions, HttpMethod, HttpRequest, HttpResponse, HttpError } from './http/index.js';

export { createApiClient, buildUrl, ENDPOINTS } from './remote/index.js';
export type { AccessTokenProvider, ApiCall, ApiClient, ApiClientConfig, ApiRequest, QueryValue } from './remote/index.js';

// ============================================================================
// DOMAINS: Repositories and Remote Data Sources
// ============================================================================

export {
  createPortfolioRepository,
  createPortfolioRemote,
  computeAllocation,
  summarizeHoldings,
  summarizePortfolios,
} from './portfolio/index.js';
export type { CashTransfer, PortfolioRemote, PortfolioRepository, PortfolioRepositoryDeps } from './portfolio/index.js';

export { createGoalRepository, createGoalRemote, summarizeGoals } from './goal/index.js';
export type { FetchGoalsOptions, GoalRemote, GoalRepository, GoalRepositoryDeps } from './goal/index.js';

export {
  createDCARepository,
  createDCARemote,
  isScheduleActive,
  summarizeSchedules,
  upcomingExecutions,
} from './dca/index.js';
export type { DCARemote, DCARepository, DCARepositoryDeps } from './dca/index.js';

export { createFamilyRepository, createFamilyRemote } from './family/index.js';
export type { FamilyRemote, FamilyRepository, FamilyRepositoryDeps } from './family/index.js';

export { createFundingRepository, createFundingRemote, summarizeTransfers } from './funding/index.js';
export type { FundingRemote, FundingRepository, FundingRepositoryDeps, TransferRequest } from './funding/index.js';

export { createStockRepository, createStockRemote, computeMarketStatus, normalizeSymbol } from './stock/index.js';
export type { StockRemote, StockRepository, StockRepositoryDeps } from './stock/index.js';

export { createUserRepository, createUserRemote } from './user/index.js';
export type { DevicePlatform, UserRemote, UserRepository, UserRepositoryDeps } from './user/index.js';

export { createAIInsightRepository, createAIRemote } from './ai/index.js';
export type {
  AIInsightRepository,
  AIInsightRepositoryDeps,
  AIRemote,
  ChatRequest,
  FetchInsightsOptions,
  SendMessageOptions,
} from './ai/index.js';

// ============================================================================
// MODELS
// ============================================================================

export * from './models/index.js';
