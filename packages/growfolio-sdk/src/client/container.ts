import type { Logger } from 'pino';
import { createSilentLogger } from '../logging/logger.js';
import { createInvalidationRules } from '../invalidation/rules.js';
import type { InvalidationRules, InvalidationTable } from '../invalidation/types.js';
import type { ApiClient } from '../remote/api-client.js';
import { createAIInsightRepository, createAIRemote } from '../ai/index.js';
import type { AIInsightRepository, AIRemote } from '../ai/index.js';
import { createDCARemote, createDCARepository } from '../dca/index.js';
import type { DCARemote, DCARepository } from '../dca/index.js';
import { createFamilyRemote, createFamilyRepository } from '../family/index.js';
import type { FamilyRemote, FamilyRepository } from '../family/index.js';
import { createFundingRemote, createFundingRepository } from '../funding/index.js';
import type { FundingRemote, FundingRepository } from '../funding/index.js';
import { createGoalRemote, createGoalRepository } from '../goal/index.js';
import type { GoalRemote, GoalRepository } from '../goal/index.js';
import { createPortfolioRemote, createPortfolioRepository } from '../portfolio/index.js';
import type { PortfolioRemote, PortfolioRepository } from '../portfolio/index.js';
import { createStockRemote, createStockRepository } from '../stock/index.js';
import type { StockRemote, StockRepository } from '../stock/index.js';
import { createUserRemote, createUserRepository } from '../user/index.js';
import type { UserRemote, UserRepository } from '../user/index.js';

/**
 * One data source per domain.
 */
export interface GrowfolioRemotes {
  readonly portfolio: PortfolioRemote;
  readonly goal: GoalRemote;
  readonly dca: DCARemote;
  readonly family: FamilyRemote;
  readonly funding: FundingRemote;
  readonly stock: StockRemote;
  readonly user: UserRemote;
  readonly ai: AIRemote;
}

export const createRemotes = (api: ApiClient): GrowfolioRemotes => ({
  portfolio: createPortfolioRemote(api),
  goal: createGoalRemote(api),
  dca: createDCARemote(api),
  family: createFamilyRemote(api),
  funding: createFundingRemote(api),
  stock: createStockRemote(api),
  user: createUserRemote(api),
  ai: createAIRemote(api),
});

export interface RepositoryContainerOptions {
  readonly remotes: GrowfolioRemotes;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  /** Clock shared by every cache, Date.now by default */
  readonly now?: (() => number) | undefined;
  /** Defaults to INVALIDATION_TABLE */
  readonly table?: InvalidationTable | undefined;
}

export interface RepositoryContainer {
  readonly portfolios: PortfolioRepository;
  readonly goals: GoalRepository;
  readonly dca: DCARepository;
  readonly family: FamilyRepository;
  readonly funding: FundingRepository;
  readonly stocks: StockRepository;
  readonly user: UserRepository;
  readonly ai: AIInsightRepository;
  readonly rules: InvalidationRules;
  /** Drops every cached value in every repository. */
  readonly clearAll: () => void;
  /** Clears all caches so nothing of the signed-out user survives. */
  readonly signOut: () => void;
}

/**
 * Builds every repository around one set of invalidation rules.
 *
 * @example
 * ```typescript
 * const container = createRepositoryContainer({ remotes: createRemotes(api), logger });
 * await container.funding.initiateDeposit(100); // drops container.funding's balance
 * ```
 */
export const createRepositoryContainer = (options: RepositoryContainerOptions): RepositoryContainer => {
  const { remotes, now, table } = options;
  const logger = options.logger ?? createSilentLogger();
  const rules = createInvalidationRules({ logger, table });
  const deps = { rules, logger, now };

  const portfolios = createPortfolioRepository({ ...deps, remote: remotes.portfolio });
  const goals = createGoalRepository({ ...deps, remote: remotes.goal });
  const dca = createDCARepository({ ...deps, remote: remotes.dca });
  const family = createFamilyRepository({ ...deps, remote: remotes.family });
  const funding = createFundingRepository({ ...deps, remote: remotes.funding });
  const stocks = createStockRepository({ ...deps, remote: remotes.stock });
  const user = createUserRepository({ ...deps, remote: remotes.user });
  const ai = createAIInsightRepository({ ...deps, remote: remotes.ai });

  const clearAll = (): void => {
    rules.clearAll();
    for (const repository of [portfolios, goals, dca, family, funding, stocks, user, ai]) {
      repository.invalidateCache();
    }
    logger.debug('all caches cleared');
  };

  return {
    portfolios,
    goals,
    dca,
    family,
    funding,
    stocks,
    user,
    ai,
    rules,
    clearAll,
    signOut: () => {
      clearAll();
      logger.info('signed out, caches cleared');
    },
  };
};
