import { err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import { createDomainRuleError } from '../errors/errors.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { ChatReply, InsightsResponse, InvestingTip, StockExplanation } from '../models/index.js';
import type { AIInsightRepository, AIRemote, SendMessageOptions } from './types.js';

export interface AIInsightRepositoryDeps {
  readonly remote: AIRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const TIPS = 'tips';

const insightsKey = (includeGoals: boolean): string => (includeGoals ? 'with-goals' : 'portfolio');

/**
 * Creates the AI insight repository.
 *
 * @example
 * ```typescript
 * const ai = createAIInsightRepository({ remote: createAIRemote(api), rules, logger });
 * await ai.fetchStockExplanation('aapl'); // cached under AAPL
 * ```
 */
export const createAIInsightRepository = (deps: AIInsightRepositoryDeps): AIInsightRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'ai' });

  const insights = createResourceCache<InsightsResponse>({
    name: 'ai.insights',
    freshForMs: FRESHNESS.insights,
    logger: log,
    now,
  });
  const goalInsights = createResourceCache<InsightsResponse>({
    name: 'ai.goalInsights',
    freshForMs: FRESHNESS.insights,
    logger: log,
    now,
  });
  const explanations = createResourceCache<StockExplanation>({
    name: 'ai.explanations',
    freshForMs: FRESHNESS.stockExplanation,
    logger: log,
    now,
  });
  const tips = createResourceCache<InvestingTip[]>({
    name: 'ai.tips',
    freshForMs: FRESHNESS.investingTips,
    logger: log,
    now,
  });

  rules.register('ai.insights', { clear: () => insights.invalidate(), remove: () => insights.invalidate() });
  rules.register('ai.goalInsights', {
    clear: () => goalInsights.invalidate(),
    remove: (goalId) => goalInsights.invalidate(goalId),
  });

  const sendMessage = (
    message: string,
    options: SendMessageOptions = {}
  ): Promise<Result<ChatReply, RepositoryError>> => {
    if (message.trim().length === 0) {
      return Promise.resolve(err(createDomainRuleError('EMPTY_MESSAGE')));
    }
    const history = options.history ?? [];
    return remote.chat({
      message,
      conversationHistory: history.length > 0 ? history : undefined,
      includePortfolioContext: options.includePortfolioContext ?? true,
    });
  };

  const clearInsightsCache = (): void => {
    insights.invalidate();
    goalInsights.invalidate();
  };

  return {
    fetchInsights: (options = {}) => {
      const includeGoals = options.includeGoals === true;
      return insights.load(insightsKey(includeGoals), () => remote.getInsights(includeGoals), options);
    },
    fetchGoalInsights: (goalId, options) =>
      goalInsights.load(goalId, () => remote.getGoalInsights(goalId), options),
    fetchStockExplanation: (symbol, options) => {
      const key = symbol.trim().toUpperCase();
      return explanations.load(key, () => remote.getStockExplanation(key), options);
    },
    fetchInvestingTips: (options) => tips.load(TIPS, () => remote.getInvestingTips(), options),
    fetchAllocationSuggestion: (request) => remote.suggestAllocation(request),
    sendMessage,
    clearInsightsCache,
    invalidateCache: () => {
      clearInsightsCache();
      explanations.invalidate();
      tips.invalidate();
    },
  };
};
