import { describe, it, expect, vi } from 'vitest';
import { createAIInsightRepository } from './repository.js';
import type { AIRemote } from './types.js';
import { createInvalidationRules } from '../invalidation/rules.js';
import { createSilentLogger } from '../logging/logger.js';
import { createFakeTimer, okAsync } from '../test/mocks.js';
import { buildInsights, TEST_TIMESTAMP } from '../test/fixtures.js';

const setup = (overrides: Partial<AIRemote> = {}) => {
  const timer = createFakeTimer();
  const logger = createSilentLogger();
  const rules = createInvalidationRules({ logger });
  const remote = {
    chat: vi.fn(() => okAsync({ message: 'Hello', suggestedActions: [] })),
    getInsights: vi.fn((includeGoals: boolean) =>
      okAsync(buildInsights({ summary: includeGoals ? 'with goals' : 'portfolio only' }))
    ),
    getGoalInsights: vi.fn(() => okAsync(buildInsights())),
    getStockExplanation: vi.fn((symbol: string) =>
      okAsync({ symbol, explanation: 'A technology company.', generatedAt: TEST_TIMESTAMP })
    ),
    suggestAllocation: vi.fn(() => okAsync({ suggestions: [] })),
    getInvestingTips: vi.fn(() =>
      okAsync([{ id: 'tip-1', title: 'Start early', content: 'Time in the market.', category: 'basics' }])
    ),
    ...overrides,
  };
  const repository = createAIInsightRepository({ remote, rules, logger, now: timer.now });
  return { timer, rules, remote, repository };
};

describe('createAIInsightRepository', () => {
  describe('fetchInsights', () => {
    it('caches each includeGoals variant separately', async () => {
      const { remote, repository } = setup();

      const portfolio = await repository.fetchInsights();
      const withGoals = await repository.fetchInsights({ includeGoals: true });
      await repository.fetchInsights({ includeGoals: false });

      expect(portfolio.isOk() && portfolio.value.summary).toBe('portfolio only');
      expect(withGoals.isOk() && withGoals.value.summary).toBe('with goals');
      expect(remote.getInsights).toHaveBeenCalledTimes(2);
    });

    it('reloads after a buy order', async () => {
      const { remote, rules, repository } = setup();
      await repository.fetchInsights();

      rules.apply('order.buy');
      await repository.fetchInsights();

      expect(remote.getInsights).toHaveBeenCalledTimes(2);
    });
  });

  describe('fetchGoalInsights', () => {
    it('drops only the updated goal', async () => {
      const { remote, rules, repository } = setup();
      await repository.fetchGoalInsights('goal-1');
      await repository.fetchGoalInsights('goal-2');

      rules.apply('goal.update', { goalId: 'goal-1' });
      await repository.fetchGoalInsights('goal-1');
      await repository.fetchGoalInsights('goal-2');

      expect(remote.getGoalInsights).toHaveBeenCalledTimes(3);
    });
  });

  describe('fetchStockExplanation', () => {
    it('treats symbols case-insensitively', async () => {
      const { remote, repository } = setup();

      await repository.fetchStockExplanation('aapl');
      await repository.fetchStockExplanation('AAPL');

      expect(remote.getStockExplanation).toHaveBeenCalledTimes(1);
      expect(remote.getStockExplanation).toHaveBeenCalledWith('AAPL');
    });
  });

  describe('fetchInvestingTips', () => {
    it('keeps tips for an hour', async () => {
      const { remote, repository, timer } = setup();

      await repository.fetchInvestingTips();
      timer.advance(3_600_000);
      await repository.fetchInvestingTips();
      timer.advance(1);
      await repository.fetchInvestingTips();

      expect(remote.getInvestingTips).toHaveBeenCalledTimes(2);
    });
  });

  describe('fetchAllocationSuggestion', () => {
    it('calls the remote every time', async () => {
      const { remote, repository } = setup();
      const request = { investmentAmount: 1000, riskTolerance: 'moderate', timeHorizon: 'long' } as const;

      await repository.fetchAllocationSuggestion(request);
      await repository.fetchAllocationSuggestion(request);

      expect(remote.suggestAllocation).toHaveBeenCalledTimes(2);
    });
  });

  describe('sendMessage', () => {
    it('rejects a blank message without a call', async () => {
      const { remote, repository } = setup();

      const result = await repository.sendMessage('   ');

      expect(result.isErr() && result.error.rule).toBe('EMPTY_MESSAGE');
      expect(remote.chat).not.toHaveBeenCalled();
    });

    it('omits an empty history and includes portfolio context by default', async () => {
      const { remote, repository } = setup();

      await repository.sendMessage('How am I doing?');

      expect(remote.chat).toHaveBeenCalledWith({
        message: 'How am I doing?',
        conversationHistory: undefined,
        includePortfolioContext: true,
      });
    });

    it('passes the history through', async () => {
      const { remote, repository } = setup();
      const history = [{ role: 'user', content: 'Hi' }] as const;

      await repository.sendMessage('And now?', { history, includePortfolioContext: false });

      expect(remote.chat).toHaveBeenCalledWith({
        message: 'And now?',
        conversationHistory: history,
        includePortfolioContext: false,
      });
    });
  });

  describe('clearInsightsCache', () => {
    it('keeps explanations', async () => {
      const { remote, repository } = setup();
      await repository.fetchInsights();
      await repository.fetchStockExplanation('AAPL');

      repository.clearInsightsCache();
      await repository.fetchInsights();
      await repository.fetchStockExplanation('AAPL');

      expect(remote.getInsights).toHaveBeenCalledTimes(2);
      expect(remote.getStockExplanation).toHaveBeenCalledTimes(1);
    });
  });
});
