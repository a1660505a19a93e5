/**
 * Tool handlers over the Growfolio repositories.
 *
 * @packageDocumentation
 */

import { describeError, summarizeHoldings, summarizeSchedules } from '@growfolio/sdk';
import type { AllocationGrouping, Logger, RepositoryContainer, RepositoryError } from '@growfolio/sdk';
import type { Result } from 'neverthrow';

/**
 * MCP tool response.
 * Note: MCP SDK requires mutable arrays and index signature for compatibility.
 */
export interface ToolResponse {
  [x: string]: unknown;
  content: [{ type: 'text'; text: string }];
  isError?: true;
}

const textResponse = (value: unknown): ToolResponse => ({
  content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
});

/**
 * Formats a repository error as an MCP error response.
 */
export const errorResponse = (error: RepositoryError): ToolResponse => ({
  ...textResponse({ error: error.code, rule: error.rule, message: describeError(error) }),
  isError: true,
});

const respond = <T>(result: Result<T, RepositoryError>, render: (value: T) => unknown): ToolResponse =>
  result.isOk() ? textResponse(render(result.value)) : errorResponse(result.error);

export interface ToolHandlers {
  readonly listPortfolios: () => Promise<ToolResponse>;
  readonly getHoldings: (args: { readonly portfolioId: string }) => Promise<ToolResponse>;
  readonly getAllocation: (args: {
    readonly portfolioId?: string | undefined;
    readonly groupBy?: AllocationGrouping | undefined;
  }) => Promise<ToolResponse>;
  readonly listGoals: (args: { readonly includeArchived?: boolean | undefined }) => Promise<ToolResponse>;
  readonly listDcaSchedules: () => Promise<ToolResponse>;
  readonly getFundingBalance: () => Promise<ToolResponse>;
  readonly getWatchlist: () => Promise<ToolResponse>;
  readonly explainStock: (args: { readonly symbol: string }) => Promise<ToolResponse>;
  readonly getInsights: (args: { readonly includeGoals?: boolean | undefined }) => Promise<ToolResponse>;
  readonly refreshData: () => Promise<ToolResponse>;
}

export interface ToolHandlersDeps {
  readonly container: RepositoryContainer;
  readonly logger: Logger;
}

/**
 * Creates the handler behind each MCP tool. Repository errors become
 * `isError` responses; nothing is thrown.
 */
export const createToolHandlers = ({ container, logger }: ToolHandlersDeps): ToolHandlers => {
  const log = logger.child({ component: 'tools' });

  return {
    listPortfolios: async () => {
      log.debug({ tool: 'list_portfolios' }, 'tool called');
      const result = await container.portfolios.fetchPortfolios();
      return respond(result, (portfolios) => ({
        portfolios,
        summary: container.portfolios.selectPortfoliosSummary(),
      }));
    },

    getHoldings: async ({ portfolioId }) => {
      log.debug({ tool: 'get_holdings', portfolioId }, 'tool called');
      const result = await container.portfolios.fetchHoldings(portfolioId);
      return respond(result, (holdings) => ({ holdings, summary: summarizeHoldings(holdings) }));
    },

    getAllocation: async ({ portfolioId, groupBy = 'sector' }) => {
      log.debug({ tool: 'get_allocation', portfolioId, groupBy }, 'tool called');
      const result =
        portfolioId === undefined
          ? await container.portfolios.fetchCombinedAllocation(groupBy)
          : await container.portfolios.fetchAllocation(portfolioId, groupBy);
      return respond(result, (allocation) => allocation);
    },

    listGoals: async ({ includeArchived }) => {
      log.debug({ tool: 'list_goals', includeArchived }, 'tool called');
      const result = await container.goals.fetchGoals({ includeArchived });
      return respond(result, (goals) => ({ goals, summary: container.goals.selectGoalsSummary() }));
    },

    listDcaSchedules: async () => {
      log.debug({ tool: 'list_dca_schedules' }, 'tool called');
      const result = await container.dca.fetchSchedules();
      return respond(result, (schedules) => ({ schedules, summary: summarizeSchedules(schedules) }));
    },

    getFundingBalance: async () => {
      log.debug({ tool: 'get_funding_balance' }, 'tool called');
      return respond(await container.funding.fetchBalance(), (balance) => balance);
    },

    getWatchlist: async () => {
      log.debug({ tool: 'get_watchlist' }, 'tool called');
      return respond(await container.stocks.fetchWatchlistWithQuotes(), (entries) => entries);
    },

    explainStock: async ({ symbol }) => {
      log.debug({ tool: 'explain_stock', symbol }, 'tool called');
      return respond(await container.ai.fetchStockExplanation(symbol), (explanation) => explanation);
    },

    getInsights: async ({ includeGoals }) => {
      log.debug({ tool: 'get_insights', includeGoals }, 'tool called');
      return respond(await container.ai.fetchInsights({ includeGoals }), (insights) => insights);
    },

    refreshData: () => {
      container.clearAll();
      log.info({ tool: 'refresh_data' }, 'caches cleared');
      return Promise.resolve(textResponse({ message: 'Cached data cleared; the next read fetches fresh data.' }));
    },
  };
};
