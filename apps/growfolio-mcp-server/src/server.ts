import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { Logger, RepositoryContainer } from '@growfolio/sdk';
import { createToolHandlers } from './tools.js';

export const SERVER_NAME = 'growfolio-mcp-server';
export const SERVER_VERSION = '0.1.0';

/**
 * Creates the MCP server with one tool per read over the repositories, plus
 * `refresh_data` to drop every cache.
 */
export function createServer(container: RepositoryContainer, logger: Logger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const tools = createToolHandlers({ container, logger });

  // -------------------------------------------------------------------------
  // Portfolios
  // -------------------------------------------------------------------------

  server.registerTool(
    'list_portfolios',
    {
      description: 'List portfolios with combined value, cost basis and cash.',
      inputSchema: {},
    },
    () => tools.listPortfolios()
  );

  server.registerTool(
    'get_holdings',
    {
      description: 'List the holdings of a portfolio with market value and unrealized gain.',
      inputSchema: {
        portfolioId: z.string().min(1).describe('Portfolio ID'),
      },
    },
    ({ portfolioId }) => tools.getHoldings({ portfolioId })
  );

  server.registerTool(
    'get_allocation',
    {
      description: 'Break a portfolio down by sector, industry, asset type or holding.',
      inputSchema: {
        portfolioId: z.string().optional().describe('Portfolio ID; the first portfolio when omitted'),
        groupBy: z.enum(['sector', 'industry', 'assetType', 'holding']).optional().describe('Defaults to sector'),
      },
    },
    ({ portfolioId, groupBy }) => tools.getAllocation({ portfolioId, groupBy })
  );

  // -------------------------------------------------------------------------
  // Goals, DCA and funding
  // -------------------------------------------------------------------------

  server.registerTool(
    'list_goals',
    {
      description: 'List savings goals with overall progress.',
      inputSchema: {
        includeArchived: z.boolean().optional().describe('Include archived goals'),
      },
    },
    ({ includeArchived }) => tools.listGoals({ includeArchived })
  );

  server.registerTool(
    'list_dca_schedules',
    {
      description: 'List dollar-cost averaging schedules with their monthly total.',
      inputSchema: {},
    },
    () => tools.listDcaSchedules()
  );

  server.registerTool(
    'get_funding_balance',
    {
      description: 'Get available and pending cash in USD and GBP.',
      inputSchema: {},
    },
    () => tools.getFundingBalance()
  );

  // -------------------------------------------------------------------------
  // Stocks and insights
  // -------------------------------------------------------------------------

  server.registerTool(
    'get_watchlist',
    {
      description: 'List watchlist symbols with their latest quotes.',
      inputSchema: {},
    },
    () => tools.getWatchlist()
  );

  server.registerTool(
    'explain_stock',
    {
      description: 'Plain-language explanation of a stock.',
      inputSchema: {
        symbol: z.string().min(1).describe('Ticker symbol, e.g. AAPL'),
      },
    },
    ({ symbol }) => tools.explainStock({ symbol })
  );

  server.registerTool(
    'get_insights',
    {
      description: 'Generated insights about the portfolio.',
      inputSchema: {
        includeGoals: z.boolean().optional().describe('Include goal progress in the insights'),
      },
    },
    ({ includeGoals }) => tools.getInsights({ includeGoals })
  );

  server.registerTool(
    'refresh_data',
    {
      description: 'Drop every cached response so the next call reads fresh data.',
      inputSchema: {},
    },
    () => tools.refreshData()
  );

  return server;
}
