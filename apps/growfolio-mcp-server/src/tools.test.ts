import { describe, it, expect, vi } from 'vitest';
import { createGrowfolioClient, createSilentLogger } from '@growfolio/sdk';
import { createToolHandlers } from './tools.js';
import type { ToolResponse } from './tools.js';

const TIMESTAMP = '2025-01-15T12:00:00.000Z';

const ROUTES: Readonly<Record<string, unknown>> = {
  'GET /v1/portfolios': [
    {
      id: 'portfolio-1',
      userId: 'user-123',
      name: 'Main',
      type: 'personal',
      currencyCode: 'USD',
      totalValue: 1000,
      totalCostBasis: 800,
      cashBalance: 100,
      isDefault: true,
      createdAt: TIMESTAMP,
      updatedAt: TIMESTAMP,
    },
  ],
  'GET /v1/portfolios/portfolio-1/holdings': [
    {
      id: 'holding-1',
      portfolioId: 'portfolio-1',
      stockSymbol: 'AAPL',
      stockName: 'Apple Inc.',
      quantity: 10,
      averageCostPerShare: 100,
      currentPricePerShare: 150,
      sector: 'Technology',
      assetType: 'stock',
    },
  ],
};

const routeKey = (input: string | URL | Request, init?: RequestInit): string => {
  const url = new URL(input instanceof Request ? input.url : input);
  return `${init?.method ?? 'GET'} ${url.pathname}`;
};

const setup = () => {
  const fetchStub = vi.fn<typeof fetch>((input, init) => {
    const body = ROUTES[routeKey(input, init)];
    return Promise.resolve(
      body === undefined
        ? new Response('{"message":"Not found"}', { status: 404 })
        : new Response(JSON.stringify(body), { status: 200 })
    );
  });
  const container = createGrowfolioClient({
    baseUrl: 'https://api.example.com',
    getAccessToken: () => 'test-token',
    fetch: fetchStub,
  });
  const handlers = createToolHandlers({ container, logger: createSilentLogger() });
  const callsTo = (key: string): number =>
    fetchStub.mock.calls.filter(([input, init]) => routeKey(input, init) === key).length;
  return { handlers, callsTo };
};

const parse = (response: ToolResponse): unknown => JSON.parse(response.content[0].text);

describe('createToolHandlers', () => {
  describe('get_holdings', () => {
    it('returns the holdings with their summary', async () => {
      const { handlers } = setup();

      const response = await handlers.getHoldings({ portfolioId: 'portfolio-1' });

      expect(response.isError).toBeUndefined();
      expect(parse(response)).toMatchObject({
        holdings: [{ id: 'holding-1', stockSymbol: 'AAPL' }],
        summary: { holdingCount: 1, totalMarketValue: 1500, totalCostBasis: 1000, unrealizedGainLoss: 500 },
      });
    });

    it('reports an unknown portfolio as an error response', async () => {
      const { handlers } = setup();

      const response = await handlers.getHoldings({ portfolioId: 'portfolio-404' });

      expect(response.isError).toBe(true);
      expect(parse(response)).toEqual({ error: 'NOT_FOUND', message: 'Not found' });
    });
  });

  describe('get_allocation', () => {
    it('uses the first portfolio when none is given', async () => {
      const { handlers, callsTo } = setup();

      const response = await handlers.getAllocation({});

      expect(response.isError).toBeUndefined();
      expect(callsTo('GET /v1/portfolios')).toBe(1);
      expect(callsTo('GET /v1/portfolios/portfolio-1/holdings')).toBe(1);
    });
  });

  describe('refresh_data', () => {
    it('makes the next read go to the network', async () => {
      const { handlers, callsTo } = setup();
      await handlers.listPortfolios();
      await handlers.listPortfolios();

      await handlers.refreshData();
      await handlers.listPortfolios();

      expect(callsTo('GET /v1/portfolios')).toBe(2);
    });
  });
});
