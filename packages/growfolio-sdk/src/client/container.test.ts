import { describe, it, expect, vi } from 'vitest';
import { createGrowfolioClient } from './growfolio-client.js';
import { createFakeTimer } from '../test/mocks.js';
import {
  buildBalance,
  buildPortfolio,
  buildTransfer,
  buildUser,
  TEST_ACCESS_TOKEN,
  TEST_API_URL,
  TEST_TIMESTAMP,
} from '../test/fixtures.js';

const ROUTES: Readonly<Record<string, unknown>> = {
  'GET /v1/funding/balance': buildBalance(),
  'POST /v1/funding/deposit': buildTransfer(),
  'GET /v1/users/me': buildUser(),
  'GET /v1/portfolios': [buildPortfolio()],
  'POST /v1/orders': {
    id: 'order-1',
    symbol: 'AAPL',
    side: 'buy',
    type: 'market',
    status: 'accepted',
    notional: 250,
    submittedAt: TEST_TIMESTAMP,
  },
};

const routeKey = (input: string | URL | Request, init?: RequestInit): string => {
  const url = new URL(input instanceof Request ? input.url : input);
  return `${init?.method ?? 'GET'} ${url.pathname}`;
};

/**
 * Serves ROUTES as JSON; anything else is a 404.
 */
const createRoutingFetch = () =>
  vi.fn<typeof fetch>((input, init) => {
    const body = ROUTES[routeKey(input, init)];
    return Promise.resolve(
      body === undefined
        ? new Response('{"message":"Not found"}', { status: 404 })
        : new Response(JSON.stringify(body), { status: 200 })
    );
  });

const setup = () => {
  const fetchStub = createRoutingFetch();
  const timer = createFakeTimer();
  const client = createGrowfolioClient({
    baseUrl: TEST_API_URL,
    getAccessToken: () => TEST_ACCESS_TOKEN,
    fetch: fetchStub,
    now: timer.now,
  });
  const callsTo = (key: string): number =>
    fetchStub.mock.calls.filter(([input, init]) => routeKey(input, init) === key).length;
  return { client, fetchStub, callsTo };
};

describe('createGrowfolioClient', () => {
  describe('given an access token provider', () => {
    it('sends it as a bearer token', async () => {
      const { client, fetchStub } = setup();

      await client.user.fetchCurrentUser();

      const init = fetchStub.mock.calls[0]?.[1];
      expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
    });

    it('sends the platform header on every request', async () => {
      const { client, fetchStub } = setup();

      await client.user.fetchCurrentUser();
      await client.funding.fetchBalance();

      const platforms = fetchStub.mock.calls.map(([, init]) => new Headers(init?.headers).get('X-Platform'));
      expect(platforms).toEqual(['web', 'web']);
    });
  });

  describe('given a deposit', () => {
    it('refetches the funding balance on the next read', async () => {
      const { client, callsTo } = setup();
      await client.funding.fetchBalance();

      const deposit = await client.funding.initiateDeposit(100);
      await client.funding.fetchBalance();

      expect(deposit.isOk()).toBe(true);
      expect(callsTo('GET /v1/funding/balance')).toBe(2);
    });
  });

  describe('given a buy order', () => {
    it('drops caches owned by other repositories', async () => {
      const { client, callsTo } = setup();
      await client.funding.fetchBalance();
      await client.portfolios.fetchPortfolios();

      const order = await client.stocks.submitBuyOrder('aapl', 250);
      await client.funding.fetchBalance();
      await client.portfolios.fetchPortfolios();

      expect(order.isOk()).toBe(true);
      expect(callsTo('GET /v1/funding/balance')).toBe(2);
      expect(callsTo('GET /v1/portfolios')).toBe(2);
    });
  });

  describe('signOut', () => {
    it('clears every repository', async () => {
      const { client, callsTo } = setup();
      await client.user.fetchCurrentUser();
      await client.portfolios.fetchPortfolios();

      client.signOut();
      await client.user.fetchCurrentUser();
      await client.portfolios.fetchPortfolios();

      expect(callsTo('GET /v1/users/me')).toBe(2);
      expect(callsTo('GET /v1/portfolios')).toBe(2);
    });
  });

  describe('given an unknown resource', () => {
    it('surfaces NOT_FOUND', async () => {
      const { client } = setup();

      const result = await client.goals.fetchGoal('goal-404');

      expect(result.isErr() && result.error.code).toBe('NOT_FOUND');
    });
  });
});
