import { z } from 'zod';
import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import {
  costBasisSummarySchema,
  holdingSchema,
  ledgerEntrySchema,
  paginatedSchema,
  portfolioPerformanceSchema,
  portfolioSchema,
} from '../models/index.js';
import type { LedgerEntryInput } from '../models/index.js';
import type { PortfolioRemote } from './types.js';

// The ledger endpoints name the transaction date `date`
const toLedgerBody = ({ transactionDate, ...rest }: Partial<LedgerEntryInput>) => ({
  ...rest,
  date: transactionDate,
});

/**
 * Portfolio, holding and ledger data source over the REST API.
 */
export const createPortfolioRemote = (api: ApiClient): PortfolioRemote => ({
  listPortfolios: () =>
    api.request({ method: 'GET', path: ENDPOINTS.portfolios, schema: z.array(portfolioSchema) }),

  getPortfolio: (id) => api.request({ method: 'GET', path: ENDPOINTS.portfolio(id), schema: portfolioSchema }),

  createPortfolio: (input) =>
    api.request({ method: 'POST', path: ENDPOINTS.portfolios, body: input, schema: portfolioSchema }),

  updatePortfolio: (id, update) =>
    api.request({ method: 'PATCH', path: ENDPOINTS.portfolio(id), body: update, schema: portfolioSchema }),

  deletePortfolio: (id) => api.send({ method: 'DELETE', path: ENDPOINTS.portfolio(id) }),

  listHoldings: (portfolioId) =>
    api.request({ method: 'GET', path: ENDPOINTS.holdings(portfolioId), schema: z.array(holdingSchema) }),

  addHolding: (portfolioId, input) =>
    api.request({ method: 'POST', path: ENDPOINTS.holdings(portfolioId), body: input, schema: holdingSchema }),

  updateHolding: (portfolioId, holdingId, update) =>
    api.request({
      method: 'PATCH',
      path: ENDPOINTS.holding(portfolioId, holdingId),
      body: update,
      schema: holdingSchema,
    }),

  removeHolding: (portfolioId, holdingId) =>
    api.send({ method: 'DELETE', path: ENDPOINTS.holding(portfolioId, holdingId) }),

  listLedgerEntries: (portfolioId, page, limit) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.ledger(portfolioId),
      query: { page, limit },
      schema: paginatedSchema(ledgerEntrySchema),
    }),

  createLedgerEntry: (portfolioId, input) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.ledger(portfolioId),
      body: toLedgerBody(input),
      schema: ledgerEntrySchema,
    }),

  updateLedgerEntry: (portfolioId, entryId, update) =>
    api.request({
      method: 'PATCH',
      path: ENDPOINTS.ledgerEntry(portfolioId, entryId),
      body: toLedgerBody(update),
      schema: ledgerEntrySchema,
    }),

  deleteLedgerEntry: (portfolioId, entryId) =>
    api.send({ method: 'DELETE', path: ENDPOINTS.ledgerEntry(portfolioId, entryId) }),

  getPerformance: (portfolioId, period) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.portfolioPerformance(portfolioId),
      query: { period },
      schema: portfolioPerformanceSchema,
    }),

  getCostBasis: (symbol) =>
    api.request({ method: 'GET', path: ENDPOINTS.costBasis(symbol), schema: costBasisSummarySchema }),
});
