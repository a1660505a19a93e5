import { z } from 'zod';
import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import {
  marketStatusSchema,
  orderSchema,
  stockHistorySchema,
  stockQuoteSchema,
  stockSchema,
  watchlistItemSchema,
} from '../models/index.js';
import type { StockRemote } from './types.js';

export const createStockRemote = (api: ApiClient): StockRemote => ({
  searchStocks: (query, limit) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.stockSearch,
      query: { q: query, limit },
      schema: z.array(stockSchema),
    }),

  getStock: (symbol) => api.request({ method: 'GET', path: ENDPOINTS.stock(symbol), schema: stockSchema }),

  getQuote: (symbol) =>
    api.request({ method: 'GET', path: ENDPOINTS.stockQuote(symbol), schema: stockQuoteSchema }),

  getHistory: (symbol, period) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.stockHistory(symbol),
      query: { period },
      schema: stockHistorySchema,
    }),

  getMarketStatus: () => api.request({ method: 'GET', path: ENDPOINTS.marketStatus, schema: marketStatusSchema }),

  // The orders endpoint takes snake_case fields
  submitBuyOrder: (symbol, notionalUsd) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.orders,
      body: { symbol, side: 'buy', type: 'market', time_in_force: 'day', notional: notionalUsd },
      schema: orderSchema,
    }),

  getWatchlist: () =>
    api.request({ method: 'GET', path: ENDPOINTS.watchlist, schema: z.array(watchlistItemSchema) }),

  addToWatchlist: (symbol) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.watchlistSymbols,
      body: { symbol },
      schema: watchlistItemSchema,
    }),

  removeFromWatchlist: (symbol) => api.send({ method: 'DELETE', path: ENDPOINTS.watchlistSymbol(symbol) }),
});
