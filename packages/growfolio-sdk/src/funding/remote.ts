import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import {
  fundingBalanceSchema,
  fxRateSchema,
  paginatedSchema,
  transferSchema,
} from '../models/index.js';
import type { FundingRemote } from './types.js';

/**
 * Funding data source over the REST API.
 */
export const createFundingRemote = (api: ApiClient): FundingRemote => ({
  getBalance: () =>
    api.request({ method: 'GET', path: ENDPOINTS.fundingBalance, schema: fundingBalanceSchema }),

  getFxRate: () => api.request({ method: 'GET', path: ENDPOINTS.fundingFxRate, schema: fxRateSchema }),

  initiateDeposit: (request) =>
    api.request({ method: 'POST', path: ENDPOINTS.fundingDeposit, body: request, schema: transferSchema }),

  confirmDeposit: (transferId, fxRate) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.fundingDepositConfirm,
      body: { transferId, fxRate },
      schema: transferSchema,
    }),

  initiateWithdrawal: (request) =>
    api.request({ method: 'POST', path: ENDPOINTS.fundingWithdraw, body: request, schema: transferSchema }),

  confirmWithdrawal: (transferId, fxRate) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.fundingWithdrawConfirm,
      body: { transferId, fxRate },
      schema: transferSchema,
    }),

  getTransfer: (id) =>
    api.request({ method: 'GET', path: ENDPOINTS.fundingTransfer(id), schema: transferSchema }),

  cancelTransfer: (id) =>
    api.request({ method: 'POST', path: ENDPOINTS.fundingTransferCancel(id), schema: transferSchema }),

  getTransferHistory: (page, limit, portfolioId) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.fundingHistory,
      query: { page, limit, portfolio_id: portfolioId },
      schema: paginatedSchema(transferSchema),
    }),
});
