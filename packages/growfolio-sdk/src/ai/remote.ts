import { z } from 'zod';
import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import {
  allocationSuggestionSchema,
  chatReplySchema,
  insightsResponseSchema,
  investingTipSchema,
  stockExplanationSchema,
} from '../models/index.js';
import type { AIRemote } from './types.js';

const tipsResponseSchema = z.object({ tips: z.array(investingTipSchema) });

export const createAIRemote = (api: ApiClient): AIRemote => ({
  chat: (request) =>
    api.request({ method: 'POST', path: ENDPOINTS.aiChat, body: request, schema: chatReplySchema }),

  getInsights: (includeGoals) =>
    api.request({
      method: 'GET',
      path: ENDPOINTS.aiInsights,
      query: { includeGoals },
      schema: insightsResponseSchema,
    }),

  getGoalInsights: (goalId) =>
    api.request({ method: 'GET', path: ENDPOINTS.goalInsights(goalId), schema: insightsResponseSchema }),

  getStockExplanation: (symbol) =>
    api.request({ method: 'GET', path: ENDPOINTS.aiExplain(symbol), schema: stockExplanationSchema }),

  suggestAllocation: (request) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.aiSuggestAllocation,
      body: request,
      schema: allocationSuggestionSchema,
    }),

  getInvestingTips: async () => {
    const response = await api.request({ method: 'GET', path: ENDPOINTS.aiTips, schema: tipsResponseSchema });
    return response.map((body) => body.tips);
  },
});
