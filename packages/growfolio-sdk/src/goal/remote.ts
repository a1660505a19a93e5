import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import { MAX_PAGE_SIZE, goalSchema, paginatedSchema } from '../models/index.js';
import type { GoalRemote } from './types.js';

export const createGoalRemote = (api: ApiClient): GoalRemote => ({
  listGoals: async () => {
    const page = await api.request({
      method: 'GET',
      path: ENDPOINTS.goals,
      query: { page: 1, limit: MAX_PAGE_SIZE },
      schema: paginatedSchema(goalSchema),
    });
    return page.map((p) => p.data);
  },

  getGoal: (id) => api.request({ method: 'GET', path: ENDPOINTS.goal(id), schema: goalSchema }),

  createGoal: (input) =>
    api.request({ method: 'POST', path: ENDPOINTS.goals, body: input, schema: goalSchema }),

  updateGoal: (id, update) =>
    api.request({ method: 'PATCH', path: ENDPOINTS.goal(id), body: update, schema: goalSchema }),

  deleteGoal: (id) => api.send({ method: 'DELETE', path: ENDPOINTS.goal(id) }),
});
