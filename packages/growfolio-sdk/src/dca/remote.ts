import { z } from 'zod';
import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import { dcaScheduleSchema } from '../models/index.js';
import type { DCARemote } from './types.js';

export const createDCARemote = (api: ApiClient): DCARemote => ({
  listSchedules: () =>
    api.request({ method: 'GET', path: ENDPOINTS.dcaSchedules, schema: z.array(dcaScheduleSchema) }),

  getSchedule: (id) =>
    api.request({ method: 'GET', path: ENDPOINTS.dcaSchedule(id), schema: dcaScheduleSchema }),

  createSchedule: (input) =>
    api.request({
      method: 'POST',
      path: ENDPOINTS.dcaSchedules,
      body: { ...input, stockSymbol: input.stockSymbol.toUpperCase() },
      schema: dcaScheduleSchema,
    }),

  updateSchedule: (id, update) =>
    api.request({ method: 'PATCH', path: ENDPOINTS.dcaSchedule(id), body: update, schema: dcaScheduleSchema }),

  pauseSchedule: (id) =>
    api.request({ method: 'POST', path: ENDPOINTS.dcaPause(id), schema: dcaScheduleSchema }),

  resumeSchedule: (id) =>
    api.request({ method: 'POST', path: ENDPOINTS.dcaResume(id), schema: dcaScheduleSchema }),

  deleteSchedule: (id) => api.send({ method: 'DELETE', path: ENDPOINTS.dcaSchedule(id) }),
});
