import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import { userPreferencesSchema, userSchema } from '../models/index.js';
import type { UserRemote } from './types.js';

export const createUserRemote = (api: ApiClient): UserRemote => ({
  getCurrentUser: () => api.request({ method: 'GET', path: ENDPOINTS.currentUser, schema: userSchema }),

  updateUser: (update) =>
    api.request({ method: 'PATCH', path: ENDPOINTS.currentUser, body: update, schema: userSchema }),

  getPreferences: () =>
    api.request({ method: 'GET', path: ENDPOINTS.userPreferences, schema: userPreferencesSchema }),

  updatePreferences: (update) =>
    api.request({
      method: 'PUT',
      path: ENDPOINTS.userPreferences,
      body: update,
      schema: userPreferencesSchema,
    }),

  registerDevice: (token, platform) =>
    api.send({ method: 'POST', path: ENDPOINTS.devices, body: { deviceToken: token, platform } }),

  deleteUser: () => api.send({ method: 'DELETE', path: ENDPOINTS.currentUser }),
});
