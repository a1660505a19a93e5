import { z } from 'zod';
import type { ApiClient } from '../remote/api-client.js';
import { ENDPOINTS } from '../remote/endpoints.js';
import {
  familyAccountSchema,
  familyGoalSchema,
  familyInviteSchema,
  familyMemberSchema,
  familySchema,
} from '../models/index.js';
import type { FamilyRemote } from './types.js';

export const createFamilyRemote = (api: ApiClient): FamilyRemote => ({
  getFamily: () => api.request({ method: 'GET', path: ENDPOINTS.family, schema: familySchema }),

  createFamily: (input) =>
    api.request({ method: 'POST', path: ENDPOINTS.family, body: input, schema: familySchema }),

  updateFamily: (id, update) =>
    api.request({ method: 'PATCH', path: ENDPOINTS.familyById(id), body: update, schema: familySchema }),

  deleteFamily: (id) => api.send({ method: 'DELETE', path: ENDPOINTS.familyById(id) }),

  inviteMember: (input) =>
    api.request({ method: 'POST', path: ENDPOINTS.familyInvite, body: input, schema: familyInviteSchema }),

  resendInvite: (inviteId) =>
    api.request({ method: 'POST', path: ENDPOINTS.familyInviteResend(inviteId), schema: familyInviteSchema }),

  cancelInvite: (inviteId) => api.send({ method: 'DELETE', path: ENDPOINTS.familyInviteById(inviteId) }),

  listPendingInvites: () =>
    api.request({ method: 'GET', path: ENDPOINTS.familyInvites, schema: z.array(familyInviteSchema) }),

  listReceivedInvites: () =>
    api.request({ method: 'GET', path: ENDPOINTS.familyInvitesReceived, schema: z.array(familyInviteSchema) }),

  acceptInvite: (inviteId) =>
    api.request({ method: 'POST', path: ENDPOINTS.familyInviteAccept(inviteId), schema: familySchema }),

  declineInvite: (inviteId) => api.send({ method: 'POST', path: ENDPOINTS.familyInviteDecline(inviteId) }),

  updateMember: (memberId, update) =>
    api.request({
      method: 'PATCH',
      path: ENDPOINTS.familyMember(memberId),
      body: update,
      schema: familyMemberSchema,
    }),

  removeMember: (memberId) => api.send({ method: 'DELETE', path: ENDPOINTS.familyMember(memberId) }),

  leaveFamily: () => api.send({ method: 'POST', path: ENDPOINTS.familyLeave }),

  listFamilyGoals: () =>
    api.request({ method: 'GET', path: ENDPOINTS.familyGoals, schema: z.array(familyGoalSchema) }),

  listFamilyAccounts: () =>
    api.request({ method: 'GET', path: ENDPOINTS.familyAccounts, schema: z.array(familyAccountSchema) }),

  createFamilyAccount: (input) =>
    api.request({ method: 'POST', path: ENDPOINTS.familyAccounts, body: input, schema: familyAccountSchema }),
});
