import { describe, it, expect, vi } from 'vitest';
import { createFamilyRepository } from './repository.js';
import type { FamilyRemote, FamilyRepository } from './types.js';
import { createInvalidationRules } from '../invalidation/rules.js';
import { createNotFoundError, createRepositoryError } from '../errors/errors.js';
import { createSilentLogger } from '../logging/logger.js';
import { createFakeTimer, errAsync, okAsync } from '../test/mocks.js';
import { buildFamily, buildFamilyMember, buildInvite } from '../test/fixtures.js';
import type { Family } from '../models/index.js';

const setup = (overrides: Partial<FamilyRemote> = {}) => {
  const timer = createFakeTimer();
  const logger = createSilentLogger();
  const rules = createInvalidationRules({ logger });
  const remote = {
    getFamily: vi.fn(() => okAsync(buildFamily())),
    createFamily: vi.fn(() => okAsync(buildFamily({ id: 'family-new', name: 'New' }))),
    updateFamily: vi.fn(() => okAsync(buildFamily({ name: 'Renamed' }))),
    deleteFamily: vi.fn(() => okAsync(undefined)),
    inviteMember: vi.fn(() => okAsync(buildInvite())),
    resendInvite: vi.fn(() => okAsync(buildInvite())),
    cancelInvite: vi.fn(() => okAsync(undefined)),
    listPendingInvites: vi.fn(() => okAsync([buildInvite()])),
    listReceivedInvites: vi.fn(() => okAsync([buildInvite({ id: 'invite-2' })])),
    acceptInvite: vi.fn(() => okAsync(buildFamily())),
    declineInvite: vi.fn(() => okAsync(undefined)),
    updateMember: vi.fn(() => okAsync(buildFamilyMember({ role: 'viewer' }))),
    removeMember: vi.fn(() => okAsync(undefined)),
    leaveFamily: vi.fn(() => okAsync(undefined)),
    listFamilyGoals: vi.fn(() => okAsync([])),
    listFamilyAccounts: vi.fn(() => okAsync([])),
    createFamilyAccount: vi.fn(() =>
      okAsync({ id: 'account-1', name: 'Junior', relationship: 'child' })
    ),
    ...overrides,
  };
  const repository = createFamilyRepository({ remote, rules, logger, now: timer.now });
  return { timer, remote, repository };
};

describe('createFamilyRepository', () => {
  describe('fetchFamily', () => {
    describe('given the user has no family', () => {
      it('returns null and caches it', async () => {
        const { remote, repository } = setup({
          getFamily: vi.fn(() => errAsync<Family>(createNotFoundError('No family'))),
        });

        const first = await repository.fetchFamily();
        const second = await repository.fetchFamily();

        expect(first.isOk() && first.value).toBeNull();
        expect(second.isOk() && second.value).toBeNull();
        expect(remote.getFamily).toHaveBeenCalledTimes(1);
      });
    });

    describe('given any other error', () => {
      it('surfaces it', async () => {
        const { repository } = setup({
          getFamily: vi.fn(() => errAsync<Family>(createRepositoryError('FORBIDDEN'))),
        });

        const result = await repository.fetchFamily();

        expect(result.isErr() && result.error.code).toBe('FORBIDDEN');
      });
    });

    it('stays fresh for two minutes', async () => {
      const { remote, repository, timer } = setup();
      await repository.fetchFamily();

      timer.advance(120_000);
      await repository.fetchFamily();
      timer.advance(1);
      await repository.fetchFamily();

      expect(remote.getFamily).toHaveBeenCalledTimes(2);
    });
  });

  describe('createFamily', () => {
    it('stores the created family without a refetch', async () => {
      const { remote, repository } = setup({
        getFamily: vi.fn(() => errAsync<Family>(createNotFoundError('No family'))),
      });
      await repository.fetchFamily();

      await repository.createFamily({ name: 'New' });
      const result = await repository.fetchFamily();

      expect(result.isOk() && result.value?.id).toBe('family-new');
      expect(remote.getFamily).toHaveBeenCalledTimes(1);
    });
  });

  describe.each<[string, (r: FamilyRepository) => Promise<unknown>]>([
    ['updateMemberRole', (r) => r.updateMemberRole('member-1', 'viewer')],
    ['updateMemberPrivacy', (r) => r.updateMemberPrivacy('member-1', { shareGoals: false })],
    ['removeMember', (r) => r.removeMember('member-1')],
    ['leaveFamily', (r) => r.leaveFamily()],
  ])('given %s succeeds', (_name, mutation) => {
    it('refetches the family but keeps both invite lists', async () => {
      const { remote, repository } = setup();
      await repository.fetchFamily();
      await repository.fetchPendingInvites();
      await repository.fetchReceivedInvites();

      await mutation(repository);
      await repository.fetchFamily();
      await repository.fetchPendingInvites();
      await repository.fetchReceivedInvites();

      expect(remote.getFamily).toHaveBeenCalledTimes(2);
      expect(remote.listPendingInvites).toHaveBeenCalledTimes(1);
      expect(remote.listReceivedInvites).toHaveBeenCalledTimes(1);
    });
  });

  describe('inviteMember', () => {
    it('refetches the family and the pending invites', async () => {
      const { remote, repository } = setup();
      await repository.fetchFamily();
      await repository.fetchPendingInvites();

      await repository.inviteMember({ email: 'sam@example.com', role: 'member' });
      await repository.fetchFamily();
      await repository.fetchPendingInvites();

      expect(remote.getFamily).toHaveBeenCalledTimes(2);
      expect(remote.listPendingInvites).toHaveBeenCalledTimes(2);
    });
  });

  describe('declineInvite', () => {
    it('refetches the received invites only', async () => {
      const { remote, repository } = setup();
      await repository.fetchPendingInvites();
      await repository.fetchReceivedInvites();

      await repository.declineInvite('invite-2');
      await repository.fetchPendingInvites();
      await repository.fetchReceivedInvites();

      expect(remote.listPendingInvites).toHaveBeenCalledTimes(1);
      expect(remote.listReceivedInvites).toHaveBeenCalledTimes(2);
    });
  });

  describe('updateMemberRole', () => {
    it('sends the role only', async () => {
      const { remote, repository } = setup();

      const result = await repository.updateMemberRole('member-1', 'viewer');

      expect(remote.updateMember).toHaveBeenCalledWith('member-1', { role: 'viewer' });
      expect(result.isOk() && result.value.role).toBe('viewer');
    });
  });

  describe('createFamilyAccount', () => {
    it('appends the account to the cached list', async () => {
      const { remote, repository } = setup();
      await repository.fetchFamilyAccounts();

      await repository.createFamilyAccount({ name: 'Junior', relationship: 'child' });
      const accounts = await repository.fetchFamilyAccounts();

      expect(accounts.isOk() && accounts.value.map((a) => a.id)).toEqual(['account-1']);
      expect(remote.listFamilyAccounts).toHaveBeenCalledTimes(1);
    });
  });
});
