import { describe, it, expect, vi } from 'vitest';
import { createUserRepository } from './repository.js';
import type { UserRemote } from './types.js';
import { createInvalidationRules } from '../invalidation/rules.js';
import { createRepositoryError } from '../errors/errors.js';
import { createSilentLogger } from '../logging/logger.js';
import { createFakeTimer, errAsync, okAsync } from '../test/mocks.js';
import { buildPreferences, buildUser } from '../test/fixtures.js';
import type { User } from '../models/index.js';

const setup = (overrides: Partial<UserRemote> = {}) => {
  const timer = createFakeTimer();
  const logger = createSilentLogger();
  const rules = createInvalidationRules({ logger });
  const remote = {
    getCurrentUser: vi.fn(() => okAsync(buildUser())),
    updateUser: vi.fn((update: { readonly displayName: string }) =>
      okAsync(buildUser({ displayName: update.displayName }))
    ),
    getPreferences: vi.fn(() => okAsync(buildPreferences())),
    updatePreferences: vi.fn(() => okAsync(buildPreferences({ marketAlerts: true }))),
    registerDevice: vi.fn(() => okAsync(undefined)),
    deleteUser: vi.fn(() => okAsync(undefined)),
    ...overrides,
  };
  const repository = createUserRepository({ remote, rules, logger, now: timer.now });
  return { timer, remote, repository };
};

describe('createUserRepository', () => {
  describe('fetchCurrentUser', () => {
    it('caches the profile for five minutes', async () => {
      const { remote, repository, timer } = setup();

      await repository.fetchCurrentUser();
      timer.advance(300_000);
      await repository.fetchCurrentUser();
      timer.advance(1);
      await repository.fetchCurrentUser();

      expect(remote.getCurrentUser).toHaveBeenCalledTimes(2);
    });
  });

  describe('updateProfile', () => {
    it('stores the returned user so the next read makes no call', async () => {
      const { remote, repository } = setup();
      await repository.fetchCurrentUser();

      await repository.updateProfile('Sam');
      const result = await repository.fetchCurrentUser();

      expect(result.isOk() && result.value.displayName).toBe('Sam');
      expect(remote.getCurrentUser).toHaveBeenCalledTimes(1);
    });

    it('keeps the cached profile when the update fails', async () => {
      const { repository } = setup({
        updateUser: vi.fn(() => errAsync<User>(createRepositoryError('VALIDATION'))),
      });
      await repository.fetchCurrentUser();

      await repository.updateProfile('Sam');
      const result = await repository.fetchCurrentUser();

      expect(result.isOk() && result.value.displayName).toBe('Alex');
    });
  });

  describe('updatePreferences', () => {
    it('stores the preferences and drops the profile', async () => {
      const { remote, repository } = setup();
      await repository.fetchCurrentUser();

      await repository.updatePreferences({ marketAlerts: true });
      const preferences = await repository.fetchPreferences();
      await repository.fetchCurrentUser();

      expect(preferences.isOk() && preferences.value.marketAlerts).toBe(true);
      expect(remote.getPreferences).not.toHaveBeenCalled();
      expect(remote.getCurrentUser).toHaveBeenCalledTimes(2);
    });
  });

  describe('deleteAccount', () => {
    it('drops profile and preferences', async () => {
      const { remote, repository } = setup();
      await repository.fetchCurrentUser();
      await repository.fetchPreferences();

      await repository.deleteAccount();
      await repository.fetchCurrentUser();
      await repository.fetchPreferences();

      expect(remote.getCurrentUser).toHaveBeenCalledTimes(2);
      expect(remote.getPreferences).toHaveBeenCalledTimes(2);
    });
  });

  describe('registerDeviceToken', () => {
    it('defaults the platform to web', async () => {
      const { remote, repository } = setup();

      await repository.registerDeviceToken('device-token');

      expect(remote.registerDevice).toHaveBeenCalledWith('device-token', 'web');
    });
  });
});
