import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { User, UserPreferences, UserPreferencesUpdate } from '../models/index.js';
import type { UserRemote, UserRepository } from './types.js';

export interface UserRepositoryDeps {
  readonly remote: UserRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const ME = 'me';

/**
 * Creates the user repository: the signed-in profile and its preferences.
 */
export const createUserRepository = (deps: UserRepositoryDeps): UserRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'user' });

  const profile = createResourceCache<User>({
    name: 'user.profile',
    freshForMs: FRESHNESS.user,
    logger: log,
    now,
  });
  const preferences = createResourceCache<UserPreferences>({
    name: 'user.preferences',
    freshForMs: FRESHNESS.preferences,
    logger: log,
    now,
  });

  rules.register('user.profile', { clear: () => profile.invalidate(), remove: () => profile.invalidate() });
  rules.register('user.preferences', {
    clear: () => preferences.invalidate(),
    remove: () => preferences.invalidate(),
  });

  const updateProfile = async (displayName: string): Promise<Result<User, RepositoryError>> => {
    const result = await remote.updateUser({ displayName });
    if (result.isOk()) {
      profile.put(ME, result.value);
      rules.apply('user.profileUpdate', { id: result.value.id });
    }
    return result;
  };

  const updatePreferences = async (
    update: UserPreferencesUpdate
  ): Promise<Result<UserPreferences, RepositoryError>> => {
    const result = await remote.updatePreferences(update);
    if (result.isOk()) {
      preferences.put(ME, result.value);
      rules.apply('user.preferencesUpdate');
    }
    return result;
  };

  const deleteAccount = async (): Promise<Result<void, RepositoryError>> => {
    const result = await remote.deleteUser();
    if (result.isOk()) {
      rules.apply('user.deleteAccount');
      log.info('account deleted');
    }
    return result;
  };

  return {
    fetchCurrentUser: (options) => profile.load(ME, () => remote.getCurrentUser(), options),
    updateProfile,
    fetchPreferences: (options) => preferences.load(ME, () => remote.getPreferences(), options),
    updatePreferences,
    registerDeviceToken: async (token, platform = 'web') => {
      const result = await remote.registerDevice(token, platform);
      if (result.isOk()) {
        rules.apply('user.deviceRegister');
      }
      return result;
    },
    deleteAccount,
    invalidateCache: () => {
      profile.invalidate();
      preferences.invalidate();
    },
  };
};
