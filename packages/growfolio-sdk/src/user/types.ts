import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type { User, UserPreferences, UserPreferencesUpdate } from '../models/index.js';

export type DevicePlatform = 'ios' | 'android' | 'web';

export interface UserRemote {
  readonly getCurrentUser: () => Promise<Result<User, RepositoryError>>;
  readonly updateUser: (update: { readonly displayName: string }) => Promise<Result<User, RepositoryError>>;
  readonly getPreferences: () => Promise<Result<UserPreferences, RepositoryError>>;
  readonly updatePreferences: (
    update: UserPreferencesUpdate
  ) => Promise<Result<UserPreferences, RepositoryError>>;
  readonly registerDevice: (token: string, platform: DevicePlatform) => Promise<Result<void, RepositoryError>>;
  readonly deleteUser: () => Promise<Result<void, RepositoryError>>;
}

export interface UserRepository {
  readonly fetchCurrentUser: (options?: LoadOptions) => Promise<Result<User, RepositoryError>>;
  readonly updateProfile: (displayName: string) => Promise<Result<User, RepositoryError>>;
  readonly fetchPreferences: (options?: LoadOptions) => Promise<Result<UserPreferences, RepositoryError>>;
  readonly updatePreferences: (
    update: UserPreferencesUpdate
  ) => Promise<Result<UserPreferences, RepositoryError>>;
  readonly registerDeviceToken: (
    token: string,
    platform?: DevicePlatform
  ) => Promise<Result<void, RepositoryError>>;
  readonly deleteAccount: () => Promise<Result<void, RepositoryError>>;
  readonly invalidateCache: () => void;
}
