export { createUserRepository } from './repository.js';
export type { UserRepositoryDeps } from './repository.js';
export { createUserRemote } from './remote.js';
export type { DevicePlatform, UserRemote, UserRepository } from './types.js';
