export { createFamilyRepository } from './repository.js';
export type { FamilyRepositoryDeps } from './repository.js';
export { createFamilyRemote } from './remote.js';
export type { FamilyRemote, FamilyRepository } from './types.js';
