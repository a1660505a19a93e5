export { createInvalidationRules } from './rules.js';
export type { InvalidationRulesOptions } from './rules.js';
export { INVALIDATION_TABLE } from './table.js';
export type {
  CacheTarget,
  MutationKind,
  InvalidationContext,
  KeyDerivation,
  InvalidationEdge,
  InvalidationTable,
  InvalidationHandle,
  InvalidationRules,
} from './types.js';
