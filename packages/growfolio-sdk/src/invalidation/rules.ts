import type { Logger } from 'pino';
import { INVALIDATION_TABLE } from './table.js';
import type {
  CacheTarget,
  InvalidationContext,
  InvalidationEdge,
  InvalidationHandle,
  InvalidationRules,
  InvalidationTable,
  MutationKind,
} from './types.js';

export interface InvalidationRulesOptions {
  readonly logger: Logger;
  /** Defaults to INVALIDATION_TABLE */
  readonly table?: InvalidationTable | undefined;
}

/**
 * Creates the table-driven invalidation registry.
 *
 * Each repository registers handles for the caches it owns; `apply` then
 * calls straight into the owning repository, so no cache storage is shared.
 *
 * @example
 * ```typescript
 * const rules = createInvalidationRules({ logger });
 * rules.register('funding.balance', { clear: () => balance.invalidate(), remove: () => balance.invalidate() });
 * rules.apply('funding.deposit'); // balance is refetched on next read
 * ```
 */
export const createInvalidationRules = (options: InvalidationRulesOptions): InvalidationRules => {
  const { logger } = options;
  const table = options.table ?? INVALIDATION_TABLE;
  const handles = new Map<CacheTarget, InvalidationHandle>();

  const register = (target: CacheTarget, handle: InvalidationHandle): void => {
    handles.set(target, handle);
  };

  const applyEdge = (
    edge: InvalidationEdge,
    handle: InvalidationHandle,
    context: InvalidationContext
  ): void => {
    switch (edge.keys.strategy) {
      case 'singleton':
      case 'collection':
        handle.clear();
        return;
      case 'key': {
        const key = context[edge.keys.from];
        if (key !== undefined) {
          handle.remove(key);
        }
        return;
      }
    }
  };

  const apply = (kind: MutationKind, context: InvalidationContext = {}): number => {
    let reached = 0;
    for (const edge of table[kind]) {
      const handle = handles.get(edge.target);
      if (handle === undefined) {
        continue;
      }
      applyEdge(edge, handle, context);
      reached += 1;
    }
    logger.debug({ mutation: kind, edges: reached }, 'invalidation applied');
    return reached;
  };

  const clearAll = (): void => {
    for (const handle of handles.values()) {
      handle.clear();
    }
  };

  return {
    register,
    apply,
    clearAll,
  };
};
