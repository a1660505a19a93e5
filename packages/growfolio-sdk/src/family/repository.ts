import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules, MutationKind } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { upsertById } from '../repositories/collection.js';
import type { Family, FamilyAccount, FamilyGoal, FamilyInvite } from '../models/index.js';
import type { FamilyRemote, FamilyRepository } from './types.js';

export interface FamilyRepositoryDeps {
  readonly remote: FamilyRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const CURRENT = 'current';
const PENDING = 'pending';
const RECEIVED = 'received';
const ALL = 'all';

/**
 * Creates the family repository.
 */
export const createFamilyRepository = (deps: FamilyRepositoryDeps): FamilyRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'family' });

  const family = createResourceCache<Family | null>({
    name: 'family.family',
    freshForMs: FRESHNESS.family,
    logger: log,
    now,
  });
  const pendingInvites = createResourceCache<FamilyInvite[]>({
    name: 'family.pendingInvites',
    freshForMs: FRESHNESS.familyInvites,
    logger: log,
    now,
  });
  const receivedInvites = createResourceCache<FamilyInvite[]>({
    name: 'family.receivedInvites',
    freshForMs: FRESHNESS.familyInvites,
    logger: log,
    now,
  });
  const goals = createResourceCache<FamilyGoal[]>({
    name: 'family.goals',
    freshForMs: FRESHNESS.family,
    logger: log,
    now,
  });
  const accounts = createResourceCache<FamilyAccount[]>({
    name: 'family.accounts',
    freshForMs: FRESHNESS.family,
    logger: log,
    now,
  });

  for (const [target, cache] of [
    ['family.family', family],
    ['family.pendingInvites', pendingInvites],
    ['family.receivedInvites', receivedInvites],
    ['family.goals', goals],
    ['family.accounts', accounts],
  ] as const) {
    rules.register(target, { clear: () => cache.invalidate(), remove: () => cache.invalidate() });
  }

  /** Applies `kind` after a successful call; a failed call changes nothing. */
  const mutate = async <T>(
    kind: MutationKind,
    call: () => Promise<Result<T, RepositoryError>>,
    merge?: (value: T) => void
  ): Promise<Result<T, RepositoryError>> => {
    const result = await call();
    if (result.isOk()) {
      merge?.(result.value);
      rules.apply(kind);
      log.info({ mutation: kind }, 'family changed');
    }
    return result;
  };

  const fetchFamily = (options?: LoadOptions): Promise<Result<Family | null, RepositoryError>> =>
    family.load(
      CURRENT,
      async (): Promise<Result<Family | null, RepositoryError>> => {
        const result = await remote.getFamily();
        if (result.isErr()) {
          return result.error.code === 'NOT_FOUND' ? ok(null) : err(result.error);
        }
        return ok(result.value);
      },
      options
    );

  return {
    fetchFamily,
    createFamily: (input) =>
      mutate('family.create', () => remote.createFamily(input), (created) => family.put(CURRENT, created)),
    updateFamily: (id, update) =>
      mutate('family.update', () => remote.updateFamily(id, update), (updated) => family.put(CURRENT, updated)),
    deleteFamily: (id) => mutate('family.delete', () => remote.deleteFamily(id)),

    inviteMember: (input) => mutate('family.invite', () => remote.inviteMember(input)),
    resendInvite: (inviteId) => mutate('family.inviteResend', () => remote.resendInvite(inviteId)),
    cancelInvite: (inviteId) => mutate('family.inviteCancel', () => remote.cancelInvite(inviteId)),
    fetchPendingInvites: (options) => pendingInvites.load(PENDING, () => remote.listPendingInvites(), options),
    fetchReceivedInvites: (options) =>
      receivedInvites.load(RECEIVED, () => remote.listReceivedInvites(), options),
    acceptInvite: (inviteId) => mutate('family.inviteAccept', () => remote.acceptInvite(inviteId)),
    declineInvite: (inviteId) => mutate('family.inviteDecline', () => remote.declineInvite(inviteId)),

    updateMemberRole: (memberId, role) =>
      mutate('family.memberRole', () => remote.updateMember(memberId, { role })),
    updateMemberPrivacy: (memberId, privacy) =>
      mutate('family.memberPrivacy', () => remote.updateMember(memberId, privacy)),
    removeMember: (memberId) => mutate('family.memberRemove', () => remote.removeMember(memberId)),
    leaveFamily: () => mutate('family.leave', () => remote.leaveFamily()),

    fetchFamilyGoals: (options) => goals.load(ALL, () => remote.listFamilyGoals(), options),
    fetchFamilyAccounts: (options) => accounts.load(ALL, () => remote.listFamilyAccounts(), options),
    createFamilyAccount: (input) =>
      mutate(
        'family.accountCreate',
        () => remote.createFamilyAccount(input),
        (account) => accounts.update(ALL, (list) => upsertById(list, account))
      ),

    invalidateCache: () => {
      family.invalidate();
      pendingInvites.invalidate();
      receivedInvites.invalidate();
      goals.invalidate();
      accounts.invalidate();
    },
  };
};
