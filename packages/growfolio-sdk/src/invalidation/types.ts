/**
 * Caches that mutation rules can reach, named `<domain>.<cache>`.
 */
export type CacheTarget =
  | 'portfolio.list'
  | 'portfolio.holdings'
  | 'portfolio.ledger'
  | 'goal.items'
  | 'dca.schedules'
  | 'family.family'
  | 'family.pendingInvites'
  | 'family.receivedInvites'
  | 'family.goals'
  | 'family.accounts'
  | 'funding.balance'
  | 'stock.watchlistQuotes'
  | 'user.profile'
  | 'user.preferences'
  | 'ai.insights'
  | 'ai.goalInsights';

/**
 * Every mutating repository operation.
 */
export type MutationKind =
  | 'portfolio.create'
  | 'portfolio.update'
  | 'portfolio.delete'
  | 'holding.add'
  | 'holding.update'
  | 'holding.remove'
  | 'ledger.add'
  | 'ledger.update'
  | 'ledger.delete'
  | 'cash.deposit'
  | 'cash.withdraw'
  | 'cash.transfer'
  | 'goal.create'
  | 'goal.update'
  | 'goal.archive'
  | 'goal.unarchive'
  | 'goal.delete'
  | 'dca.create'
  | 'dca.update'
  | 'dca.pause'
  | 'dca.resume'
  | 'dca.delete'
  | 'family.create'
  | 'family.update'
  | 'family.delete'
  | 'family.leave'
  | 'family.invite'
  | 'family.inviteResend'
  | 'family.inviteCancel'
  | 'family.inviteAccept'
  | 'family.inviteDecline'
  | 'family.memberRole'
  | 'family.memberPrivacy'
  | 'family.memberRemove'
  | 'family.accountCreate'
  | 'funding.deposit'
  | 'funding.depositConfirm'
  | 'funding.withdrawal'
  | 'funding.withdrawalConfirm'
  | 'funding.transferCancel'
  | 'order.buy'
  | 'watchlist.add'
  | 'watchlist.remove'
  | 'user.profileUpdate'
  | 'user.preferencesUpdate'
  | 'user.deleteAccount'
  | 'user.deviceRegister';

/**
 * Identifiers of the mutated resource, used to derive keys.
 */
export interface InvalidationContext {
  readonly id?: string | undefined;
  readonly portfolioId?: string | undefined;
  readonly targetPortfolioId?: string | undefined;
  readonly goalId?: string | undefined;
  readonly symbol?: string | undefined;
}

/**
 * How an edge picks what to drop from its target.
 * - `singleton`: the target holds one value; clear it.
 * - `collection`: clear every key, used when the change is not locally knowable.
 * - `key`: remove the key named by a context field; a missing field removes nothing.
 */
export type KeyDerivation =
  | { readonly strategy: 'singleton' }
  | { readonly strategy: 'collection' }
  | { readonly strategy: 'key'; readonly from: keyof InvalidationContext };

export interface InvalidationEdge {
  readonly target: CacheTarget;
  readonly keys: KeyDerivation;
}

export type InvalidationTable = Readonly<Record<MutationKind, readonly InvalidationEdge[]>>;

/**
 * A repository's entry points for clearing one of its caches.
 */
export interface InvalidationHandle {
  readonly clear: () => void;
  readonly remove: (key: string) => void;
}

/**
 * Applies the invalidation table after successful mutations.
 */
export interface InvalidationRules {
  /**
   * Registers the handle for a target, replacing any earlier one.
   */
  readonly register: (target: CacheTarget, handle: InvalidationHandle) => void;

  /**
   * Applies every edge of `kind`. Idempotent; unregistered targets are skipped.
   * @returns The number of edges that reached a registered target
   */
  readonly apply: (kind: MutationKind, context?: InvalidationContext) => number;

  /** Clears every registered target. */
  readonly clearAll: () => void;
}
