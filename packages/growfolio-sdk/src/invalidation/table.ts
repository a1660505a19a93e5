import type { CacheTarget, InvalidationContext, InvalidationEdge, InvalidationTable } from './types.js';

const singleton = (target: CacheTarget): InvalidationEdge => ({
  target,
  keys: { strategy: 'singleton' },
});

const collection = (target: CacheTarget): InvalidationEdge => ({
  target,
  keys: { strategy: 'collection' },
});

const keyed = (target: CacheTarget, from: keyof InvalidationContext): InvalidationEdge => ({
  target,
  keys: { strategy: 'key', from },
});

/** Holdings, ledger and totals of the mutated portfolio */
const portfolioScoped: readonly InvalidationEdge[] = [
  keyed('portfolio.holdings', 'portfolioId'),
  keyed('portfolio.ledger', 'portfolioId'),
  collection('portfolio.list'),
];

const familyMembership: readonly InvalidationEdge[] = [
  singleton('family.family'),
  collection('family.goals'),
];

const goalScoped: readonly InvalidationEdge[] = [
  keyed('goal.items', 'goalId'),
  keyed('ai.goalInsights', 'goalId'),
];

/**
 * Caches dropped after each successful mutation, beyond the merge the
 * mutating repository performs on its own collection.
 */
export const INVALIDATION_TABLE: InvalidationTable = {
  'portfolio.create': [],
  'portfolio.update': [],
  'portfolio.delete': [keyed('portfolio.holdings', 'portfolioId'), keyed('portfolio.ledger', 'portfolioId')],
  'holding.add': portfolioScoped,
  'holding.update': portfolioScoped,
  'holding.remove': portfolioScoped,
  'ledger.add': portfolioScoped,
  'ledger.update': portfolioScoped,
  'ledger.delete': portfolioScoped,
  'cash.deposit': portfolioScoped,
  'cash.withdraw': portfolioScoped,
  'cash.transfer': [
    ...portfolioScoped,
    keyed('portfolio.holdings', 'targetPortfolioId'),
    keyed('portfolio.ledger', 'targetPortfolioId'),
  ],

  'goal.create': [],
  'goal.update': goalScoped,
  'goal.archive': goalScoped,
  'goal.unarchive': goalScoped,
  'goal.delete': goalScoped,

  'dca.create': [collection('dca.schedules')],
  'dca.update': [collection('dca.schedules')],
  'dca.pause': [collection('dca.schedules')],
  'dca.resume': [collection('dca.schedules')],
  'dca.delete': [collection('dca.schedules')],

  'family.create': [collection('family.goals'), collection('family.accounts')],
  'family.update': [],
  'family.delete': [...familyMembership, collection('family.accounts')],
  'family.leave': [...familyMembership, collection('family.accounts')],
  'family.invite': [singleton('family.family'), singleton('family.pendingInvites')],
  'family.inviteResend': [singleton('family.family'), singleton('family.pendingInvites')],
  'family.inviteCancel': [singleton('family.family'), singleton('family.pendingInvites')],
  'family.inviteAccept': [...familyMembership, singleton('family.receivedInvites')],
  'family.inviteDecline': [singleton('family.family'), singleton('family.receivedInvites')],
  'family.memberRole': [singleton('family.family')],
  'family.memberPrivacy': familyMembership,
  'family.memberRemove': familyMembership,
  'family.accountCreate': [singleton('family.family')],

  'funding.deposit': [singleton('funding.balance')],
  'funding.depositConfirm': [singleton('funding.balance')],
  'funding.withdrawal': [singleton('funding.balance')],
  'funding.withdrawalConfirm': [singleton('funding.balance')],
  'funding.transferCancel': [singleton('funding.balance')],

  // Allocation after a fill is not locally knowable
  'order.buy': [
    collection('portfolio.holdings'),
    collection('portfolio.ledger'),
    collection('portfolio.list'),
    singleton('funding.balance'),
    collection('ai.insights'),
  ],
  'watchlist.add': [collection('stock.watchlistQuotes')],
  'watchlist.remove': [collection('stock.watchlistQuotes')],

  'user.profileUpdate': [],
  'user.preferencesUpdate': [singleton('user.profile')],
  'user.deleteAccount': [singleton('user.profile'), singleton('user.preferences')],
  'user.deviceRegister': [],
};
