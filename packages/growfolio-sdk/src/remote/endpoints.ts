const V1 = '/v1';

const seg = (value: string): string => encodeURIComponent(value);

/**
 * REST paths of the Growfolio API.
 */
export const ENDPOINTS = {
  portfolios: `${V1}/portfolios`,
  portfolio: (id: string) => `${V1}/portfolios/${seg(id)}`,
  holdings: (portfolioId: string) => `${V1}/portfolios/${seg(portfolioId)}/holdings`,
  holding: (portfolioId: string, holdingId: string) =>
    `${V1}/portfolios/${seg(portfolioId)}/holdings/${seg(holdingId)}`,
  ledger: (portfolioId: string) => `${V1}/portfolios/${seg(portfolioId)}/ledger`,
  ledgerEntry: (portfolioId: string, entryId: string) =>
    `${V1}/portfolios/${seg(portfolioId)}/ledger/${seg(entryId)}`,
  portfolioPerformance: (portfolioId: string) => `${V1}/portfolios/${seg(portfolioId)}/performance`,
  costBasis: (symbol: string) => `${V1}/ledger/cost-basis/${seg(symbol.toUpperCase())}`,

  goals: `${V1}/goals`,
  goal: (id: string) => `${V1}/goals/${seg(id)}`,
  goalInsights: (goalId: string) => `${V1}/goals/${seg(goalId)}/insights`,

  dcaSchedules: `${V1}/dca/schedules`,
  dcaSchedule: (id: string) => `${V1}/dca/schedules/${seg(id)}`,
  dcaPause: (id: string) => `${V1}/dca/schedules/${seg(id)}/pause`,
  dcaResume: (id: string) => `${V1}/dca/schedules/${seg(id)}/resume`,

  family: `${V1}/family`,
  familyById: (id: string) => `${V1}/family/${seg(id)}`,
  familyInvite: `${V1}/family/invite`,
  familyInvites: `${V1}/family/invites`,
  familyInvitesReceived: `${V1}/family/invites/received`,
  familyInviteById: (inviteId: string) => `${V1}/family/invites/${seg(inviteId)}`,
  familyInviteResend: (inviteId: string) => `${V1}/family/invites/${seg(inviteId)}/resend`,
  familyInviteAccept: (inviteId: string) => `${V1}/family/invites/${seg(inviteId)}/accept`,
  familyInviteDecline: (inviteId: string) => `${V1}/family/invites/${seg(inviteId)}/decline`,
  familyMember: (memberId: string) => `${V1}/family/members/${seg(memberId)}`,
  familyLeave: `${V1}/family/leave`,
  familyGoals: `${V1}/family/goals`,
  familyAccounts: `${V1}/family/accounts`,

  fundingBalance: `${V1}/funding/balance`,
  fundingFxRate: `${V1}/funding/fx-rate`,
  fundingDeposit: `${V1}/funding/deposit`,
  fundingDepositConfirm: `${V1}/funding/deposit/confirm`,
  fundingWithdraw: `${V1}/funding/withdraw`,
  fundingWithdrawConfirm: `${V1}/funding/withdraw/confirm`,
  fundingTransfer: (id: string) => `${V1}/funding/transfers/${seg(id)}`,
  fundingTransferCancel: (id: string) => `${V1}/funding/transfers/${seg(id)}/cancel`,
  fundingHistory: `${V1}/funding/history`,

  stockSearch: `${V1}/stocks/search`,
  stock: (symbol: string) => `${V1}/stocks/${seg(symbol)}`,
  stockQuote: (symbol: string) => `${V1}/stocks/${seg(symbol)}/quote`,
  stockHistory: (symbol: string) => `${V1}/stocks/${seg(symbol)}/history`,
  marketStatus: `${V1}/stocks/market/status`,
  orders: `${V1}/orders`,
  watchlist: `${V1}/watchlist`,
  watchlistSymbol: (symbol: string) => `${V1}/watchlist/symbols/${seg(symbol)}`,
  watchlistSymbols: `${V1}/watchlist/symbols`,

  currentUser: `${V1}/users/me`,
  userPreferences: `${V1}/users/me/preferences`,
  devices: `${V1}/devices`,

  aiChat: `${V1}/ai/chat`,
  aiInsights: `${V1}/ai/insights`,
  aiExplain: (symbol: string) => `${V1}/ai/explain/${seg(symbol.toUpperCase())}`,
  aiSuggestAllocation: `${V1}/ai/suggest-allocation`,
  aiTips: `${V1}/ai/tips`,
} as const;
