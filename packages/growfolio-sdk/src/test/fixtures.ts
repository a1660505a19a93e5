/**
 * Shared test fixtures and constants.
 * Builders return valid domain objects; pass overrides for the fields a test cares about.
 */

import type {
  DCASchedule,
  Family,
  FamilyInvite,
  FamilyMember,
  FundingBalance,
  FxRate,
  Goal,
  Holding,
  LedgerEntry,
  Portfolio,
  PortfolioPerformance,
  Stock,
  StockQuote,
  Transfer,
  User,
  UserPreferences,
  InsightsResponse,
  WatchlistItem,
} from '../models/index.js';

// ============================================================================
// Time Constants
// ============================================================================

/** One hour in milliseconds */
export const ONE_HOUR_MS = 60 * 60 * 1000;

/** One minute in milliseconds */
export const ONE_MINUTE_MS = 60 * 1000;

/** ISO timestamp used for every created/updated field */
export const TEST_TIMESTAMP = '2025-01-15T12:00:00.000Z';

// ============================================================================
// API Constants
// ============================================================================

export const TEST_API_URL = 'https://api.example.com';
export const TEST_ACCESS_TOKEN = 'test-token';
export const TEST_USER_ID = 'user-123';

// ============================================================================
// Portfolio Builders
// ============================================================================

export const buildPortfolio = (overrides: Partial<Portfolio> = {}): Portfolio => ({
  id: 'portfolio-1',
  userId: TEST_USER_ID,
  name: 'Main',
  type: 'personal',
  currencyCode: 'USD',
  totalValue: 1000,
  totalCostBasis: 800,
  cashBalance: 100,
  isDefault: false,
  createdAt: TEST_TIMESTAMP,
  updatedAt: TEST_TIMESTAMP,
  ...overrides,
});

export const buildHolding = (overrides: Partial<Holding> = {}): Holding => ({
  id: 'holding-1',
  portfolioId: 'portfolio-1',
  stockSymbol: 'AAPL',
  stockName: 'Apple Inc.',
  quantity: 10,
  averageCostPerShare: 100,
  currentPricePerShare: 150,
  sector: 'Technology',
  industry: 'Consumer Electronics',
  assetType: 'stock',
  ...overrides,
});

export const buildLedgerEntry = (overrides: Partial<LedgerEntry> = {}): LedgerEntry => ({
  id: 'entry-1',
  portfolioId: 'portfolio-1',
  type: 'deposit',
  totalAmount: 100,
  fees: 0,
  currencyCode: 'USD',
  transactionDate: TEST_TIMESTAMP,
  ...overrides,
});

// ============================================================================
// Goal and DCA Builders
// ============================================================================

export const buildGoal = (overrides: Partial<Goal> = {}): Goal => ({
  id: 'goal-1',
  userId: TEST_USER_ID,
  name: 'House deposit',
  targetAmount: 10000,
  currentAmount: 2500,
  category: 'house',
  isArchived: false,
  createdAt: TEST_TIMESTAMP,
  updatedAt: TEST_TIMESTAMP,
  ...overrides,
});

export const buildPerformance = (overrides: Partial<PortfolioPerformance> = {}): PortfolioPerformance => ({
  portfolioId: 'portfolio-1',
  period: '1m',
  startValue: 1000,
  endValue: 1100,
  absoluteReturn: 100,
  percentageReturn: 10,
  dataPoints: [],
  calculatedAt: TEST_TIMESTAMP,
  ...overrides,
});

export const buildSchedule = (overrides: Partial<DCASchedule> = {}): DCASchedule => ({
  id: 'schedule-1',
  userId: TEST_USER_ID,
  stockSymbol: 'VOO',
  amount: 100,
  frequency: 'monthly',
  startDate: '2025-01-01T00:00:00.000Z',
  nextExecutionDate: '2025-02-01T00:00:00.000Z',
  portfolioId: 'portfolio-1',
  isActive: true,
  isPaused: false,
  totalInvested: 0,
  executionCount: 0,
  createdAt: TEST_TIMESTAMP,
  updatedAt: TEST_TIMESTAMP,
  ...overrides,
});

// ============================================================================
// Family Builders
// ============================================================================

export const buildFamilyMember = (overrides: Partial<FamilyMember> = {}): FamilyMember => ({
  id: 'member-1',
  userId: TEST_USER_ID,
  name: 'Alex',
  email: 'alex@example.com',
  role: 'admin',
  status: 'active',
  shareGoals: true,
  sharePortfolioValue: false,
  ...overrides,
});

export const buildFamily = (overrides: Partial<Family> = {}): Family => ({
  id: 'family-1',
  name: 'The Testers',
  ownerId: TEST_USER_ID,
  adminIds: [TEST_USER_ID],
  members: [buildFamilyMember()],
  maxMembers: 10,
  allowSharedGoals: true,
  ...overrides,
});

export const buildInvite = (overrides: Partial<FamilyInvite> = {}): FamilyInvite => ({
  id: 'invite-1',
  familyId: 'family-1',
  inviteeEmail: 'sam@example.com',
  role: 'member',
  status: 'pending',
  expiresAt: '2025-01-22T12:00:00.000Z',
  ...overrides,
});

// ============================================================================
// Funding Builders
// ============================================================================

export const buildBalance = (overrides: Partial<FundingBalance> = {}): FundingBalance => ({
  id: 'balance-1',
  userId: TEST_USER_ID,
  portfolioId: 'portfolio-1',
  availableUsd: 625,
  availableGbp: 500,
  pendingDepositsUsd: 0,
  pendingDepositsGbp: 0,
  pendingWithdrawalsUsd: 0,
  pendingWithdrawalsGbp: 0,
  updatedAt: TEST_TIMESTAMP,
  ...overrides,
});

export const buildFxRate = (overrides: Partial<FxRate> = {}): FxRate => ({
  fromCurrency: 'GBP',
  toCurrency: 'USD',
  rate: 1.25,
  spread: 0,
  timestamp: TEST_TIMESTAMP,
  expiresAt: '2025-01-15T12:00:30.000Z',
  ...overrides,
});

export const buildTransfer = (overrides: Partial<Transfer> = {}): Transfer => ({
  id: 'transfer-1',
  userId: TEST_USER_ID,
  portfolioId: 'portfolio-1',
  type: 'deposit',
  status: 'pending',
  amount: 100,
  currency: 'GBP',
  fees: 0,
  initiatedAt: TEST_TIMESTAMP,
  createdAt: TEST_TIMESTAMP,
  updatedAt: TEST_TIMESTAMP,
  ...overrides,
});

// ============================================================================
// Stock Builders
// ============================================================================

export const buildStock = (overrides: Partial<Stock> = {}): Stock => ({
  symbol: 'AAPL',
  name: 'Apple Inc.',
  exchange: 'NASDAQ',
  sector: 'Technology',
  currencyCode: 'USD',
  ...overrides,
});

export const buildQuote = (overrides: Partial<StockQuote> = {}): StockQuote => ({
  symbol: 'AAPL',
  price: 150,
  change: 1.5,
  changePercent: 1,
  timestamp: TEST_TIMESTAMP,
  ...overrides,
});

export const buildWatchlistItem = (overrides: Partial<WatchlistItem> = {}): WatchlistItem => ({
  symbol: 'AAPL',
  dateAdded: TEST_TIMESTAMP,
  ...overrides,
});

// ============================================================================
// User and AI Builders
// ============================================================================

export const buildUser = (overrides: Partial<User> = {}): User => ({
  id: TEST_USER_ID,
  email: 'alex@example.com',
  displayName: 'Alex',
  preferredCurrency: 'USD',
  subscriptionTier: 'free',
  createdAt: TEST_TIMESTAMP,
  ...overrides,
});

export const buildPreferences = (overrides: Partial<UserPreferences> = {}): UserPreferences => ({
  preferredCurrency: 'USD',
  notificationsEnabled: true,
  dcaReminders: true,
  goalProgressAlerts: true,
  marketAlerts: false,
  weeklyDigest: true,
  ...overrides,
});

export const buildInsights = (overrides: Partial<InsightsResponse> = {}): InsightsResponse => ({
  insights: [
    {
      id: 'insight-1',
      type: 'diversification',
      title: 'Concentrated in technology',
      content: 'Most of your portfolio is in one sector.',
      priority: 'medium',
    },
  ],
  generatedAt: TEST_TIMESTAMP,
  ...overrides,
});
