import { z } from 'zod';
import { timestampSchema } from './common.js';

export const portfolioSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  type: z.string().default('personal'),
  currencyCode: z.string().default('USD'),
  totalValue: z.number(),
  totalCostBasis: z.number(),
  cashBalance: z.number().default(0),
  isDefault: z.boolean().default(false),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

export type Portfolio = z.infer<typeof portfolioSchema>;

export interface PortfolioInput {
  readonly name: string;
  readonly description?: string | undefined;
  readonly type?: string | undefined;
  readonly currencyCode?: string | undefined;
}

export const assetTypeSchema = z.enum(['stock', 'etf', 'mutualFund', 'bond', 'reit', 'crypto', 'other']);

export type AssetType = z.infer<typeof assetTypeSchema>;

export const holdingSchema = z.object({
  id: z.string(),
  portfolioId: z.string(),
  stockSymbol: z.string(),
  stockName: z.string().nullish(),
  quantity: z.number(),
  averageCostPerShare: z.number(),
  currentPricePerShare: z.number(),
  sector: z.string().nullish(),
  industry: z.string().nullish(),
  assetType: assetTypeSchema.default('stock'),
  updatedAt: timestampSchema.optional(),
});

export type Holding = z.infer<typeof holdingSchema>;

export interface HoldingInput {
  readonly stockSymbol: string;
  readonly quantity: number;
  readonly averageCostPerShare: number;
}

export const holdingMarketValue = (holding: Holding): number =>
  holding.quantity * holding.currentPricePerShare;

export const holdingCostBasis = (holding: Holding): number =>
  holding.quantity * holding.averageCostPerShare;

export const ledgerEntryTypeSchema = z.enum([
  'buy',
  'sell',
  'deposit',
  'withdrawal',
  'dividend',
  'interest',
  'fee',
  'transfer',
  'adjustment',
]);

export type LedgerEntryType = z.infer<typeof ledgerEntryTypeSchema>;

export const ledgerEntrySchema = z.object({
  id: z.string(),
  portfolioId: z.string(),
  type: ledgerEntryTypeSchema,
  stockSymbol: z.string().nullish(),
  quantity: z.number().nullish(),
  pricePerShare: z.number().nullish(),
  totalAmount: z.number(),
  fees: z.number().default(0),
  currencyCode: z.string().default('USD'),
  transactionDate: timestampSchema,
  notes: z.string().nullish(),
});

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;

export interface LedgerEntryInput {
  readonly type: LedgerEntryType;
  readonly totalAmount: number;
  readonly stockSymbol?: string | undefined;
  readonly quantity?: number | undefined;
  readonly pricePerShare?: number | undefined;
  readonly transactionDate?: string | undefined;
  readonly notes?: string | undefined;
}

export interface LedgerSummary {
  readonly totalTransactions: number;
  readonly totalBuys: number;
  readonly totalSells: number;
  readonly totalDeposits: number;
  readonly totalWithdrawals: number;
  readonly totalDividends: number;
  readonly totalFees: number;
  /** Signed sum of every entry's net amount */
  readonly netCashFlow: number;
}

export const performancePeriodSchema = z.enum(['1d', '1w', '1m', '3m', '6m', '1y', 'ytd', 'all']);

export type PerformancePeriod = z.infer<typeof performancePeriodSchema>;

export const DEFAULT_PERFORMANCE_PERIOD: PerformancePeriod = '1m';

export const performanceDataPointSchema = z.object({
  date: timestampSchema,
  value: z.number(),
  cumulativeReturn: z.number().nullish(),
});

export const portfolioPerformanceSchema = z.object({
  portfolioId: z.string(),
  period: performancePeriodSchema,
  startValue: z.number(),
  endValue: z.number(),
  absoluteReturn: z.number(),
  percentageReturn: z.number(),
  annualizedReturn: z.number().nullish(),
  benchmarkReturn: z.number().nullish(),
  alpha: z.number().nullish(),
  dataPoints: z.array(performanceDataPointSchema).default([]),
  calculatedAt: timestampSchema,
});

export type PortfolioPerformance = z.infer<typeof portfolioPerformanceSchema>;

export const costBasisSummarySchema = z.object({
  symbol: z.string(),
  totalShares: z.number(),
  totalCostUsd: z.number(),
  averageCostUsd: z.number(),
});

export type CostBasisSummary = z.infer<typeof costBasisSummarySchema>;

export type AllocationGrouping = 'sector' | 'industry' | 'assetType' | 'holding';

export interface AllocationItem {
  readonly category: string;
  readonly value: number;
  /** Share of total market value, 0 to 100 */
  readonly percentage: number;
}

export interface PortfolioAllocation {
  readonly portfolioId: string;
  readonly allocations: readonly AllocationItem[];
}

export interface PortfoliosSummary {
  readonly portfolioCount: number;
  readonly totalValue: number;
  readonly totalCostBasis: number;
  readonly totalCash: number;
  readonly totalReturn: number;
}

export interface HoldingsSummary {
  readonly holdingCount: number;
  readonly totalMarketValue: number;
  readonly totalCostBasis: number;
  readonly unrealizedGainLoss: number;
}
