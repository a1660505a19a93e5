import { holdingCostBasis, holdingMarketValue } from '../models/index.js';
import type {
  AllocationGrouping,
  AllocationItem,
  AssetType,
  Holding,
  HoldingsSummary,
  Portfolio,
  PortfoliosSummary,
} from '../models/index.js';

const UNKNOWN = 'Unknown';

const ASSET_TYPE_LABELS: Readonly<Record<AssetType, string>> = {
  stock: 'Stock',
  etf: 'ETF',
  mutualFund: 'Mutual Fund',
  bond: 'Bond',
  reit: 'REIT',
  crypto: 'Crypto',
  other: 'Other',
};

const categoryOf = (holding: Holding, groupBy: AllocationGrouping): string => {
  switch (groupBy) {
    case 'sector':
      return holding.sector ?? UNKNOWN;
    case 'industry':
      return holding.industry ?? UNKNOWN;
    case 'assetType':
      return ASSET_TYPE_LABELS[holding.assetType];
    case 'holding':
      return holding.stockName ?? holding.stockSymbol;
  }
};

/**
 * Groups holdings by `groupBy` and weighs each group by market value,
 * largest first. Percentages are 0 when the total value is 0.
 *
 * Grouping by holding keeps one item per holding, even when two share a name.
 */
export const computeAllocation = (
  holdings: readonly Holding[],
  groupBy: AllocationGrouping
): AllocationItem[] => {
  const totalValue = holdings.reduce((sum, holding) => sum + holdingMarketValue(holding), 0);
  const percentOf = (value: number): number => (totalValue > 0 ? (value / totalValue) * 100 : 0);

  const groups: Array<{ category: string; value: number }> = [];
  if (groupBy === 'holding') {
    for (const holding of holdings) {
      groups.push({ category: categoryOf(holding, groupBy), value: holdingMarketValue(holding) });
    }
  } else {
    const byCategory = new Map<string, number>();
    for (const holding of holdings) {
      const category = categoryOf(holding, groupBy);
      byCategory.set(category, (byCategory.get(category) ?? 0) + holdingMarketValue(holding));
    }
    for (const [category, value] of byCategory) {
      groups.push({ category, value });
    }
  }

  return groups
    .map(({ category, value }) => ({ category, value, percentage: percentOf(value) }))
    .sort((a, b) => b.percentage - a.percentage);
};

export const summarizeHoldings = (holdings: readonly Holding[]): HoldingsSummary => {
  const totalMarketValue = holdings.reduce((sum, holding) => sum + holdingMarketValue(holding), 0);
  const totalCostBasis = holdings.reduce((sum, holding) => sum + holdingCostBasis(holding), 0);
  return {
    holdingCount: holdings.length,
    totalMarketValue,
    totalCostBasis,
    unrealizedGainLoss: totalMarketValue - totalCostBasis,
  };
};

export const summarizePortfolios = (portfolios: readonly Portfolio[]): PortfoliosSummary => {
  const totalValue = portfolios.reduce((sum, portfolio) => sum + portfolio.totalValue, 0);
  const totalCostBasis = portfolios.reduce((sum, portfolio) => sum + portfolio.totalCostBasis, 0);
  return {
    portfolioCount: portfolios.length,
    totalValue,
    totalCostBasis,
    totalCash: portfolios.reduce((sum, portfolio) => sum + portfolio.cashBalance, 0),
    totalReturn: totalValue - totalCostBasis,
  };
};
