import { z } from 'zod';
import { timestampSchema } from './common.js';

export const stockSchema = z.object({
  symbol: z.string(),
  name: z.string(),
  exchange: z.string().nullish(),
  assetType: z.string().nullish(),
  currentPrice: z.number().nullish(),
  priceChange: z.number().nullish(),
  priceChangePercent: z.number().nullish(),
  sector: z.string().nullish(),
  industry: z.string().nullish(),
  currencyCode: z.string().default('USD'),
});

export type Stock = z.infer<typeof stockSchema>;

export const stockQuoteSchema = z.object({
  symbol: z.string(),
  price: z.number(),
  change: z.number(),
  changePercent: z.number(),
  volume: z.number().nullish(),
  timestamp: timestampSchema,
});

export type StockQuote = z.infer<typeof stockQuoteSchema>;

export const historyPeriodSchema = z.enum(['1D', '1W', '1M', '3M', '6M', '1Y', '5Y', 'ALL']);

export type HistoryPeriod = z.infer<typeof historyPeriodSchema>;

export const stockHistorySchema = z.object({
  symbol: z.string(),
  period: z.string(),
  dataPoints: z.array(
    z.object({
      date: timestampSchema,
      close: z.number(),
      volume: z.number().nullish(),
    })
  ),
});

export type StockHistory = z.infer<typeof stockHistorySchema>;

export const marketStatusSchema = z.object({
  isOpen: z.boolean(),
  session: z.enum(['pre', 'regular', 'post', 'closed']),
  nextOpen: timestampSchema.nullish(),
  nextClose: timestampSchema.nullish(),
});

export type MarketStatus = z.infer<typeof marketStatusSchema>;

export const orderSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  side: z.enum(['buy', 'sell']),
  type: z.string().default('market'),
  status: z.string(),
  notional: z.number().nullish(),
  submittedAt: timestampSchema,
});

export type Order = z.infer<typeof orderSchema>;

export const watchlistItemSchema = z.object({
  symbol: z.string(),
  dateAdded: timestampSchema,
});

export type WatchlistItem = z.infer<typeof watchlistItemSchema>;

export interface WatchlistEntry {
  readonly symbol: string;
  readonly dateAdded: string;
  readonly stock?: Stock | undefined;
  readonly quote?: StockQuote | undefined;
}
