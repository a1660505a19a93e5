import { z } from 'zod';
import { timestampSchema } from './common.js';

export const fundingBalanceSchema = z.object({
  id: z.string(),
  userId: z.string(),
  portfolioId: z.string(),
  availableUsd: z.number(),
  availableGbp: z.number(),
  pendingDepositsUsd: z.number().default(0),
  pendingDepositsGbp: z.number().default(0),
  pendingWithdrawalsUsd: z.number().default(0),
  pendingWithdrawalsGbp: z.number().default(0),
  updatedAt: timestampSchema,
});

export type FundingBalance = z.infer<typeof fundingBalanceSchema>;

export const fxRateSchema = z.object({
  fromCurrency: z.string(),
  toCurrency: z.string(),
  rate: z.number(),
  spread: z.number().default(0),
  timestamp: timestampSchema,
  expiresAt: timestampSchema,
});

export type FxRate = z.infer<typeof fxRateSchema>;

export const transferTypeSchema = z.enum(['deposit', 'withdrawal']);

export type TransferType = z.infer<typeof transferTypeSchema>;

export const transferStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed', 'cancelled']);

export type TransferStatus = z.infer<typeof transferStatusSchema>;

export const transferSchema = z.object({
  id: z.string(),
  userId: z.string(),
  portfolioId: z.string(),
  type: transferTypeSchema,
  status: transferStatusSchema,
  amount: z.number(),
  currency: z.string(),
  amountUsd: z.number().nullish(),
  fxRate: z.number().nullish(),
  fees: z.number().default(0),
  notes: z.string().nullish(),
  initiatedAt: timestampSchema,
  completedAt: timestampSchema.nullish(),
  failureReason: z.string().nullish(),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

export type Transfer = z.infer<typeof transferSchema>;

/** Pending and processing transfers can still be cancelled */
export const isTransferInProgress = (transfer: Transfer): boolean =>
  transfer.status === 'pending' || transfer.status === 'processing';

export const canCancelTransfer = isTransferInProgress;

export interface TransferSummary {
  /** Completed deposits */
  readonly totalDeposits: number;
  /** Completed withdrawals */
  readonly totalWithdrawals: number;
  readonly pendingDeposits: number;
  readonly pendingWithdrawals: number;
  readonly netTransfers: number;
}
