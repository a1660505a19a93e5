import { z } from 'zod';
import { timestampSchema } from './common.js';

export const dcaFrequencySchema = z.enum(['daily', 'weekly', 'biweekly', 'monthly', 'quarterly']);

export type DCAFrequency = z.infer<typeof dcaFrequencySchema>;

export const dcaScheduleSchema = z.object({
  id: z.string(),
  userId: z.string(),
  stockSymbol: z.string(),
  stockName: z.string().nullish(),
  amount: z.number(),
  frequency: dcaFrequencySchema,
  startDate: timestampSchema,
  endDate: timestampSchema.nullish(),
  nextExecutionDate: timestampSchema.nullish(),
  portfolioId: z.string(),
  isActive: z.boolean(),
  isPaused: z.boolean().default(false),
  totalInvested: z.number().default(0),
  executionCount: z.number().int().default(0),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

export type DCASchedule = z.infer<typeof dcaScheduleSchema>;

export interface DCAScheduleInput {
  readonly stockSymbol: string;
  readonly amount: number;
  readonly frequency: DCAFrequency;
  readonly portfolioId: string;
  readonly startDate?: string | undefined;
  readonly endDate?: string | undefined;
  readonly isActive?: boolean | undefined;
}

export interface DCAScheduleUpdate {
  readonly amount?: number | undefined;
  readonly frequency?: DCAFrequency | undefined;
  readonly endDate?: string | undefined;
}

export interface DCASummary {
  readonly totalSchedules: number;
  readonly activeSchedules: number;
  readonly totalInvested: number;
  readonly totalExecutions: number;
  /** Sum of active amounts normalized to one month */
  readonly monthlyCommitment: number;
}

export interface UpcomingExecution {
  readonly scheduleId: string;
  readonly stockSymbol: string;
  readonly amount: number;
  readonly executionDate: string;
}

/** Executions per month for each frequency */
export const EXECUTIONS_PER_MONTH: Record<DCAFrequency, number> = {
  daily: 30,
  weekly: 52 / 12,
  biweekly: 26 / 12,
  monthly: 1,
  quarterly: 1 / 3,
};
