import { z } from 'zod';
import { timestampSchema } from './common.js';

export const goalCategorySchema = z.enum([
  'retirement',
  'education',
  'house',
  'car',
  'vacation',
  'emergency',
  'wedding',
  'investment',
  'other',
]);

export type GoalCategory = z.infer<typeof goalCategorySchema>;

export const goalSchema = z.object({
  id: z.string(),
  userId: z.string(),
  name: z.string(),
  targetAmount: z.number(),
  currentAmount: z.number().default(0),
  targetDate: timestampSchema.nullish(),
  linkedPortfolioId: z.string().nullish(),
  category: goalCategorySchema.default('other'),
  notes: z.string().nullish(),
  isArchived: z.boolean().default(false),
  createdAt: timestampSchema,
  updatedAt: timestampSchema,
});

export type Goal = z.infer<typeof goalSchema>;

export interface GoalInput {
  readonly name: string;
  readonly targetAmount: number;
  readonly targetDate?: string | undefined;
  readonly category?: GoalCategory | undefined;
  readonly linkedPortfolioId?: string | undefined;
  readonly notes?: string | undefined;
}

export interface GoalUpdate {
  readonly name?: string | undefined;
  readonly targetAmount?: number | undefined;
  readonly currentAmount?: number | undefined;
  readonly targetDate?: string | undefined;
  readonly category?: GoalCategory | undefined;
  /** `null` unlinks the goal */
  readonly linkedPortfolioId?: string | null | undefined;
  readonly notes?: string | undefined;
  readonly isArchived?: boolean | undefined;
}

export interface GoalsSummary {
  readonly totalGoals: number;
  readonly activeGoals: number;
  readonly completedGoals: number;
  readonly totalTargetAmount: number;
  readonly totalCurrentAmount: number;
  /** Combined progress, 0 to 1 */
  readonly overallProgress: number;
}

export const isGoalCompleted = (goal: Goal): boolean => goal.currentAmount >= goal.targetAmount;
