import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type { Goal, GoalCategory, GoalInput, GoalUpdate, GoalsSummary } from '../models/index.js';

export interface GoalRemote {
  readonly listGoals: () => Promise<Result<Goal[], RepositoryError>>;
  readonly getGoal: (id: string) => Promise<Result<Goal, RepositoryError>>;
  readonly createGoal: (input: GoalInput) => Promise<Result<Goal, RepositoryError>>;
  readonly updateGoal: (id: string, update: GoalUpdate) => Promise<Result<Goal, RepositoryError>>;
  readonly deleteGoal: (id: string) => Promise<Result<void, RepositoryError>>;
}

export interface FetchGoalsOptions extends LoadOptions {
  /** Archived goals are left out unless set */
  readonly includeArchived?: boolean | undefined;
}

export interface GoalRepository {
  readonly fetchGoals: (options?: FetchGoalsOptions) => Promise<Result<Goal[], RepositoryError>>;

  /** Served from the cached list when present, else fetched and cached on its own. */
  readonly fetchGoal: (id: string, options?: LoadOptions) => Promise<Result<Goal, RepositoryError>>;

  readonly createGoal: (input: GoalInput) => Promise<Result<Goal, RepositoryError>>;
  readonly updateGoal: (id: string, update: GoalUpdate) => Promise<Result<Goal, RepositoryError>>;
  readonly updateGoalProgress: (id: string, currentAmount: number) => Promise<Result<Goal, RepositoryError>>;
  readonly archiveGoal: (id: string) => Promise<Result<Goal, RepositoryError>>;
  readonly unarchiveGoal: (id: string) => Promise<Result<Goal, RepositoryError>>;
  readonly linkGoalToPortfolio: (id: string, portfolioId: string) => Promise<Result<Goal, RepositoryError>>;
  readonly unlinkGoalFromPortfolio: (id: string) => Promise<Result<Goal, RepositoryError>>;

  /** Refetches one goal from the server and merges it into the cached list. */
  readonly syncGoalProgress: (id: string) => Promise<Result<Goal, RepositoryError>>;

  readonly deleteGoal: (id: string) => Promise<Result<void, RepositoryError>>;
  /** Deletes in order and stops at the first failure; goals deleted before it stay deleted. */
  readonly deleteGoals: (ids: readonly string[]) => Promise<Result<void, RepositoryError>>;

  readonly fetchGoalsByCategory: (category: GoalCategory) => Promise<Result<Goal[], RepositoryError>>;
  readonly fetchGoalsLinkedToPortfolio: (portfolioId: string) => Promise<Result<Goal[], RepositoryError>>;

  /** Summary of the cached, unarchived goals. Never fetches. */
  readonly selectGoalsSummary: () => GoalsSummary;

  readonly invalidateCache: () => void;
}
