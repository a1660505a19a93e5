import { ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules, MutationKind } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { findById, removeById, upsertById } from '../repositories/collection.js';
import { isGoalCompleted } from '../models/index.js';
import type { Goal, GoalUpdate, GoalsSummary } from '../models/index.js';
import type { FetchGoalsOptions, GoalRemote, GoalRepository } from './types.js';

export interface GoalRepositoryDeps {
  readonly remote: GoalRemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const ALL = 'all';

const unarchived = (goals: readonly Goal[]): Goal[] => goals.filter((goal) => !goal.isArchived);

export const summarizeGoals = (goals: readonly Goal[]): GoalsSummary => {
  const totalTargetAmount = goals.reduce((sum, goal) => sum + goal.targetAmount, 0);
  const totalCurrentAmount = goals.reduce((sum, goal) => sum + goal.currentAmount, 0);
  const completedGoals = goals.filter(isGoalCompleted).length;

  return {
    totalGoals: goals.length,
    activeGoals: goals.filter((goal) => !isGoalCompleted(goal) && !goal.isArchived).length,
    completedGoals,
    totalTargetAmount,
    totalCurrentAmount,
    overallProgress: totalTargetAmount > 0 ? totalCurrentAmount / totalTargetAmount : 0,
  };
};

/**
 * Creates the goal repository.
 *
 * The full goal list (archived included) is cached once and filtered per
 * call. Writes merge the returned goal into that list.
 */
export const createGoalRepository = (deps: GoalRepositoryDeps): GoalRepository => {
  const { remote, rules, logger, now } = deps;
  const log = logger.child({ repository: 'goal' });

  const goals = createResourceCache<Goal[]>({
    name: 'goal.list',
    freshForMs: FRESHNESS.goals,
    logger: log,
    now,
  });
  const items = createResourceCache<Goal>({
    name: 'goal.items',
    freshForMs: FRESHNESS.goals,
    logger: log,
    now,
  });

  rules.register('goal.items', {
    clear: () => items.invalidate(),
    remove: (id) => items.invalidate(id),
  });

  const loadAll = (options?: LoadOptions): Promise<Result<Goal[], RepositoryError>> =>
    goals.load(ALL, () => remote.listGoals(), options);

  const fetchGoals = async (
    options: FetchGoalsOptions = {}
  ): Promise<Result<Goal[], RepositoryError>> => {
    const result = await loadAll(options);
    return options.includeArchived === true ? result : result.map(unarchived);
  };

  const fetchGoal = (id: string, options?: LoadOptions): Promise<Result<Goal, RepositoryError>> => {
    if (options?.force !== true) {
      const listed = findById(goals.get(ALL), id);
      if (listed !== undefined) {
        return Promise.resolve(ok(listed));
      }
    }
    return items.load(id, () => remote.getGoal(id), options);
  };

  const mergeGoal = (goal: Goal, kind: MutationKind): void => {
    goals.update(ALL, (list) => upsertById(list, goal));
    rules.apply(kind, { id: goal.id, goalId: goal.id, portfolioId: goal.linkedPortfolioId ?? undefined });
  };

  const writeGoal = async (
    id: string,
    update: GoalUpdate,
    kind: MutationKind
  ): Promise<Result<Goal, RepositoryError>> => {
    const result = await remote.updateGoal(id, update);
    if (result.isOk()) {
      mergeGoal(result.value, kind);
    }
    return result;
  };

  const deleteGoal = async (id: string): Promise<Result<void, RepositoryError>> => {
    const result = await remote.deleteGoal(id);
    if (result.isOk()) {
      goals.update(ALL, (list) => removeById(list, id));
      rules.apply('goal.delete', { id, goalId: id });
      log.info({ goalId: id }, 'goal deleted');
    }
    return result;
  };

  const deleteGoals = async (ids: readonly string[]): Promise<Result<void, RepositoryError>> => {
    for (const id of ids) {
      const result = await deleteGoal(id);
      if (result.isErr()) {
        return result;
      }
    }
    return ok(undefined);
  };

  const syncGoalProgress = async (id: string): Promise<Result<Goal, RepositoryError>> => {
    const result = await items.load(id, () => remote.getGoal(id), { force: true });
    if (result.isOk()) {
      const synced = result.value;
      goals.update(ALL, (list) => upsertById(list, synced));
    }
    return result;
  };

  const fetchFiltered = async (
    predicate: (goal: Goal) => boolean
  ): Promise<Result<Goal[], RepositoryError>> =>
    (await fetchGoals()).map((list) => list.filter(predicate));

  return {
    fetchGoals,
    fetchGoal,
    createGoal: async (input) => {
      const result = await remote.createGoal(input);
      if (result.isOk()) {
        mergeGoal(result.value, 'goal.create');
      }
      return result;
    },
    updateGoal: (id, update) => writeGoal(id, update, 'goal.update'),
    updateGoalProgress: (id, currentAmount) => writeGoal(id, { currentAmount }, 'goal.update'),
    archiveGoal: (id) => writeGoal(id, { isArchived: true }, 'goal.archive'),
    unarchiveGoal: (id) => writeGoal(id, { isArchived: false }, 'goal.unarchive'),
    linkGoalToPortfolio: (id, portfolioId) =>
      writeGoal(id, { linkedPortfolioId: portfolioId }, 'goal.update'),
    unlinkGoalFromPortfolio: (id) => writeGoal(id, { linkedPortfolioId: null }, 'goal.update'),
    syncGoalProgress,
    deleteGoal,
    deleteGoals,
    fetchGoalsByCategory: (category) => fetchFiltered((goal) => goal.category === category),
    fetchGoalsLinkedToPortfolio: (portfolioId) =>
      fetchFiltered((goal) => goal.linkedPortfolioId === portfolioId),
    selectGoalsSummary: () => summarizeGoals(unarchived(goals.peek(ALL)?.value ?? [])),
    invalidateCache: () => {
      goals.invalidate();
      items.invalidate();
    },
  };
};
