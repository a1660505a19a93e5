export { createGoalRepository, summarizeGoals } from './repository.js';
export type { GoalRepositoryDeps } from './repository.js';
export { createGoalRemote } from './remote.js';
export type { FetchGoalsOptions, GoalRemote, GoalRepository } from './types.js';
