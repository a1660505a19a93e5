export {
  createDCARepository,
  isScheduleActive,
  summarizeSchedules,
  upcomingExecutions,
} from './repository.js';
export type { DCARepositoryDeps } from './repository.js';
export { createDCARemote } from './remote.js';
export type { DCARemote, DCARepository } from './types.js';
