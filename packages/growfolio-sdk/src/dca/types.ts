import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  DCASchedule,
  DCAScheduleInput,
  DCAScheduleUpdate,
  DCASummary,
  UpcomingExecution,
} from '../models/index.js';

export interface DCARemote {
  readonly listSchedules: () => Promise<Result<DCASchedule[], RepositoryError>>;
  readonly getSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly createSchedule: (input: DCAScheduleInput) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly updateSchedule: (
    id: string,
    update: DCAScheduleUpdate
  ) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly pauseSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly resumeSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly deleteSchedule: (id: string) => Promise<Result<void, RepositoryError>>;
}

/**
 * Recurring-investment schedules. Every mutation except a cancel drops the
 * cached schedules, so the next read returns the server's state. A cancel
 * merges the returned schedule into the cached list.
 */
export interface DCARepository {
  readonly fetchSchedules: (options?: LoadOptions) => Promise<Result<DCASchedule[], RepositoryError>>;
  readonly fetchSchedule: (id: string, options?: LoadOptions) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly createSchedule: (input: DCAScheduleInput) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly updateSchedule: (
    id: string,
    update: DCAScheduleUpdate
  ) => Promise<Result<DCASchedule, RepositoryError>>;
  /** Deactivates the schedule for good; a paused schedule can be resumed, a cancelled one cannot. */
  readonly cancelSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly pauseSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly resumeSchedule: (id: string) => Promise<Result<DCASchedule, RepositoryError>>;
  readonly deleteSchedule: (id: string) => Promise<Result<void, RepositoryError>>;

  readonly fetchActiveSchedules: () => Promise<Result<DCASchedule[], RepositoryError>>;
  /** Case-insensitive on the symbol */
  readonly fetchSchedulesForSymbol: (symbol: string) => Promise<Result<DCASchedule[], RepositoryError>>;
  readonly fetchSchedulesForPortfolio: (portfolioId: string) => Promise<Result<DCASchedule[], RepositoryError>>;

  /** Active schedules currently cached. Never fetches. */
  readonly selectActiveSchedules: () => DCASchedule[];

  readonly fetchDCASummary: () => Promise<Result<DCASummary, RepositoryError>>;

  /** Active schedules executing within the next `days` days, soonest first. */
  readonly fetchUpcomingExecutions: (days: number) => Promise<Result<UpcomingExecution[], RepositoryError>>;

  readonly invalidateCache: () => void;
}
