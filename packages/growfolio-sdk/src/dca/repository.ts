import { ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { FRESHNESS } from '../cache/freshness.js';
import type { RepositoryError } from '../errors/types.js';
import type { InvalidationRules, MutationKind } from '../invalidation/types.js';
import { createResourceCache } from '../repositories/resource-cache.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import { findById, upsertById } from '../repositories/collection.js';
import { EXECUTIONS_PER_MONTH } from '../models/index.js';
import type { DCASchedule, DCASummary, UpcomingExecution } from '../models/index.js';
import type { DCARemote, DCARepository } from './types.js';

export interface DCARepositoryDeps {
  readonly remote: DCARemote;
  readonly rules: InvalidationRules;
  readonly logger: Logger;
  readonly now?: (() => number) | undefined;
}

const ALL = 'all';
const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export const isScheduleActive = (schedule: DCASchedule): boolean =>
  schedule.isActive && !schedule.isPaused;

export const summarizeSchedules = (schedules: readonly DCASchedule[]): DCASummary => {
  const active = schedules.filter(isScheduleActive);
  return {
    totalSchedules: schedules.length,
    activeSchedules: active.length,
    totalInvested: schedules.reduce((sum, s) => sum + s.totalInvested, 0),
    totalExecutions: schedules.reduce((sum, s) => sum + s.executionCount, 0),
    monthlyCommitment: active.reduce(
      (sum, s) => sum + s.amount * EXECUTIONS_PER_MONTH[s.frequency],
      0
    ),
  };
};

/**
 * Active schedules whose next execution falls within `[now, now + days]`.
 */
export const upcomingExecutions = (
  schedules: readonly DCASchedule[],
  days: number,
  now: number
): UpcomingExecution[] => {
  const horizon = now + days * ONE_DAY_MS;
  return schedules
    .filter(isScheduleActive)
    .flatMap((schedule) => {
      const next = schedule.nextExecutionDate;
      if (next === null || next === undefined) {
        return [];
      }
      const at = Date.parse(next);
      if (Number.isNaN(at) || at < now || at > horizon) {
        return [];
      }
      return [
        {
          scheduleId: schedule.id,
          stockSymbol: schedule.stockSymbol,
          amount: schedule.amount,
          executionDate: next,
        },
      ];
    })
    .sort((a, b) => Date.parse(a.executionDate) - Date.parse(b.executionDate));
};

/**
 * Creates the DCA schedule repository.
 */
export const createDCARepository = (deps: DCARepositoryDeps): DCARepository => {
  const { remote, rules, logger } = deps;
  const now = deps.now ?? ((): number => Date.now());
  const log = logger.child({ repository: 'dca' });

  const schedules = createResourceCache<DCASchedule[]>({
    name: 'dca.schedules',
    freshForMs: FRESHNESS.dcaSchedules,
    logger: log,
    now,
  });
  const items = createResourceCache<DCASchedule>({
    name: 'dca.items',
    freshForMs: FRESHNESS.dcaSchedules,
    logger: log,
    now,
  });

  const clearAll = (): void => {
    schedules.invalidate();
    items.invalidate();
  };

  rules.register('dca.schedules', { clear: clearAll, remove: clearAll });

  const fetchSchedules = (options?: LoadOptions): Promise<Result<DCASchedule[], RepositoryError>> =>
    schedules.load(ALL, () => remote.listSchedules(), options);

  const fetchSchedule = (id: string, options?: LoadOptions): Promise<Result<DCASchedule, RepositoryError>> => {
    if (options?.force !== true) {
      const listed = findById(schedules.get(ALL), id);
      if (listed !== undefined) {
        return Promise.resolve(ok(listed));
      }
    }
    return items.load(id, () => remote.getSchedule(id), options);
  };

  const mutate = async <T>(
    kind: MutationKind,
    id: string | undefined,
    call: () => Promise<Result<T, RepositoryError>>
  ): Promise<Result<T, RepositoryError>> => {
    const result = await call();
    if (result.isOk()) {
      rules.apply(kind, { id });
      log.info({ mutation: kind, scheduleId: id }, 'schedule changed');
    }
    return result;
  };

  const cancelSchedule = async (id: string): Promise<Result<DCASchedule, RepositoryError>> => {
    const result = await remote.updateSchedule(id, { isActive: false });
    if (result.isOk()) {
      const cancelled = result.value;
      schedules.update(ALL, (list) => upsertById(list, cancelled));
      items.invalidate(id);
      log.info({ scheduleId: id }, 'schedule cancelled');
    }
    return result;
  };

  const fetchFiltered = async (
    predicate: (schedule: DCASchedule) => boolean
  ): Promise<Result<DCASchedule[], RepositoryError>> =>
    (await fetchSchedules()).map((list) => list.filter(predicate));

  return {
    fetchSchedules,
    fetchSchedule,
    createSchedule: (input) => mutate('dca.create', undefined, () => remote.createSchedule(input)),
    updateSchedule: (id, update) => mutate('dca.update', id, () => remote.updateSchedule(id, update)),
    cancelSchedule,
    pauseSchedule: (id) => mutate('dca.pause', id, () => remote.pauseSchedule(id)),
    resumeSchedule: (id) => mutate('dca.resume', id, () => remote.resumeSchedule(id)),
    deleteSchedule: (id) => mutate('dca.delete', id, () => remote.deleteSchedule(id)),
    fetchActiveSchedules: () => fetchFiltered(isScheduleActive),
    fetchSchedulesForSymbol: (symbol) =>
      fetchFiltered((s) => s.stockSymbol.toUpperCase() === symbol.toUpperCase()),
    fetchSchedulesForPortfolio: (portfolioId) => fetchFiltered((s) => s.portfolioId === portfolioId),
    selectActiveSchedules: () => (schedules.peek(ALL)?.value ?? []).filter(isScheduleActive),
    fetchDCASummary: async () => (await fetchSchedules()).map(summarizeSchedules),
    fetchUpcomingExecutions: async (days) =>
      (await fetchSchedules()).map((list) => upcomingExecutions(list, days, now())),
    invalidateCache: clearAll,
  };
};
