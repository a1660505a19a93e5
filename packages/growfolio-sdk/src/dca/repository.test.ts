import { describe, it, expect, vi } from 'vitest';
import { createDCARepository, summarizeSchedules, upcomingExecutions } from './repository.js';
import type { DCARemote, DCARepository } from './types.js';
import { createInvalidationRules } from '../invalidation/rules.js';
import { createRepositoryError } from '../errors/errors.js';
import { createSilentLogger } from '../logging/logger.js';
import { createFakeTimer, errAsync, okAsync } from '../test/mocks.js';
import { buildSchedule } from '../test/fixtures.js';
import type { DCASchedule } from '../models/index.js';

const scheduleA = buildSchedule({ id: 'A', stockSymbol: 'VOO', portfolioId: 'portfolio-1' });
const scheduleB = buildSchedule({
  id: 'B',
  stockSymbol: 'aapl',
  portfolioId: 'portfolio-2',
  amount: 50,
  frequency: 'weekly',
});

const setup = (overrides: Partial<DCARemote> = {}) => {
  const timer = createFakeTimer();
  const logger = createSilentLogger();
  const rules = createInvalidationRules({ logger });
  const remote = {
    listSchedules: vi
      .fn<DCARemote['listSchedules']>()
      .mockReturnValueOnce(okAsync([scheduleA, scheduleB]))
      .mockReturnValue(okAsync([{ ...scheduleA, isActive: false }, scheduleB])),
    getSchedule: vi.fn((id: string) => okAsync(buildSchedule({ id }))),
    createSchedule: vi.fn(() => okAsync(buildSchedule({ id: 'C' }))),
    updateSchedule: vi.fn((id: string) => okAsync(buildSchedule({ id, amount: 75 }))),
    pauseSchedule: vi.fn((id: string) => okAsync(buildSchedule({ id, isActive: false }))),
    resumeSchedule: vi.fn((id: string) => okAsync(buildSchedule({ id }))),
    deleteSchedule: vi.fn(() => okAsync(undefined)),
    ...overrides,
  };
  const repository = createDCARepository({ remote, rules, logger, now: timer.now });
  return { timer, remote, repository };
};

describe('createDCARepository', () => {
  describe('given a schedule is paused after the list was cached', () => {
    it('returns the server state on the next read with exactly one new call', async () => {
      const { remote, repository } = setup();

      const before = await repository.fetchSchedules();
      expect(remote.listSchedules).toHaveBeenCalledTimes(1);
      expect(before.isOk() && before.value.map((s) => s.id)).toEqual(['A', 'B']);

      const paused = await repository.pauseSchedule('A');
      const after = await repository.fetchSchedules();

      expect(paused.isOk()).toBe(true);
      expect(remote.listSchedules).toHaveBeenCalledTimes(2);
      expect(after.isOk() && after.value.find((s) => s.id === 'A')?.isActive).toBe(false);
    });
  });

  describe('given the pause fails', () => {
    it('keeps the cached list', async () => {
      const { remote, repository } = setup({
        pauseSchedule: vi.fn(() => errAsync<DCASchedule>(createRepositoryError('SERVER_ERROR'))),
      });
      await repository.fetchSchedules();

      await repository.pauseSchedule('A');
      await repository.fetchSchedules();

      expect(remote.listSchedules).toHaveBeenCalledTimes(1);
    });
  });

  describe('given a schedule is cancelled after the list was cached', () => {
    it('merges the inactive schedule without refetching the list', async () => {
      const { remote, repository } = setup({
        updateSchedule: vi.fn((id: string) => okAsync(buildSchedule({ id, isActive: false }))),
      });
      await repository.fetchSchedules();

      const cancelled = await repository.cancelSchedule('A');
      const after = await repository.fetchSchedules();

      expect(remote.updateSchedule).toHaveBeenCalledWith('A', { isActive: false });
      expect(cancelled.isOk()).toBe(true);
      expect(remote.listSchedules).toHaveBeenCalledTimes(1);
      expect(after.isOk() && after.value.map((s) => [s.id, s.isActive])).toEqual([
        ['A', false],
        ['B', true],
      ]);
    });
  });

  describe('given the cancel fails', () => {
    it('leaves the cached schedule active', async () => {
      const { repository } = setup({
        updateSchedule: vi.fn(() => errAsync<DCASchedule>(createRepositoryError('SERVER_ERROR'))),
      });
      await repository.fetchSchedules();

      const result = await repository.cancelSchedule('A');

      expect(result.isErr() && result.error.code).toBe('SERVER_ERROR');
      expect(repository.selectActiveSchedules().map((s) => s.id)).toEqual(['A', 'B']);
    });
  });

  const input = { stockSymbol: 'VOO', amount: 10, frequency: 'monthly', portfolioId: 'portfolio-1' } as const;

  describe.each<[string, (r: DCARepository) => Promise<unknown>]>([
    ['createSchedule', (r) => r.createSchedule(input)],
    ['updateSchedule', (r) => r.updateSchedule('A', { amount: 75 })],
    ['resumeSchedule', (r) => r.resumeSchedule('A')],
    ['deleteSchedule', (r) => r.deleteSchedule('A')],
  ])('given %s succeeds', (_name, mutation) => {
    it('drops the cached schedules', async () => {
      const { remote, repository } = setup();
      await repository.fetchSchedules();

      await mutation(repository);
      await repository.fetchSchedules();

      expect(remote.listSchedules).toHaveBeenCalledTimes(2);
    });
  });

  describe('fetchSchedule', () => {
    it('answers from the cached list', async () => {
      const { remote, repository } = setup();
      await repository.fetchSchedules();

      const result = await repository.fetchSchedule('B');

      expect(result.isOk() && result.value.stockSymbol).toBe('aapl');
      expect(remote.getSchedule).not.toHaveBeenCalled();
    });

    it('fetches a schedule missing from the list', async () => {
      const { remote, repository } = setup();
      await repository.fetchSchedules();

      await repository.fetchSchedule('Z');

      expect(remote.getSchedule).toHaveBeenCalledWith('Z');
    });
  });

  describe('derived reads', () => {
    it('matches symbols case-insensitively', async () => {
      const { repository } = setup();

      const result = await repository.fetchSchedulesForSymbol('AAPL');

      expect(result.isOk() && result.value.map((s) => s.id)).toEqual(['B']);
    });

    it('filters by portfolio', async () => {
      const { repository } = setup();

      const result = await repository.fetchSchedulesForPortfolio('portfolio-2');

      expect(result.isOk() && result.value.map((s) => s.id)).toEqual(['B']);
    });

    it('selects nothing before the first fetch', () => {
      const { repository } = setup();

      expect(repository.selectActiveSchedules()).toEqual([]);
    });

    it('runs one fetch for concurrent derived reads', async () => {
      const { remote, repository } = setup();

      await Promise.all([
        repository.fetchActiveSchedules(),
        repository.fetchSchedulesForSymbol('VOO'),
        repository.fetchDCASummary(),
      ]);

      expect(remote.listSchedules).toHaveBeenCalledTimes(1);
    });
  });

  describe('fetchUpcomingExecutions', () => {
    it('uses the repository clock', async () => {
      const { repository, timer } = setup();
      timer.set(Date.UTC(2025, 0, 25));

      const result = await repository.fetchUpcomingExecutions(7);

      expect(result.isOk() && result.value.map((e) => e.scheduleId)).toEqual(['A', 'B']);
    });
  });
});

describe('summarizeSchedules', () => {
  it('normalizes active amounts to a monthly commitment', () => {
    const summary = summarizeSchedules([
      buildSchedule({ amount: 100, frequency: 'monthly', totalInvested: 300, executionCount: 3 }),
      buildSchedule({ amount: 300, frequency: 'quarterly', totalInvested: 600, executionCount: 2 }),
      buildSchedule({ amount: 999, isPaused: true }),
    ]);

    expect(summary).toMatchObject({
      totalSchedules: 3,
      activeSchedules: 2,
      totalInvested: 900,
      totalExecutions: 5,
    });
    expect(summary.monthlyCommitment).toBeCloseTo(200);
  });
});

describe('upcomingExecutions', () => {
  const now = Date.UTC(2025, 0, 15);

  it('keeps active schedules inside the window, soonest first', () => {
    const result = upcomingExecutions(
      [
        buildSchedule({ id: 'late', nextExecutionDate: '2025-01-20T00:00:00.000Z' }),
        buildSchedule({ id: 'soon', nextExecutionDate: '2025-01-16T00:00:00.000Z' }),
        buildSchedule({ id: 'past', nextExecutionDate: '2025-01-14T00:00:00.000Z' }),
        buildSchedule({ id: 'far', nextExecutionDate: '2025-02-01T00:00:00.000Z' }),
        buildSchedule({ id: 'paused', isPaused: true, nextExecutionDate: '2025-01-16T00:00:00.000Z' }),
        buildSchedule({ id: 'unscheduled', nextExecutionDate: null }),
      ],
      7,
      now
    );

    expect(result.map((e) => e.scheduleId)).toEqual(['soon', 'late']);
  });
});
