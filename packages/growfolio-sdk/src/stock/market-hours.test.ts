import { describe, it, expect } from 'vitest';
import { computeMarketStatus } from './market-hours.js';

describe('computeMarketStatus', () => {
  describe('given a weekday in January (UTC-5 in New York)', () => {
    it.each([
      ['07:00 is pre-market', Date.UTC(2025, 0, 15, 12, 0), { isOpen: false, session: 'pre' }],
      ['09:29 is still pre-market', Date.UTC(2025, 0, 15, 14, 29), { isOpen: false, session: 'pre' }],
      ['09:30 opens the regular session', Date.UTC(2025, 0, 15, 14, 30), { isOpen: true, session: 'regular' }],
      ['15:59 is the regular session', Date.UTC(2025, 0, 15, 20, 59), { isOpen: true, session: 'regular' }],
      ['16:00 is after hours', Date.UTC(2025, 0, 15, 21, 0), { isOpen: false, session: 'post' }],
      ['20:00 is closed', Date.UTC(2025, 0, 16, 1, 0), { isOpen: false, session: 'closed' }],
      ['03:59 is closed', Date.UTC(2025, 0, 15, 8, 59), { isOpen: false, session: 'closed' }],
    ])('%s', (_label, at, expected) => {
      expect(computeMarketStatus(at)).toEqual(expected);
    });
  });

  describe('given daylight saving time (UTC-4 in New York)', () => {
    it('opens at 13:30 UTC', () => {
      expect(computeMarketStatus(Date.UTC(2025, 6, 16, 13, 30))).toEqual({ isOpen: true, session: 'regular' });
    });
  });

  describe('given a weekend', () => {
    it('reports closed during regular hours', () => {
      // Saturday 10:00 in New York
      expect(computeMarketStatus(Date.UTC(2025, 0, 18, 15, 0))).toEqual({ isOpen: false, session: 'closed' });
    });
  });
});
