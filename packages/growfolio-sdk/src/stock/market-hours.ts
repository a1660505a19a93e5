import type { MarketStatus } from '../models/index.js';

const EXCHANGE_TIME_ZONE = 'America/New_York';

/** Minutes after midnight, exchange time */
const PRE_MARKET_OPEN = 4 * 60;
const REGULAR_OPEN = 9 * 60 + 30;
const REGULAR_CLOSE = 16 * 60;
const AFTER_HOURS_CLOSE = 20 * 60;

const formatter = new Intl.DateTimeFormat('en-US', {
  timeZone: EXCHANGE_TIME_ZONE,
  weekday: 'short',
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
});

interface ExchangeClock {
  readonly weekday: string;
  readonly minutes: number;
}

const exchangeClock = (at: number): ExchangeClock => {
  const parts = formatter.formatToParts(new Date(at));
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return {
    weekday: part('weekday'),
    minutes: Number(part('hour')) * 60 + Number(part('minute')),
  };
};

/**
 * Market status computed from New York regular hours, used when the API
 * cannot be reached. Holidays are not known locally.
 */
export const computeMarketStatus = (at: number): MarketStatus => {
  const { weekday, minutes } = exchangeClock(at);

  if (weekday === 'Sat' || weekday === 'Sun') {
    return { isOpen: false, session: 'closed' };
  }
  if (minutes >= REGULAR_OPEN && minutes < REGULAR_CLOSE) {
    return { isOpen: true, session: 'regular' };
  }
  if (minutes >= PRE_MARKET_OPEN && minutes < REGULAR_OPEN) {
    return { isOpen: false, session: 'pre' };
  }
  if (minutes >= REGULAR_CLOSE && minutes < AFTER_HOURS_CLOSE) {
    return { isOpen: false, session: 'post' };
  }
  return { isOpen: false, session: 'closed' };
};
