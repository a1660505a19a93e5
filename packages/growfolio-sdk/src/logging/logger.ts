import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger } from 'pino';

const isTestRun = (): boolean =>
  process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';

/**
 * Options for the root logger.
 */
export interface LoggerOptions {
  /** Minimum level; falls back to GROWFOLIO_LOG_LEVEL, then silent in tests and info otherwise */
  readonly level?: string | undefined;
  /** Service name stamped on every line */
  readonly name?: string | undefined;
  /** Output stream, stdout by default */
  readonly destination?: DestinationStream | undefined;
}

const resolveLevel = (level: string | undefined): string => {
  if (level !== undefined && level.length > 0) {
    return level;
  }
  const fromEnv = process.env['GROWFOLIO_LOG_LEVEL'];
  if (fromEnv !== undefined && fromEnv.length > 0) {
    return fromEnv;
  }
  return isTestRun() ? 'silent' : 'info';
};

/**
 * Creates the root structured logger.
 * Repositories log through `logger.child({ repository })`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'growfolio-mcp-server', destination: pino.destination(2) });
 * logger.child({ repository: 'funding' }).debug({ key: 'balance' }, 'cache miss');
 * ```
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const config = {
    level: resolveLevel(options.level),
    base: { service: options.name ?? 'growfolio-sdk' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['token', 'accessToken', 'authorization', 'headers.Authorization', '*.accessToken'],
      censor: '[REDACTED]',
    },
  };

  return options.destination === undefined ? pino(config) : pino(config, options.destination);
};

/**
 * Logger that drops every line, for callers that pass none.
 */
export const createSilentLogger = (): Logger => pino({ level: 'silent' });
