import type { Logger } from 'pino';
import { createFetchClient } from '../http/fetch-client.js';
import { createSilentLogger } from '../logging/logger.js';
import { createApiClient } from '../remote/api-client.js';
import type { AccessTokenProvider } from '../remote/api-client.js';
import { createRemotes, createRepositoryContainer } from './container.js';
import type { RepositoryContainer } from './container.js';

export interface GrowfolioClientOptions {
  /** API origin, e.g. https://api.growfolio.app */
  readonly baseUrl: string;
  readonly getAccessToken?: AccessTokenProvider | undefined;
  /** Per-request timeout (default: 30000) */
  readonly timeoutMs?: number | undefined;
  /** fetch implementation, defaults to the global fetch */
  readonly fetch?: typeof fetch | undefined;
  /** Sent as X-Platform on every request (default: web) */
  readonly platform?: string | undefined;
  /** Sent as X-App-Version when set */
  readonly appVersion?: string | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => number) | undefined;
}

/**
 * Creates a Growfolio client: HTTP transport, API client and every repository.
 *
 * @example
 * ```typescript
 * const client = createGrowfolioClient({
 *   baseUrl: 'https://api.growfolio.app',
 *   getAccessToken: () => session.accessToken,
 * });
 * const portfolios = await client.portfolios.fetchPortfolios();
 * ```
 */
export const createGrowfolioClient = (options: GrowfolioClientOptions): RepositoryContainer => {
  const logger = options.logger ?? createSilentLogger();
  const httpClient = createFetchClient({
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
    baseHeaders: {
      'X-Platform': options.platform ?? 'web',
      ...(options.appVersion !== undefined ? { 'X-App-Version': options.appVersion } : {}),
    },
  });
  const api = createApiClient({
    baseUrl: options.baseUrl,
    httpClient,
    getAccessToken: options.getAccessToken,
  });

  logger.debug({ baseUrl: options.baseUrl }, 'growfolio client created');
  return createRepositoryContainer({ remotes: createRemotes(api), logger, now: options.now });
};
