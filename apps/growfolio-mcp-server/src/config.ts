/**
 * MCP Server Configuration Module
 *
 * @packageDocumentation
 */

import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const DEFAULT_TIMEOUT_MS = 30_000;

const envSchema = z.object({
  GROWFOLIO_API_URL: z.string().url(),
  GROWFOLIO_ACCESS_TOKEN: z.string().optional(),
  GROWFOLIO_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  GROWFOLIO_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Growfolio MCP server configuration.
 */
export interface ServerConfig {
  /** Growfolio API origin */
  readonly apiUrl: string;
  /** Bearer token sent with every API request; none when unset */
  readonly accessToken: string | undefined;
  readonly timeoutMs: number;
  readonly logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Creates the server configuration from environment variables.
 * Empty values count as unset.
 *
 * Required env vars:
 * - GROWFOLIO_API_URL: Growfolio API origin
 *
 * Optional env vars:
 * - GROWFOLIO_ACCESS_TOKEN: bearer token for the API
 * - GROWFOLIO_API_TIMEOUT_MS: request timeout (default: 30000)
 * - GROWFOLIO_LOG_LEVEL: pino level (default: info)
 *
 * @throws Error naming every invalid variable
 */
export function createServerConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): ServerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.length > 0)
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration (${problems.join('; ')})`);
  }

  return {
    apiUrl: parsed.data.GROWFOLIO_API_URL,
    accessToken: parsed.data.GROWFOLIO_ACCESS_TOKEN,
    timeoutMs: parsed.data.GROWFOLIO_API_TIMEOUT_MS,
    logLevel: parsed.data.GROWFOLIO_LOG_LEVEL,
  };
}
