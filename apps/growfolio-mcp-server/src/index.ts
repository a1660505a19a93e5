#!/usr/bin/env node

/**
 * Growfolio MCP server over stdio.
 *
 * Reads GROWFOLIO_API_URL and GROWFOLIO_ACCESS_TOKEN from the environment
 * (or a .env file) and logs to stderr, leaving stdout to the protocol.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import pino from 'pino';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createGrowfolioClient, createLogger } from '@growfolio/sdk';
import { createServerConfig } from './config.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
  const config = createServerConfig();
  const logger = createLogger({ name: SERVER_NAME, level: config.logLevel, destination: pino.destination(2) });
  logger.info({ apiUrl: config.apiUrl }, 'starting');

  const { accessToken } = config;
  const container = createGrowfolioClient({
    baseUrl: config.apiUrl,
    getAccessToken: () => accessToken,
    timeoutMs: config.timeoutMs,
    platform: 'mcp',
    appVersion: SERVER_VERSION,
    logger,
  });
  const server = createServer(container, logger);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('connected via stdio');

  process.on('SIGINT', () => {
    logger.info('shutting down');
    container.signOut();
    void server
      .close()
      .catch((error: unknown) => {
        logger.error({ err: error }, 'close failed');
      })
      .finally(() => process.exit(0));
  });
}

main().catch((error: unknown) => {
  process.stderr.write(`[${SERVER_NAME}] Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
