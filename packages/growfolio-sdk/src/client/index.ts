export { createRemotes, createRepositoryContainer } from './container.js';
export type { GrowfolioRemotes, RepositoryContainer, RepositoryContainerOptions } from './container.js';
export { createGrowfolioClient } from './growfolio-client.js';
export type { GrowfolioClientOptions } from './growfolio-client.js';
