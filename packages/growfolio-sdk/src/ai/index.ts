export { createAIInsightRepository } from './repository.js';
export type { AIInsightRepositoryDeps } from './repository.js';
export { createAIRemote } from './remote.js';
export type {
  AIInsightRepository,
  AIRemote,
  ChatRequest,
  FetchInsightsOptions,
  SendMessageOptions,
} from './types.js';
