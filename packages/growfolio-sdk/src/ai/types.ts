import type { Result } from 'neverthrow';
import type { RepositoryError } from '../errors/types.js';
import type { LoadOptions } from '../repositories/resource-cache.js';
import type {
  AllocationRequest,
  AllocationSuggestion,
  ChatReply,
  ChatTurn,
  InsightsResponse,
  InvestingTip,
  StockExplanation,
} from '../models/index.js';

export interface ChatRequest {
  readonly message: string;
  /** Omitted for a new conversation */
  readonly conversationHistory?: readonly ChatTurn[] | undefined;
  readonly includePortfolioContext: boolean;
}

export interface AIRemote {
  readonly chat: (request: ChatRequest) => Promise<Result<ChatReply, RepositoryError>>;
  readonly getInsights: (includeGoals: boolean) => Promise<Result<InsightsResponse, RepositoryError>>;
  readonly getGoalInsights: (goalId: string) => Promise<Result<InsightsResponse, RepositoryError>>;
  readonly getStockExplanation: (symbol: string) => Promise<Result<StockExplanation, RepositoryError>>;
  readonly suggestAllocation: (
    request: AllocationRequest
  ) => Promise<Result<AllocationSuggestion, RepositoryError>>;
  readonly getInvestingTips: () => Promise<Result<InvestingTip[], RepositoryError>>;
}

export interface FetchInsightsOptions extends LoadOptions {
  readonly includeGoals?: boolean | undefined;
}

export interface SendMessageOptions {
  readonly history?: readonly ChatTurn[] | undefined;
  /** Defaults to true */
  readonly includePortfolioContext?: boolean | undefined;
}

/**
 * Generated insights and explanations. Chat and allocation suggestions are
 * never cached.
 */
export interface AIInsightRepository {
  /** Cached per `includeGoals` flag. */
  readonly fetchInsights: (options?: FetchInsightsOptions) => Promise<Result<InsightsResponse, RepositoryError>>;
  readonly fetchGoalInsights: (
    goalId: string,
    options?: LoadOptions
  ) => Promise<Result<InsightsResponse, RepositoryError>>;
  /** The symbol is case-insensitive. */
  readonly fetchStockExplanation: (
    symbol: string,
    options?: LoadOptions
  ) => Promise<Result<StockExplanation, RepositoryError>>;
  readonly fetchInvestingTips: (options?: LoadOptions) => Promise<Result<InvestingTip[], RepositoryError>>;
  readonly fetchAllocationSuggestion: (
    request: AllocationRequest
  ) => Promise<Result<AllocationSuggestion, RepositoryError>>;
  /** Fails with EMPTY_MESSAGE for blank input. */
  readonly sendMessage: (
    message: string,
    options?: SendMessageOptions
  ) => Promise<Result<ChatReply, RepositoryError>>;
  readonly clearInsightsCache: () => void;
  readonly invalidateCache: () => void;
}
