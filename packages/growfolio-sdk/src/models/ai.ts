import { z } from 'zod';
import { timestampSchema } from './common.js';

export const insightSchema = z.object({
  id: z.string(),
  type: z.string(),
  title: z.string(),
  content: z.string(),
  priority: z.enum(['low', 'medium', 'high']).default('medium'),
  actionType: z.string().nullish(),
});

export type AIInsight = z.infer<typeof insightSchema>;

export const insightsResponseSchema = z.object({
  insights: z.array(insightSchema),
  generatedAt: timestampSchema,
  healthScore: z.number().nullish(),
  summary: z.string().nullish(),
});

export type InsightsResponse = z.infer<typeof insightsResponseSchema>;

export const stockExplanationSchema = z.object({
  symbol: z.string(),
  explanation: z.string(),
  generatedAt: timestampSchema,
});

export type StockExplanation = z.infer<typeof stockExplanationSchema>;

export const investingTipSchema = z.object({
  id: z.string(),
  title: z.string(),
  content: z.string(),
  category: z.string(),
});

export type InvestingTip = z.infer<typeof investingTipSchema>;

export const allocationSuggestionSchema = z.object({
  suggestions: z.array(
    z.object({
      symbol: z.string(),
      percentage: z.number(),
      rationale: z.string().nullish(),
    })
  ),
  summary: z.string().nullish(),
});

export type AllocationSuggestion = z.infer<typeof allocationSuggestionSchema>;

export interface AllocationRequest {
  readonly investmentAmount: number;
  readonly riskTolerance: 'conservative' | 'moderate' | 'aggressive';
  readonly timeHorizon: 'short' | 'medium' | 'long';
}

export const chatReplySchema = z.object({
  message: z.string(),
  suggestedActions: z.array(z.string()).default([]),
});

export type ChatReply = z.infer<typeof chatReplySchema>;

export interface ChatTurn {
  readonly role: 'user' | 'assistant';
  readonly content: string;
}
