/**
 * Enrichment Types
 */

import type { z } from 'zod';
import type { ChatMessage } from '@/core/conversation/types';

/**
 * Agent definition for LLM-powered analysis.
 *
 * The systemPrompt defines the agent's identity and output format;
 * formatInput renders the structured input as the user message.
 */
export interface Agent<I, O> {
  systemPrompt: string;
  outputSchema: z.ZodType<O>;
  formatInput: (input: I) => string;
}

/**
 * LLM call settings for agents.
 */
export interface AgentCallConfig {
  maxRetries: number;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface EnrichmentJob {
  conversationId: string;
  query: string;
  history: ChatMessage[];
}

export interface EnricherStats {
  workers: number;
  queueSize: number;
  active: number;
  pending: number;
  completed: number;
  failed: number;
  dropped: number;
}
