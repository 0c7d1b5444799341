import type { z } from 'zod';
import type { LLMProvider } from '@/config/schema';
import type { StrategyExecutorOptions } from './structured';

export type { LLMProvider };

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** Unset fields fall back to the provider's defaults */
export interface CompletionOptions {
  maxTokens?: number;
  /** 0-2 for most providers */
  temperature?: number;
  abortSignal?: AbortSignal;
}

export interface JSONCompletionOptions extends CompletionOptions {
  strategyOptions?: StrategyExecutorOptions;
}

/**
 * Chat model used for conversation summaries.
 */
export interface LLMClient {
  complete(messages: Message[], options?: CompletionOptions): Promise<string>;

  /**
   * Completion parsed into `schema`, through the structured output tiers
   * the provider supports.
   *
   * @throws Error when no tier produced a valid answer
   */
  completeJSON<T>(
    messages: Message[],
    schema: z.ZodType<T>,
    options?: JSONCompletionOptions
  ): Promise<T>;

  readonly modelId: string;
}
