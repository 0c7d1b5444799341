/**
 * Vercel AI SDK v6 LLM Client
 *
 * Plain completions through generateText; JSON through the structured
 * output tiers. No streaming: summaries are parsed as a whole.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { z } from 'zod';
import { executeWithStrategies, getDefaultCapabilities, type ProviderCapabilities } from './structured';
import type { CompletionOptions, JSONCompletionOptions, LLMClient, Message } from './types';

export class VercelLLMClient implements LLMClient {
  readonly modelId: string;

  constructor(
    private readonly model: LanguageModelV3,
    readonly capabilities: ProviderCapabilities = getDefaultCapabilities('openai-compatible')
  ) {
    this.modelId = model.modelId;
  }

  async complete(messages: Message[], options: CompletionOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      messages,
      maxOutputTokens: options.maxTokens,
      temperature: options.temperature,
      abortSignal: options.abortSignal
    });
    return text;
  }

  completeJSON<T>(messages: Message[], schema: z.ZodType<T>, options: JSONCompletionOptions = {}): Promise<T> {
    const { strategyOptions, ...completion } = options;
    return executeWithStrategies(this.model, messages, schema, this.capabilities, completion, strategyOptions);
  }
}
