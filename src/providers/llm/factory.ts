/**
 * LLM Client Factory
 *
 * One language model per provider, built on the shared AI SDK provider
 * instances. Capabilities decide which structured output tiers are tried.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import type { LLMProvider } from '@/config/schema';
import {
  anthropicProvider,
  compatibleProvider,
  googleProvider,
  ollamaProvider,
  openAIProvider,
  type ProviderConnection
} from '@/providers/sdk';
import { VercelLLMClient } from './client';
import { getDefaultCapabilities, type ProviderCapabilities } from './structured';
import type { LLMClient } from './types';

export interface CreateLLMClientOptions extends ProviderConnection {
  /** Override detected capabilities */
  capabilities?: Partial<ProviderCapabilities>;
}

const LANGUAGE_MODELS: Record<LLMProvider, (model: string, connection: ProviderConnection) => LanguageModelV3> = {
  openai: (model, connection) => openAIProvider(connection)(model),
  anthropic: (model, connection) => anthropicProvider(connection)(model),
  google: (model, connection) => googleProvider(connection)(model),
  ollama: (model, connection) => ollamaProvider(connection).languageModel(model),
  'openai-compatible': (model, connection) => compatibleProvider(connection, true).languageModel(model)
};

export function createLLMClient(
  provider: LLMProvider,
  model: string,
  options: CreateLLMClientOptions = {}
): LLMClient {
  const { capabilities: overrides, ...connection } = options;
  const capabilities: ProviderCapabilities = {
    ...getDefaultCapabilities(provider),
    ...overrides,
    provider
  };
  return new VercelLLMClient(LANGUAGE_MODELS[provider](model, connection), capabilities);
}
