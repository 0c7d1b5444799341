/**
 * AI SDK Providers
 *
 * Provider instances shared by the embedding and LLM factories. Requests
 * go straight to each provider's API; ollama and self-hosted endpoints
 * are reached through the OpenAI-compatible provider.
 */

import { type AnthropicProvider, createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI, type GoogleGenerativeAIProvider } from '@ai-sdk/google';
import { createOpenAI, type OpenAIProvider } from '@ai-sdk/openai';
import { createOpenAICompatible, type OpenAICompatibleProvider } from '@ai-sdk/openai-compatible';

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434/v1';

export interface ProviderConnection {
  apiKey?: string;
  baseUrl?: string;
  /** Name reported by openai-compatible endpoints */
  providerName?: string;
}

export function openAIProvider(connection: ProviderConnection): OpenAIProvider {
  return createOpenAI({ apiKey: connection.apiKey });
}

export function anthropicProvider(connection: ProviderConnection): AnthropicProvider {
  return createAnthropic({ apiKey: connection.apiKey });
}

export function googleProvider(connection: ProviderConnection): GoogleGenerativeAIProvider {
  return createGoogleGenerativeAI({ apiKey: connection.apiKey });
}

/**
 * Ollama's OpenAI-compatible API. The SDK wants an API key; ollama ignores it.
 */
export function ollamaProvider(connection: ProviderConnection): OpenAICompatibleProvider {
  return createOpenAICompatible({
    name: 'ollama',
    baseURL: connection.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
    apiKey: 'ollama'
  });
}

/**
 * Any endpoint speaking the OpenAI wire format.
 *
 * @throws Error when no baseUrl is given
 */
export function compatibleProvider(
  connection: ProviderConnection,
  supportsStructuredOutputs = false
): OpenAICompatibleProvider {
  if (!connection.baseUrl) {
    throw new Error('baseUrl required for openai-compatible provider');
  }
  return createOpenAICompatible({
    name: connection.providerName ?? 'openai-compatible',
    baseURL: connection.baseUrl,
    apiKey: connection.apiKey ?? '',
    supportsStructuredOutputs
  });
}
