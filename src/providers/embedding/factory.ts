/**
 * Embedding Client Factory
 *
 * Entity texts and queries must land in the same vector space as the
 * store's vector index, so every provider is asked for the configured
 * dimension where its API takes one.
 */

import type { EmbeddingModelV3 } from '@ai-sdk/provider';
import { defaultEmbeddingSettingsMiddleware, wrapEmbeddingModel } from 'ai';
import type { EmbeddingProvider } from '@/config/schema';
import {
  compatibleProvider,
  googleProvider,
  ollamaProvider,
  openAIProvider,
  type ProviderConnection
} from '@/providers/sdk';
import { VercelEmbeddingClient } from './client';
import type { EmbeddingClient } from './types';

export type EmbeddingClientOptions = ProviderConnection;

type ModelBuilder = (model: string, dimensions: number, connection: ProviderConnection) => EmbeddingModelV3;

const EMBEDDING_MODELS: Record<EmbeddingProvider, ModelBuilder> = {
  openai: (model, dimensions, connection) =>
    withProviderOptions(openAIProvider(connection).embedding(model), 'openai', { dimensions }),

  google: (model, dimensions, connection) =>
    withProviderOptions(googleProvider(connection).embedding(model), 'google', {
      outputDimensionality: dimensions
    }),

  // Dimension is fixed by the pulled model
  ollama: (model, _dimensions, connection) => ollamaProvider(connection).embeddingModel(model),

  // Not every compatible endpoint accepts a dimension; the client checks the result instead
  'openai-compatible': (model, _dimensions, connection) =>
    compatibleProvider(connection).embeddingModel(model)
};

export function createEmbeddingClient(
  provider: EmbeddingProvider,
  model: string,
  dimensions: number,
  options: EmbeddingClientOptions = {}
): EmbeddingClient {
  const embeddingModel = EMBEDDING_MODELS[provider](model, dimensions, options);
  return new VercelEmbeddingClient(embeddingModel, dimensions);
}

/**
 * Set provider options once on the model instead of on every call.
 */
function withProviderOptions(
  model: EmbeddingModelV3,
  providerKey: string,
  providerOptions: Record<string, number>
): EmbeddingModelV3 {
  return wrapEmbeddingModel({
    model,
    middleware: defaultEmbeddingSettingsMiddleware({
      settings: { providerOptions: { [providerKey]: providerOptions } }
    })
  });
}
