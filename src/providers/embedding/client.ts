/**
 * Vercel AI SDK v6 Embedding Client
 *
 * Wraps embed/embedMany. Every vector is checked against the configured
 * dimension and L2-normalized, so dot product and cosine agree downstream.
 */

import type { EmbeddingModel } from 'ai';
import { embed, embedMany } from 'ai';
import type { EmbeddingClient, EmbedOptions } from './types';
import { assertEmbeddingShape, normalizeL2 } from './vectors';

function assertEmbeddable(text: string): void {
  if (!text.trim()) {
    throw new Error('Cannot embed empty or whitespace-only text');
  }
}

export class VercelEmbeddingClient implements EmbeddingClient {
  readonly modelId: string;

  constructor(
    private readonly model: EmbeddingModel,
    readonly dimensions: number
  ) {
    this.modelId = typeof model === 'string' ? model : model.modelId;
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    assertEmbeddable(text);

    const { embedding } = await embed({
      model: this.model,
      value: text,
      abortSignal: options.abortSignal
    });

    return this.finish(embedding);
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];
    texts.forEach(assertEmbeddable);

    const { embeddings } = await embedMany({
      model: this.model,
      values: texts,
      abortSignal: options.abortSignal
    });

    return embeddings.map((embedding) => this.finish(embedding));
  }

  private finish(embedding: number[]): number[] {
    assertEmbeddingShape(embedding, this.dimensions, this.modelId);
    return normalizeL2(embedding);
  }
}
