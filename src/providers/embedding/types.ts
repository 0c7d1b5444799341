import type { EmbeddingProvider } from '@/config/schema';

export type { EmbeddingProvider };

export interface EmbedOptions {
  /** Cancels the provider request */
  abortSignal?: AbortSignal;
}

export interface EmbeddingClient {
  /**
   * Embed a single text.
   * @param text - The text to embed (must not be empty)
   * @returns L2-normalized embedding vector
   */
  embed(text: string, options?: EmbedOptions): Promise<number[]>;

  /**
   * Embed several texts in one request, preserving order.
   */
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

  /**
   * Set from embedding.dimensions in the service config.
   */
  readonly dimensions: number;

  readonly modelId: string;
}
