/**
 * Embedding Vector Checks
 */

/**
 * Scale a vector to unit length. The zero vector comes back as is.
 */
export function normalizeL2(vector: readonly number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return [...vector];
  return vector.map((val) => val / magnitude);
}

/**
 * Reject a provider answer that would not fit the store's vector index.
 *
 * @throws Error on a length other than `expected` or a non-finite component
 */
export function assertEmbeddingShape(vector: readonly number[], expected: number, modelId: string): void {
  if (vector.length !== expected) {
    throw new Error(
      `Embedding model ${modelId} returned ${vector.length} dimensions, index expects ${expected}`
    );
  }
  if (!vector.every(Number.isFinite)) {
    throw new Error(`Embedding model ${modelId} returned a non-finite component`);
  }
}
