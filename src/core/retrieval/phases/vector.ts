/**
 * Vector Phase - Similarity search over every entity
 *
 * Runs only when cluster expansion came back thinner than the scope's
 * minimum; asks for the scope's maximum.
 */

import type { EntityCandidate } from '@/core/entities/types';
import type { GraphClient } from '@/providers/graph/types';
import { candidateFromStored } from '../utils';

export async function vectorFallback(
  graphClient: GraphClient,
  queryVector: number[],
  limit: number
): Promise<EntityCandidate[]> {
  if (queryVector.length === 0 || limit <= 0) return [];

  const results = await graphClient.searchEntities(queryVector, limit);
  return results.map((r) =>
    candidateFromStored(r.node, r.score, 'vector', { vectorScore: r.score })
  );
}
