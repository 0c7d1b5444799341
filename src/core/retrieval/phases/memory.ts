/**
 * Memory Phase - Recall entities from conversation memory
 *
 * Relevant remembered entities come back as candidates without a
 * retrieval similarity; their memory weights travel as annotations and
 * the reranker turns them into boosts. Stored entity data is loaded for
 * them when the store has it.
 */

import { createCandidate } from '@/core/entities/candidate';
import type { EntityCandidate } from '@/core/entities/types';
import type { ConversationMemoryService, RecalledEntityWithTopic } from '@/core/memory/service';
import type { GraphClient, StoredEntity } from '@/providers/graph/types';
import { logWarning } from '@/utils/logger';
import { candidateFromStored } from '../utils';

export async function recallMemoryCandidates(
  memoryService: ConversationMemoryService,
  graphClient: GraphClient,
  conversationId: string,
  query: string,
  maxEntities: number,
  signal?: AbortSignal
): Promise<EntityCandidate[]> {
  const recalled = await memoryService.getRelevantEntities(conversationId, query, maxEntities);
  if (recalled.length === 0) return [];
  signal?.throwIfAborted();

  const stored = await loadStored(
    graphClient,
    recalled.map((r) => r.entityId)
  );

  return recalled.map((entry) => {
    const annotations = {
      memoryBoosted: true,
      memoryRelevance: entry.memoryRelevance,
      storedRelevance: entry.relevanceScore,
      memoryBoostWeight: entry.boostWeight,
      topicBoost: entry.topicBoost
    };
    const entity = stored.get(entry.entityId);
    return entity
      ? candidateFromStored(entity, 0, 'memory', annotations)
      : fromMemoryOnly(entry, annotations);
  });
}

async function loadStored(graphClient: GraphClient, ids: string[]): Promise<Map<string, StoredEntity>> {
  try {
    const entities = await graphClient.getEntitiesByIds(ids);
    return new Map(entities.map((e) => [e.entityId, e]));
  } catch (error) {
    logWarning('Failed to load remembered entities', error);
    return new Map();
  }
}

function fromMemoryOnly(
  entry: RecalledEntityWithTopic,
  annotations: EntityCandidate['annotations']
): EntityCandidate {
  return createCandidate({
    entityId: entry.entityId,
    domain: entry.domain,
    area: entry.area,
    similarity: 0,
    source: 'memory',
    annotations
  });
}
