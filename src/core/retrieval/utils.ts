/**
 * Retrieval Utilities
 */

import { createCandidate } from '@/core/entities/candidate';
import type { CandidateAnnotations, CandidateSource, EntityCandidate } from '@/core/entities/types';
import type { StoredEntity } from '@/providers/graph/types';
import { withTimeout } from '@/utils/async';
import { logWarning } from '@/utils/logger';
import type { RetrievalStage } from './types';

/**
 * Candidate from a stored entity. The stored embedding is not carried over.
 */
export function candidateFromStored(
  entity: StoredEntity,
  similarity: number,
  source: CandidateSource,
  annotations: CandidateAnnotations = {}
): EntityCandidate {
  return createCandidate({
    entityId: entity.entityId,
    domain: entity.domain,
    area: entity.area,
    state: entity.state,
    deviceClass: entity.deviceClass,
    friendlyName: entity.friendlyName,
    text: entity.text,
    attributes: entity.attributes,
    similarity,
    source,
    annotations
  });
}

export interface StageOutcome<T> {
  value: T;
  durationMs: number;
  /** Message of the error that replaced the value with the fallback */
  error: string | null;
}

export interface RunStageOptions<T> {
  timeoutMs: number;
  fallback: T;
  signal?: AbortSignal;
}

/**
 * Run one pipeline stage under a timeout. A failure or timeout yields the
 * fallback value and is logged; an abort is rethrown.
 */
export async function runStage<T>(
  stage: RetrievalStage,
  task: () => Promise<T>,
  options: RunStageOptions<T>
): Promise<StageOutcome<T>> {
  options.signal?.throwIfAborted();
  const start = Date.now();

  try {
    const value = await withTimeout(task(), options.timeoutMs, {
      context: stage,
      signal: options.signal
    });
    return { value, durationMs: Date.now() - start, error: null };
  } catch (error) {
    if (options.signal?.aborted) throw error;
    logWarning(`Retrieval stage ${stage} failed`, error);
    return {
      value: options.fallback,
      durationMs: Date.now() - start,
      error: error instanceof Error ? error.message : String(error)
    };
  }
}
