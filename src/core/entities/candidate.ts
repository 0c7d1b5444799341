/**
 * Entity Candidate Helpers
 */

import type {
  CandidateAnnotations,
  CandidateSource,
  EntityCandidate,
  WireEntity
} from './types';

/**
 * Domain prefix of an entity id ("light.konyha" → "light").
 * Ids without a dot have no domain.
 */
export function domainOf(entityId: string): string {
  const dot = entityId.indexOf('.');
  return dot > 0 ? entityId.slice(0, dot) : '';
}

export interface CandidateInit {
  entityId: string;
  similarity: number;
  source: CandidateSource;
  domain?: string | null;
  area?: string | null;
  state?: string | null;
  deviceClass?: string | null;
  friendlyName?: string | null;
  text?: string | null;
  attributes?: Record<string, unknown>;
  annotations?: CandidateAnnotations;
}

/**
 * Build a candidate, deriving the domain from the id when it is missing
 * and clamping similarity to [0, 1].
 */
export function createCandidate(init: CandidateInit): EntityCandidate {
  return {
    entityId: init.entityId,
    domain: init.domain || domainOf(init.entityId),
    area: init.area ?? null,
    state: init.state ?? null,
    deviceClass: init.deviceClass ?? null,
    friendlyName: init.friendlyName ?? null,
    text: init.text ?? null,
    attributes: init.attributes ?? {},
    similarity: Math.min(1, Math.max(0, Number.isFinite(init.similarity) ? init.similarity : 0)),
    source: init.source,
    annotations: init.annotations ?? {}
  };
}

/**
 * Return a copy with extra annotations. Existing annotation keys win,
 * so a later stage cannot silently overwrite an earlier one.
 */
export function annotate(
  candidate: EntityCandidate,
  annotations: CandidateAnnotations
): EntityCandidate {
  return {
    ...candidate,
    annotations: { ...annotations, ...candidate.annotations }
  };
}

/**
 * Merge candidate lists into one, keyed by entity id.
 *
 * The first occurrence fixes the position (so the result is stable), the
 * best similarity wins, and annotations from every occurrence are combined.
 */
export function mergeCandidates(...lists: readonly (readonly EntityCandidate[])[]): EntityCandidate[] {
  const merged = new Map<string, EntityCandidate>();

  for (const list of lists) {
    for (const candidate of list) {
      const existing = merged.get(candidate.entityId);
      if (!existing) {
        merged.set(candidate.entityId, candidate);
        continue;
      }

      const [best, other] =
        candidate.similarity > existing.similarity ? [candidate, existing] : [existing, candidate];
      merged.set(candidate.entityId, {
        ...best,
        area: best.area ?? other.area,
        state: best.state ?? other.state,
        deviceClass: best.deviceClass ?? other.deviceClass,
        friendlyName: best.friendlyName ?? other.friendlyName,
        text: best.text ?? other.text,
        annotations: { ...other.annotations, ...best.annotations }
      });
    }
  }

  return Array.from(merged.values());
}

/**
 * Convert to the snake_case wire shape.
 */
export function toWireEntity(candidate: EntityCandidate): WireEntity {
  const cluster = candidate.annotations.clusterContext;
  return {
    entity_id: candidate.entityId,
    domain: candidate.domain,
    area: candidate.area,
    state: candidate.state,
    similarity: candidate.similarity,
    _memory_boosted: candidate.annotations.memoryBoosted === true,
    _cluster_context: cluster
      ? {
          cluster_key: cluster.clusterKey,
          role: cluster.role,
          weight: cluster.weight,
          context_boost: cluster.contextBoost
        }
      : null
  };
}
