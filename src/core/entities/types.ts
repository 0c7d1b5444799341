/**
 * Entity Candidate Types
 *
 * The value type that flows through every retrieval stage. Stages add
 * annotations; they never rewrite fields an earlier stage produced.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Cluster Membership
// ═══════════════════════════════════════════════════════════════════════════════

export const CLUSTER_TYPES = ['micro_cluster', 'macro_cluster', 'overview_cluster'] as const;
export type ClusterType = (typeof CLUSTER_TYPES)[number];

export const CLUSTER_ROLES = ['primary', 'related'] as const;
export type ClusterRole = (typeof CLUSTER_ROLES)[number];

/**
 * Where a candidate came from, attached by cluster expansion.
 */
export interface ClusterContext {
  clusterKey: string;
  role: ClusterRole;
  weight: number;
  contextBoost: number;
  /** Similarity of the cluster itself to the query */
  clusterScore: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate
// ═══════════════════════════════════════════════════════════════════════════════

export type CandidateSource = 'cluster' | 'vector' | 'memory';

/**
 * Stage-specific annotations. `extra` is the open end for anything
 * not modelled here.
 */
export interface CandidateAnnotations {
  clusterContext?: ClusterContext;
  /** Raw vector-search similarity, when the vector stage saw this entity */
  vectorScore?: number;
  memoryBoosted?: boolean;
  memoryRelevance?: number;
  /** Relevance memory stored for the entity on an earlier turn */
  storedRelevance?: number;
  memoryBoostWeight?: number;
  /** Topic-aware multiplier from the stored conversation summary */
  topicBoost?: number;
  extra?: Record<string, unknown>;
}

export interface EntityCandidate {
  /** Domain-prefixed id, e.g. "sensor.nappali_homerseklet" */
  entityId: string;
  domain: string;
  area: string | null;
  state: string | null;
  deviceClass: string | null;
  friendlyName: string | null;
  /** Free text the entity was indexed with */
  text: string | null;
  attributes: Record<string, unknown>;
  /** Retrieval similarity in [0, 1] */
  similarity: number;
  source: CandidateSource;
  annotations: CandidateAnnotations;
}

/**
 * Wire shape handed to external formatters and HTTP clients.
 */
export interface WireEntity {
  entity_id: string;
  domain: string;
  area: string | null;
  state: string | null;
  similarity: number;
  _memory_boosted: boolean;
  _cluster_context: {
    cluster_key: string;
    role: ClusterRole;
    weight: number;
    context_boost: number;
  } | null;
}
