/**
 * Neo4j Schema Registry
 *
 * Single source of truth for all database schema elements.
 */

// ============================================================
// NODE LABELS
// ============================================================

/**
 * - Entity: An indexed smart-home entity (read-only here)
 * - Cluster: A named semantic group of entities
 * - MemoryDocument: TTL'd JSON document (conversation memory, summaries)
 */
export const LABELS = {
  ENTITY: 'Entity',
  CLUSTER: 'Cluster',
  DOCUMENT: 'MemoryDocument'
} as const;

export type Label = (typeof LABELS)[keyof typeof LABELS];

// ============================================================
// RELATIONSHIP TYPES
// ============================================================

/**
 * - CONTAINS_ENTITY: Cluster -> Entity, carries role, weight and context_boost
 */
export const RELS = {
  CONTAINS_ENTITY: 'CONTAINS_ENTITY'
} as const;

export type RelType = (typeof RELS)[keyof typeof RELS];

// ============================================================
// INDEX NAMES
// ============================================================

export const INDEXES = {
  ENTITY_VECTOR: 'entity_vidx'
} as const;

export type IndexName = (typeof INDEXES)[keyof typeof INDEXES];

// ============================================================
// RETRY CONFIGURATION
// ============================================================

/**
 * Retry settings for transient error handling.
 */
export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY_MS: 100
} as const;
