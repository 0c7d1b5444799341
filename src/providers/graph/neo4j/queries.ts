/**
 * Neo4j Query Repository
 *
 * Centralized Cypher queries. Each block notes the constraint the
 * query relies on.
 */

import { INDEXES, LABELS, RELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * Entities are keyed by their Home Assistant id, clusters by key and
 * documents by key. All three are unique.
 */
export const CONSTRAINTS = {
  ENTITY_ID: `CREATE CONSTRAINT entity_id_unique IF NOT EXISTS FOR (e:${LABELS.ENTITY}) REQUIRE e.entity_id IS UNIQUE`,
  CLUSTER_KEY: `CREATE CONSTRAINT cluster_key_unique IF NOT EXISTS FOR (c:${LABELS.CLUSTER}) REQUIRE c.key IS UNIQUE`,
  DOCUMENT_KEY: `CREATE CONSTRAINT document_key_unique IF NOT EXISTS FOR (d:${LABELS.DOCUMENT}) REQUIRE d.key IS UNIQUE`
} as const;

/**
 * Filtering indexes: entity domain/area for filtered lookups,
 * cluster type for scope-restricted listing, document expiry for sweeps.
 */
export const RANGE_INDEXES = {
  ENTITY_DOMAIN: `CREATE INDEX entity_domain IF NOT EXISTS FOR (e:${LABELS.ENTITY}) ON (e.domain)`,
  ENTITY_AREA: `CREATE INDEX entity_area IF NOT EXISTS FOR (e:${LABELS.ENTITY}) ON (e.area)`,
  CLUSTER_TYPE: `CREATE INDEX cluster_type IF NOT EXISTS FOR (c:${LABELS.CLUSTER}) ON (c.type)`,
  DOCUMENT_EXPIRES_AT: `CREATE INDEX document_expires_at IF NOT EXISTS FOR (d:${LABELS.DOCUMENT}) ON (d.expires_at)`
} as const;

/**
 * Cosine vector index over entity embeddings.
 */
export function createVectorIndexQuery(
  indexName: string,
  label: string,
  dimensions: number
): string {
  return `CREATE VECTOR INDEX ${indexName} IF NOT EXISTS FOR (n:${label}) ON (n.embedding) OPTIONS {indexConfig: {\`vector.dimensions\`: ${dimensions}, \`vector.similarity_function\`: 'cosine'}}`;
}

// ============================================================
// ENTITY QUERIES
// ============================================================

/**
 * The vector index cannot pre-filter, so filtered searches over-fetch
 * and filter afterwards. $fetch >= $limit.
 */
export const SEARCH_ENTITIES = `
  CALL db.index.vector.queryNodes('${INDEXES.ENTITY_VECTOR}', $fetch, $vector)
  YIELD node, score
  WHERE ($domains IS NULL OR node.domain IN $domains)
    AND ($areas IS NULL OR node.area IN $areas)
  RETURN node, score
  ORDER BY score DESC
  LIMIT $limit
`;

export const GET_ENTITIES_BY_IDS = `
  UNWIND $ids AS id
  MATCH (e:${LABELS.ENTITY} {entity_id: id})
  RETURN e AS node
`;

export const FIND_ENTITIES = `
  MATCH (e:${LABELS.ENTITY})
  WHERE ($domains IS NULL OR e.domain IN $domains)
    AND ($areas IS NULL OR e.area IN $areas)
  RETURN e AS node
  ORDER BY e.entity_id
  LIMIT $limit
`;

// ============================================================
// CLUSTER QUERIES
// ============================================================

/**
 * Plain CREATE: the key constraint turns a duplicate into a
 * constraint violation, which bootstrap treats as "already seeded".
 */
export const CREATE_CLUSTER = `
  CREATE (c:${LABELS.CLUSTER} {
    key: $key,
    name: $name,
    type: $type,
    scope: $scope,
    description: $description,
    embedding: $embedding,
    query_patterns: $query_patterns,
    areas: $areas,
    domains: $domains,
    created_at: $timestamp,
    updated_at: $timestamp
  })
  RETURN c AS node
`;

export const GET_CLUSTER = `
  MATCH (c:${LABELS.CLUSTER} {key: $key})
  RETURN c AS node
`;

export const LIST_CLUSTERS = `
  MATCH (c:${LABELS.CLUSTER})
  WHERE $types IS NULL OR c.type IN $types
  RETURN c AS node
  ORDER BY c.key
`;

/**
 * CREATE, not MERGE: an entity may hold several memberships,
 * even in the same cluster with different roles.
 */
export const ADD_CLUSTER_MEMBER = `
  MATCH (c:${LABELS.CLUSTER} {key: $cluster_key})
  MATCH (e:${LABELS.ENTITY} {entity_id: $entity_id})
  CREATE (c)-[r:${RELS.CONTAINS_ENTITY} {
    role: $role,
    weight: $weight,
    context_boost: $context_boost,
    created_at: $timestamp
  }]->(e)
  RETURN count(r) AS created
`;

export const GET_CLUSTER_ENTITIES = `
  UNWIND $keys AS key
  MATCH (c:${LABELS.CLUSTER} {key: key})-[r:${RELS.CONTAINS_ENTITY}]->(e:${LABELS.ENTITY})
  WHERE $role IS NULL OR r.role = $role
  RETURN e AS node, c.key AS cluster_key, r.role AS role,
         r.weight AS weight, r.context_boost AS context_boost
`;

// ============================================================
// DOCUMENT QUERIES
// ============================================================

export const GET_DOCUMENT = `
  MATCH (d:${LABELS.DOCUMENT} {key: $key})
  RETURN d AS node
`;

/**
 * Last write wins per key.
 */
export const PUT_DOCUMENT = `
  MERGE (d:${LABELS.DOCUMENT} {key: $key})
  SET d.body = $body, d.expires_at = $expires_at, d.updated_at = $timestamp
`;

export const DELETE_DOCUMENT = `
  MATCH (d:${LABELS.DOCUMENT} {key: $key})
  DELETE d
  RETURN count(*) AS deleted
`;

/**
 * A document expires at expires_at itself, as on read. Concurrent sweeps
 * may race: whichever matches a node first deletes it, the other sees
 * nothing and reports 0 for it.
 */
export const DELETE_EXPIRED_DOCUMENTS = `
  MATCH (d:${LABELS.DOCUMENT})
  WHERE d.key STARTS WITH $prefix AND d.expires_at <= $now
  DELETE d
  RETURN count(*) AS deleted
`;
