/**
 * Graph Provider Types
 *
 * Storage-facing records and the GraphClient contract. Records use
 * camelCase; the Neo4j implementation maps them to snake_case properties.
 */

import type { ClusterRole, ClusterType } from '@/core/entities/types';

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * CONNECTION_ERROR and TRANSIENT_ERROR mean the store is unavailable
 * right now; the others are answers about the request itself.
 */
export type GraphErrorType =
  | 'CONNECTION_ERROR'
  | 'CONSTRAINT_VIOLATION'
  | 'NOT_FOUND'
  | 'QUERY_ERROR'
  | 'TRANSIENT_ERROR';

/**
 * The only error a GraphClient implementation throws.
 */
export class GraphClientError extends Error {
  override readonly name = 'GraphClientError';

  constructor(
    message: string,
    readonly type: GraphErrorType,
    cause?: Error
  ) {
    super(message, cause ? { cause } : undefined);
  }
}

// ============================================================
// ENTITY RECORDS
// ============================================================

/**
 * A smart-home entity as indexed in the store. Ingestion happens
 * elsewhere; this service only reads entities.
 */
export interface StoredEntity {
  entityId: string;
  domain: string;
  area: string | null;
  state: string | null;
  deviceClass: string | null;
  friendlyName: string | null;
  text: string | null;
  attributes: Record<string, unknown>;
  embedding: number[] | null;
}

/**
 * Optional restriction for entity lookups.
 * Empty or missing lists do not filter.
 */
export interface EntityFilter {
  domains?: string[];
  areas?: string[];
}

/**
 * Search result with similarity score.
 */
export interface SearchResult<T> {
  node: T;
  score: number;
}

// ============================================================
// CLUSTER RECORDS
// ============================================================

export type ClusterScope = 'specific' | 'area_wide' | 'global';

export interface ClusterRecord {
  key: string;
  name: string;
  type: ClusterType;
  scope: ClusterScope;
  description: string;
  /** Empty when embedding failed; such clusters never match a search */
  embedding: number[];
  queryPatterns: string[];
  areas: string[];
  domains: string[];
  createdAt: string;
  updatedAt: string;
}

export type CreateClusterInput = Omit<ClusterRecord, 'createdAt' | 'updatedAt'>;

export interface MembershipInput {
  clusterKey: string;
  entityId: string;
  role: ClusterRole;
  weight: number;
  contextBoost: number;
}

/**
 * An entity reached over a CONTAINS_ENTITY edge.
 */
export interface ClusterEntityRecord {
  entity: StoredEntity;
  clusterKey: string;
  role: ClusterRole;
  weight: number;
  contextBoost: number;
}

// ============================================================
// DOCUMENT RECORDS
// ============================================================

/**
 * Opaque JSON document with an expiry, used for conversation memory.
 */
export interface StoredDocument {
  key: string;
  /** Serialized JSON */
  body: string;
  /** ISO 8601; the document is dead once this passes */
  expiresAt: string;
}

// ============================================================
// CLIENT INTERFACE
// ============================================================

/**
 * Abstract interface for the backing store.
 */
export interface GraphClient {
  // --- Connection management ---
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  /**
   * Create constraints and indexes. Safe to run repeatedly.
   * @param dimensions - Vector embedding dimensions
   */
  initializeSchema(dimensions: number): Promise<void>;

  // --- Entities ---

  /**
   * Top entities by cosine similarity to `vector`, best first.
   */
  searchEntities(
    vector: number[],
    limit: number,
    filter?: EntityFilter
  ): Promise<SearchResult<StoredEntity>[]>;

  /**
   * Entities by id. Unknown ids are skipped.
   */
  getEntitiesByIds(ids: string[]): Promise<StoredEntity[]>;

  /**
   * Entities matching a filter, ordered by id.
   */
  findEntities(filter: EntityFilter, limit: number): Promise<StoredEntity[]>;

  // --- Clusters ---

  /**
   * @throws GraphClientError with type CONSTRAINT_VIOLATION when the key exists
   */
  createCluster(input: CreateClusterInput): Promise<ClusterRecord>;
  getCluster(key: string): Promise<ClusterRecord | null>;
  listClusters(types?: readonly ClusterType[]): Promise<ClusterRecord[]>;

  /**
   * Add a membership edge. The same entity may belong to many clusters.
   * @throws GraphClientError with type NOT_FOUND when cluster or entity is missing
   */
  addClusterMember(input: MembershipInput): Promise<void>;
  getClusterEntities(clusterKeys: string[], role?: ClusterRole): Promise<ClusterEntityRecord[]>;

  // --- Documents ---
  getDocument(key: string): Promise<StoredDocument | null>;
  /** Insert or replace */
  putDocument(document: StoredDocument): Promise<void>;
  /** @returns whether a document was deleted */
  deleteDocument(key: string): Promise<boolean>;
  /**
   * Delete documents under `prefix` whose expiry is before `now`.
   * @returns number of documents deleted
   */
  deleteExpiredDocuments(prefix: string, now: string): Promise<number>;
}
