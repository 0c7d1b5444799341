/**
 * Graph Provider Module
 *
 * The GraphClient contract the core codes against, and its Neo4j
 * implementation.
 */

export { type Neo4jConfig, Neo4jGraphClient } from './neo4j';

// Types
export type {
  ClusterEntityRecord,
  ClusterRecord,
  ClusterScope,
  CreateClusterInput,
  EntityFilter,
  GraphClient,
  GraphErrorType,
  MembershipInput,
  SearchResult,
  StoredDocument,
  StoredEntity
} from './types';
export { GraphClientError } from './types';
