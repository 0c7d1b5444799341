/**
 * Neo4j Operations Module
 *
 * Re-exports all operation functions for clean imports.
 */

// Cluster operations
export {
  addClusterMember,
  createCluster,
  getCluster,
  getClusterEntities,
  listClusters
} from './clusters';

// Document operations
export {
  deleteDocument,
  deleteExpiredDocuments,
  getDocument,
  putDocument
} from './documents';

// Entity operations
export { findEntities, getEntitiesByIds, searchEntities } from './entities';
