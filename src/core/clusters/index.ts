/**
 * Cluster Module
 */

export { ClusterManager, type SearchClustersOptions } from './manager';
export {
  BootstrapFileSchema,
  type BootstrapResult,
  type ClusterDefinition,
  type ClusterDefinitionInput,
  ClusterDefinitionSchema,
  type ClusterMatch
} from './types';
