/**
 * Cluster Manager
 *
 * Semantic clusters group entities that tend to answer the same kind of
 * question ("climate in a room", "all lights", "house overview"). A
 * cluster is embedded from its description and query patterns; a query
 * vector then finds clusters, and clusters expand to their members.
 */

import type { ClusterRole, ClusterType } from '@/core/entities/types';
import type { EmbeddingClient } from '@/providers/embedding/types';
import {
  type ClusterEntityRecord,
  type ClusterRecord,
  GraphClientError,
  type GraphClient
} from '@/providers/graph/types';
import { logBootstrap, logClusterCreated, logWarning } from '@/utils/logger';
import { computeCosineSimilarity } from '../retrieval/algorithms/similarity';
import bootstrapData from './data/bootstrap.json';
import {
  BootstrapFileSchema,
  type BootstrapResult,
  type ClusterDefinition,
  type ClusterDefinitionInput,
  ClusterDefinitionSchema,
  type ClusterMatch
} from './types';

/** Upper bound on members seeded per bootstrapped cluster */
const BOOTSTRAP_MEMBER_LIMIT = 100;

export interface SearchClustersOptions {
  clusterTypes?: readonly ClusterType[];
  k?: number;
  threshold?: number;
}

export class ClusterManager {
  constructor(
    private readonly graphClient: GraphClient,
    private readonly embeddingClient: EmbeddingClient
  ) {}

  /**
   * Text a cluster is embedded from.
   */
  static embeddingText(description: string, queryPatterns: readonly string[]): string {
    return `${description} Patterns: ${queryPatterns.join(' ')}`;
  }

  /**
   * Create a cluster. An embedding failure still creates the cluster,
   * with an empty embedding that keeps it out of searches.
   *
   * @throws GraphClientError CONSTRAINT_VIOLATION when the key exists
   */
  async createCluster(input: ClusterDefinitionInput): Promise<ClusterRecord> {
    const definition = ClusterDefinitionSchema.parse(input);

    let embedding: number[] = [];
    try {
      embedding = await this.embeddingClient.embed(
        ClusterManager.embeddingText(definition.description, definition.queryPatterns)
      );
    } catch (error) {
      logWarning(`Failed to embed cluster ${definition.key}`, error);
    }

    const cluster = await this.graphClient.createCluster({ ...definition, embedding });
    logClusterCreated(cluster.key, cluster.type, embedding.length > 0);
    return cluster;
  }

  /**
   * @throws GraphClientError NOT_FOUND when the cluster or entity is missing
   */
  async addEntityToCluster(
    clusterKey: string,
    entityId: string,
    role: ClusterRole = 'primary',
    weight = 1.0,
    contextBoost = 1.0
  ): Promise<void> {
    await this.graphClient.addClusterMember({ clusterKey, entityId, role, weight, contextBoost });
  }

  /**
   * Clusters whose embedding is at least `threshold` similar to the query,
   * best first.
   */
  async searchClusters(
    queryVector: number[],
    options: SearchClustersOptions = {}
  ): Promise<ClusterMatch[]> {
    const { clusterTypes, k = 5, threshold = 0.7 } = options;
    if (queryVector.length === 0 || k <= 0) return [];

    const clusters = await this.graphClient.listClusters(
      clusterTypes && clusterTypes.length > 0 ? clusterTypes : undefined
    );

    return clusters
      .filter((cluster) => cluster.embedding.length > 0)
      .filter((cluster) => !clusterTypes?.length || clusterTypes.includes(cluster.type))
      .map((cluster) => ({
        cluster,
        similarity: computeCosineSimilarity(queryVector, cluster.embedding)
      }))
      .filter((match) => match.similarity >= threshold)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async getClusterEntities(
    clusterKeys: string[],
    roleFilter?: ClusterRole
  ): Promise<ClusterEntityRecord[]> {
    if (clusterKeys.length === 0) return [];
    return this.graphClient.getClusterEntities(clusterKeys, roleFilter);
  }

  async listClusters(types?: readonly ClusterType[]): Promise<ClusterRecord[]> {
    return this.graphClient.listClusters(types);
  }

  /**
   * Seed the bundled clusters. Existing keys are skipped, so running it
   * again changes nothing. Newly created clusters with domains get the
   * matching entities (restricted to the cluster's areas, if any) as
   * primary members.
   */
  async bootstrapInitialClusters(
    definitions: readonly ClusterDefinition[] = BootstrapFileSchema.parse(bootstrapData).clusters
  ): Promise<BootstrapResult> {
    const result: BootstrapResult = { created: [], skipped: [], failed: [], members: 0 };

    for (const definition of definitions) {
      try {
        await this.createCluster(definition);
        result.created.push(definition.key);
      } catch (error) {
        if (error instanceof GraphClientError && error.type === 'CONSTRAINT_VIOLATION') {
          result.skipped.push(definition.key);
        } else {
          result.failed.push(definition.key);
          logWarning(`Failed to create cluster ${definition.key}`, error);
        }
        continue;
      }

      result.members += await this.seedMembers(definition);
    }

    logBootstrap(result.created.length, result.skipped.length, result.members);
    return result;
  }

  private async seedMembers(definition: ClusterDefinition): Promise<number> {
    if (definition.domains.length === 0) return 0;

    try {
      const entities = await this.graphClient.findEntities(
        { domains: definition.domains, areas: definition.areas },
        BOOTSTRAP_MEMBER_LIMIT
      );
      for (const entity of entities) {
        await this.addEntityToCluster(definition.key, entity.entityId, 'primary');
      }
      return entities.length;
    } catch (error) {
      logWarning(`Failed to seed members of cluster ${definition.key}`, error);
      return 0;
    }
  }
}
