/**
 * Neo4j Graph Client
 *
 * GraphClient over a single driver. Queries live in the operation
 * modules; this class owns the connection and hands them a context.
 */

import neo4j, { type Driver } from 'neo4j-driver';
import type { ClusterRole, ClusterType } from '@/core/entities/types';
import type {
  ClusterEntityRecord,
  ClusterRecord,
  CreateClusterInput,
  EntityFilter,
  GraphClient,
  MembershipInput,
  SearchResult,
  StoredDocument,
  StoredEntity
} from '../types';
import { GraphClientError } from '../types';
import type { Neo4jContext } from './errors';
import * as ops from './operations';
import { initializeSchema } from './schema';

export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
}

export class Neo4jGraphClient implements GraphClient {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jConfig) {}

  /**
   * @throws GraphClientError (CONNECTION_ERROR) before connect()
   */
  private get ctx(): Neo4jContext {
    if (!this.driver) {
      throw new GraphClientError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return { driver: this.driver, database: this.config.database };
  }

  // ============================================================
  // LIFECYCLE
  // ============================================================

  /**
   * Connect and verify, so a wrong URI or password fails at startup
   * rather than on the first request.
   */
  async connect(): Promise<void> {
    const driver = neo4j.driver(this.config.uri, neo4j.auth.basic(this.config.user, this.config.password));
    try {
      await driver.verifyConnectivity({ database: this.config.database });
    } catch (error) {
      await driver.close();
      throw new GraphClientError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'CONNECTION_ERROR',
        error instanceof Error ? error : undefined
      );
    }
    this.driver = driver;
  }

  async disconnect(): Promise<void> {
    const driver = this.driver;
    this.driver = null;
    await driver?.close();
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) return false;
    return this.driver.verifyConnectivity({ database: this.config.database }).then(
      () => true,
      () => false
    );
  }

  async initializeSchema(dimensions: number): Promise<void> {
    await initializeSchema(this.ctx, dimensions);
  }

  // ============================================================
  // ENTITIES
  // ============================================================

  async searchEntities(vector: number[], limit: number, filter?: EntityFilter): Promise<SearchResult<StoredEntity>[]> {
    return ops.searchEntities(this.ctx, vector, limit, filter);
  }

  async getEntitiesByIds(ids: string[]): Promise<StoredEntity[]> {
    return ops.getEntitiesByIds(this.ctx, ids);
  }

  async findEntities(filter: EntityFilter, limit: number): Promise<StoredEntity[]> {
    return ops.findEntities(this.ctx, filter, limit);
  }

  // ============================================================
  // CLUSTERS
  // ============================================================

  async createCluster(input: CreateClusterInput): Promise<ClusterRecord> {
    return ops.createCluster(this.ctx, input);
  }

  async getCluster(key: string): Promise<ClusterRecord | null> {
    return ops.getCluster(this.ctx, key);
  }

  async listClusters(types?: readonly ClusterType[]): Promise<ClusterRecord[]> {
    return ops.listClusters(this.ctx, types);
  }

  async addClusterMember(input: MembershipInput): Promise<void> {
    return ops.addClusterMember(this.ctx, input);
  }

  async getClusterEntities(clusterKeys: string[], role?: ClusterRole): Promise<ClusterEntityRecord[]> {
    return ops.getClusterEntities(this.ctx, clusterKeys, role);
  }

  // ============================================================
  // DOCUMENTS
  // ============================================================

  async getDocument(key: string): Promise<StoredDocument | null> {
    return ops.getDocument(this.ctx, key);
  }

  async putDocument(document: StoredDocument): Promise<void> {
    return ops.putDocument(this.ctx, document);
  }

  async deleteDocument(key: string): Promise<boolean> {
    return ops.deleteDocument(this.ctx, key);
  }

  async deleteExpiredDocuments(prefix: string, now: string): Promise<number> {
    return ops.deleteExpiredDocuments(this.ctx, prefix, now);
  }
}
