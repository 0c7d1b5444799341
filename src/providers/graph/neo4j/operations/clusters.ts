/**
 * Neo4j Cluster Operations
 *
 * Cluster nodes and CONTAINS_ENTITY membership edges.
 */

import type { ClusterRole, ClusterType } from '@/core/entities/types';
import type {
  ClusterEntityRecord,
  ClusterRecord,
  CreateClusterInput,
  MembershipInput
} from '../../types';
import { GraphClientError } from '../../types';
import { type Neo4jContext, runCommand, runCommandWithRetry } from '../errors';
import { membershipSchema, recordToCluster, recordToEntity, toCount, toStoreTimestamp } from '../mapping';
import {
  ADD_CLUSTER_MEMBER,
  CREATE_CLUSTER,
  GET_CLUSTER,
  GET_CLUSTER_ENTITIES,
  LIST_CLUSTERS
} from '../queries';

// ============================================================
// CLUSTER NODES
// ============================================================

/**
 * Not retried: a duplicate key is a constraint violation the caller
 * wants to see immediately.
 */
export async function createCluster(
  ctx: Neo4jContext,
  input: CreateClusterInput
): Promise<ClusterRecord> {
  return runCommand(
    ctx,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(CREATE_CLUSTER, {
          key: input.key,
          name: input.name,
          type: input.type,
          scope: input.scope,
          description: input.description,
          embedding: input.embedding,
          query_patterns: input.queryPatterns,
          areas: input.areas,
          domains: input.domains,
          timestamp: toStoreTimestamp()
        })
      );
      const [record] = result.records;
      if (!record) {
        throw new GraphClientError(`Cluster ${input.key} was not created`, 'QUERY_ERROR');
      }
      return recordToCluster(record.get('node'));
    },
    'createCluster'
  );
}

export async function getCluster(
  ctx: Neo4jContext,
  key: string
): Promise<ClusterRecord | null> {
  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(GET_CLUSTER, { key });
      const [record] = result.records;
      return record ? recordToCluster(record.get('node')) : null;
    },
    'getCluster'
  );
}

export async function listClusters(
  ctx: Neo4jContext,
  types?: readonly ClusterType[]
): Promise<ClusterRecord[]> {
  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(LIST_CLUSTERS, {
        types: types && types.length > 0 ? [...types] : null
      });
      return result.records.map((r) => recordToCluster(r.get('node')));
    },
    'listClusters'
  );
}

// ============================================================
// MEMBERSHIP EDGES
// ============================================================

export async function addClusterMember(
  ctx: Neo4jContext,
  input: MembershipInput
): Promise<void> {
  const created = await runCommandWithRetry(
    ctx,
    'write',
    async (session) => {
      const result = await session.executeWrite((tx) =>
        tx.run(ADD_CLUSTER_MEMBER, {
          cluster_key: input.clusterKey,
          entity_id: input.entityId,
          role: input.role,
          weight: input.weight,
          context_boost: input.contextBoost,
          timestamp: toStoreTimestamp()
        })
      );
      return toCount(result.records[0]?.get('created'));
    },
    'addClusterMember'
  );

  if (created === 0) {
    throw new GraphClientError(
      `Cluster ${input.clusterKey} or entity ${input.entityId} not found`,
      'NOT_FOUND'
    );
  }
}

export async function getClusterEntities(
  ctx: Neo4jContext,
  clusterKeys: string[],
  role?: ClusterRole
): Promise<ClusterEntityRecord[]> {
  if (clusterKeys.length === 0) return [];

  return runCommandWithRetry(
    ctx,
    'read',
    async (session) => {
      const result = await session.run(GET_CLUSTER_ENTITIES, {
        keys: clusterKeys,
        role: role ?? null
      });

      return result.records.map((r) => {
        const membership = membershipSchema.parse({
          cluster_key: r.get('cluster_key'),
          role: r.get('role'),
          weight: r.get('weight'),
          context_boost: r.get('context_boost')
        });
        return {
          entity: recordToEntity(r.get('node')),
          clusterKey: membership.cluster_key,
          role: membership.role,
          weight: membership.weight,
          contextBoost: membership.context_boost
        };
      });
    },
    'getClusterEntities'
  );
}
