/**
 * Cluster Phase - Expand matching clusters into candidates
 *
 * Clusters of the scope's types above the scope's threshold are expanded
 * to their members. A member's similarity is its own embedding's cosine to
 * the query, or the cluster's similarity when it has no embedding.
 */

import type { ClusterManager } from '@/core/clusters/manager';
import type { ClusterMatch } from '@/core/clusters/types';
import { mergeCandidates } from '@/core/entities/candidate';
import type { EntityCandidate } from '@/core/entities/types';
import type { ScopeConfig } from '@/core/scope/types';
import { computeCosineSimilarity } from '../algorithms/similarity';
import type { RetrievalConfig } from '../config';
import { candidateFromStored } from '../utils';

export interface ClusterPhaseResult {
  clusters: ClusterMatch[];
  candidates: EntityCandidate[];
}

export async function searchClusterCandidates(
  clusterManager: ClusterManager,
  queryVector: number[],
  scope: ScopeConfig,
  config: RetrievalConfig,
  signal?: AbortSignal
): Promise<ClusterPhaseResult> {
  const clusters = await clusterManager.searchClusters(queryVector, {
    clusterTypes: scope.clusterTypes,
    k: config.clusters.maxClusters,
    threshold: scope.threshold
  });
  if (clusters.length === 0) return { clusters, candidates: [] };
  signal?.throwIfAborted();

  const clusterScores = new Map(clusters.map((m) => [m.cluster.key, m.similarity]));
  const members = await clusterManager.getClusterEntities(clusters.map((m) => m.cluster.key));

  // Best cluster first, so a shared member keeps its strongest membership
  const ordered = members
    .map((member, index) => ({ member, index, score: clusterScores.get(member.clusterKey) ?? 0 }))
    .sort((a, b) => b.score - a.score || a.index - b.index);

  const candidates = ordered.map(({ member, score }) => {
    const embedding = member.entity.embedding;
    const similarity =
      embedding && embedding.length > 0
        ? Math.max(0, computeCosineSimilarity(queryVector, embedding))
        : score;

    return candidateFromStored(member.entity, similarity, 'cluster', {
      clusterContext: {
        clusterKey: member.clusterKey,
        role: member.role,
        weight: member.weight,
        contextBoost: member.contextBoost,
        clusterScore: score
      }
    });
  });

  return { clusters, candidates: mergeCandidates(candidates) };
}
