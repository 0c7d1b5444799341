/**
 * Debug & Trace Types
 */

import type { ScopeConfig } from '@/core/scope/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Search Debugger
// ═══════════════════════════════════════════════════════════════════════════════

export const DEBUG_STAGES = [
  'cluster_search',
  'memory_recall',
  'vector_fallback',
  'reranking',
  'final_selection'
] as const;
export type DebugStage = (typeof DEBUG_STAGES)[number];

export interface StageRecord {
  stage: DebugStage;
  entitiesIn: number;
  entitiesOut: number;
  durationMs: number;
  metadata: Record<string, unknown>;
}

/**
 * Everything known about one entity across the stages it passed.
 */
export interface EntityDebugRecord {
  entityId: string;
  friendlyName: string | null;
  domain: string | null;
  area: string | null;

  clusterScore: number | null;
  sourceCluster: string | null;
  vectorScore: number | null;
  memoryRelevance: number | null;

  baseScore: number | null;
  contextBoost: number | null;
  finalScore: number | null;
  rankingFactors: Record<string, number> | null;
  usedFallbackMatching: boolean | null;
  crossEncoderScore: number | null;

  isActive: boolean | null;
  selectionRank: number | null;
  inPrompt: boolean;
  stageReached: DebugStage | null;
  /** finalScore − vectorScore, when both exist */
  scoreDelta: number | null;
}

export interface PipelineMetrics {
  /** Cluster output share of cluster + vector output */
  clusterHitRate?: number;
  /** Mean scoreDelta of entities that have one */
  avgRerankingBoost?: number;
  /** Active share of the selected entities */
  activeEntityRatio?: number;
  /** Share of tracked entities that made it into the prompt */
  promptInclusionRate?: number;
}

export interface SearchDebugTrace {
  query: string;
  embeddingDimensions: number;
  scopeConfig: ScopeConfig | null;
  threshold: number;
  stages: StageRecord[];
  entities: EntityDebugRecord[];
  totalDurationMs: number;
  finalEntityCount: number;
  metrics: PipelineMetrics;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Workflow Tracer
// ═══════════════════════════════════════════════════════════════════════════════

export type NodeStatus = 'pending' | 'running' | 'success' | 'error';

export interface NodeExecution {
  nodeName: string;
  startedAt: string;
  endedAt: string | null;
  durationMs: number | null;
  input: unknown;
  output: unknown;
  errors: string[];
  status: NodeStatus;
}

export interface EntityStage {
  stage: string;
  entityCount: number;
  entities: SanitizedEntity[];
  metadata: Record<string, unknown>;
}

export interface SanitizedEntity {
  entity_id: string;
  domain: string | null;
  area: string | null;
  state: string | null;
  similarity: number | null;
  score: number | null;
  memory_boosted: boolean;
  cluster_key: string | null;
}

export interface TraceMetrics {
  totalNodes: number;
  successfulNodes: number;
  failedNodes: number;
  nodeTimes: Record<string, number>;
  entityStages: number;
  finalEntityCount: number;
}

export interface WorkflowTrace {
  traceId: string;
  sessionId: string;
  query: string;
  startedAt: string;
  endedAt: string | null;
  durationMs: number | null;
  nodes: NodeExecution[];
  entityPipeline: EntityStage[];
  result: unknown;
  errors: string[];
  status: NodeStatus;
  metrics: TraceMetrics | null;
}
