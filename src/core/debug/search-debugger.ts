/**
 * Search Debugger
 *
 * Per-request capture of what each retrieval stage received and produced.
 * Purely observational: inputs are read through lenient schemas, never
 * modified, and a malformed entry is skipped instead of raising.
 */

import type { ScopeConfig } from '@/core/scope/types';
import { type DebugCandidate, type DebugScore, readCandidates, readScores } from './schemas';
import type {
  DebugStage,
  EntityDebugRecord,
  PipelineMetrics,
  SearchDebugTrace,
  StageRecord
} from './types';

interface Session {
  query: string;
  embeddingDimensions: number;
  scopeConfig: ScopeConfig | null;
  threshold: number;
  stages: StageRecord[];
  entities: Map<string, EntityDebugRecord>;
}

export class SearchDebugger {
  private session: Session | null = null;

  get active(): boolean {
    return this.session !== null;
  }

  /**
   * Begin a session. A session already in progress is discarded.
   *
   * @param threshold - Final score an entity needs to count as "in prompt"
   */
  startSession(
    query: string,
    embedding: readonly number[] | null,
    scopeConfig: ScopeConfig | null,
    threshold = 0.7
  ): void {
    this.session = {
      query,
      embeddingDimensions: embedding?.length ?? 0,
      scopeConfig,
      threshold,
      stages: [],
      entities: new Map()
    };
  }

  /**
   * Record one stage. Candidate stages take EntityCandidate lists,
   * reranking and final_selection take EntityScore lists. Ignored when no
   * session is active.
   */
  captureStage(
    stage: DebugStage,
    entitiesIn: readonly unknown[],
    entitiesOut: readonly unknown[],
    durationMs: number,
    metadata: Record<string, unknown> = {}
  ): void {
    const session = this.session;
    if (!session) return;

    session.stages.push({
      stage,
      entitiesIn: entitiesIn.length,
      entitiesOut: entitiesOut.length,
      durationMs: Number.isFinite(durationMs) ? durationMs : 0,
      metadata: { ...metadata }
    });

    switch (stage) {
      case 'cluster_search':
        for (const candidate of readCandidates(entitiesOut)) {
          const record = this.recordFor(session, candidate);
          const cluster = candidate.annotations?.clusterContext;
          record.clusterScore = cluster?.clusterScore ?? null;
          record.sourceCluster = cluster?.clusterKey ?? null;
          record.stageReached = stage;
        }
        break;
      case 'vector_fallback':
        for (const candidate of readCandidates(entitiesOut)) {
          const record = this.recordFor(session, candidate);
          record.vectorScore = candidate.annotations?.vectorScore ?? candidate.similarity ?? null;
          record.stageReached = stage;
        }
        break;
      case 'memory_recall':
        for (const candidate of readCandidates(entitiesOut)) {
          const record = this.recordFor(session, candidate);
          record.memoryRelevance = candidate.annotations?.memoryRelevance ?? null;
          record.stageReached = stage;
        }
        break;
      case 'reranking':
        for (const score of readScores(entitiesOut)) {
          this.captureScore(session, score).stageReached = stage;
        }
        break;
      case 'final_selection':
        readScores(entitiesOut).forEach((score, index) => {
          const record = this.captureScore(session, score);
          record.isActive = !('unavailable_penalty' in score.rankingFactors);
          record.selectionRank = index + 1;
          record.inPrompt = score.finalScore >= session.threshold;
          record.stageReached = stage;
        });
        break;
    }
  }

  /**
   * Close the session and compute metrics.
   *
   * @returns The trace, or null when no session was active
   */
  finishSession(): SearchDebugTrace | null {
    const session = this.session;
    if (!session) return null;
    this.session = null;

    const entities = Array.from(session.entities.values());
    return {
      query: session.query,
      embeddingDimensions: session.embeddingDimensions,
      scopeConfig: session.scopeConfig,
      threshold: session.threshold,
      stages: session.stages,
      entities,
      totalDurationMs: session.stages.reduce((sum, stage) => sum + stage.durationMs, 0),
      finalEntityCount: entities.filter((e) => e.selectionRank !== null).length,
      metrics: computeMetrics(session.stages, entities)
    };
  }

  private captureScore(session: Session, score: DebugScore): EntityDebugRecord {
    const record = this.recordFor(session, score.entity);
    record.baseScore = score.baseScore;
    record.contextBoost = score.contextBoost;
    record.finalScore = score.finalScore;
    record.rankingFactors = { ...score.rankingFactors };
    record.usedFallbackMatching = score.usedFallbackMatching ?? null;
    record.crossEncoderScore = score.crossEncoderScore ?? null;
    if (record.vectorScore !== null) {
      record.scoreDelta = score.finalScore - record.vectorScore;
    }
    return record;
  }

  private recordFor(session: Session, candidate: DebugCandidate): EntityDebugRecord {
    const existing = session.entities.get(candidate.entityId);
    if (existing) return existing;

    const record: EntityDebugRecord = {
      entityId: candidate.entityId,
      friendlyName: candidate.friendlyName ?? null,
      domain: candidate.domain ?? null,
      area: candidate.area ?? null,
      clusterScore: null,
      sourceCluster: null,
      vectorScore: null,
      memoryRelevance: null,
      baseScore: null,
      contextBoost: null,
      finalScore: null,
      rankingFactors: null,
      usedFallbackMatching: null,
      crossEncoderScore: null,
      isActive: null,
      selectionRank: null,
      inPrompt: false,
      stageReached: null,
      scoreDelta: null
    };
    session.entities.set(candidate.entityId, record);
    return record;
  }
}

export function computeMetrics(
  stages: readonly StageRecord[],
  entities: readonly EntityDebugRecord[]
): PipelineMetrics {
  const metrics: PipelineMetrics = {};
  if (stages.length === 0) return metrics;

  const cluster = stages.find((s) => s.stage === 'cluster_search');
  const vector = stages.find((s) => s.stage === 'vector_fallback');
  if (cluster && vector) {
    const total = cluster.entitiesOut + vector.entitiesOut;
    if (total > 0) metrics.clusterHitRate = cluster.entitiesOut / total;
  }

  const deltas = entities.flatMap((e) => (e.scoreDelta !== null ? [e.scoreDelta] : []));
  if (deltas.length > 0) {
    metrics.avgRerankingBoost = deltas.reduce((sum, d) => sum + d, 0) / deltas.length;
  }

  const judged = entities.filter((e) => e.isActive !== null);
  if (judged.length > 0) {
    metrics.activeEntityRatio = judged.filter((e) => e.isActive).length / judged.length;
  }

  if (entities.length > 0) {
    metrics.promptInclusionRate = entities.filter((e) => e.inPrompt).length / entities.length;
  }

  return metrics;
}
