/**
 * Retrieval Pipeline Orchestrator
 *
 * One request, one async flow:
 *
 *   context → scope → embed → (clusters ∥ memory) → [vector fallback]
 *     → merge → rerank → format → remember
 *
 * Each outbound stage runs under its own timeout; a stage that fails or
 * times out contributes no candidates and is listed in stats.failedStages.
 * An abort rejects the stage in flight and stops the request. Every stage
 * reports to the workflow tracer, and to a search debugger when the
 * request asks for debug output.
 */

import { contextFromHints } from '@/core/conversation/types';
import { mergeCandidates } from '@/core/entities/candidate';
import type { EntityCandidate } from '@/core/entities/types';
import type { EnhancementData } from '@/core/memory/turn-processor';
import type { MemoryEntityInput } from '@/core/memory/types';
import type { EntityScore } from '@/core/ranking/types';
import { logRetrievalResult, logRetrievalStart } from '@/utils/logger';
import { type RetrievalConfig, retrievalDefaults } from './config';
import { formatPrompt } from './format';
import { type ClusterPhaseResult, recallMemoryCandidates, searchClusterCandidates, vectorFallback } from './phases';
import type {
  RetrievalDependencies,
  RetrievalOutput,
  RetrievalRequest,
  RetrievalStage,
  RetrievalStats
} from './types';
import { runStage, type StageOutcome } from './utils';

const EMPTY_CLUSTERS: ClusterPhaseResult = { clusters: [], candidates: [] };

/**
 * Execute the retrieval pipeline.
 *
 * @example
 * ```typescript
 * const result = await retrieve(
 *   { query: 'mi van a nappaliban?', conversationId: 'conv-1', history },
 *   services.retrieval
 * );
 * result.prompt; // context block for the system prompt
 * ```
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
  config: RetrievalConfig = retrievalDefaults
): Promise<RetrievalOutput> {
  const startTime = Date.now();
  const { query, signal } = request;
  const conversationId = request.conversationId ?? null;
  const history = request.history ?? [];
  const { tracer } = deps;
  const timeouts = config.timeouts;

  signal?.throwIfAborted();
  logRetrievalStart(query, request.conversationId);

  const traceId = tracer?.startTrace(conversationId ?? 'anonymous', query) ?? null;
  const failedStages: RetrievalStage[] = [];
  const debugSession = request.debug && deps.createDebugger ? deps.createDebugger() : null;

  /** Run a stage and report it to the tracer */
  async function stage<T>(
    name: RetrievalStage,
    input: Record<string, unknown>,
    task: () => Promise<T>,
    fallback: T,
    timeoutMs: number
  ): Promise<StageOutcome<T>> {
    if (traceId) tracer?.startNode(traceId, name, input);
    const outcome = await runStage(name, task, { timeoutMs, fallback, signal });
    if (outcome.error !== null) failedStages.push(name);
    if (traceId) {
      tracer?.endNode(traceId, name, { durationMs: outcome.durationMs }, outcome.error ? [outcome.error] : []);
    }
    return outcome;
  }

  try {
    // ─── Context & scope ───────────────────────────────────────────────────
    const context = request.context
      ? contextFromHints(request.context)
      : deps.analyzer.analyze(query, history);

    if (traceId) tracer?.startNode(traceId, 'scope_detection', { query });
    const scope = deps.scopeDetector.detectScope(query, context);
    const k = scope.details.optimalK;
    if (traceId) {
      tracer?.endNode(traceId, 'scope_detection', {
        scope: scope.scope,
        optimalK: k,
        formatter: scope.config.formatter,
        confidence: scope.details.confidence
      });
    }

    // ─── Query embedding ───────────────────────────────────────────────────
    const embedding = await stage<number[]>(
      'embedding',
      { query },
      () => deps.embeddingClient.embed(query, { abortSignal: signal }),
      [],
      timeouts.embeddingMs
    );
    const queryVector = embedding.value;
    debugSession?.startSession(query, queryVector, scope.config, scope.config.threshold);

    // ─── Clusters ∥ memory ─────────────────────────────────────────────────
    const { memoryService } = deps;
    const [clusterOutcome, memoryOutcome] = await Promise.all([
      queryVector.length > 0
        ? stage(
            'cluster_search',
            { clusterTypes: scope.config.clusterTypes, threshold: scope.config.threshold },
            () => searchClusterCandidates(deps.clusterManager, queryVector, scope.config, config, signal),
            EMPTY_CLUSTERS,
            timeouts.clusterSearchMs
          )
        : Promise.resolve(skipped(EMPTY_CLUSTERS)),
      conversationId && memoryService
        ? stage<EntityCandidate[]>(
            'memory_recall',
            { conversationId },
            () =>
              recallMemoryCandidates(
                memoryService,
                deps.graphClient,
                conversationId,
                query,
                config.memory.maxEntities,
                signal
              ),
            [],
            timeouts.memoryMs
          )
        : Promise.resolve(skipped<EntityCandidate[]>([]))
    ]);

    const clusterCandidates = clusterOutcome.value.candidates;
    const memoryCandidates = memoryOutcome.value;
    debugSession?.captureStage('cluster_search', [], clusterCandidates, clusterOutcome.durationMs, {
      clusters: clusterOutcome.value.clusters.map((m) => m.cluster.key)
    });
    debugSession?.captureStage('memory_recall', [], memoryCandidates, memoryOutcome.durationMs);
    if (traceId) {
      tracer?.recordEntityStage(traceId, 'cluster_search', clusterCandidates);
      tracer?.recordEntityStage(traceId, 'memory_recall', memoryCandidates);
    }

    // ─── Vector fallback ───────────────────────────────────────────────────
    let vectorCandidates: EntityCandidate[] = [];
    const usedVectorFallback = clusterCandidates.length < scope.config.kMin && queryVector.length > 0;
    if (usedVectorFallback) {
      const vector = await stage<EntityCandidate[]>(
        'vector_fallback',
        { limit: scope.config.kMax },
        () => vectorFallback(deps.graphClient, queryVector, scope.config.kMax),
        [],
        timeouts.vectorSearchMs
      );
      vectorCandidates = vector.value;
      debugSession?.captureStage('vector_fallback', clusterCandidates, vectorCandidates, vector.durationMs, {
        limit: scope.config.kMax
      });
      if (traceId) tracer?.recordEntityStage(traceId, 'vector_fallback', vectorCandidates);
    }

    // ─── Merge & rerank ────────────────────────────────────────────────────
    signal?.throwIfAborted();
    const merged = mergeCandidates(clusterCandidates, vectorCandidates, memoryCandidates);

    const rankStart = Date.now();
    if (traceId) tracer?.startNode(traceId, 'reranking', { candidates: merged.length, k });
    const ranked = deps.reranker.rankEntities(merged, query, {
      k,
      history,
      context,
      reinforcement: deps.tracker?.getSignificantBoosts(1.0)
    });
    const rankMs = Date.now() - rankStart;
    if (traceId) {
      tracer?.endNode(traceId, 'reranking', { selected: ranked.length });
      tracer?.recordEntityStage(traceId, 'final_selection', ranked);
    }
    debugSession?.captureStage('reranking', merged, ranked, rankMs);
    debugSession?.captureStage('final_selection', ranked, ranked, 0, { k });

    const prompt = formatPrompt(ranked, scope.config.formatter, context, {
      maxRelated: Math.max(8, ranked.length)
    });

    // ─── Remember this turn ────────────────────────────────────────────────
    let enhancement: EnhancementData | null = null;
    const { turns } = deps;
    if (conversationId && turns) {
      const stored = await stage<EnhancementData | null>(
        'memory_store',
        { entities: ranked.length },
        () =>
          turns.processTurn({
            conversationId,
            query,
            entities: ranked.map(toMemoryInput),
            history
          }),
        null,
        timeouts.memoryMs
      );
      enhancement = stored.value;
    }

    const stats: RetrievalStats = {
      clusterCandidates: clusterCandidates.length,
      memoryCandidates: memoryCandidates.length,
      vectorCandidates: vectorCandidates.length,
      mergedCandidates: merged.length,
      clustersMatched: clusterOutcome.value.clusters.map((m) => m.cluster.key),
      usedVectorFallback,
      failedStages,
      durationMs: Date.now() - startTime
    };

    const output: RetrievalOutput = {
      query,
      conversationId,
      scope,
      entities: ranked,
      prompt,
      stats,
      traceId,
      debug: debugSession?.finishSession() ?? null,
      enhancement
    };

    if (traceId) {
      tracer?.endTrace(
        traceId,
        {
          scope: scope.scope,
          optimalK: k,
          formatter: scope.config.formatter,
          entityCount: ranked.length,
          promptLength: prompt.length,
          usedVectorFallback
        },
        failedStages.map((name) => `${name} failed`)
      );
    }

    logRetrievalResult(output);
    return output;
  } catch (error) {
    if (traceId) {
      tracer?.endTrace(traceId, {}, [error instanceof Error ? error.message : String(error)]);
    }
    throw error;
  }
}

function skipped<T>(value: T): StageOutcome<T> {
  return { value, durationMs: 0, error: null };
}

/**
 * The ranked score, clamped to [0, 1]. A recalled entity that only the
 * keyword fallback could score keeps at least its stored relevance.
 */
function toMemoryInput(score: EntityScore, index: number): MemoryEntityInput {
  const ranked = Math.min(1, Math.max(0, score.finalScore));
  const { storedRelevance } = score.entity.annotations;
  return {
    entityId: score.entity.entityId,
    area: score.entity.area,
    domain: score.entity.domain,
    similarity: score.entity.similarity,
    score:
      score.usedFallbackMatching && storedRelevance !== undefined
        ? Math.max(ranked, storedRelevance)
        : ranked,
    isPrimary: index === 0
  };
}
