/**
 * Retrieval Pipeline Types
 *
 * Request, dependencies and output of the scope → clusters ∥ memory →
 * fallback → rerank pipeline.
 */

import type { ConversationAnalyzer } from '@/core/conversation/analyzer';
import type { ChatMessage, ContextHints } from '@/core/conversation/types';
import type { ClusterManager } from '@/core/clusters/manager';
import type { SearchDebugTrace } from '@/core/debug/types';
import type { SearchDebugger } from '@/core/debug/search-debugger';
import type { WorkflowTracer } from '@/core/debug/workflow-tracer';
import type { EntityContextTracker } from '@/core/memory/tracker';
import type { ConversationMemoryService } from '@/core/memory/service';
import type { EnhancementData, TurnProcessor } from '@/core/memory/turn-processor';
import type { EntityReranker, EntityScore } from '@/core/ranking/types';
import type { QueryScopeDetector } from '@/core/scope/detector';
import type { ScopeDetection } from '@/core/scope/types';
import type { EmbeddingClient } from '@/providers/embedding/types';
import type { GraphClient } from '@/providers/graph/types';

export type { EntityScore };

/**
 * Stages that produce candidates and may fail on their own.
 */
export type RetrievalStage = 'embedding' | 'cluster_search' | 'memory_recall' | 'vector_fallback' | 'memory_store';

export interface RetrievalRequest {
  query: string;
  /** Enables memory recall and storage of the selected entities */
  conversationId?: string;
  history?: ChatMessage[];
  /** Caller-side analysis; replaces the analyzer when present */
  context?: ContextHints;
  /** Attach a SearchDebugger trace to the output */
  debug?: boolean;
  signal?: AbortSignal;
}

export interface RetrievalDependencies {
  graphClient: GraphClient;
  embeddingClient: EmbeddingClient;
  analyzer: ConversationAnalyzer;
  scopeDetector: QueryScopeDetector;
  clusterManager: ClusterManager;
  reranker: EntityReranker;
  memoryService?: ConversationMemoryService;
  tracker?: EntityContextTracker;
  turns?: TurnProcessor;
  tracer?: WorkflowTracer;
  /** Factory so each debug request gets a fresh session */
  createDebugger?: () => SearchDebugger;
}

export interface RetrievalStats {
  clusterCandidates: number;
  memoryCandidates: number;
  vectorCandidates: number;
  /** Candidates handed to the reranker after merging */
  mergedCandidates: number;
  clustersMatched: string[];
  usedVectorFallback: boolean;
  /** Stages that timed out or failed and contributed nothing */
  failedStages: RetrievalStage[];
  durationMs: number;
}

export interface RetrievalOutput {
  query: string;
  conversationId: string | null;
  scope: ScopeDetection;
  /** Ranked, at most scope.details.optimalK long */
  entities: EntityScore[];
  /** Formatted context block for the system prompt */
  prompt: string;
  stats: RetrievalStats;
  traceId: string | null;
  debug: SearchDebugTrace | null;
  /** Memory-side signals after this turn was stored */
  enhancement: EnhancementData | null;
}
