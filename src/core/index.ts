/**
 * Core Retrieval System
 *
 * Public API barrel file.
 *
 * @example
 * ```typescript
 * import { retrieve, QueryScopeDetector } from '@/core';
 * import type { RetrievalDependencies, RetrievalOutput } from '@/core';
 * ```
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval
// ═══════════════════════════════════════════════════════════════════════════════

export { createRetrievalConfig, formatPrompt, retrieve, retrievalDefaults } from './retrieval';

export type {
  RetrievalConfig,
  RetrievalDependencies,
  RetrievalOutput,
  RetrievalRequest,
  RetrievalStats
} from './retrieval';

// ═══════════════════════════════════════════════════════════════════════════════
// Components
// ═══════════════════════════════════════════════════════════════════════════════

export { ClusterManager } from './clusters';
export { ConversationAnalyzer } from './conversation/analyzer';
export type { ChatMessage, ContextHints, ConversationContext } from './conversation/types';
export { SearchDebugger, WorkflowTracer } from './debug';
export { ConversationEnricher, ConversationSummarizer } from './enrichment';
export type { EntityCandidate } from './entities/types';
export { createLanguagePack, type LanguagePack } from './language/pack';
export {
  ConversationMemoryService,
  EntityContextTracker,
  QueryExpansionMemory,
  TurnProcessor
} from './memory';
export { ContextReranker, type EntityReranker, type EntityScore } from './ranking';
export { QueryScopeDetector, type ScopeDetection } from './scope';
