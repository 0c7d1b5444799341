/**
 * Retrieval Module
 *
 * Scope-driven entity retrieval:
 * scope → clusters ∥ memory → vector fallback → rerank → prompt
 */

// Algorithms
export { computeCosineSimilarity } from './algorithms';

// Configuration
export type { RetrievalConfig } from './config';
export { createRetrievalConfig, retrievalDefaults } from './config';

// Formatting
export {
  type CategorizedEntities,
  categorizeEntities,
  ENTITY_LIST_PREFIX,
  formatPrompt,
  PROMPT_HEADER
} from './format';

// Phases (for advanced usage / testing)
export { recallMemoryCandidates, searchClusterCandidates, vectorFallback } from './phases';

// Pipeline (main entry point)
export { retrieve } from './pipeline';

// Types
export type {
  RetrievalDependencies,
  RetrievalOutput,
  RetrievalRequest,
  RetrievalStage,
  RetrievalStats
} from './types';
