/**
 * Retrieval Pipeline Configuration
 *
 * Tuned defaults for the orchestrator. Stage timeouts come from the
 * user-facing config; the rest are internal tuning parameters.
 * Use createRetrievalConfig() to override any of them.
 */

import type { StageTimeouts } from '@/config/schema';

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

interface ClusterSearchConfig {
  /** Clusters expanded per query */
  readonly maxClusters: number;
}

interface MemoryRecallConfig {
  /** Entities recalled from conversation memory per query */
  readonly maxEntities: number;
}

export interface RetrievalConfig {
  readonly timeouts: StageTimeouts;
  readonly clusters: ClusterSearchConfig;
  readonly memory: MemoryRecallConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Default Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const timeouts = {
  embeddingMs: 4000,
  clusterSearchMs: 2000,
  vectorSearchMs: 2000,
  memoryMs: 1500
} as const satisfies StageTimeouts;

const clusters = {
  maxClusters: 5
} as const satisfies ClusterSearchConfig;

const memory = {
  maxEntities: 10
} as const satisfies MemoryRecallConfig;

// ═══════════════════════════════════════════════════════════════════════════════
// Exports
// ═══════════════════════════════════════════════════════════════════════════════

export const retrievalDefaults = {
  timeouts,
  clusters,
  memory
} as const satisfies RetrievalConfig;

/**
 * Create retrieval config with optional overrides.
 *
 * @example
 * const config = createRetrievalConfig({ timeouts: config.retrieval.timeouts });
 */
export function createRetrievalConfig(overrides?: DeepPartial<RetrievalConfig>): RetrievalConfig {
  if (!overrides) return retrievalDefaults;

  return {
    timeouts: { ...retrievalDefaults.timeouts, ...overrides.timeouts },
    clusters: { ...retrievalDefaults.clusters, ...overrides.clusters },
    memory: { ...retrievalDefaults.memory, ...overrides.memory }
  };
}
