/**
 * Memory Configuration
 *
 * Heuristic constants for conversation memory, topic boosts and the
 * process-local reinforcement trackers. Internal tuning, not exposed in
 * user-facing config. Use createMemoryConfig() to override any of them.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface BoostConfig {
  readonly min: number;
  readonly max: number;
  /** Caller-flagged primary entity */
  readonly primary: number;
  readonly highSimilarityThreshold: number;
  readonly highSimilarity: number;
  readonly midSimilarityThreshold: number;
  readonly midSimilarity: number;
  readonly sensor: number;
}

export interface ContextTypeConfig {
  readonly primaryRelevance: number;
  readonly primaryPosition: number;
  readonly secondaryRelevance: number;
  readonly secondaryPosition: number;
}

export interface DecayConfig {
  /** Seconds until an un-mentioned entity reaches the floor */
  readonly windowSeconds: number;
  readonly floor: number;
}

export interface RelevanceConfig {
  readonly directMatch: number;
  readonly area: number;
  readonly areaAlias: number;
  readonly domain: number;
  /** Per overlapping token */
  readonly overlap: number;
  readonly recentSeconds: number;
  readonly recent: number;
  readonly warmSeconds: number;
  readonly warm: number;
  readonly highBoostThreshold: number;
  readonly highBoost: number;
  readonly followUp: number;
  /** Query tokens shorter than this are ignored */
  readonly minTokenLength: number;
  /** Entities must score strictly above this */
  readonly threshold: number;
}

export interface TopicBoostConfig {
  readonly topicDomain: number;
  readonly focusArea: number;
  readonly focusInId: number;
  readonly focusHistory: number;
  readonly deviceControl: number;
  readonly statusCheck: number;
  readonly sequentialRooms: number;
  /** Decay constant for exp(-age / decaySeconds) */
  readonly decaySeconds: number;
  readonly decayFloor: number;
  readonly cap: number;
}

export interface TrackerConfig {
  /** Weight of the previous importance in the moving average */
  readonly emaRetain: number;
  readonly frequencyStep: number;
  readonly frequencyCap: number;
  readonly recencyWindowSeconds: number;
  readonly recencyFloor: number;
  /** Only boosts above this are reported as enhancement data */
  readonly reportThreshold: number;
  /** Entities idle this long are forgotten */
  readonly idleSeconds: number;
  /** Least recently seen entities are evicted beyond this */
  readonly maxTracked: number;
}

export interface MemoryConfig {
  readonly maxEntities: number;
  readonly ttlMinutes: number;
  readonly focusHistoryLimit: number;
  readonly boost: BoostConfig;
  readonly contextType: ContextTypeConfig;
  readonly decay: DecayConfig;
  readonly relevance: RelevanceConfig;
  readonly topic: TopicBoostConfig;
  readonly tracker: TrackerConfig;
  /** Jaccard similarity above which a learned query pattern applies */
  readonly expansionSimilarity: number;
  /** Least recently learned query patterns are evicted beyond this */
  readonly expansionMaxPatterns: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Default Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const boost = {
  min: 0.1,
  max: 3.0,
  primary: 1.5,
  highSimilarityThreshold: 0.8,
  highSimilarity: 1.3,
  midSimilarityThreshold: 0.6,
  midSimilarity: 1.1,
  sensor: 1.2
} as const satisfies BoostConfig;

const contextType = {
  primaryRelevance: 0.7,
  primaryPosition: 3,
  secondaryRelevance: 0.4,
  secondaryPosition: 8
} as const satisfies ContextTypeConfig;

const decay = {
  windowSeconds: 600,
  floor: 0.5
} as const satisfies DecayConfig;

const relevance = {
  directMatch: 2.0,
  area: 1.5,
  areaAlias: 1.3,
  domain: 1.2,
  overlap: 0.5,
  recentSeconds: 300,
  recent: 0.8,
  warmSeconds: 900,
  warm: 0.4,
  highBoostThreshold: 1.5,
  highBoost: 0.6,
  followUp: 0.5,
  minTokenLength: 3,
  threshold: 0.3
} as const satisfies RelevanceConfig;

const topic = {
  topicDomain: 1.3,
  focusArea: 2.0,
  focusInId: 1.5,
  focusHistory: 1.2,
  deviceControl: 1.2,
  statusCheck: 1.2,
  sequentialRooms: 1.4,
  decaySeconds: 300,
  decayFloor: 0.5,
  cap: 3.0
} as const satisfies TopicBoostConfig;

const tracker = {
  emaRetain: 0.7,
  frequencyStep: 0.2,
  frequencyCap: 1.5,
  recencyWindowSeconds: 900,
  recencyFloor: 0.5,
  reportThreshold: 1.1,
  idleSeconds: 3600,
  maxTracked: 1000
} as const satisfies TrackerConfig;

// ═══════════════════════════════════════════════════════════════════════════════
// Exports
// ═══════════════════════════════════════════════════════════════════════════════

export const memoryDefaults = {
  maxEntities: 20,
  ttlMinutes: 15,
  focusHistoryLimit: 9,
  boost,
  contextType,
  decay,
  relevance,
  topic,
  tracker,
  expansionSimilarity: 0.6,
  expansionMaxPatterns: 500
} as const satisfies MemoryConfig;

/**
 * Create memory config with optional overrides.
 *
 * @example
 * const config = createMemoryConfig({ ttlMinutes: 30, decay: { floor: 0.3 } });
 */
export function createMemoryConfig(overrides?: DeepPartial<MemoryConfig>): MemoryConfig {
  if (!overrides) return memoryDefaults;

  return {
    maxEntities: overrides.maxEntities ?? memoryDefaults.maxEntities,
    ttlMinutes: overrides.ttlMinutes ?? memoryDefaults.ttlMinutes,
    focusHistoryLimit: overrides.focusHistoryLimit ?? memoryDefaults.focusHistoryLimit,
    boost: { ...memoryDefaults.boost, ...overrides.boost },
    contextType: { ...memoryDefaults.contextType, ...overrides.contextType },
    decay: { ...memoryDefaults.decay, ...overrides.decay },
    relevance: { ...memoryDefaults.relevance, ...overrides.relevance },
    topic: { ...memoryDefaults.topic, ...overrides.topic },
    tracker: { ...memoryDefaults.tracker, ...overrides.tracker },
    expansionSimilarity: overrides.expansionSimilarity ?? memoryDefaults.expansionSimilarity,
    expansionMaxPatterns: overrides.expansionMaxPatterns ?? memoryDefaults.expansionMaxPatterns
  };
}
