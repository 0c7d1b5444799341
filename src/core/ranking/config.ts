/**
 * Ranking Configuration
 *
 * Tuned weights for the conversation analyzer and the entity reranker.
 * These are internal tuning parameters, not exposed in user-facing config.
 * Use createRankingConfig() to override any of them.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Type Definitions
// ═══════════════════════════════════════════════════════════════════════════════

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** Multipliers the conversation analyzer hands out per mentioned area/domain */
export interface ContextBoostConfig {
  /** Generic "house" reference */
  readonly areaGeneric: number;
  /** A concrete room or zone */
  readonly areaSpecific: number;
  /** Applied on top of area boosts when the message is a follow-up */
  readonly followUpMultiplier: number;
  readonly domain: number;
  readonly deviceClass: number;
}

/** Additive factors used by the reranker */
export interface FactorConfig {
  /** Partial area name match receives this fraction of the exact-match factor */
  readonly partialAreaRatio: number;
  readonly previousMention: number;
  readonly controllable: number;
  readonly readable: number;
  /** Sensor with a live state */
  readonly activeValue: number;
  /** Sensor whose state is missing, unknown or unavailable */
  readonly unavailablePenalty: number;
  /** Scales (boost_weight - 1) of a memory-recalled entity */
  readonly memory: number;
  /** Scales (topic multiplier - 1) from the conversation summary */
  readonly topic: number;
  /** Scales membership weight × context boost of a cluster-expanded entity */
  readonly cluster: number;
  /** Extra factor for primary cluster members */
  readonly clusterPrimary: number;
  /** Scales (tracker boost - 1) from process-local reinforcement */
  readonly reinforcement: number;
}

export interface SelectionConfig {
  /** Active-first selection looks at the top k × poolMultiplier scores */
  readonly poolMultiplier: number;
  /** States that make a sensor count as inactive */
  readonly inactiveStates: readonly string[];
}

export interface RankingConfig {
  readonly context: ContextBoostConfig;
  readonly factors: FactorConfig;
  readonly selection: SelectionConfig;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Default Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const context = {
  areaGeneric: 1.2,
  areaSpecific: 2.0,
  followUpMultiplier: 1.5,
  domain: 1.5,
  deviceClass: 2.0
} as const satisfies ContextBoostConfig;

const factors = {
  partialAreaRatio: 0.5,
  previousMention: 0.3,
  controllable: 0.2,
  readable: 0.1,
  activeValue: 2.0,
  unavailablePenalty: -0.5,
  memory: 1.0,
  topic: 0.5,
  cluster: 0.2,
  clusterPrimary: 0.1,
  reinforcement: 0.5
} as const satisfies FactorConfig;

const selection = {
  poolMultiplier: 2,
  inactiveStates: ['unavailable', 'unknown']
} as const satisfies SelectionConfig;

// ═══════════════════════════════════════════════════════════════════════════════
// Exports
// ═══════════════════════════════════════════════════════════════════════════════

export const rankingDefaults = {
  context,
  factors,
  selection
} as const satisfies RankingConfig;

/**
 * Create ranking config with optional overrides.
 *
 * @example
 * const config = createRankingConfig({ factors: { activeValue: 1.0 } });
 */
export function createRankingConfig(overrides?: DeepPartial<RankingConfig>): RankingConfig {
  if (!overrides) return rankingDefaults;

  return {
    context: { ...rankingDefaults.context, ...overrides.context },
    factors: { ...rankingDefaults.factors, ...overrides.factors },
    selection: {
      poolMultiplier: overrides.selection?.poolMultiplier ?? rankingDefaults.selection.poolMultiplier,
      inactiveStates: overrides.selection?.inactiveStates?.filter(isString) ??
        rankingDefaults.selection.inactiveStates
    }
  };
}

function isString(value: string | undefined): value is string {
  return typeof value === 'string';
}
