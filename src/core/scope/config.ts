/**
 * Scope Configuration
 *
 * Retrieval budget per scope. Fixed: the rest of the pipeline assumes
 * micro < macro < overview in both k and breadth of cluster types.
 */

import type { QueryScope, ScopeConfig } from './types';

const micro = {
  kMin: 5,
  kMax: 10,
  clusterTypes: ['micro_cluster'],
  formatter: 'detailed',
  threshold: 0.8
} as const satisfies ScopeConfig;

const macro = {
  kMin: 15,
  kMax: 30,
  clusterTypes: ['micro_cluster', 'macro_cluster'],
  formatter: 'grouped_by_area',
  threshold: 0.7
} as const satisfies ScopeConfig;

const overview = {
  kMin: 30,
  kMax: 50,
  clusterTypes: ['overview_cluster', 'macro_cluster'],
  formatter: 'tldr',
  threshold: 0.6
} as const satisfies ScopeConfig;

export const SCOPE_CONFIGS = {
  micro,
  macro,
  overview
} as const satisfies Record<QueryScope, ScopeConfig>;

/** Word-count fallback when no pattern or context signal fired */
export const FALLBACK_WORDS = {
  /** At most this many words → micro */
  microMax: 3,
  /** At least this many words → overview */
  overviewMin: 10
} as const;

/** Context-driven score adjustments */
export const CONTEXT_ADJUSTMENTS = {
  singleArea: 2.0,
  multipleAreas: 1.5,
  manyDomains: 1.0,
  singleDomain: 0.5,
  followUp: 1.0,
  controlMicro: 1.0,
  controlOverviewPenalty: -0.5,
  /** Cap on the (areas + domains - 1) term of the macro k adjustment */
  macroComplexityCap: 5
} as const;
