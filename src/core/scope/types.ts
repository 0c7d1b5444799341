/**
 * Query Scope Types
 */

import type { ConversationContext, Intent } from '@/core/conversation/types';
import type { ClusterType } from '@/core/entities/types';

export const QUERY_SCOPES = ['micro', 'macro', 'overview'] as const;

/**
 * How much of the house a query is about:
 * - micro: one device or a precise value
 * - macro: one area or a domain inside it
 * - overview: the whole house
 */
export type QueryScope = (typeof QUERY_SCOPES)[number];

export const PROMPT_FORMATS = ['detailed', 'grouped_by_area', 'tldr', 'compact'] as const;
export type PromptFormat = (typeof PROMPT_FORMATS)[number];

export interface ScopeConfig {
  readonly kMin: number;
  readonly kMax: number;
  readonly clusterTypes: readonly ClusterType[];
  readonly formatter: PromptFormat;
  /** Minimum cluster similarity */
  readonly threshold: number;
}

export type ScopeScores = Record<QueryScope, number>;

export interface ContextFactors {
  areasCount: number;
  domainsCount: number;
  isFollowUp: boolean;
  intent: Intent;
}

export interface ScopeDetails {
  scopeScores: ScopeScores;
  matchedPatterns: Record<QueryScope, string[]>;
  optimalK: number;
  /** Total score of the winning scope (0 when the word-count fallback decided) */
  confidence: number;
  contextFactors: ContextFactors;
  reasoning: string;
}

export interface ScopeDetection {
  scope: QueryScope;
  config: ScopeConfig;
  details: ScopeDetails;
  /** Context the decision was made with */
  context: ConversationContext;
}

/**
 * Shape handed to callers outside the pipeline.
 */
export interface WireScopeDecision {
  scope: QueryScope;
  optimal_k: number;
  formatter: PromptFormat;
  confidence: number;
  reasoning: string;
}
