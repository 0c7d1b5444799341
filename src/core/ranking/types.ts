/**
 * Ranking Types
 */

import type { ChatMessage, ConversationContext } from '@/core/conversation/types';
import type { EntityCandidate } from '@/core/entities/types';

/**
 * A scored candidate. finalScore = baseScore + contextBoost, and
 * contextBoost is the sum of rankingFactors.
 */
export interface EntityScore {
  entity: EntityCandidate;
  baseScore: number;
  contextBoost: number;
  finalScore: number;
  /** Named additive factors, e.g. area_nappali, has_active_value */
  rankingFactors: Record<string, number>;
  /** True when no retrieval similarity existed and keyword matching stood in */
  usedFallbackMatching: boolean;
  /** Diagnostics of a cross-encoder stage; never set by the built-in reranker */
  crossEncoderScore?: number;
  crossEncoderRaw?: number;
}

export interface RankOptions {
  /** Maximum number of results */
  k: number;
  /** Used to derive the conversation context when `context` is absent */
  history?: readonly ChatMessage[];
  context?: ConversationContext;
  /** Process-local reinforcement boosts by entity id (1.0 = neutral) */
  reinforcement?: ReadonlyMap<string, number>;
}

/**
 * Contract for anything that orders candidates for the prompt.
 */
export interface EntityReranker {
  rankEntities(entities: readonly EntityCandidate[], query: string, options: RankOptions): EntityScore[];
}
