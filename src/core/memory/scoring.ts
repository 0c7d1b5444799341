/**
 * Memory Scoring
 *
 * Pure heuristics behind conversation memory: how a new entity is
 * classified and weighted, how old entities fade, how relevant a stored
 * entity is to the next query, and how the conversation topic reweights
 * recalled entities.
 */

import type { LanguagePack } from '@/core/language/pack';
import { containsAny, tokenize } from '@/core/language/text';
import type { MemoryConfig } from './config';
import type {
  ContextType,
  ConversationEntity,
  ConversationMemory,
  MemoryEntityInput
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Storing
// ═══════════════════════════════════════════════════════════════════════════════

export function clampBoost(weight: number, config: MemoryConfig): number {
  return Math.min(config.boost.max, Math.max(config.boost.min, weight));
}

/**
 * Relevance of an incoming entity: rerank score, then similarity, then 0.
 */
export function incomingRelevance(entity: MemoryEntityInput): number {
  return entity.score ?? entity.similarity ?? 0;
}

export function determineContextType(
  relevance: number,
  position: number,
  config: MemoryConfig
): ContextType {
  const t = config.contextType;
  if (relevance > t.primaryRelevance || position < t.primaryPosition) return 'primary';
  if (relevance > t.secondaryRelevance || position < t.secondaryPosition) return 'secondary';
  return 'historical';
}

/**
 * Initial boost weight of an incoming entity.
 */
export function initialBoostWeight(entity: MemoryEntityInput, config: MemoryConfig): number {
  const b = config.boost;
  let weight = 1.0;

  if (entity.isPrimary) weight *= b.primary;

  const similarity = entity.similarity ?? 0;
  if (similarity > b.highSimilarityThreshold) weight *= b.highSimilarity;
  else if (similarity > b.midSimilarityThreshold) weight *= b.midSimilarity;

  if (entity.domain === 'sensor') weight *= b.sensor;

  return clampBoost(weight, config);
}

/**
 * Linear fade for entities that were not mentioned again, floored.
 */
export function decayFactor(elapsedMs: number, config: MemoryConfig): number {
  const elapsedSeconds = Math.max(0, elapsedMs) / 1000;
  return Math.max(config.decay.floor, 1 - elapsedSeconds / config.decay.windowSeconds);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Recall
// ═══════════════════════════════════════════════════════════════════════════════

/** Lowercase and strip diacritics ("hőmérséklet" → "homerseklet") */
export function foldText(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

/**
 * How relevant a stored entity is to the current query.
 * Entities scoring at or below the threshold are not recalled.
 */
export function memoryRelevance(
  entity: ConversationEntity,
  query: string,
  now: number,
  pack: LanguagePack,
  config: MemoryConfig
): number {
  const r = config.relevance;
  const queryLower = query.toLowerCase();
  const allTokens = tokenize(query);
  const queryTokens = new Set(
    allTokens.filter((token) => token.length >= r.minTokenLength).map(foldText)
  );
  const idFolded = foldText(entity.entityId);
  const idTokens = new Set(tokenize(idFolded));

  let score = 0;

  // Query word inside the id
  for (const token of queryTokens) {
    if (idFolded.includes(token)) {
      score += r.directMatch;
      break;
    }
  }

  if (entity.area) {
    const area = entity.area.toLowerCase();
    if (queryLower.includes(area)) score += r.area;

    const aliases = pack.memory.areaAliases[area];
    if (aliases && containsAny(queryLower, aliases)) score += r.areaAlias;
  }

  if (entity.domain) {
    const keywords = pack.memory.domainKeywords[entity.domain];
    if (keywords && containsAny(queryLower, keywords)) score += r.domain;
  }

  let overlap = 0;
  for (const token of queryTokens) {
    if (idTokens.has(token)) overlap++;
  }
  score += overlap * r.overlap;

  const ageSeconds = (now - entity.mentionedAt) / 1000;
  if (ageSeconds < r.recentSeconds) score += r.recent;
  else if (ageSeconds < r.warmSeconds) score += r.warm;

  if (entity.boostWeight > r.highBoostThreshold) score += r.highBoost;

  const indicators = new Set(pack.memory.followUpIndicators);
  if (allTokens.some((token) => indicators.has(token))) score += r.followUp;

  return score;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Topic Awareness
// ═══════════════════════════════════════════════════════════════════════════════

const CONTROL_DOMAINS: readonly string[] = ['switch', 'light', 'climate'];

/**
 * Reweight a recalled entity by the conversation's topic: topic domains,
 * the current focus area and the intent pattern, then fade with age.
 */
export function topicAwareBoost(
  entity: Pick<ConversationEntity, 'entityId' | 'area' | 'domain' | 'mentionedAt'>,
  memory: Pick<ConversationMemory, 'topicDomains' | 'currentFocus' | 'focusHistory' | 'intentPattern'>,
  now: number,
  config: MemoryConfig
): number {
  const t = config.topic;
  let weight = 1.0;

  if (entity.domain && memory.topicDomains.includes(entity.domain)) {
    weight *= t.topicDomain;
  }

  const area = entity.area?.toLowerCase() ?? '';
  if (memory.currentFocus) {
    const focus = memory.currentFocus.toLowerCase();
    if (area === focus) weight *= t.focusArea;
    else if (entity.entityId.toLowerCase().includes(focus)) weight *= t.focusInId;
    else if (area && memory.focusHistory.includes(area)) weight *= t.focusHistory;
  }

  switch (memory.intentPattern) {
    case 'device_control':
      if (entity.domain && CONTROL_DOMAINS.includes(entity.domain)) weight *= t.deviceControl;
      break;
    case 'status_check':
      if (entity.domain === 'sensor') weight *= t.statusCheck;
      break;
    case 'sequential_rooms':
      if (area) weight *= t.sequentialRooms;
      break;
  }

  const ageSeconds = Math.max(0, now - entity.mentionedAt) / 1000;
  weight *= Math.max(t.decayFloor, Math.exp(-ageSeconds / t.decaySeconds));

  return Math.min(weight, t.cap);
}
