/**
 * Context Reranker
 *
 * Deterministic scoring of retrieval candidates against the conversation:
 *
 *   finalScore = baseScore + Σ rankingFactors
 *
 * baseScore is the retrieval similarity, or a keyword match score when the
 * candidate has none. Factors reward the areas, domains and device classes
 * in play, the intent, live sensor values, memory, topic, cluster
 * membership and reinforcement. Selection keeps live entities ahead of
 * unavailable ones within the top of the ranking.
 */

import { ConversationAnalyzer } from '@/core/conversation/analyzer';
import type { ConversationContext } from '@/core/conversation/types';
import { mergeCandidates } from '@/core/entities/candidate';
import type { EntityCandidate } from '@/core/entities/types';
import type { LanguagePack } from '@/core/language/pack';
import { type RankingConfig, rankingDefaults } from './config';
import type { EntityReranker, EntityScore, RankOptions } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Keyword Fallback
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Text the keyword fallback matches against:
 * id | friendly name | "terület: area" | "domain device_class" | text
 */
export function describeEntity(entity: EntityCandidate): string {
  const parts: string[] = [entity.entityId];
  if (entity.friendlyName) parts.push(entity.friendlyName);
  if (entity.area) parts.push(`terület: ${entity.area}`);
  if (entity.domain) {
    parts.push(entity.deviceClass ? `${entity.domain} ${entity.deviceClass}` : entity.domain);
  }
  if (entity.text) parts.push(entity.text);
  return parts.join(' | ');
}

/**
 * Share of query words found in the entity description; 0.5 for an
 * empty query.
 */
export function keywordScore(entity: EntityCandidate, query: string): number {
  const words = query.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) return 0.5;

  const description = describeEntity(entity).toLowerCase();
  const matches = words.filter((word) => description.includes(word)).length;
  return Math.min(1, matches / words.length);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reranker
// ═══════════════════════════════════════════════════════════════════════════════

export class ContextReranker implements EntityReranker {
  private readonly controllable: ReadonlySet<string>;

  constructor(
    pack: LanguagePack,
    private readonly config: RankingConfig = rankingDefaults,
    private readonly analyzer: ConversationAnalyzer = new ConversationAnalyzer(pack, config.context)
  ) {
    this.controllable = new Set(pack.domains.controllableDomains);
  }

  rankEntities(
    entities: readonly EntityCandidate[],
    query: string,
    options: RankOptions
  ): EntityScore[] {
    const k = Math.max(0, Math.floor(options.k));
    if (entities.length === 0 || k === 0) return [];

    const context = options.context ?? this.analyzer.analyze(query, options.history ?? []);
    const reinforcement = options.reinforcement ?? new Map<string, number>();

    const scores = mergeCandidates(entities)
      .map((entity) => this.scoreEntity(entity, query, context, reinforcement))
      .map((score, index) => ({ score, index }))
      .sort((a, b) => b.score.finalScore - a.score.finalScore || a.index - b.index)
      .map(({ score }) => score);

    return this.selectActiveFirst(scores, k);
  }

  scoreEntity(
    entity: EntityCandidate,
    query: string,
    context: ConversationContext,
    reinforcement: ReadonlyMap<string, number> = new Map()
  ): EntityScore {
    const usedFallbackMatching = !(entity.similarity > 0);
    const baseScore = usedFallbackMatching ? keywordScore(entity, query) : entity.similarity;
    const rankingFactors = this.rankingFactors(entity, context, reinforcement);
    const contextBoost = Object.values(rankingFactors).reduce((sum, value) => sum + value, 0);

    return {
      entity,
      baseScore,
      contextBoost,
      finalScore: baseScore + contextBoost,
      rankingFactors,
      usedFallbackMatching
    };
  }

  private rankingFactors(
    entity: EntityCandidate,
    context: ConversationContext,
    reinforcement: ReadonlyMap<string, number>
  ): Record<string, number> {
    const f = this.config.factors;
    const factors: Record<string, number> = {};

    // Areas: exact match wins over a partial one
    const entityArea = entity.area?.toLowerCase() ?? '';
    if (entityArea) {
      for (const [area, boost] of this.analyzer.getAreaBoostFactors(context)) {
        const areaLower = area.toLowerCase();
        const key = `area_${area}`;
        if (entityArea === areaLower) {
          factors[key] = boost - 1;
        } else if (
          !(key in factors) &&
          (entityArea.includes(areaLower) || areaLower.includes(entityArea))
        ) {
          factors[key] = (boost - 1) * f.partialAreaRatio;
        }
      }
    }

    const domainBoosts = this.analyzer.getDomainBoostFactors(context);
    const domainBoost = domainBoosts.get(`domain:${entity.domain}`);
    if (entity.domain && domainBoost !== undefined) {
      factors[`domain_${entity.domain}`] = domainBoost - 1;
    }
    if (entity.deviceClass) {
      const classBoost = domainBoosts.get(`device_class:${entity.deviceClass}`);
      if (classBoost !== undefined) factors[`device_class_${entity.deviceClass}`] = classBoost - 1;
    }

    if (context.previousEntities.includes(entity.entityId)) {
      factors['previous_mention'] = f.previousMention;
    }

    if (context.intent === 'control' && this.controllable.has(entity.domain)) {
      factors['controllable'] = f.controllable;
    } else if (context.intent === 'read' && entity.domain === 'sensor') {
      factors['readable'] = f.readable;
    }

    if (entity.domain === 'sensor') {
      if (this.isActive(entity)) factors['has_active_value'] = f.activeValue;
      else factors['unavailable_penalty'] = f.unavailablePenalty;
    }

    const { memoryBoosted, memoryBoostWeight, topicBoost, clusterContext } = entity.annotations;
    if (memoryBoosted && memoryBoostWeight !== undefined && memoryBoostWeight > 1) {
      factors['memory_boost'] = (memoryBoostWeight - 1) * f.memory;
    }
    if (topicBoost !== undefined && topicBoost > 1) {
      factors['topic_boost'] = (topicBoost - 1) * f.topic;
    }
    if (clusterContext) {
      factors['cluster_boost'] =
        f.cluster * clusterContext.weight * clusterContext.contextBoost +
        (clusterContext.role === 'primary' ? f.clusterPrimary : 0);
    }

    const tracked = reinforcement.get(entity.entityId);
    if (tracked !== undefined && tracked > 1) {
      factors['reinforcement_boost'] = (tracked - 1) * f.reinforcement;
    }

    return factors;
  }

  private isActive(entity: EntityCandidate): boolean {
    if (entity.state === null) return false;
    return !this.config.selection.inactiveStates.includes(entity.state.toLowerCase());
  }

  /**
   * From the top k × poolMultiplier, take live entities first and fill
   * with inactive ones; the result keeps ranking order.
   */
  private selectActiveFirst(scores: EntityScore[], k: number): EntityScore[] {
    const pool = scores.slice(0, k * this.config.selection.poolMultiplier);
    const active = pool.filter((s) => !('unavailable_penalty' in s.rankingFactors));
    const inactive = pool.filter((s) => 'unavailable_penalty' in s.rankingFactors);

    const chosen = new Set([...active, ...inactive].slice(0, k));
    return pool.filter((s) => chosen.has(s));
  }
}
