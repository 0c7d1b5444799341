/**
 * Conversation Memory Service
 *
 * Short-term, TTL'd memory of which entities a conversation touched.
 * Each write merges with what is stored: re-mentioned entities are
 * replaced, the rest fade, and the list is capped. Reads treat expired
 * or malformed documents as absent.
 *
 * Every public method degrades to null / false / [] / 0 when storage
 * fails, so retrieval never breaks because memory is unavailable.
 */

import type { LanguagePack } from '@/core/language/pack';
import type { GraphClient } from '@/providers/graph/types';
import { logError, logMemoryCleanup, logMemoryStored } from '@/utils/logger';
import { type MemoryConfig, memoryDefaults } from './config';
import {
  MEMORY_KEY_PREFIX,
  MemoryDocumentSchema,
  memoryFromDocument,
  memoryKey,
  memoryToDocument,
  parseDocumentBody,
  SUMMARY_KEY_PREFIX,
  SummaryDocumentSchema,
  summaryFromStored,
  summaryKey,
  summaryToStored
} from './schemas';
import {
  clampBoost,
  decayFactor,
  determineContextType,
  incomingRelevance,
  initialBoostWeight,
  memoryRelevance,
  topicAwareBoost
} from './scoring';
import type {
  ConversationEntity,
  ConversationMemory,
  ConversationStats,
  ConversationSummary,
  MemoryEntityInput,
  RecalledEntity
} from './types';

export interface MemoryServiceOptions {
  config?: MemoryConfig;
  /** Epoch milliseconds; injectable for tests */
  clock?: () => number;
}

/**
 * A recalled entity plus the topic multiplier of its conversation.
 */
export interface RecalledEntityWithTopic extends RecalledEntity {
  /** 1.0 when the conversation carries no topic information */
  topicBoost: number;
}

const MS_PER_MINUTE = 60_000;

export class ConversationMemoryService {
  private readonly config: MemoryConfig;
  private readonly clock: () => number;

  constructor(
    private readonly graphClient: GraphClient,
    private readonly pack: LanguagePack,
    options: MemoryServiceOptions = {}
  ) {
    this.config = options.config ?? memoryDefaults;
    this.clock = options.clock ?? Date.now;
  }

  get ttlMinutes(): number {
    return this.config.ttlMinutes;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Memory Documents
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Stored memory, or null when missing, malformed or expired.
   * Expired documents are deleted on the way out.
   */
  async getConversationMemory(conversationId: string): Promise<ConversationMemory | null> {
    const key = memoryKey(conversationId);
    try {
      const stored = await this.graphClient.getDocument(key);
      if (!stored) return null;

      const doc = parseDocumentBody(stored.body, MemoryDocumentSchema);
      if (!doc) return null;

      const memory = memoryFromDocument(doc);
      if (memory.ttl <= this.clock()) {
        await this.graphClient.deleteDocument(key);
        return null;
      }
      return memory;
    } catch (error) {
      logError(`Failed to read conversation memory for ${conversationId}`, error);
      return null;
    }
  }

  /**
   * Merge a turn's entities into the conversation's memory.
   *
   * @returns false when storage failed
   */
  async storeConversationMemory(
    conversationId: string,
    entities: readonly MemoryEntityInput[],
    areasMentioned: Iterable<string>,
    domainsMentioned: Iterable<string>,
    queryContext = '',
    conversationSummary: ConversationSummary | null = null
  ): Promise<boolean> {
    try {
      const now = this.clock();
      const existing = await this.getConversationMemory(conversationId);

      const incoming = this.toConversationEntities(entities, queryContext, now);
      const incomingIds = new Set(incoming.map((e) => e.entityId));

      const carried = (existing?.entities ?? [])
        .filter((e) => !incomingIds.has(e.entityId))
        .map((e) => ({
          ...e,
          boostWeight: clampBoost(
            e.boostWeight * decayFactor(now - e.mentionedAt, this.config),
            this.config
          )
        }));

      const memory: ConversationMemory = {
        conversationId,
        entities: this.rankAndCap([...carried, ...incoming]),
        areasMentioned: union(existing?.areasMentioned ?? [], areasMentioned),
        domainsMentioned: union(existing?.domainsMentioned ?? [], domainsMentioned),
        lastUpdated: now,
        ttl: now + this.config.ttlMinutes * MS_PER_MINUTE,
        queryCount: (existing?.queryCount ?? 0) + 1,
        ...this.mergeTopic(existing, conversationSummary)
      };

      await this.persist(memory);
      logMemoryStored(conversationId, memory.entities.length, memory.areasMentioned.length, memory.ttl);
      return true;
    } catch (error) {
      logError(`Failed to store conversation memory for ${conversationId}`, error);
      return false;
    }
  }

  /**
   * Stored entities relevant to the query, best first. Read-only.
   */
  async getRelevantEntities(
    conversationId: string,
    currentQuery: string,
    maxEntities = 10
  ): Promise<RecalledEntityWithTopic[]> {
    const memory = await this.getConversationMemory(conversationId);
    if (!memory) return [];

    const now = this.clock();
    const hasTopic =
      memory.topicDomains.length > 0 || memory.currentFocus !== null || memory.intentPattern !== null;

    const recalled: RecalledEntityWithTopic[] = [];
    for (const entity of memory.entities) {
      const relevance = memoryRelevance(entity, currentQuery, now, this.pack, this.config);
      if (relevance <= this.config.relevance.threshold) continue;

      recalled.push({
        entityId: entity.entityId,
        relevanceScore: entity.relevanceScore,
        boostWeight: entity.boostWeight,
        area: entity.area,
        domain: entity.domain,
        context: entity.context,
        mentionedAt: entity.mentionedAt,
        memoryRelevance: relevance,
        contextType: entity.contextType,
        topicBoost: hasTopic ? topicAwareBoost(entity, memory, now, this.config) : 1.0
      });
    }

    return recalled
      .map((entity, index) => ({ entity, index }))
      .sort(
        (a, b) =>
          b.entity.memoryRelevance * b.entity.boostWeight -
            a.entity.memoryRelevance * a.entity.boostWeight || a.index - b.index
      )
      .slice(0, maxEntities)
      .map(({ entity }) => entity);
  }

  /**
   * Multiply one entity's boost weight (clamped) and write the memory back
   * without decaying the others.
   *
   * @returns whether the entity was found and stored
   */
  async updateEntityBoost(
    conversationId: string,
    entityId: string,
    multiplier: number
  ): Promise<boolean> {
    const memory = await this.getConversationMemory(conversationId);
    if (!memory) return false;

    if (!memory.entities.some((entity) => entity.entityId === entityId)) return false;

    const entities = memory.entities.map((entity) =>
      entity.entityId === entityId
        ? { ...entity, boostWeight: clampBoost(entity.boostWeight * multiplier, this.config) }
        : entity
    );

    const now = this.clock();
    try {
      await this.persist({
        ...memory,
        entities: this.rankAndCap(entities),
        lastUpdated: now,
        ttl: now + this.config.ttlMinutes * MS_PER_MINUTE
      });
      return true;
    } catch (error) {
      logError(`Failed to update boost for ${entityId} in ${conversationId}`, error);
      return false;
    }
  }

  async deleteConversationMemory(conversationId: string): Promise<boolean> {
    try {
      const deleted = await this.graphClient.deleteDocument(memoryKey(conversationId));
      await this.graphClient.deleteDocument(summaryKey(conversationId));
      return deleted;
    } catch (error) {
      logError(`Failed to delete conversation memory for ${conversationId}`, error);
      return false;
    }
  }

  /**
   * Delete every expired memory and summary document.
   *
   * @returns number of documents removed
   */
  async cleanupAllExpired(): Promise<number> {
    try {
      const now = new Date(this.clock()).toISOString();
      const memories = await this.graphClient.deleteExpiredDocuments(MEMORY_KEY_PREFIX, now);
      const summaries = await this.graphClient.deleteExpiredDocuments(SUMMARY_KEY_PREFIX, now);
      logMemoryCleanup(memories + summaries);
      return memories + summaries;
    } catch (error) {
      logError('Failed to sweep expired conversation memory', error);
      return 0;
    }
  }

  async getConversationStats(conversationId: string): Promise<ConversationStats | null> {
    const memory = await this.getConversationMemory(conversationId);
    if (!memory) return null;

    const totalBoost = memory.entities.reduce((sum, e) => sum + e.boostWeight, 0);
    return {
      conversation_id: conversationId,
      entity_count: memory.entities.length,
      areas_count: memory.areasMentioned.length,
      domains_count: memory.domainsMentioned.length,
      query_count: memory.queryCount,
      last_updated: new Date(memory.lastUpdated).toISOString(),
      ttl: new Date(memory.ttl).toISOString(),
      minutes_remaining: Math.max(0, (memory.ttl - this.clock()) / MS_PER_MINUTE),
      average_boost_weight: memory.entities.length > 0 ? totalBoost / memory.entities.length : 0,
      top_areas: memory.areasMentioned,
      top_domains: memory.domainsMentioned
    };
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Summary Cache
  // ═══════════════════════════════════════════════════════════════════════════════

  async storeConversationSummary(
    conversationId: string,
    summary: ConversationSummary,
    ttlMinutes = this.config.ttlMinutes
  ): Promise<boolean> {
    const now = this.clock();
    const expiresAt = new Date(now + ttlMinutes * MS_PER_MINUTE).toISOString();
    try {
      await this.graphClient.putDocument({
        key: summaryKey(conversationId),
        body: JSON.stringify({
          conversation_id: conversationId,
          summary_data: summaryToStored(summary),
          created_at: new Date(now).toISOString(),
          ttl: expiresAt,
          type: 'conversation_summary'
        }),
        expiresAt
      });
      return true;
    } catch (error) {
      logError(`Failed to store conversation summary for ${conversationId}`, error);
      return false;
    }
  }

  async getConversationSummary(conversationId: string): Promise<ConversationSummary | null> {
    const key = summaryKey(conversationId);
    try {
      const stored = await this.graphClient.getDocument(key);
      if (!stored) return null;

      const doc = parseDocumentBody(stored.body, SummaryDocumentSchema);
      if (!doc) return null;

      if (Date.parse(doc.ttl) <= this.clock()) {
        await this.graphClient.deleteDocument(key);
        return null;
      }
      return summaryFromStored(doc.summary_data);
    } catch (error) {
      logError(`Failed to read conversation summary for ${conversationId}`, error);
      return null;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════════════

  private toConversationEntities(
    entities: readonly MemoryEntityInput[],
    queryContext: string,
    now: number
  ): ConversationEntity[] {
    const seen = new Set<string>();
    const result: ConversationEntity[] = [];

    entities.forEach((entity, position) => {
      if (!entity.entityId || seen.has(entity.entityId)) return;
      seen.add(entity.entityId);

      const relevance = incomingRelevance(entity);
      result.push({
        entityId: entity.entityId,
        relevanceScore: relevance,
        mentionedAt: now,
        context: queryContext,
        area: entity.area ?? null,
        domain: entity.domain ?? null,
        boostWeight: initialBoostWeight(entity, this.config),
        contextType: determineContextType(relevance, position, this.config)
      });
    });

    return result;
  }

  /** Stable sort by relevance × boost, then cap */
  private rankAndCap(entities: ConversationEntity[]): ConversationEntity[] {
    return entities
      .map((entity, index) => ({ entity, index }))
      .sort(
        (a, b) =>
          b.entity.relevanceScore * b.entity.boostWeight -
            a.entity.relevanceScore * a.entity.boostWeight || a.index - b.index
      )
      .slice(0, this.config.maxEntities)
      .map(({ entity }) => entity);
  }

  private mergeTopic(
    existing: ConversationMemory | null,
    summary: ConversationSummary | null
  ): Pick<
    ConversationMemory,
    | 'topicSummary'
    | 'currentFocus'
    | 'intentPattern'
    | 'topicDomains'
    | 'focusHistory'
    | 'conversationSummary'
  > {
    let topicSummary = existing?.topicSummary ?? null;
    let currentFocus = existing?.currentFocus ?? null;
    let intentPattern = existing?.intentPattern ?? null;
    const topicDomains = new Set(existing?.topicDomains ?? []);
    let focusHistory = [...(existing?.focusHistory ?? [])];

    if (summary) {
      topicSummary = summary.topic || topicSummary;
      if (summary.currentFocus && summary.currentFocus !== currentFocus) {
        if (currentFocus) focusHistory.push(currentFocus);
        currentFocus = summary.currentFocus;
        focusHistory = focusHistory.slice(-this.config.focusHistoryLimit);
      }
      intentPattern = summary.intentPattern || intentPattern;
      for (const domain of summary.topicDomains) topicDomains.add(domain);
    }

    return {
      topicSummary,
      currentFocus,
      intentPattern,
      topicDomains: Array.from(topicDomains),
      focusHistory,
      conversationSummary: summary ?? existing?.conversationSummary ?? null
    };
  }

  private async persist(memory: ConversationMemory): Promise<void> {
    await this.graphClient.putDocument({
      key: memoryKey(memory.conversationId),
      body: JSON.stringify(memoryToDocument(memory)),
      expiresAt: new Date(memory.ttl).toISOString()
    });
  }
}

function union(existing: readonly string[], added: Iterable<string>): string[] {
  const result = new Set(existing);
  for (const value of added) {
    if (value) result.add(value);
  }
  return Array.from(result);
}
