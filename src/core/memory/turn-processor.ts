/**
 * Turn Processor
 *
 * Everything that happens after a turn's entities are chosen: the
 * reinforcement trackers learn from them, conversation memory stores
 * them, and background enrichment is queued.
 */

import type { ChatMessage } from '@/core/conversation/types';
import type { ConversationEnricher } from '@/core/enrichment/enricher';
import { type MemoryConfig, memoryDefaults } from './config';
import type { ExpansionSuggestions, QueryExpansionMemory } from './expansion';
import type { ConversationMemoryService } from './service';
import type { EntityContextTracker } from './tracker';
import type { ConversationSummary, MemoryEntityInput } from './types';

export interface TurnInput {
  conversationId: string;
  query: string;
  entities: MemoryEntityInput[];
  history?: ChatMessage[];
  /** Learning signal in [0, 1] */
  successFeedback?: number;
}

export interface EnhancementData {
  /** Tracker boosts above the report threshold */
  entityBoosts: Record<string, number>;
  expansionSuggestions: ExpansionSuggestions;
  cachedSummary: ConversationSummary | null;
  backgroundPending: boolean;
}

export class TurnProcessor {
  constructor(
    private readonly memoryService: ConversationMemoryService,
    private readonly tracker: EntityContextTracker,
    private readonly expansion: QueryExpansionMemory,
    private readonly enricher: ConversationEnricher | null = null,
    private readonly config: MemoryConfig = memoryDefaults
  ) {}

  async processTurn(input: TurnInput): Promise<EnhancementData> {
    const { conversationId, query, entities } = input;

    for (const entity of entities) {
      this.tracker.updateEntity(
        entity.entityId,
        entity.score ?? entity.similarity ?? 0,
        entity.area,
        entity.domain
      );
    }

    this.expansion.learnSuccessfulPattern(
      query,
      entities.map((e) => e.entityId),
      input.successFeedback ?? 1.0
    );

    const areas = entities.flatMap((e) => (e.area ? [e.area] : []));
    const domains = entities.flatMap((e) => (e.domain ? [e.domain] : []));
    const summary = await this.memoryService.getConversationSummary(conversationId);

    await this.memoryService.storeConversationMemory(
      conversationId,
      entities,
      areas,
      domains,
      query,
      summary
    );

    this.enricher?.enqueue({ conversationId, query, history: input.history ?? [] });

    return this.getEnhancementData(conversationId, query, summary);
  }

  async getEnhancementData(
    conversationId: string,
    query: string,
    cachedSummary?: ConversationSummary | null
  ): Promise<EnhancementData> {
    const summary =
      cachedSummary !== undefined
        ? cachedSummary
        : await this.memoryService.getConversationSummary(conversationId);

    return {
      entityBoosts: Object.fromEntries(
        this.tracker.getSignificantBoosts(this.config.tracker.reportThreshold)
      ),
      expansionSuggestions: this.expansion.getExpansionSuggestions(query),
      cachedSummary: summary,
      backgroundPending: this.enricher?.isPending(conversationId) ?? false
    };
  }
}
