/**
 * Conversation Memory Types
 */

export const CONTEXT_TYPES = ['primary', 'secondary', 'historical'] as const;
export type ContextType = (typeof CONTEXT_TYPES)[number];

export interface ConversationEntity {
  entityId: string;
  relevanceScore: number;
  /** Epoch milliseconds */
  mentionedAt: number;
  /** Query that surfaced the entity */
  context: string;
  area: string | null;
  domain: string | null;
  /** Always within [boost.min, boost.max] */
  boostWeight: number;
  contextType: ContextType;
}

/**
 * Summary produced by the summarizer, stored alongside memory.
 */
export interface ConversationSummary {
  topic: string;
  currentFocus: string | null;
  intentPattern: string;
  topicDomains: string[];
  contextEntities: string[];
  confidence: number;
  reasoning: string;
}

export interface ConversationMemory {
  conversationId: string;
  /** Sorted by relevanceScore × boostWeight, best first */
  entities: ConversationEntity[];
  areasMentioned: string[];
  domainsMentioned: string[];
  lastUpdated: number;
  /** Expiry, epoch milliseconds; always after lastUpdated */
  ttl: number;
  queryCount: number;
  topicSummary: string | null;
  currentFocus: string | null;
  intentPattern: string | null;
  topicDomains: string[];
  focusHistory: string[];
  conversationSummary: ConversationSummary | null;
}

/**
 * An entity handed to storeConversationMemory by the retrieval flow.
 */
export interface MemoryEntityInput {
  entityId: string;
  area?: string | null;
  domain?: string | null;
  similarity?: number;
  /** Reranker score; preferred over similarity as relevance */
  score?: number;
  isPrimary?: boolean;
}

/**
 * An entity recalled from memory with its relevance to the current query.
 */
export interface RecalledEntity {
  entityId: string;
  relevanceScore: number;
  boostWeight: number;
  area: string | null;
  domain: string | null;
  context: string;
  mentionedAt: number;
  memoryRelevance: number;
  contextType: ContextType;
}

export interface ConversationStats {
  conversation_id: string;
  entity_count: number;
  areas_count: number;
  domains_count: number;
  query_count: number;
  last_updated: string;
  ttl: string;
  minutes_remaining: number;
  average_boost_weight: number;
  top_areas: string[];
  top_domains: string[];
}
