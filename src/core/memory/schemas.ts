/**
 * Persisted Memory Documents
 *
 * Conversation memory is stored as a snake_case JSON document under
 * `conv_{id}_memory`; summaries under `summary_{id}`. Anything that does
 * not parse is treated as absent.
 */

import { z } from 'zod';
import {
  CONTEXT_TYPES,
  type ConversationMemory,
  type ConversationSummary
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Keys
// ═══════════════════════════════════════════════════════════════════════════════

export const MEMORY_KEY_PREFIX = 'conv_';
export const SUMMARY_KEY_PREFIX = 'summary_';

export function memoryKey(conversationId: string): string {
  return `${MEMORY_KEY_PREFIX}${conversationId}_memory`;
}

export function summaryKey(conversationId: string): string {
  return `${SUMMARY_KEY_PREFIX}${conversationId}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Summary as returned by the LLM and as stored. Lenient on optional
 * fields so a partial model answer still counts.
 */
export const ConversationSummarySchema = z.object({
  topic: z.string(),
  current_focus: z.string().nullish(),
  intent_pattern: z.string().default('unknown'),
  topic_domains: z.array(z.string()).default([]),
  context_entities: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).default(0.5),
  reasoning: z.string().default('')
});
export type StoredSummary = z.infer<typeof ConversationSummarySchema>;

export function summaryFromStored(stored: StoredSummary): ConversationSummary {
  return {
    topic: stored.topic,
    currentFocus: stored.current_focus ?? null,
    intentPattern: stored.intent_pattern,
    topicDomains: stored.topic_domains,
    contextEntities: stored.context_entities,
    confidence: stored.confidence,
    reasoning: stored.reasoning
  };
}

export function summaryToStored(summary: ConversationSummary): StoredSummary {
  return {
    topic: summary.topic,
    current_focus: summary.currentFocus,
    intent_pattern: summary.intentPattern,
    topic_domains: summary.topicDomains,
    context_entities: summary.contextEntities,
    confidence: summary.confidence,
    reasoning: summary.reasoning
  };
}

export const SummaryDocumentSchema = z.object({
  conversation_id: z.string(),
  summary_data: ConversationSummarySchema,
  created_at: z.iso.datetime(),
  ttl: z.iso.datetime(),
  type: z.literal('conversation_summary')
});

// ═══════════════════════════════════════════════════════════════════════════════
// Memory
// ═══════════════════════════════════════════════════════════════════════════════

const StoredEntitySchema = z.object({
  entity_id: z.string().min(1),
  relevance_score: z.number(),
  mentioned_at: z.iso.datetime(),
  context: z.string(),
  area: z.string().nullable(),
  domain: z.string().nullable(),
  boost_weight: z.number().default(1.0),
  context_type: z.enum(CONTEXT_TYPES).default('primary')
});

export const MemoryDocumentSchema = z.object({
  conversation_id: z.string(),
  entities: z.array(StoredEntitySchema),
  areas_mentioned: z.array(z.string()),
  domains_mentioned: z.array(z.string()),
  last_updated: z.iso.datetime(),
  ttl: z.iso.datetime(),
  query_count: z.number().int().default(1),
  topic_summary: z.string().nullable().default(null),
  current_focus: z.string().nullable().default(null),
  intent_pattern: z.string().nullable().default(null),
  topic_domains: z.array(z.string()).default([]),
  focus_history: z.array(z.string()).default([]),
  conversation_summary: ConversationSummarySchema.nullable().default(null)
});
export type MemoryDocument = z.infer<typeof MemoryDocumentSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Conversion
// ═══════════════════════════════════════════════════════════════════════════════

const iso = (ms: number): string => new Date(ms).toISOString();

export function memoryToDocument(memory: ConversationMemory): MemoryDocument {
  return {
    conversation_id: memory.conversationId,
    entities: memory.entities.map((e) => ({
      entity_id: e.entityId,
      relevance_score: e.relevanceScore,
      mentioned_at: iso(e.mentionedAt),
      context: e.context,
      area: e.area,
      domain: e.domain,
      boost_weight: e.boostWeight,
      context_type: e.contextType
    })),
    areas_mentioned: memory.areasMentioned,
    domains_mentioned: memory.domainsMentioned,
    last_updated: iso(memory.lastUpdated),
    ttl: iso(memory.ttl),
    query_count: memory.queryCount,
    topic_summary: memory.topicSummary,
    current_focus: memory.currentFocus,
    intent_pattern: memory.intentPattern,
    topic_domains: memory.topicDomains,
    focus_history: memory.focusHistory,
    conversation_summary: memory.conversationSummary
      ? summaryToStored(memory.conversationSummary)
      : null
  };
}

export function memoryFromDocument(doc: MemoryDocument): ConversationMemory {
  return {
    conversationId: doc.conversation_id,
    entities: doc.entities.map((e) => ({
      entityId: e.entity_id,
      relevanceScore: e.relevance_score,
      mentionedAt: Date.parse(e.mentioned_at),
      context: e.context,
      area: e.area,
      domain: e.domain,
      boostWeight: e.boost_weight,
      contextType: e.context_type
    })),
    areasMentioned: doc.areas_mentioned,
    domainsMentioned: doc.domains_mentioned,
    lastUpdated: Date.parse(doc.last_updated),
    ttl: Date.parse(doc.ttl),
    queryCount: doc.query_count,
    topicSummary: doc.topic_summary,
    currentFocus: doc.current_focus,
    intentPattern: doc.intent_pattern,
    topicDomains: doc.topic_domains,
    focusHistory: doc.focus_history,
    conversationSummary: doc.conversation_summary
      ? summaryFromStored(doc.conversation_summary)
      : null
  };
}

/**
 * Parse a stored JSON body. Returns null for anything malformed.
 */
export function parseDocumentBody<T>(body: string, schema: z.ZodType<T>): T | null {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return null;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}
