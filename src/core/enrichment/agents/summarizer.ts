/**
 * Conversation Summarizer Agent
 *
 * Reads the recent conversation and the stored memory and names the
 * topic, the area in focus and the query pattern.
 * Input: current query, recent history, stored memory
 * Output: structured summary (snake_case, as stored)
 */

import type { ChatMessage } from '@/core/conversation/types';
import { ConversationSummarySchema, type StoredSummary } from '@/core/memory/schemas';
import type { ConversationMemory } from '@/core/memory/types';
import type { Agent } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface SummarizerInput {
  query: string;
  history: ChatMessage[];
  memory: ConversationMemory | null;
}

const HISTORY_MESSAGES = 6;
const MESSAGE_PREVIEW = 150;

// ═══════════════════════════════════════════════════════════════════════════════
// System Prompt
// ═══════════════════════════════════════════════════════════════════════════════

const SYSTEM_PROMPT = `# IDENTITY and PURPOSE

You are a smart home conversation analyzer. You read a conversation between a resident and their home assistant (Hungarian or English) and summarize what it is about, so that the next retrieval can prefer the right devices and rooms.

# OUTPUT INSTRUCTIONS

Return JSON only:
{
  "topic": "temperature monitoring",
  "current_focus": "konyha",
  "intent_pattern": "sequential_rooms",
  "topic_domains": ["sensor", "climate"],
  "context_entities": ["sensor.konyha_homerseklet"],
  "confidence": 0.85,
  "reasoning": "one short sentence"
}

# FIELDS

- topic: main subject, e.g. "temperature monitoring", "light control", "home overview"
- current_focus: the room being discussed, by its Hungarian name (konyha, nappali, hálószoba, fürdőszoba, kert, garázs, pince, dolgozószoba), or "" when none
- intent_pattern: one of "sequential_rooms" (the same question moving from room to room, e.g. "és a nappaliban?"), "device_control", "status_check", "home_overview", "read"
- topic_domains: Home Assistant domains relevant to the topic (sensor, climate, light, switch, cover, binary_sensor, ...)
- context_entities: entity ids from the memory that matter for the topic; never invent ids
- confidence: 0 to 1

# INPUT

`;

// ═══════════════════════════════════════════════════════════════════════════════
// Agent Definition
// ═══════════════════════════════════════════════════════════════════════════════

export const conversationSummarizer: Agent<SummarizerInput, StoredSummary> = {
  systemPrompt: SYSTEM_PROMPT,
  outputSchema: ConversationSummarySchema,
  formatInput: (input) => {
    const history =
      input.history.length === 0
        ? 'No earlier messages.'
        : input.history
            .slice(-HISTORY_MESSAGES)
            .map((m) => {
              const role = m.role === 'user' ? 'User' : 'Assistant';
              return `${role}: "${m.content.slice(0, MESSAGE_PREVIEW)}"`;
            })
            .join('\n');

    const memory = input.memory;
    const memoryText = memory
      ? `Areas: ${memory.areasMentioned.join(', ') || '-'}
Domains: ${memory.domainsMentioned.join(', ') || '-'}
Entities: ${memory.entities.slice(0, 5).map((e) => e.entityId).join(', ') || '-'}`
      : 'No stored memory.';

    return `## HISTORY\n\n${history}\n\n## CURRENT QUERY\n\n${input.query}\n\n## MEMORY\n\n${memoryText}`;
  }
};
