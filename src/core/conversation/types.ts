/**
 * Conversation Types
 */

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type Intent = 'control' | 'read';

/**
 * Canonical conversation context consumed by scope detection and ranking.
 * Lists keep first-seen order and hold no duplicates.
 */
export interface ConversationContext {
  areasMentioned: string[];
  domainsMentioned: string[];
  deviceClassesMentioned: string[];
  /** Entity ids announced in earlier system prompts */
  previousEntities: string[];
  isFollowUp: boolean;
  intent: Intent;
}

/**
 * Partial context supplied by a caller that did its own analysis.
 */
export type ContextHints = Partial<ConversationContext>;

export function contextFromHints(hints: ContextHints = {}): ConversationContext {
  return {
    areasMentioned: unique(hints.areasMentioned ?? []),
    domainsMentioned: unique(hints.domainsMentioned ?? []),
    deviceClassesMentioned: unique(hints.deviceClassesMentioned ?? []),
    previousEntities: unique(hints.previousEntities ?? []),
    isFollowUp: hints.isFollowUp ?? false,
    intent: hints.intent ?? 'read'
  };
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
