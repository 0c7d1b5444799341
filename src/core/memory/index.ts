/**
 * Conversation Memory Module
 */

export { createMemoryConfig, type MemoryConfig, memoryDefaults } from './config';
export { type ExpansionSuggestions, QueryExpansionMemory } from './expansion';
export { memoryKey, summaryKey } from './schemas';
export {
  ConversationMemoryService,
  type MemoryServiceOptions,
  type RecalledEntityWithTopic
} from './service';
export { EntityContextTracker } from './tracker';
export { type EnhancementData, type TurnInput, TurnProcessor } from './turn-processor';
export type {
  ContextType,
  ConversationEntity,
  ConversationMemory,
  ConversationStats,
  ConversationSummary,
  MemoryEntityInput,
  RecalledEntity
} from './types';
