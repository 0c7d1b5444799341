/**
 * Enrichment Module
 */

export { ConversationEnricher, type EnricherOptions } from './enricher';
export { callAgent, ConversationSummarizer, summarizerDefaults } from './summarizer';
export type { Agent, AgentCallConfig, EnricherStats, EnrichmentJob } from './types';
