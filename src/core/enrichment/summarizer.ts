/**
 * Conversation Summarizer
 *
 * Produces a topic summary for a conversation: LLM first, bounded by a
 * timeout, with a rule-based fallback from the language pack when no LLM
 * is configured or the call fails.
 */

import type { ChatMessage } from '@/core/conversation/types';
import type { LanguagePack } from '@/core/language/pack';
import { compilePattern, containsAny } from '@/core/language/text';
import { summaryFromStored } from '@/core/memory/schemas';
import type { ConversationMemory, ConversationSummary } from '@/core/memory/types';
import type { LLMClient, Message } from '@/providers/llm/types';
import { withTimeout } from '@/utils/async';
import { logWarning } from '@/utils/logger';
import { conversationSummarizer } from './agents/summarizer';
import type { Agent, AgentCallConfig } from './types';

const RULE_CONFIDENCE = 0.7;
const MEMORY_ENTITIES_CONSIDERED = 5;

export const summarizerDefaults = {
  maxRetries: 1,
  temperature: 0.3,
  maxTokens: 300,
  timeoutMs: 8000
} as const satisfies AgentCallConfig;

/**
 * Call an agent with retry logic. Each attempt is bounded by the timeout
 * and cancelled when it runs out.
 */
export async function callAgent<I, O>(
  agent: Agent<I, O>,
  input: I,
  llmClient: LLMClient,
  config: AgentCallConfig
): Promise<O> {
  const messages: Message[] = [
    { role: 'system', content: agent.systemPrompt },
    { role: 'user', content: agent.formatInput(input) }
  ];

  let lastError: Error | null = null;
  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await withTimeout(
        llmClient.completeJSON(messages, agent.outputSchema, {
          maxTokens: config.maxTokens,
          temperature: config.temperature,
          abortSignal: AbortSignal.timeout(config.timeoutMs)
        }),
        config.timeoutMs,
        { context: 'conversation summary' }
      );
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }
  }

  throw new Error(`Agent failed after ${config.maxRetries + 1} attempts: ${lastError?.message}`);
}

export class ConversationSummarizer {
  private readonly config: AgentCallConfig;
  private readonly intentPatterns: [string, RegExp[]][];

  constructor(
    private readonly pack: LanguagePack,
    private readonly llmClient: LLMClient | null = null,
    config: Partial<AgentCallConfig> = {}
  ) {
    this.config = { ...summarizerDefaults, ...config };
    this.intentPatterns = Object.entries(pack.summarizer.intents).map(([intent, patterns]) => [
      intent,
      patterns.map(compilePattern)
    ]);
  }

  async generateSummary(
    query: string,
    history: ChatMessage[],
    memory: ConversationMemory | null = null
  ): Promise<ConversationSummary> {
    if (this.llmClient) {
      try {
        const stored = await callAgent(
          conversationSummarizer,
          { query, history, memory },
          this.llmClient,
          this.config
        );
        return summaryFromStored(stored);
      } catch (error) {
        logWarning('LLM summarization failed, using rule-based summary', error);
      }
    }
    return this.ruleBasedSummary(query, memory);
  }

  /**
   * Topic, intent and focus from keyword tables. First match wins in
   * table order.
   */
  ruleBasedSummary(query: string, memory: ConversationMemory | null = null): ConversationSummary {
    const queryLower = query.toLowerCase();

    let topic = 'general';
    let topicDomains: string[] = [];
    for (const [name, entry] of Object.entries(this.pack.summarizer.topics)) {
      if (containsAny(queryLower, entry.keywords)) {
        topic = `${name} monitoring`;
        topicDomains = [...entry.domains];
        break;
      }
    }

    let intentPattern = 'read';
    for (const [intent, patterns] of this.intentPatterns) {
      if (patterns.some((pattern) => pattern.test(queryLower))) {
        intentPattern = intent;
        break;
      }
    }

    let currentFocus: string | null = null;
    for (const [area, keywords] of Object.entries(this.pack.summarizer.areaFocus)) {
      if (containsAny(queryLower, keywords)) {
        currentFocus = area;
        break;
      }
    }

    const contextEntities = (memory?.entities ?? [])
      .slice(0, MEMORY_ENTITIES_CONSIDERED)
      .map((e) => e.entityId)
      .filter((id) => {
        if (currentFocus && id.toLowerCase().includes(currentFocus)) return true;
        return topicDomains.some((domain) => id.includes(domain));
      });

    return {
      topic,
      currentFocus,
      intentPattern,
      topicDomains,
      contextEntities,
      confidence: RULE_CONFIDENCE,
      reasoning: 'Rule-based pattern matching'
    };
  }
}
