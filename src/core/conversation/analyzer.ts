/**
 * Conversation Analyzer
 *
 * Derives the canonical ConversationContext from the current message and
 * recent history: areas, domains and device classes mentioned, intent,
 * follow-up detection and entity ids announced in earlier system prompts.
 * Matching is substring based on the language pack keyword tables.
 */

import type { LanguagePack } from '@/core/language/pack';
import { compilePattern } from '@/core/language/text';
import { type ContextBoostConfig, rankingDefaults } from '@/core/ranking/config';
import type { ChatMessage, ConversationContext, Intent } from './types';

/** Only the most recent messages are scanned for announced entities */
const ENTITY_HISTORY_WINDOW = 5;
/** Follow-ups inherit areas from this many trailing messages */
const AREA_HISTORY_WINDOW = 3;
const ENTITY_LIST_MARKER = 'Relevant entities:';

export class ConversationAnalyzer {
  private readonly controlPatterns: RegExp[];
  private readonly followUpPatterns: RegExp[];

  constructor(
    private readonly pack: LanguagePack,
    private readonly boosts: ContextBoostConfig = rankingDefaults.context
  ) {
    this.controlPatterns = pack.intents.control.map(compilePattern);
    this.followUpPatterns = pack.intents.followUp.map(compilePattern);
  }

  analyze(message: string, history: readonly ChatMessage[] = []): ConversationContext {
    let areasMentioned = this.extractAreas(message);
    const { domains, deviceClasses } = this.extractDomainsAndClasses(message);
    const isFollowUp = this.isFollowUp(message);

    if (isFollowUp && areasMentioned.length === 0 && history.length > 0) {
      areasMentioned = this.extractAreasFromHistory(history);
    }

    return {
      areasMentioned,
      domainsMentioned: domains,
      deviceClassesMentioned: deviceClasses,
      previousEntities: extractPreviousEntities(history),
      isFollowUp,
      intent: this.detectIntent(message)
    };
  }

  extractAreas(text: string): string[] {
    const lower = text.toLowerCase();
    const areas: string[] = [];
    for (const [area, aliases] of Object.entries(this.pack.areas.areas)) {
      if (aliases.some((alias) => lower.includes(alias.toLowerCase()))) {
        areas.push(area);
      }
    }
    return areas;
  }

  /**
   * A device-class keyword implies the sensor domain as well.
   */
  extractDomainsAndClasses(text: string): { domains: string[]; deviceClasses: string[] } {
    const lower = text.toLowerCase();
    const domains = new Set<string>();
    const deviceClasses = new Set<string>();

    for (const [deviceClass, keywords] of Object.entries(this.pack.domains.sensorDeviceClasses)) {
      if (keywords.some((keyword) => lower.includes(keyword))) {
        domains.add('sensor');
        deviceClasses.add(deviceClass);
      }
    }
    for (const [domain, keywords] of Object.entries(this.pack.domains.domains)) {
      if (keywords.some((keyword) => lower.includes(keyword))) {
        domains.add(domain);
      }
    }

    return { domains: [...domains], deviceClasses: [...deviceClasses] };
  }

  isFollowUp(text: string): boolean {
    return this.followUpPatterns.some((pattern) => pattern.test(text));
  }

  detectIntent(text: string): Intent {
    return this.controlPatterns.some((pattern) => pattern.test(text)) ? 'control' : 'read';
  }

  /**
   * Multiplier per mentioned area: the generic house reference gets a small
   * boost, concrete rooms a larger one, and follow-ups amplify both.
   */
  getAreaBoostFactors(context: ConversationContext): Map<string, number> {
    const generic = new Set(this.pack.areas.genericAreas);
    const factors = new Map<string, number>();
    const multiplier = context.isFollowUp ? this.boosts.followUpMultiplier : 1;

    for (const area of context.areasMentioned) {
      const base = generic.has(area) ? this.boosts.areaGeneric : this.boosts.areaSpecific;
      factors.set(area, base * multiplier);
    }
    return factors;
  }

  /**
   * Keys are `domain:<domain>` and `device_class:<class>`.
   */
  getDomainBoostFactors(context: ConversationContext): Map<string, number> {
    const factors = new Map<string, number>();
    for (const domain of context.domainsMentioned) {
      factors.set(`domain:${domain}`, this.boosts.domain);
    }
    for (const deviceClass of context.deviceClassesMentioned) {
      factors.set(`device_class:${deviceClass}`, this.boosts.deviceClass);
    }
    return factors;
  }

  private extractAreasFromHistory(history: readonly ChatMessage[]): string[] {
    const recent = history.slice(-AREA_HISTORY_WINDOW).reverse();
    for (const message of recent) {
      if (message.role !== 'user') continue;
      const areas = this.extractAreas(message.content);
      if (areas.length > 0) return areas;
    }
    return [];
  }
}

/**
 * Entity ids listed on "Relevant entities:" lines of recent system messages.
 */
export function extractPreviousEntities(history: readonly ChatMessage[]): string[] {
  const entities = new Set<string>();

  for (const message of history.slice(-ENTITY_HISTORY_WINDOW)) {
    if (message.role !== 'system' || !message.content.includes(ENTITY_LIST_MARKER)) continue;

    for (const line of message.content.split('\n')) {
      if (!line.startsWith(ENTITY_LIST_MARKER)) continue;
      for (const part of line.slice(ENTITY_LIST_MARKER.length).split(',')) {
        const id = part.trim();
        if (id.includes('.')) entities.add(id);
      }
    }
  }

  return [...entities];
}
