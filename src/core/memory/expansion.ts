/**
 * Query Expansion Memory
 *
 * Remembers which entities answered a query so that similar queries
 * later can lean on them. Process-local, like the tracker, and capped at
 * expansionMaxPatterns: the least recently learned pattern goes first.
 */

import { jaccard } from '@/core/language/text';
import { type MemoryConfig, memoryDefaults } from './config';

interface LearnedPattern {
  expandedTerms: Set<string>;
  boostEntities: Set<string>;
  successRate: number;
  sampleCount: number;
}

export interface ExpansionSuggestions {
  expandedTerms: string[];
  boostEntities: string[];
  /** Best success rate among the matching patterns; 0 when none match */
  confidence: number;
}

export class QueryExpansionMemory {
  private readonly patterns = new Map<string, LearnedPattern>();

  constructor(private readonly config: MemoryConfig = memoryDefaults) {}

  learnSuccessfulPattern(query: string, entityIds: readonly string[], successScore: number): void {
    const key = normalizeQuery(query);
    if (!key) return;

    const pattern = this.patterns.get(key) ?? {
      expandedTerms: new Set<string>(),
      boostEntities: new Set<string>(),
      successRate: 0,
      sampleCount: 0
    };

    pattern.sampleCount += 1;
    pattern.successRate =
      (pattern.successRate * (pattern.sampleCount - 1) + successScore) / pattern.sampleCount;
    for (const id of entityIds) {
      if (id) pattern.boostEntities.add(id);
    }

    this.patterns.delete(key);
    this.patterns.set(key, pattern);

    for (const oldest of this.patterns.keys()) {
      if (this.patterns.size <= this.config.expansionMaxPatterns) break;
      this.patterns.delete(oldest);
    }
  }

  getExpansionSuggestions(query: string): ExpansionSuggestions {
    const words = wordSet(normalizeQuery(query));
    const terms = new Set<string>();
    const entities = new Set<string>();
    let confidence = 0;

    for (const [patternQuery, pattern] of this.patterns) {
      if (jaccard(words, wordSet(patternQuery)) <= this.config.expansionSimilarity) continue;

      for (const term of pattern.expandedTerms) terms.add(term);
      for (const id of pattern.boostEntities) entities.add(id);
      confidence = Math.max(confidence, pattern.successRate);
    }

    return {
      expandedTerms: Array.from(terms),
      boostEntities: Array.from(entities),
      confidence
    };
  }

  get size(): number {
    return this.patterns.size;
  }
}

function normalizeQuery(query: string): string {
  return query.toLowerCase().trim();
}

function wordSet(normalized: string): Set<string> {
  return new Set(normalized.split(/\s+/).filter((word) => word.length > 0));
}
