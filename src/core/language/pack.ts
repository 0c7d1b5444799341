/**
 * Language Pack
 *
 * Bilingual (Hungarian / English) vocabulary used by the analyzers:
 * area aliases, domain keywords, intent and scope patterns, memory
 * heuristics and summarizer topics. The tables live in ./data as JSON
 * and are validated on load.
 */

import { z } from 'zod';
import areasData from './data/areas.json';
import domainsData from './data/domains.json';
import intentsData from './data/intents.json';
import memoryData from './data/memory.json';
import scopePatternsData from './data/scope-patterns.json';
import summarizerData from './data/summarizer.json';

// ═══════════════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════════════

const keywordTable = z.record(z.string(), z.array(z.string().min(1)));

const areasSchema = z.object({
  genericAreas: z.array(z.string()),
  areas: keywordTable
});

const domainsSchema = z.object({
  sensorDeviceClasses: keywordTable,
  domains: keywordTable,
  controllableDomains: z.array(z.string())
});

const intentsSchema = z.object({
  control: z.array(z.string()),
  read: z.array(z.string()),
  followUp: z.array(z.string())
});

const scopePatternsSchema = z.object({
  micro: z.array(z.string()),
  macro: z.array(z.string()),
  overview: z.array(z.string())
});

const memorySchema = z.object({
  areaAliases: keywordTable,
  domainKeywords: keywordTable,
  followUpIndicators: z.array(z.string())
});

const summarizerSchema = z.object({
  topics: z.record(
    z.string(),
    z.object({ keywords: z.array(z.string()), domains: z.array(z.string()) })
  ),
  intents: keywordTable,
  areaFocus: keywordTable
});

export const languagePackSchema = z.object({
  areas: areasSchema,
  domains: domainsSchema,
  intents: intentsSchema,
  scopePatterns: scopePatternsSchema,
  memory: memorySchema,
  summarizer: summarizerSchema
});

export type LanguagePack = z.infer<typeof languagePackSchema>;
export type ScopePatternTable = z.infer<typeof scopePatternsSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// Loading
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build a validated language pack from the bundled tables, optionally
 * replacing whole sections (tests and alternative vocabularies).
 */
export function createLanguagePack(overrides?: Partial<LanguagePack>): LanguagePack {
  return languagePackSchema.parse({
    areas: areasData,
    domains: domainsData,
    intents: intentsData,
    scopePatterns: scopePatternsData,
    memory: memoryData,
    summarizer: summarizerData,
    ...overrides
  });
}
