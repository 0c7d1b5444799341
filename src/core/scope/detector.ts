/**
 * Query Scope Detector
 *
 * Pure classifier: pattern hits plus context adjustments decide whether a
 * query is about one device (micro), one area (macro) or the whole house
 * (overview). The scope fixes the retrieval budget and the prompt format.
 */

import { ConversationAnalyzer } from '@/core/conversation/analyzer';
import type { ConversationContext } from '@/core/conversation/types';
import type { LanguagePack } from '@/core/language/pack';
import { compilePattern, countWords } from '@/core/language/text';
import { CONTEXT_ADJUSTMENTS, FALLBACK_WORDS, SCOPE_CONFIGS } from './config';
import {
  QUERY_SCOPES,
  type QueryScope,
  type ScopeConfig,
  type ScopeDetection,
  type ScopeScores,
  type WireScopeDecision
} from './types';

interface CompiledPattern {
  source: string;
  regex: RegExp;
}

export class QueryScopeDetector {
  private readonly patterns: Record<QueryScope, CompiledPattern[]>;

  constructor(
    pack: LanguagePack,
    private readonly analyzer: ConversationAnalyzer = new ConversationAnalyzer(pack)
  ) {
    const compile = (sources: string[]): CompiledPattern[] =>
      sources.map((source) => ({ source, regex: compilePattern(source) }));

    this.patterns = {
      micro: compile(pack.scopePatterns.micro),
      macro: compile(pack.scopePatterns.macro),
      overview: compile(pack.scopePatterns.overview)
    };
  }

  /**
   * Classify a query. Without a context one is derived from the bare query.
   */
  detectScope(query: string, context?: ConversationContext): ScopeDetection {
    const ctx = context ?? this.analyzer.analyze(query);

    const scores: ScopeScores = { micro: 0, macro: 0, overview: 0 };
    const matchedPatterns: Record<QueryScope, string[]> = { micro: [], macro: [], overview: [] };

    for (const scope of QUERY_SCOPES) {
      for (const pattern of this.patterns[scope]) {
        if (pattern.regex.test(query)) {
          scores[scope] += 1;
          matchedPatterns[scope].push(pattern.source);
        }
      }
    }

    applyContextAdjustments(scores, ctx);

    // First maximum wins, so ties resolve micro, then macro, then overview
    let scope: QueryScope = 'micro';
    for (const candidate of QUERY_SCOPES) {
      if (scores[candidate] > scores[scope]) scope = candidate;
    }

    const usedFallback = scores[scope] === 0;
    if (usedFallback) scope = fallbackScope(query);

    const config = SCOPE_CONFIGS[scope];

    return {
      scope,
      config,
      context: ctx,
      details: {
        scopeScores: scores,
        matchedPatterns,
        optimalK: calculateOptimalK(scope, config, ctx),
        confidence: scores[scope],
        contextFactors: {
          areasCount: ctx.areasMentioned.length,
          domainsCount: ctx.domainsMentioned.length,
          isFollowUp: ctx.isFollowUp,
          intent: ctx.intent
        },
        reasoning: generateReasoning(scope, matchedPatterns[scope], ctx)
      }
    };
  }
}

function applyContextAdjustments(scores: ScopeScores, ctx: ConversationContext): void {
  const areas = ctx.areasMentioned.length;
  const domains = ctx.domainsMentioned.length;

  if (areas === 1) scores.macro += CONTEXT_ADJUSTMENTS.singleArea;
  else if (areas > 1) scores.overview += CONTEXT_ADJUSTMENTS.multipleAreas;

  if (domains > 2) scores.overview += CONTEXT_ADJUSTMENTS.manyDomains;
  else if (domains === 1) scores.micro += CONTEXT_ADJUSTMENTS.singleDomain;

  if (ctx.isFollowUp) scores.macro += CONTEXT_ADJUSTMENTS.followUp;

  if (ctx.intent === 'control') {
    scores.micro += CONTEXT_ADJUSTMENTS.controlMicro;
    scores.overview += CONTEXT_ADJUSTMENTS.controlOverviewPenalty;
  }
}

function fallbackScope(query: string): QueryScope {
  const words = countWords(query);
  if (words <= FALLBACK_WORDS.microMax) return 'micro';
  if (words >= FALLBACK_WORDS.overviewMin) return 'overview';
  return 'macro';
}

export function calculateOptimalK(
  scope: QueryScope,
  config: ScopeConfig,
  ctx: ConversationContext
): number {
  const mid = Math.floor((config.kMin + config.kMax) / 2);
  const areas = ctx.areasMentioned.length;
  const domains = ctx.domainsMentioned.length;

  switch (scope) {
    case 'micro':
      return areas <= 1 && domains <= 1 ? config.kMin : Math.min(mid, config.kMax);
    case 'macro': {
      const complexity = Math.min(areas + domains - 1, CONTEXT_ADJUSTMENTS.macroComplexityCap);
      return Math.min(mid + complexity * 2, config.kMax);
    }
    case 'overview':
      return config.kMax;
  }
}

function generateReasoning(
  scope: QueryScope,
  matched: readonly string[],
  ctx: ConversationContext
): string {
  const reasons: string[] = [];

  if (matched.length > 0) reasons.push(`Matched ${matched.length} ${scope} patterns`);

  const [firstArea] = ctx.areasMentioned;
  if (ctx.areasMentioned.length === 1 && firstArea !== undefined) {
    reasons.push(`Single area mentioned: ${firstArea}`);
  } else if (ctx.areasMentioned.length > 1) {
    reasons.push(`Multiple areas mentioned: ${ctx.areasMentioned.join(', ')}`);
  }

  if (ctx.isFollowUp) reasons.push('Follow-up question detected');
  if (ctx.intent === 'control') reasons.push('Control intent detected');

  return reasons.length > 0 ? reasons.join('; ') : 'Fallback heuristics applied';
}

/**
 * Reduce a detection to the shape handed to callers outside the pipeline.
 */
export function toWireScopeDecision(detection: ScopeDetection): WireScopeDecision {
  return {
    scope: detection.scope,
    optimal_k: detection.details.optimalK,
    formatter: detection.config.formatter,
    confidence: detection.details.confidence,
    reasoning: detection.details.reasoning
  };
}
