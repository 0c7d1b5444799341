/**
 * Query Scope Detector Tests
 */

import { describe, expect, test } from 'vitest';
import { contextFromHints } from '@/core/conversation/types';
import { createLanguagePack } from '@/core/language/pack';
import { SCOPE_CONFIGS } from '@/core/scope/config';
import { calculateOptimalK, QueryScopeDetector, toWireScopeDecision } from '@/core/scope/detector';

const detector = new QueryScopeDetector(createLanguagePack());

describe('QueryScopeDetector', () => {
  describe('pattern and context scoring', () => {
    test('a device command is micro', () => {
      const result = detector.detectScope('kapcsold fel a lámpát');

      expect(result.scope).toBe('micro');
      expect(result.context.intent).toBe('control');
      expect(result.context.domainsMentioned).toEqual(['light', 'switch']);
      // control +1 on top of the command pattern
      expect(result.details.scopeScores.micro).toBe(2);
      expect(result.details.scopeScores.overview).toBe(-0.5);
      // two domains widen micro to the midpoint of 5..10
      expect(result.details.optimalK).toBe(7);
      expect(result.config.formatter).toBe('detailed');
    });

    test('a question about one room is macro', () => {
      const result = detector.detectScope('mi van a nappaliban?');

      expect(result.scope).toBe('macro');
      expect(result.context.areasMentioned).toEqual(['nappali']);
      expect(result.details.scopeScores.macro).toBe(3);
      expect(result.details.optimalK).toBe(22);
      expect(result.details.reasoning).toBe('Matched 1 macro patterns; Single area mentioned: nappali');
    });

    test('a sensor reading in one room is macro with a wider k', () => {
      const result = detector.detectScope('hőmérséklet a konyhában');

      expect(result.scope).toBe('macro');
      expect(result.context.domainsMentioned).toEqual(['sensor']);
      expect(result.context.deviceClassesMentioned).toEqual(['temperature']);
      expect(result.details.optimalK).toBe(24);
    });

    test('energy questions are overview', () => {
      const result = detector.detectScope('energia fogyasztás');

      expect(result.scope).toBe('overview');
      expect(result.details.optimalK).toBe(SCOPE_CONFIGS.overview.kMax);
      expect(result.config.formatter).toBe('tldr');
    });

    test('several areas push towards overview', () => {
      const result = detector.detectScope('garage and basement');

      expect(result.context.areasMentioned).toEqual(['pince', 'garázs']);
      expect(result.scope).toBe('overview');
      expect(result.details.scopeScores.overview).toBe(1.5);
    });

    test('ties resolve in micro, macro, overview order', () => {
      // macro: single area +2; overview: two patterns
      const result = detector.detectScope('mi újság otthon?');

      expect(result.details.scopeScores.macro).toBe(2);
      expect(result.details.scopeScores.overview).toBe(2);
      expect(result.scope).toBe('macro');
    });

    test('a follow-up adds to macro', () => {
      const context = contextFromHints({ isFollowUp: true });
      const result = detector.detectScope('xyz qwe', context);

      expect(result.details.scopeScores.macro).toBe(1);
      expect(result.scope).toBe('macro');
      expect(result.details.reasoning).toBe('Follow-up question detected');
    });
  });

  describe('word-count fallback', () => {
    test.each([
      ['xyz qwe', 'micro'],
      ['xyz qwe rty uio pas dfg', 'macro'],
      ['xyz qwe rty uio pas dfg hjk zxc vbn mnb poi lkj', 'overview']
    ] as const)('"%s" falls back to %s', (query, expected) => {
      const result = detector.detectScope(query);

      expect(result.scope).toBe(expected);
      expect(result.details.confidence).toBe(0);
      expect(result.details.reasoning).toBe('Fallback heuristics applied');
    });
  });

  test('is deterministic for the same input', () => {
    const queries = ['kapcsold fel a lámpát', 'mi van a nappaliban?', 'energia fogyasztás'];
    for (const query of queries) {
      expect(detector.detectScope(query)).toEqual(detector.detectScope(query));
    }
  });

  test('uses the supplied context instead of analysing the query', () => {
    const context = contextFromHints({ areasMentioned: ['konyha', 'nappali'] });
    const result = detector.detectScope('xyz qwe', context);

    expect(result.context).toBe(context);
    expect(result.scope).toBe('overview');
  });
});

describe('calculateOptimalK', () => {
  const ctx = (areas: string[], domains: string[]) =>
    contextFromHints({ areasMentioned: areas, domainsMentioned: domains });

  test('micro uses kMin for a single target', () => {
    expect(calculateOptimalK('micro', SCOPE_CONFIGS.micro, ctx(['nappali'], ['light']))).toBe(5);
  });

  test('macro grows by two per extra area or domain, capped at kMax', () => {
    expect(calculateOptimalK('macro', SCOPE_CONFIGS.macro, ctx(['nappali'], []))).toBe(22);
    expect(calculateOptimalK('macro', SCOPE_CONFIGS.macro, ctx(['nappali', 'konyha'], ['light']))).toBe(26);
    expect(
      calculateOptimalK('macro', SCOPE_CONFIGS.macro, ctx(['a', 'b', 'c', 'd'], ['x', 'y', 'z']))
    ).toBe(30);
  });

  test('overview always takes kMax', () => {
    expect(calculateOptimalK('overview', SCOPE_CONFIGS.overview, ctx([], []))).toBe(50);
  });
});

describe('toWireScopeDecision', () => {
  test('keeps the caller-facing fields', () => {
    const wire = toWireScopeDecision(detector.detectScope('energia fogyasztás'));

    expect(wire).toEqual({
      scope: 'overview',
      optimal_k: 50,
      formatter: 'tldr',
      confidence: 1,
      reasoning: 'Matched 1 overview patterns'
    });
  });
});
