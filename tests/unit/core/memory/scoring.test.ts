/**
 * Memory Scoring Tests
 */

import { describe, expect, test } from 'vitest';
import { createMemoryConfig, memoryDefaults } from '@/core/memory/config';
import {
  clampBoost,
  decayFactor,
  determineContextType,
  foldText,
  incomingRelevance,
  initialBoostWeight,
  topicAwareBoost
} from '@/core/memory/scoring';

describe('initialBoostWeight', () => {
  test('multiplies primary, similarity and sensor boosts', () => {
    const weight = initialBoostWeight(
      { entityId: 'sensor.x', domain: 'sensor', similarity: 0.9, isPrimary: true },
      memoryDefaults
    );
    // 1.5 × 1.3 × 1.2
    expect(weight).toBeCloseTo(2.34);
  });

  test('mid similarity earns the smaller boost', () => {
    expect(initialBoostWeight({ entityId: 'light.x', similarity: 0.7 }, memoryDefaults)).toBeCloseTo(1.1);
    expect(initialBoostWeight({ entityId: 'light.x', similarity: 0.6 }, memoryDefaults)).toBe(1);
  });

  test('is clamped to the configured maximum', () => {
    const config = createMemoryConfig({ boost: { max: 2 } });
    expect(
      initialBoostWeight({ entityId: 'sensor.x', domain: 'sensor', similarity: 0.9, isPrimary: true }, config)
    ).toBe(2);
  });
});

describe('clampBoost', () => {
  test('keeps weights within [0.1, 3.0]', () => {
    expect(clampBoost(0, memoryDefaults)).toBe(0.1);
    expect(clampBoost(1.7, memoryDefaults)).toBe(1.7);
    expect(clampBoost(9, memoryDefaults)).toBe(3);
  });
});

describe('incomingRelevance', () => {
  test('prefers the rerank score over similarity', () => {
    expect(incomingRelevance({ entityId: 'a', score: 2.5, similarity: 0.4 })).toBe(2.5);
    expect(incomingRelevance({ entityId: 'a', similarity: 0.4 })).toBe(0.4);
    expect(incomingRelevance({ entityId: 'a' })).toBe(0);
  });
});

describe('determineContextType', () => {
  test.each([
    [0.8, 10, 'primary'],
    [0.1, 2, 'primary'],
    [0.5, 10, 'secondary'],
    [0.1, 5, 'secondary'],
    [0.1, 8, 'historical']
  ] as const)('relevance %d at position %d is %s', (relevance, position, expected) => {
    expect(determineContextType(relevance, position, memoryDefaults)).toBe(expected);
  });
});

describe('decayFactor', () => {
  test('fades linearly over ten minutes down to the floor', () => {
    expect(decayFactor(0, memoryDefaults)).toBe(1);
    expect(decayFactor(300_000, memoryDefaults)).toBe(0.5);
    expect(decayFactor(60_000, memoryDefaults)).toBeCloseTo(0.9);
    expect(decayFactor(3_600_000, memoryDefaults)).toBe(0.5);
  });

  test('treats clock skew as no elapsed time', () => {
    expect(decayFactor(-5000, memoryDefaults)).toBe(1);
  });
});

describe('foldText', () => {
  test('strips diacritics and lowercases', () => {
    expect(foldText('Hőmérséklet')).toBe('homerseklet');
    expect(foldText('Fürdőszoba')).toBe('furdoszoba');
  });
});

describe('topicAwareBoost', () => {
  const now = 1_000_000;
  const entity = {
    entityId: 'light.nappali_lampa',
    area: 'nappali',
    domain: 'light',
    mentionedAt: now
  };
  const noTopic = { topicDomains: [], currentFocus: null, focusHistory: [], intentPattern: null };

  test('is neutral without topic information', () => {
    expect(topicAwareBoost(entity, noTopic, now, memoryDefaults)).toBe(1);
  });

  test('device control boosts controllable domains', () => {
    const memory = { ...noTopic, topicDomains: ['light'], intentPattern: 'device_control' };
    // 1.3 × 1.2
    expect(topicAwareBoost(entity, memory, now, memoryDefaults)).toBeCloseTo(1.56);
  });

  test('matches the focus inside the entity id', () => {
    const memory = { ...noTopic, currentFocus: 'nappali' };
    expect(topicAwareBoost({ ...entity, area: null }, memory, now, memoryDefaults)).toBe(1.5);
  });

  test('earlier focus areas earn a smaller boost', () => {
    const memory = { ...noTopic, currentFocus: 'konyha', focusHistory: ['nappali'] };
    expect(topicAwareBoost(entity, memory, now, memoryDefaults)).toBe(1.2);
  });

  test('fades with age down to half', () => {
    const memory = { ...noTopic, currentFocus: 'nappali' };
    const old = { ...entity, mentionedAt: now - 3_600_000 };
    // 2.0 × floor 0.5
    expect(topicAwareBoost(old, memory, now, memoryDefaults)).toBe(1);
  });
});
