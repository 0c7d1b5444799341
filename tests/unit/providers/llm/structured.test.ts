/**
 * Structured Output Tests
 */

import { describe, expect, test } from 'vitest';
import { extractJSON, getDefaultCapabilities, strategiesFor } from '@/providers/llm/structured';

describe('extractJSON', () => {
  test('prefers a fenced block', () => {
    expect(extractJSON('Here you go:\n```json\n{"topic": "light control"}\n```')).toBe(
      '{"topic": "light control"}'
    );
  });

  test('finds the first balanced object in prose', () => {
    expect(extractJSON('Sure! {"topic": "x", "nested": {"n": 1}} Anything else?')).toBe(
      '{"topic": "x", "nested": {"n": 1}}'
    );
  });

  test('falls back to an array, then the trimmed text', () => {
    expect(extractJSON('areas: ["nappali", "konyha"]')).toBe('["nappali", "konyha"]');
    expect(extractJSON('  no json here  ')).toBe('no json here');
    expect(extractJSON('{"unterminated": ')).toBe('{"unterminated":');
  });
});

describe('provider tiers', () => {
  test.each([
    ['openai', ['structured-output', 'json-mode', 'prompt-based']],
    ['openai-compatible', ['structured-output', 'json-mode', 'prompt-based']],
    ['google', ['json-mode', 'prompt-based']],
    ['ollama', ['json-mode', 'prompt-based']],
    ['anthropic', ['prompt-based']]
  ])('%s tries %j', (provider, expected) => {
    expect(strategiesFor(getDefaultCapabilities(provider))).toEqual(expected);
  });
});
