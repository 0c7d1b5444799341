/**
 * Conversation Analyzer Tests
 */

import { describe, expect, test } from 'vitest';
import { ConversationAnalyzer, extractPreviousEntities } from '@/core/conversation/analyzer';
import { type ChatMessage, contextFromHints } from '@/core/conversation/types';
import { createLanguagePack } from '@/core/language/pack';

const analyzer = new ConversationAnalyzer(createLanguagePack());

const history: ChatMessage[] = [
  { role: 'user', content: 'mi van a nappaliban?' },
  { role: 'assistant', content: 'A lámpa ég, 22 fok van.' }
];

describe('ConversationAnalyzer.analyze', () => {
  test('extracts domains and control intent from a command', () => {
    const context = analyzer.analyze('kapcsold fel a lámpát');

    expect(context).toEqual({
      areasMentioned: [],
      domainsMentioned: ['light', 'switch'],
      deviceClassesMentioned: [],
      previousEntities: [],
      isFollowUp: false,
      intent: 'control'
    });
  });

  test('a device-class keyword implies the sensor domain', () => {
    const context = analyzer.analyze('hőmérséklet a konyhában');

    expect(context.areasMentioned).toEqual(['konyha']);
    expect(context.domainsMentioned).toEqual(['sensor']);
    expect(context.deviceClassesMentioned).toEqual(['temperature']);
    expect(context.intent).toBe('read');
  });

  test('a follow-up without an area inherits it from the last user message', () => {
    const context = analyzer.analyze('és a hőmérséklet?', history);

    expect(context.isFollowUp).toBe(true);
    expect(context.areasMentioned).toEqual(['nappali']);
  });

  test('a follow-up naming an area keeps its own', () => {
    const context = analyzer.analyze('és a konyhában?', history);
    expect(context.areasMentioned).toEqual(['konyha']);
  });

  test('a standalone question does not inherit areas', () => {
    const context = analyzer.analyze('hőmérséklet', history);

    expect(context.isFollowUp).toBe(false);
    expect(context.areasMentioned).toEqual([]);
  });

  test('only the last three messages are searched for an area', () => {
    const long: ChatMessage[] = [
      { role: 'user', content: 'mi van a nappaliban?' },
      { role: 'assistant', content: 'ok' },
      { role: 'user', content: 'köszi' },
      { role: 'assistant', content: 'ok' }
    ];
    expect(analyzer.analyze('és a hőmérséklet?', long).areasMentioned).toEqual([]);
  });
});

describe('extractPreviousEntities', () => {
  test('reads ids from "Relevant entities:" lines of system messages', () => {
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: 'Home state\nRelevant entities: light.nappali_lampa, sensor.nappali_homerseklet, junk'
      },
      { role: 'user', content: 'Relevant entities: lock.bejarati_ajto' }
    ];

    expect(extractPreviousEntities(messages)).toEqual([
      'light.nappali_lampa',
      'sensor.nappali_homerseklet'
    ]);
  });

  test('ignores system messages outside the last five', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'Relevant entities: light.konyha_lampa' },
      ...Array.from({ length: 5 }, (): ChatMessage => ({ role: 'user', content: 'x' }))
    ];
    expect(extractPreviousEntities(messages)).toEqual([]);
  });

  test('deduplicates across messages', () => {
    const messages: ChatMessage[] = [
      { role: 'system', content: 'Relevant entities: light.konyha_lampa' },
      { role: 'system', content: 'Relevant entities: light.konyha_lampa, switch.kave' }
    ];
    expect(extractPreviousEntities(messages)).toEqual(['light.konyha_lampa', 'switch.kave']);
  });
});

describe('boost factors', () => {
  test('concrete rooms outweigh the generic house and follow-ups amplify both', () => {
    const plain = analyzer.getAreaBoostFactors(contextFromHints({ areasMentioned: ['nappali', 'ház'] }));
    expect(plain.get('nappali')).toBe(2);
    expect(plain.get('ház')).toBe(1.2);

    const followUp = analyzer.getAreaBoostFactors(
      contextFromHints({ areasMentioned: ['nappali', 'ház'], isFollowUp: true })
    );
    expect(followUp.get('nappali')).toBe(3);
    expect(followUp.get('ház')).toBeCloseTo(1.8);
  });

  test('domain and device-class factors use prefixed keys', () => {
    const factors = analyzer.getDomainBoostFactors(
      contextFromHints({ domainsMentioned: ['sensor'], deviceClassesMentioned: ['temperature'] })
    );

    expect([...factors]).toEqual([
      ['domain:sensor', 1.5],
      ['device_class:temperature', 2]
    ]);
  });
});
