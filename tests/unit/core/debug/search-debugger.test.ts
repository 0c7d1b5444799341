/**
 * Search Debugger Tests
 */

import { describe, expect, test } from 'vitest';
import { computeMetrics, SearchDebugger } from '@/core/debug/search-debugger';
import type { EntityScore } from '@/core/ranking/types';
import { SCOPE_CONFIGS } from '@/core/scope/config';
import {
  KITCHEN_TEMPERATURE,
  LIVING_ROOM_LIGHT,
  LIVING_ROOM_TEMPERATURE,
  toCandidate
} from '../../../helpers/fixtures';

const clusterLight = toCandidate(LIVING_ROOM_LIGHT, 0.85, {
  source: 'cluster',
  annotations: {
    clusterContext: {
      clusterKey: 'living_lights',
      role: 'primary',
      weight: 1,
      contextBoost: 1,
      clusterScore: 0.85
    }
  }
});
const vectorTemperature = toCandidate(LIVING_ROOM_TEMPERATURE, 0.6, { annotations: { vectorScore: 0.6 } });
const vectorKitchen = toCandidate(KITCHEN_TEMPERATURE, 0.4);
const memoryTemperature = toCandidate(LIVING_ROOM_TEMPERATURE, 0, {
  source: 'memory',
  annotations: { memoryBoosted: true, memoryRelevance: 5 }
});

function score(
  entity: EntityScore['entity'],
  finalScore: number,
  rankingFactors: Record<string, number> = {}
): EntityScore {
  return {
    entity,
    baseScore: entity.similarity,
    contextBoost: finalScore - entity.similarity,
    finalScore,
    rankingFactors,
    usedFallbackMatching: false
  };
}

function runSession(): ReturnType<SearchDebugger['finishSession']> {
  const debug = new SearchDebugger();
  debug.startSession('mi van a nappaliban?', [0.1, 0.2, 0.3], SCOPE_CONFIGS.macro, 0.7);

  const reranked = [
    score(vectorTemperature, 3.6, { has_active_value: 2 }),
    score(clusterLight, 0.5),
    score(vectorKitchen, 0, { unavailable_penalty: -0.5 })
  ];

  debug.captureStage('cluster_search', [], [clusterLight], 5, { clusters: ['living_lights'] });
  debug.captureStage('vector_fallback', [], [vectorTemperature, vectorKitchen], 10);
  debug.captureStage('memory_recall', [], [memoryTemperature], 1);
  debug.captureStage('reranking', [clusterLight, vectorTemperature, vectorKitchen], reranked, 2);
  debug.captureStage('final_selection', reranked, reranked.slice(0, 2), 1);

  return debug.finishSession();
}

describe('SearchDebugger', () => {
  test('records each stage', () => {
    const trace = runSession();

    expect(trace?.stages.map((s) => [s.stage, s.entitiesIn, s.entitiesOut])).toEqual([
      ['cluster_search', 0, 1],
      ['vector_fallback', 0, 2],
      ['memory_recall', 0, 1],
      ['reranking', 3, 3],
      ['final_selection', 3, 2]
    ]);
    expect(trace?.stages[0]?.metadata).toEqual({ clusters: ['living_lights'] });
    expect(trace?.totalDurationMs).toBe(19);
    expect(trace?.embeddingDimensions).toBe(3);
    expect(trace?.finalEntityCount).toBe(2);
  });

  test('follows each entity across stages', () => {
    const trace = runSession();
    const byId = new Map(trace?.entities.map((e) => [e.entityId, e]));

    expect(trace?.entities.map((e) => e.entityId)).toEqual([
      'light.nappali_lampa',
      'sensor.nappali_homerseklet',
      'sensor.konyha_homerseklet'
    ]);

    expect(byId.get('light.nappali_lampa')).toMatchObject({
      clusterScore: 0.85,
      sourceCluster: 'living_lights',
      vectorScore: null,
      scoreDelta: null,
      selectionRank: 2,
      inPrompt: false,
      isActive: true,
      stageReached: 'final_selection'
    });

    const temperature = byId.get('sensor.nappali_homerseklet');
    expect(temperature).toMatchObject({
      vectorScore: 0.6,
      memoryRelevance: 5,
      finalScore: 3.6,
      rankingFactors: { has_active_value: 2 },
      selectionRank: 1,
      inPrompt: true
    });
    expect(temperature?.scoreDelta).toBeCloseTo(3.0);

    expect(byId.get('sensor.konyha_homerseklet')).toMatchObject({
      vectorScore: 0.4,
      stageReached: 'reranking',
      selectionRank: null,
      isActive: null
    });
  });

  test('computes pipeline metrics', () => {
    const metrics = runSession()?.metrics;

    expect(metrics?.clusterHitRate).toBeCloseTo(1 / 3);
    expect(metrics?.avgRerankingBoost).toBeCloseTo(1.3);
    expect(metrics?.activeEntityRatio).toBe(1);
    expect(metrics?.promptInclusionRate).toBeCloseTo(1 / 3);
  });

  test('skips malformed entries', () => {
    const debug = new SearchDebugger();
    debug.startSession('q', null, null);
    debug.captureStage('vector_fallback', [], [{ foo: 1 }, null, vectorKitchen], Number.NaN);

    const trace = debug.finishSession();
    expect(trace?.entities.map((e) => e.entityId)).toEqual(['sensor.konyha_homerseklet']);
    expect(trace?.stages[0]?.durationMs).toBe(0);
    expect(trace?.stages[0]?.entitiesOut).toBe(3);
  });

  test('ignores captures without a session', () => {
    const debug = new SearchDebugger();
    debug.captureStage('reranking', [], [], 1);

    expect(debug.active).toBe(false);
    expect(debug.finishSession()).toBeNull();
  });

  test('a new session discards the previous one', () => {
    const debug = new SearchDebugger();
    debug.startSession('first', null, null);
    debug.captureStage('vector_fallback', [], [vectorKitchen], 1);
    debug.startSession('second', null, null);

    const trace = debug.finishSession();
    expect(trace?.query).toBe('second');
    expect(trace?.entities).toEqual([]);
    expect(trace?.threshold).toBe(0.7);
  });
});

describe('computeMetrics', () => {
  test('is empty without stages', () => {
    expect(computeMetrics([], [])).toEqual({});
  });
});
