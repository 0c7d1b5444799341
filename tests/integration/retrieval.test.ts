/**
 * Retrieval Pipeline Integration Tests
 *
 * Runs the full pipeline (scope → clusters ∥ memory → vector fallback →
 * rerank → format → remember) over the in-memory graph and the keyword
 * embedding stub.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { memoryKey } from '@/core/memory/schemas';
import { PROMPT_HEADER, retrieve } from '@/core/retrieval';
import type { EmbeddingClient } from '@/providers/embedding/types';
import { createServices, type Services } from '@/server/services';
import {
  createTestConfig,
  FRONT_DOOR_LOCK,
  HOME_ENTITIES,
  KITCHEN_LIGHT,
  LIVING_ROOM_LIGHT
} from '../helpers/fixtures';
import {
  createKeywordEmbeddingClient,
  InMemoryGraphClient,
  type KeywordEmbeddingClient
} from '../helpers/mocks';

let graph: InMemoryGraphClient;
let embedding: KeywordEmbeddingClient;
let services: Services;

function build(embeddingClient: EmbeddingClient = embedding): Services {
  return createServices(createTestConfig(), { graphClient: graph, embeddingClient, llmClient: null });
}

function run(query: string, extra: { conversationId?: string; debug?: boolean; signal?: AbortSignal } = {}) {
  return retrieve({ query, ...extra }, services.retrieval, services.retrievalConfig);
}

const ids = (output: Awaited<ReturnType<typeof run>>) => output.entities.map((s) => s.entity.entityId);

beforeEach(() => {
  graph = new InMemoryGraphClient(HOME_ENTITIES);
  embedding = createKeywordEmbeddingClient();
  services = build();
});

afterEach(async () => {
  await services.enricher.drain();
});

describe('cold start', () => {
  test('falls back to vector search when no cluster matches', async () => {
    const output = await run('kapcsold fel a lámpát');

    expect(output.scope.scope).toBe('micro');
    expect(output.stats).toMatchObject({
      clusterCandidates: 0,
      memoryCandidates: 0,
      vectorCandidates: 6,
      mergedCandidates: 6,
      clustersMatched: [],
      usedVectorFallback: true,
      failedStages: []
    });
    expect(graph.calls).toContain('searchEntities');
    expect(output.conversationId).toBeNull();
    expect(output.enhancement).toBeNull();
  });

  test('returns at most optimalK entities and rewards controllable lights', async () => {
    const output = await run('kapcsold fel a lámpát');

    expect(output.entities.length).toBeLessThanOrEqual(output.scope.details.optimalK);
    expect(ids(output)).toEqual(expect.arrayContaining([LIVING_ROOM_LIGHT.entityId, KITCHEN_LIGHT.entityId]));

    const lamp = output.entities.find((s) => s.entity.entityId === LIVING_ROOM_LIGHT.entityId);
    expect(lamp?.rankingFactors['controllable']).toBe(0.2);
    expect(lamp?.baseScore).toBeCloseTo(Math.SQRT1_2);
  });

  test('formats the ranked entities for the scope', async () => {
    const output = await run('kapcsold fel a lámpát');

    expect(output.scope.config.formatter).toBe('detailed');
    expect(output.prompt.startsWith(PROMPT_HEADER)).toBe(true);
    expect(output.prompt.split('\n').at(-1)).toBe(`Relevant entities: ${ids(output).join(', ')}`);
  });
});

describe('cluster search', () => {
  beforeEach(async () => {
    await services.clusterManager.createCluster({
      key: 'all_lights',
      name: 'Fények',
      type: 'micro_cluster',
      description: 'lámpa'
    });
    await services.clusterManager.addEntityToCluster('all_lights', LIVING_ROOM_LIGHT.entityId, 'primary');
    for (const entity of HOME_ENTITIES.slice(1)) {
      await services.clusterManager.addEntityToCluster('all_lights', entity.entityId, 'related');
    }
  });

  test('expands matching clusters and skips the fallback once kMin is met', async () => {
    const output = await run('kapcsold fel a lámpát');

    expect(output.stats).toMatchObject({
      clusterCandidates: 6,
      vectorCandidates: 0,
      clustersMatched: ['all_lights'],
      usedVectorFallback: false
    });
    expect(graph.calls).not.toContain('searchEntities');
  });

  test('cluster membership becomes a ranking factor', async () => {
    const output = await run('kapcsold fel a lámpát');
    const factor = (entityId: string) =>
      output.entities.find((s) => s.entity.entityId === entityId)?.rankingFactors['cluster_boost'];

    expect(factor(LIVING_ROOM_LIGHT.entityId)).toBeCloseTo(0.3);
    expect(factor(KITCHEN_LIGHT.entityId)).toBeCloseTo(0.2);
  });
});

describe('conversation memory', () => {
  test('stores the turn and recalls it on the next one', async () => {
    const first = await run('kapcsold fel a lámpát', { conversationId: 'conv-1' });

    expect(first.enhancement).not.toBeNull();
    expect(graph.documents.has(memoryKey('conv-1'))).toBe(true);

    const second = await run('és a konyhai lámpa?', { conversationId: 'conv-1' });

    expect(second.stats.memoryCandidates).toBeGreaterThan(0);
    expect(second.stats.failedStages).toEqual([]);
    expect(second.enhancement?.entityBoosts).toBeDefined();
  });

  test('a recalled entity keeps its relevance when only keywords can score it', async () => {
    graph = new InMemoryGraphClient([LIVING_ROOM_LIGHT]);
    services = build();
    const relevance = async () => {
      const memory = await services.memoryService.getConversationMemory('c');
      return memory?.entities.find((e) => e.entityId === LIVING_ROOM_LIGHT.entityId)?.relevanceScore;
    };

    await run('kapcsold fel a lámpát', { conversationId: 'c' });
    const before = await relevance();
    // Ranked score: similarity plus the controllable factor
    expect(before).toBeGreaterThan(Math.SQRT1_2 + 0.1);

    embedding.failWith = new Error('embedding service down');
    const second = await run('és ez?', { conversationId: 'c' });

    expect(second.stats.failedStages).toEqual(['embedding']);
    expect(second.entities[0]?.entity.entityId).toBe(LIVING_ROOM_LIGHT.entityId);
    expect(second.entities[0]?.usedFallbackMatching).toBe(true);
    expect(await relevance()).toBeGreaterThanOrEqual(before ?? Number.POSITIVE_INFINITY);
  });

  test('another conversation starts without memory', async () => {
    await run('kapcsold fel a lámpát', { conversationId: 'conv-1' });
    const other = await run('kapcsold fel a lámpát', { conversationId: 'conv-2' });

    expect(other.stats.memoryCandidates).toBe(0);
  });
});

describe('degraded stages', () => {
  test('an embedding failure leaves only memory candidates', async () => {
    embedding.failWith = new Error('embedding service down');

    const output = await run('kapcsold fel a lámpát');

    expect(output.stats.failedStages).toEqual(['embedding']);
    expect(output.stats.usedVectorFallback).toBe(false);
    expect(output.entities).toEqual([]);
    expect(output.prompt).toBe(PROMPT_HEADER);
  });

  test('a vector search failure is reported, not thrown', async () => {
    graph.fail('searchEntities');

    const output = await run('kapcsold fel a lámpát');

    expect(output.stats.failedStages).toEqual(['vector_fallback']);
    expect(output.stats.vectorCandidates).toBe(0);
    expect(services.tracer.getTrace(output.traceId ?? '')).toMatchObject({
      status: 'error',
      errors: ['vector_fallback failed']
    });
  });

  test('a memory store failure keeps the ranked result', async () => {
    graph.fail('putDocument');

    const output = await run('kapcsold fel a lámpát', { conversationId: 'conv-1' });

    expect(output.entities.length).toBeGreaterThan(0);
    expect(graph.documents.size).toBe(0);
  });
});

describe('cancellation', () => {
  test('an aborted signal rejects before any work', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(run('kapcsold fel a lámpát', { signal: controller.signal })).rejects.toThrow('cancelled');
    expect(embedding.texts).toEqual([]);
    expect(services.tracer.getRecentTraces()).toEqual([]);
  });

  test('an abort mid-request stops before the next stage and closes the trace', async () => {
    const controller = new AbortController();
    const base = createKeywordEmbeddingClient();
    services = build({
      ...base,
      embed: async (text) => {
        controller.abort(new Error('cancelled'));
        return base.embed(text);
      }
    });

    await expect(run('kapcsold fel a lámpát', { signal: controller.signal })).rejects.toThrow('cancelled');
    expect(graph.calls).not.toContain('searchEntities');

    const [trace] = services.tracer.getRecentTraces(1);
    expect(trace?.status).toBe('error');
    expect(trace?.errors).toEqual(['cancelled']);
  });

  test('an abort during a slow cluster search rejects without waiting for it', async () => {
    const controller = new AbortController();
    vi.spyOn(graph, 'listClusters').mockImplementation(() => new Promise<never>(() => {}));
    setTimeout(() => controller.abort(new Error('cancelled')), 50);

    const start = Date.now();
    await expect(run('kapcsold fel a lámpát', { signal: controller.signal })).rejects.toThrow('cancelled');

    expect(Date.now() - start).toBeLessThan(500);
    expect(graph.calls).not.toContain('searchEntities');
  });
});

describe('tracing and debugging', () => {
  test('records one trace per request', async () => {
    const output = await run('kapcsold fel a lámpát');
    const trace = services.tracer.getTrace(output.traceId ?? '');

    expect(trace?.status).toBe('success');
    expect(trace?.nodes.map((n) => n.nodeName)).toEqual([
      'scope_detection',
      'embedding',
      'cluster_search',
      'vector_fallback',
      'reranking'
    ]);
    expect(trace?.entityPipeline.map((s) => s.stage)).toEqual([
      'cluster_search',
      'memory_recall',
      'vector_fallback',
      'final_selection'
    ]);
    expect(trace?.metrics?.finalEntityCount).toBe(output.entities.length);
  });

  test('attaches a debug trace only on request', async () => {
    expect((await run('kapcsold fel a lámpát')).debug).toBeNull();

    const output = await run('kapcsold fel a lámpát', { debug: true });

    expect(output.debug?.stages.map((s) => s.stage)).toEqual([
      'cluster_search',
      'memory_recall',
      'vector_fallback',
      'reranking',
      'final_selection'
    ]);
    expect(output.debug?.finalEntityCount).toBe(output.entities.length);
    expect(output.debug?.embeddingDimensions).toBe(6);
  });

  test('uses caller-supplied context instead of analysing history', async () => {
    const output = await retrieve(
      { query: 'zár', context: { areasMentioned: ['előszoba'] } },
      services.retrieval,
      services.retrievalConfig
    );

    const lock = output.entities.find((s) => s.entity.entityId === FRONT_DOOR_LOCK.entityId);
    expect(output.scope.context.areasMentioned).toEqual(['előszoba']);
    expect(lock?.rankingFactors['area_előszoba']).toBeGreaterThan(0);
  });
});
