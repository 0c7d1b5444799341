/**
 * Workflow Tracer Tests
 */

import { describe, expect, test } from 'vitest';
import { sanitize, sanitizeEntities, WorkflowTracer } from '@/core/debug/workflow-tracer';
import { FIXED_TIMESTAMP } from '../../../helpers/mocks';
import { LIVING_ROOM_LIGHT, toCandidate } from '../../../helpers/fixtures';

function createTracer(capacity?: number) {
  const clock = { now: Date.parse(FIXED_TIMESTAMP) };
  const tracer = new WorkflowTracer({ capacity, clock: () => clock.now });
  return { tracer, clock };
}

describe('sanitize', () => {
  test('truncates long strings and arrays', () => {
    const long = 'x'.repeat(250);
    expect(sanitize(long)).toBe(`${'x'.repeat(200)}...`);

    const items = Array.from({ length: 25 }, (_, i) => i);
    expect(sanitize(items)).toEqual(items.slice(0, 20));
  });

  test('replaces embeddings by their length', () => {
    expect(sanitize({ query: 'lámpa', embedding: [0.1, 0.2, 0.3], vector: 'n/a' })).toEqual({
      query: 'lámpa',
      embedding_dim: 3,
      vector_dim: 0
    });
  });

  test('caps nesting depth', () => {
    expect(sanitize({ a: { b: { c: { d: 1 } } } })).toEqual({ a: { b: { c: '[object Object]' } } });
  });

  test('maps non-JSON values', () => {
    expect(sanitize(undefined)).toBeNull();
    expect(sanitize(Number.NaN)).toBeNull();
    expect(sanitize(10n)).toBe('10');
    expect(sanitize(() => 1)).toBeNull();
    expect(sanitize(new Date(FIXED_TIMESTAMP))).toBe(FIXED_TIMESTAMP);
  });
});

describe('sanitizeEntities', () => {
  test('reads candidates and scored candidates', () => {
    const candidate = toCandidate(LIVING_ROOM_LIGHT, 0.12345);
    const rows = sanitizeEntities([
      candidate,
      { entity: candidate, baseScore: 0.1, contextBoost: 1, finalScore: 1.23456, rankingFactors: {} },
      'garbage'
    ]);

    expect(rows).toEqual([
      {
        entity_id: 'light.nappali_lampa',
        domain: 'light',
        area: 'nappali',
        state: 'on',
        similarity: 0.123,
        score: null,
        memory_boosted: false,
        cluster_key: null
      },
      {
        entity_id: 'light.nappali_lampa',
        domain: 'light',
        area: 'nappali',
        state: 'on',
        similarity: 0.123,
        score: 1.235,
        memory_boosted: false,
        cluster_key: null
      }
    ]);
  });
});

describe('WorkflowTracer', () => {
  test('records nodes, entity stages and the result', () => {
    const { tracer, clock } = createTracer();
    const traceId = tracer.startTrace('c1', 'mi van a nappaliban?');

    tracer.startNode(traceId, 'embed_query', { query: 'mi van a nappaliban?' });
    clock.now += 5;
    tracer.endNode(traceId, 'embed_query', { embedding: [1, 0, 0] });

    tracer.startNode(traceId, 'cluster_search');
    clock.now += 3;
    tracer.endNode(traceId, 'cluster_search', {}, ['graph unreachable']);

    tracer.recordEntityStage(traceId, 'final', [toCandidate(LIVING_ROOM_LIGHT, 0.5)], { k: 5 });
    clock.now += 2;

    const trace = tracer.endTrace(traceId, { count: 1 });

    expect(trace?.status).toBe('success');
    expect(trace?.durationMs).toBe(10);
    expect(trace?.nodes.map((n) => [n.nodeName, n.status, n.durationMs])).toEqual([
      ['embed_query', 'success', 5],
      ['cluster_search', 'error', 3]
    ]);
    expect(trace?.nodes[0]?.output).toEqual({ embedding_dim: 3 });
    expect(trace?.entityPipeline[0]?.metadata).toEqual({ k: 5 });
    expect(trace?.metrics).toEqual({
      totalNodes: 2,
      successfulNodes: 1,
      failedNodes: 1,
      nodeTimes: { embed_query: 5, cluster_search: 3 },
      entityStages: 1,
      finalEntityCount: 1
    });
    expect(tracer.activeCount).toBe(0);
  });

  test('errors on endTrace mark the trace failed', () => {
    const { tracer } = createTracer();
    const traceId = tracer.startTrace('c1', 'q');

    expect(tracer.endTrace(traceId, {}, ['timeout'])?.status).toBe('error');
  });

  test('finds active and completed traces', () => {
    const { tracer } = createTracer();
    const traceId = tracer.startTrace('c1', 'q');

    expect(tracer.getTrace(traceId)?.status).toBe('running');
    tracer.endTrace(traceId);
    expect(tracer.getTrace(traceId)?.status).toBe('success');
    expect(tracer.getTrace('missing')).toBeNull();
  });

  test('keeps a bounded ring, newest first', () => {
    const { tracer } = createTracer(2);
    const ids = ['a', 'b', 'c'].map((query) => {
      const traceId = tracer.startTrace('c1', query);
      tracer.endTrace(traceId);
      return traceId;
    });

    expect(tracer.getRecentTraces().map((t) => t.query)).toEqual(['c', 'b']);
    expect(tracer.getRecentTraces(1).map((t) => t.query)).toEqual(['c']);
    expect(tracer.getRecentTraces(0)).toEqual([]);
    expect(tracer.getTrace(ids[0] ?? '')).toBeNull();
  });

  test('ignores unknown trace ids', () => {
    const { tracer } = createTracer();

    tracer.startNode('missing', 'x');
    tracer.recordEntityStage('missing', 'x', []);
    expect(tracer.endTrace('missing')).toBeNull();
  });
});
