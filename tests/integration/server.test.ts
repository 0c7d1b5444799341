/**
 * HTTP API Tests
 *
 * Drives the Hono app through app.request() with in-process clients.
 */

import type { Hono } from 'hono';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { GraphClientError } from '@/providers/graph/types';
import { createApp, createServices, type Services } from '@/server';
import { createTestConfig, HOME_ENTITIES, LIVING_ROOM_LIGHT } from '../helpers/fixtures';
import { createKeywordEmbeddingClient, InMemoryGraphClient } from '../helpers/mocks';

let graph: InMemoryGraphClient;
let services: Services;
let app: Hono;

function post(path: string, body: unknown): Response | Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

async function json(response: Response): Promise<unknown> {
  return response.json();
}

beforeEach(() => {
  graph = new InMemoryGraphClient(HOME_ENTITIES);
  services = createServices(createTestConfig(), {
    graphClient: graph,
    embeddingClient: createKeywordEmbeddingClient(),
    llmClient: null
  });
  app = createApp(services);
});

afterEach(async () => {
  await services.enricher.drain();
});

describe('GET /health', () => {
  test('reports ok', async () => {
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ status: 'ok' });
  });
});

describe('POST /v1/retrieve', () => {
  test('returns the scope, ranked entities and prompt', async () => {
    const res = await post('/v1/retrieve', { query: 'kapcsold fel a lámpát', conversation_id: 'conv-1' });

    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({
      query: 'kapcsold fel a lámpát',
      conversation_id: 'conv-1',
      scope: { scope: 'micro', optimal_k: 7, formatter: 'detailed' },
      entities: expect.arrayContaining([
        expect.objectContaining({ entity_id: LIVING_ROOM_LIGHT.entityId, domain: 'light', _cluster_context: null })
      ]),
      prompt: expect.stringContaining('Relevant entities: '),
      trace_id: expect.any(String),
      debug: null
    });
  });

  test('rejects a blank query', async () => {
    const res = await post('/v1/retrieve', { query: '   ' });

    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'query: query is required' });
  });

  test('rejects a body that is not JSON', async () => {
    const res = await app.request('/v1/retrieve', { method: 'POST', body: '{not json' });

    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'Request body must be valid JSON' });
  });
});

describe('POST /v1/scope', () => {
  test('returns the scope decision only', async () => {
    const res = await post('/v1/scope', { query: 'kapcsold fel a lámpát' });

    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({ scope: 'micro', optimal_k: 7, formatter: 'detailed' });
  });
});

describe('memory endpoints', () => {
  test('404 for an unknown conversation', async () => {
    const res = await app.request('/v1/memory/nope');

    expect(res.status).toBe(404);
    expect(await json(res)).toEqual({ error: 'No memory for conversation nope' });
    expect((await app.request('/v1/memory/nope/stats')).status).toBe(404);
  });

  test('read, summarise and forget a conversation', async () => {
    await post('/v1/retrieve', { query: 'kapcsold fel a lámpát', conversation_id: 'conv-1' });

    const memory = await app.request('/v1/memory/conv-1');
    expect(memory.status).toBe(200);
    expect(await json(memory)).toMatchObject({ conversation_id: 'conv-1', query_count: 1 });

    const stats = await app.request('/v1/memory/conv-1/stats');
    expect(await json(stats)).toMatchObject({ conversation_id: 'conv-1' });

    const deleted = await app.request('/v1/memory/conv-1', { method: 'DELETE' });
    expect(await json(deleted)).toEqual({ deleted: true });
    expect((await app.request('/v1/memory/conv-1')).status).toBe(404);
  });

  test('cleanup reports the removed documents', async () => {
    const res = await app.request('/v1/memory/cleanup', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ removed: 0 });
  });
});

describe('cluster endpoints', () => {
  const definition = {
    key: 'living_lights',
    name: 'Nappali fények',
    type: 'micro_cluster',
    description: 'nappali lámpa'
  };

  test('creates a cluster with its embedding summarised', async () => {
    const res = await post('/v1/clusters', definition);

    expect(res.status).toBe(201);
    const body = await json(res);
    expect(body).toMatchObject({ key: 'living_lights', scope: 'specific', embeddingDim: 6 });
    expect(body).not.toHaveProperty('embedding');
  });

  test('409 for a duplicate key', async () => {
    await post('/v1/clusters', definition);
    const res = await post('/v1/clusters', definition);

    expect(res.status).toBe(409);
    expect(await json(res)).toMatchObject({ type: 'CONSTRAINT_VIOLATION' });
  });

  test('400 for an invalid key', async () => {
    const res = await post('/v1/clusters', { ...definition, key: 'Living Lights' });

    expect(res.status).toBe(400);
    expect(await json(res)).toEqual({ error: 'key: key must be lowercase letters, digits and underscores' });
  });

  test('adds members and 404s for unknown entities', async () => {
    await post('/v1/clusters', definition);

    const added = await post('/v1/clusters/living_lights/entities', { entity_id: LIVING_ROOM_LIGHT.entityId });
    expect(added.status).toBe(201);
    expect(await json(added)).toEqual({
      cluster_key: 'living_lights',
      entity_id: LIVING_ROOM_LIGHT.entityId,
      role: 'primary'
    });
    expect(graph.members).toEqual([
      { clusterKey: 'living_lights', entityId: LIVING_ROOM_LIGHT.entityId, role: 'primary', weight: 1, contextBoost: 1 }
    ]);

    const missing = await post('/v1/clusters/living_lights/entities', { entity_id: 'light.missing' });
    expect(missing.status).toBe(404);
  });

  test('bootstraps the bundled clusters and lists them', async () => {
    const res = await app.request('/v1/clusters/bootstrap', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await json(res)).toMatchObject({ skipped: [], failed: [], members: 5 });

    const list = await app.request('/v1/clusters');
    const body = await json(list);
    expect(body).toMatchObject({
      clusters: expect.arrayContaining([expect.objectContaining({ key: 'lighting_control' })])
    });
  });

  test('maps store outages to 503 and unknown errors to 500', async () => {
    graph.fail('listClusters', new GraphClientError('unreachable', 'CONNECTION_ERROR'));
    const outage = await app.request('/v1/clusters');
    expect(outage.status).toBe(503);
    expect(await json(outage)).toEqual({ error: 'unreachable', type: 'CONNECTION_ERROR' });

    graph.fail('listClusters', new Error('boom'));
    const failure = await app.request('/v1/clusters');
    expect(failure.status).toBe(500);
    expect(await json(failure)).toEqual({ error: 'Internal server error' });
  });
});

describe('trace endpoints', () => {
  test('lists recent traces and fetches one', async () => {
    const retrieval = await post('/v1/retrieve', { query: 'kapcsold fel a lámpát' });
    const body = await json(retrieval);
    const traceId =
      typeof body === 'object' && body !== null && 'trace_id' in body && typeof body.trace_id === 'string'
        ? body.trace_id
        : '';

    const list = await app.request('/v1/traces?limit=10');
    expect(await json(list)).toMatchObject({ traces: [expect.objectContaining({ traceId })] });

    const one = await app.request(`/v1/traces/${traceId}`);
    expect(one.status).toBe(200);
    expect(await json(one)).toMatchObject({ traceId, status: 'success' });
  });

  test('validates the limit and 404s unknown ids', async () => {
    expect((await app.request('/v1/traces?limit=0')).status).toBe(400);
    expect((await app.request('/v1/traces/missing')).status).toBe(404);
  });
});
