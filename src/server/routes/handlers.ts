/**
 * Route Handlers
 *
 * One factory per endpoint. Each handler validates its input, calls into
 * the services and shapes the wire response.
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { z } from 'zod';
import { ClusterDefinitionSchema } from '@/core/clusters/types';
import { toWireEntity } from '@/core/entities/candidate';
import { memoryToDocument } from '@/core/memory/schemas';
import type { EntityScore } from '@/core/ranking/types';
import { retrieve } from '@/core/retrieval/pipeline';
import type { RetrievalOutput } from '@/core/retrieval/types';
import { toWireScopeDecision } from '@/core/scope/detector';
import type { ClusterRecord } from '@/providers/graph/types';
import type { Services } from '@/server/services';
import {
  AddMemberRequestSchema,
  RetrieveRequestSchema,
  ScopeRequestSchema,
  TracesQuerySchema
} from './schemas';

// ═══════════════════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════════════════

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new HTTPException(400, { message: 'Request body must be valid JSON' });
  }
}

function validate<T>(schema: z.ZodType<T>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new HTTPException(400, { message: issues.join('; ') });
  }
  return result.data;
}

function param(c: Context, name: string): string {
  const value = c.req.param(name);
  if (!value) throw new HTTPException(400, { message: `Missing path parameter: ${name}` });
  return value;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Wire shapes
// ═══════════════════════════════════════════════════════════════════════════════

function toWireScore(score: EntityScore) {
  return {
    ...toWireEntity(score.entity),
    base_score: score.baseScore,
    context_boost: score.contextBoost,
    final_score: score.finalScore,
    ranking_factors: score.rankingFactors,
    used_fallback_matching: score.usedFallbackMatching
  };
}

function toWireRetrieval(output: RetrievalOutput) {
  return {
    query: output.query,
    conversation_id: output.conversationId,
    scope: toWireScopeDecision(output.scope),
    entities: output.entities.map(toWireScore),
    prompt: output.prompt,
    stats: output.stats,
    trace_id: output.traceId,
    debug: output.debug,
    enhancement: output.enhancement
  };
}

/** Embeddings are summarised by their dimension */
function toWireCluster(cluster: ClusterRecord) {
  const { embedding, ...rest } = cluster;
  return { ...rest, embeddingDim: embedding.length };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval
// ═══════════════════════════════════════════════════════════════════════════════

export function createRetrieveHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const body = validate(RetrieveRequestSchema, await readJson(c));

    const output = await retrieve(
      {
        query: body.query,
        conversationId: body.conversation_id,
        history: body.history,
        debug: body.debug,
        signal: c.req.raw.signal
      },
      services.retrieval,
      services.retrievalConfig
    );

    return c.json(toWireRetrieval(output));
  };
}

export function createScopeHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const body = validate(ScopeRequestSchema, await readJson(c));
    const context = services.retrieval.analyzer.analyze(body.query, body.history);
    const detection = services.scopeDetector.detectScope(body.query, context);
    return c.json(toWireScopeDecision(detection));
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Memory
// ═══════════════════════════════════════════════════════════════════════════════

export function createGetMemoryHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const conversationId = param(c, 'id');
    const memory = await services.memoryService.getConversationMemory(conversationId);
    if (!memory) {
      throw new HTTPException(404, { message: `No memory for conversation ${conversationId}` });
    }
    return c.json(memoryToDocument(memory));
  };
}

export function createMemoryStatsHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const conversationId = param(c, 'id');
    const stats = await services.memoryService.getConversationStats(conversationId);
    if (!stats) {
      throw new HTTPException(404, { message: `No memory for conversation ${conversationId}` });
    }
    return c.json(stats);
  };
}

export function createDeleteMemoryHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const deleted = await services.memoryService.deleteConversationMemory(param(c, 'id'));
    return c.json({ deleted });
  };
}

export function createCleanupHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const removed = await services.memoryService.cleanupAllExpired();
    return c.json({ removed });
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Clusters
// ═══════════════════════════════════════════════════════════════════════════════

export function createListClustersHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const clusters = await services.clusterManager.listClusters();
    return c.json({ clusters: clusters.map(toWireCluster) });
  };
}

export function createClusterHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const definition = validate(ClusterDefinitionSchema, await readJson(c));
    const cluster = await services.clusterManager.createCluster(definition);
    return c.json(toWireCluster(cluster), 201);
  };
}

export function createAddMemberHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const clusterKey = param(c, 'key');
    const body = validate(AddMemberRequestSchema, await readJson(c));
    await services.clusterManager.addEntityToCluster(
      clusterKey,
      body.entity_id,
      body.role,
      body.weight,
      body.context_boost
    );
    return c.json({ cluster_key: clusterKey, entity_id: body.entity_id, role: body.role }, 201);
  };
}

export function createBootstrapHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const result = await services.clusterManager.bootstrapInitialClusters();
    return c.json(result);
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Traces
// ═══════════════════════════════════════════════════════════════════════════════

export function createListTracesHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const { limit } = validate(TracesQuerySchema, c.req.query());
    return c.json({ traces: services.tracer.getRecentTraces(limit) });
  };
}

export function createGetTraceHandler(services: Services) {
  return async (c: Context): Promise<Response> => {
    const traceId = param(c, 'id');
    const trace = services.tracer.getTrace(traceId);
    if (!trace) {
      throw new HTTPException(404, { message: `Trace not found: ${traceId}` });
    }
    return c.json(trace);
  };
}
