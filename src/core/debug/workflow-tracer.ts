/**
 * Workflow Tracer
 *
 * Records the nodes a request went through (with sanitized input and
 * output), the entity sets between them and the final result. Completed
 * traces are kept in a bounded in-memory ring, newest first on read.
 */

import { randomUUID } from 'node:crypto';
import { logWarning } from '@/utils/logger';
import { DebugCandidateSchema, type DebugCandidate, DebugScoreSchema } from './schemas';
import type {
  EntityStage,
  SanitizedEntity,
  TraceMetrics,
  WorkflowTrace
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Sanitization
// ═══════════════════════════════════════════════════════════════════════════════

const MAX_STRING = 200;
const MAX_STATE = 50;
const MAX_ARRAY = 20;
const MAX_DEPTH = 3;
const EMBEDDING_KEYS = new Set(['embedding', 'queryEmbedding', 'query_embedding', 'vector']);

function truncateString(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

/**
 * JSON-safe copy of `value`: long strings and arrays are cut, embedding
 * vectors are replaced by their length and nesting is capped.
 */
export function sanitize(value: unknown, depth = MAX_DEPTH): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return truncateString(value, MAX_STRING);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object') return null;
  if (value instanceof Date) return value.toISOString();
  if (depth <= 0) return truncateString(String(value), MAX_STRING);

  if (Array.isArray(value)) {
    return value.slice(0, MAX_ARRAY).map((item: unknown) => sanitize(item, depth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (EMBEDDING_KEYS.has(key)) {
      result[`${key}_dim`] = Array.isArray(entry) ? entry.length : 0;
      continue;
    }
    result[key] = sanitize(entry, depth - 1);
  }
  return result;
}

/**
 * Compact entity rows for an entity stage. Accepts candidates or scored
 * candidates; anything else is skipped.
 */
export function sanitizeEntities(items: readonly unknown[]): SanitizedEntity[] {
  const rows: SanitizedEntity[] = [];
  for (const item of items) {
    if (rows.length >= MAX_ARRAY) break;

    const scored = DebugScoreSchema.safeParse(item);
    if (scored.success) {
      rows.push(entityRow(scored.data.entity, scored.data.finalScore));
      continue;
    }
    const candidate = DebugCandidateSchema.safeParse(item);
    if (candidate.success) rows.push(entityRow(candidate.data, null));
  }
  return rows;
}

function entityRow(entity: DebugCandidate, score: number | null): SanitizedEntity {
  return {
    entity_id: entity.entityId,
    domain: entity.domain ?? null,
    area: entity.area ?? null,
    state: entity.state ? truncateString(entity.state, MAX_STATE) : null,
    similarity: entity.similarity !== undefined ? round(entity.similarity, 3) : null,
    score: score !== null ? round(score, 3) : null,
    memory_boosted: entity.annotations?.memoryBoosted === true,
    cluster_key: entity.annotations?.clusterContext?.clusterKey ?? null
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Tracer
// ═══════════════════════════════════════════════════════════════════════════════

export interface WorkflowTracerOptions {
  /** Completed traces kept in memory */
  capacity?: number;
  clock?: () => number;
}

export class WorkflowTracer {
  private readonly active = new Map<string, WorkflowTrace>();
  private readonly completed: WorkflowTrace[] = [];
  private readonly capacity: number;
  private readonly clock: () => number;

  constructor(options: WorkflowTracerOptions = {}) {
    this.capacity = Math.max(1, options.capacity ?? 100);
    this.clock = options.clock ?? Date.now;
  }

  startTrace(sessionId: string, query: string): string {
    const traceId = randomUUID();
    this.active.set(traceId, {
      traceId,
      sessionId,
      query: truncateString(query, MAX_STRING),
      startedAt: new Date(this.clock()).toISOString(),
      endedAt: null,
      durationMs: null,
      nodes: [],
      entityPipeline: [],
      result: null,
      errors: [],
      status: 'running',
      metrics: null
    });
    return traceId;
  }

  startNode(traceId: string, nodeName: string, input: unknown = {}): void {
    const trace = this.lookup(traceId);
    if (!trace) return;

    trace.nodes.push({
      nodeName,
      startedAt: new Date(this.clock()).toISOString(),
      endedAt: null,
      durationMs: null,
      input: sanitize(input),
      output: null,
      errors: [],
      status: 'running'
    });
  }

  /**
   * Close the most recent running node with this name. Errors mark it failed.
   */
  endNode(traceId: string, nodeName: string, output: unknown = {}, errors: string[] = []): void {
    const trace = this.lookup(traceId);
    if (!trace) return;

    const node = findLast(trace.nodes, (n) => n.nodeName === nodeName && n.status === 'running');
    if (!node) return;

    const endedAt = this.clock();
    node.endedAt = new Date(endedAt).toISOString();
    node.durationMs = endedAt - Date.parse(node.startedAt);
    node.output = sanitize(output);
    node.errors = [...errors];
    node.status = errors.length > 0 ? 'error' : 'success';
  }

  recordEntityStage(
    traceId: string,
    stage: string,
    entities: readonly unknown[],
    metadata: Record<string, unknown> = {}
  ): void {
    const trace = this.lookup(traceId);
    if (!trace) return;

    const sanitizedMetadata = sanitize(metadata);
    const entry: EntityStage = {
      stage,
      entityCount: entities.length,
      entities: sanitizeEntities(entities),
      metadata: isRecord(sanitizedMetadata) ? sanitizedMetadata : {}
    };
    trace.entityPipeline.push(entry);
  }

  /**
   * Complete a trace and move it into the ring.
   */
  endTrace(traceId: string, result: unknown = {}, errors: string[] = []): WorkflowTrace | null {
    const trace = this.lookup(traceId);
    if (!trace) return null;

    const endedAt = this.clock();
    trace.endedAt = new Date(endedAt).toISOString();
    trace.durationMs = endedAt - Date.parse(trace.startedAt);
    trace.result = sanitize(result);
    trace.errors = [...errors];
    trace.status = errors.length > 0 ? 'error' : 'success';
    trace.metrics = computeTraceMetrics(trace);

    this.active.delete(traceId);
    this.completed.push(trace);
    if (this.completed.length > this.capacity) {
      this.completed.splice(0, this.completed.length - this.capacity);
    }
    return trace;
  }

  /** An active or retained trace */
  getTrace(traceId: string): WorkflowTrace | null {
    return this.active.get(traceId) ?? this.completed.find((t) => t.traceId === traceId) ?? null;
  }

  /** Completed traces, newest first */
  getRecentTraces(limit = 50): WorkflowTrace[] {
    if (limit <= 0) return [];
    return this.completed.slice(-limit).reverse();
  }

  get activeCount(): number {
    return this.active.size;
  }

  private lookup(traceId: string): WorkflowTrace | undefined {
    const trace = this.active.get(traceId);
    if (!trace) logWarning(`Trace not found: ${traceId}`);
    return trace;
  }
}

function computeTraceMetrics(trace: WorkflowTrace): TraceMetrics {
  const nodeTimes: Record<string, number> = {};
  for (const node of trace.nodes) {
    if (node.durationMs !== null) nodeTimes[node.nodeName] = node.durationMs;
  }

  return {
    totalNodes: trace.nodes.length,
    successfulNodes: trace.nodes.filter((n) => n.status === 'success').length,
    failedNodes: trace.nodes.filter((n) => n.status === 'error').length,
    nodeTimes,
    entityStages: trace.entityPipeline.length,
    finalEntityCount: trace.entityPipeline.at(-1)?.entityCount ?? 0
  };
}

function findLast<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item !== undefined && predicate(item)) return item;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
