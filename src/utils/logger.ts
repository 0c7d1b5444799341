/**
 * Logger
 *
 * Semantic logging for retrieval operations:
 * - RETRIEVE: Entity selection for a query
 * - MEMORY: Conversation memory writes and sweeps
 * - CLUSTER: Cluster creation and bootstrap
 *
 * Action verbs first, one headline per operation, indented detail lines.
 */

import type { RetrievalOutput } from '@/core/retrieval/types';
import { c, scopeColor } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Line Format
// ═══════════════════════════════════════════════════════════════════════════════

// [HH:MM:SS] in local time
function stamp(): string {
  return c.dim(`[${new Date().toTimeString().slice(0, 8)}]`);
}

/** Collapse whitespace and cut to max characters */
function clip(text: string, max: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= max ? flat : `${flat.slice(0, max - 1)}…`;
}

/** Continuation lines line up under the headline, past the stamp */
const INDENT = ' '.repeat(11);

type Sink = 'log' | 'warn' | 'error';

function emit(tag: string, text: string, sink: Sink = 'log'): void {
  console[sink](`${stamp()} ${tag} ${text}`);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retrieval Logging (RETRIEVE)
// ═══════════════════════════════════════════════════════════════════════════════

export function logRetrievalStart(query: string, conversationId?: string): void {
  const conversation = conversationId ? ` ${c.dim(`[${conversationId}]`)}` : '';
  emit(c.magenta('RETRIEVE'), `"${c.white(clip(query, 60))}"${conversation}`);
}

export function logRetrievalResult(result: RetrievalOutput): void {
  const { scope, stats } = result;
  const sources = [
    `${stats.clusterCandidates} cluster`,
    `${stats.memoryCandidates} memory`,
    stats.usedVectorFallback ? `${stats.vectorCandidates} vector` : null
  ].filter((part) => part !== null);

  console.log(
    `${INDENT}${c.dim('→')} ${scopeColor(scope.scope)(scope.scope.toUpperCase())} k=${scope.details.optimalK} ` +
      c.dim(`(${sources.join(', ')}; ${stats.durationMs}ms)`)
  );

  if (stats.failedStages.length > 0) {
    console.log(`${INDENT}${c.yellow('! Degraded')}: ${stats.failedStages.join(', ')}`);
  }

  if (result.entities.length === 0) {
    console.log(`${INDENT}${c.dim('(no entities selected)')}`);
    return;
  }

  result.entities.slice(0, 5).forEach((scored, index) => {
    const num = c.dim(`[${index + 1}]`);
    const score = c.dim(`(${scored.finalScore.toFixed(2)})`);
    console.log(`${INDENT}${num} ${c.white(scored.entity.entityId)} ${score}`);
  });
  if (result.entities.length > 5) {
    console.log(`${INDENT}${c.dim(`… ${result.entities.length - 5} more`)}`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Memory Logging (MEMORY)
// ═══════════════════════════════════════════════════════════════════════════════

export function logMemoryStored(
  conversationId: string,
  entityCount: number,
  areaCount: number,
  expiresAt: number
): void {
  const expiry = new Date(expiresAt).toISOString().slice(11, 19);
  emit(
    c.cyan('MEMORY'),
    `${c.white(conversationId)} ${c.dim(`${entityCount} entities, ${areaCount} areas, expires ${expiry}`)}`
  );
}

export function logMemoryCleanup(count: number): void {
  if (count === 0) return;
  emit(c.cyan('MEMORY'), `${c.error('- Expired')} ${count} conversations`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Cluster Logging (CLUSTER)
// ═══════════════════════════════════════════════════════════════════════════════

export function logClusterCreated(key: string, type: string, embedded: boolean): void {
  const note = embedded ? '' : ` ${c.yellow('(no embedding)')}`;
  emit(c.blue('CLUSTER'), `${c.brightGreen('+ Created')} ${key} ${c.dim(type)}${note}`);
}

export function logBootstrap(created: number, skipped: number, members: number): void {
  emit(c.blue('CLUSTER'), `Bootstrap: ${created} created, ${skipped} existing, ${members} members`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Problems
// ═══════════════════════════════════════════════════════════════════════════════

export function logWarning(message: string, detail?: unknown): void {
  const suffix = detail === undefined ? '' : ` ${c.dim(`(${errorMessage(detail)})`)}`;
  emit(c.yellow('WARN'), `${message}${suffix}`, 'warn');
}

export function logError(message: string, error: unknown): void {
  emit(c.red('ERROR'), message, 'error');
  console.error(`${INDENT}${c.dim(errorMessage(error))}`);
}
