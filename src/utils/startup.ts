/**
 * Startup Display
 *
 * Prints the initialization steps and the endpoint list once the server
 * is listening.
 */

import type { Config } from '@/config/schema';
import { c, methodColor } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface StartupInfo {
  graphUri: string;
  embedding: {
    provider: string;
    model: string;
    dimensions: number;
  };
  /** Null when summaries are rule-based only */
  llm: {
    provider: string;
    model: string;
  } | null;
  port: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

const DIVIDER = '━'.repeat(78);

const ENDPOINTS: ReadonlyArray<readonly [method: string, path: string, description: string]> = [
  ['POST', '/v1/retrieve', 'Entities and prompt context for a query'],
  ['POST', '/v1/scope', 'Scope decision for a query'],
  ['GET', '/v1/memory/:id', 'Conversation memory'],
  ['GET', '/v1/memory/:id/stats', 'Conversation memory statistics'],
  ['DELETE', '/v1/memory/:id', 'Forget a conversation'],
  ['POST', '/v1/memory/cleanup', 'Sweep expired memory'],
  ['GET', '/v1/clusters', 'List clusters'],
  ['POST', '/v1/clusters', 'Create a cluster'],
  ['POST', '/v1/clusters/:key/entities', 'Add a cluster member'],
  ['POST', '/v1/clusters/bootstrap', 'Seed the bundled clusters'],
  ['GET', '/v1/traces', 'Recent workflow traces'],
  ['GET', '/v1/traces/:id', 'One workflow trace'],
  ['GET', '/health', 'Health check']
];

// ═══════════════════════════════════════════════════════════════════════════════
// Startup Display
// ═══════════════════════════════════════════════════════════════════════════════

function logStep(label: string, detail?: string): void {
  const check = c.brightGreen('✓');
  const labelText = c.white(label);
  const detailText = detail ? c.dim(detail) : '';

  // Align details to column 30
  const padding = Math.max(1, 26 - label.length);
  console.log(`  ${check} ${labelText}${' '.repeat(padding)}${detailText}`);
}

function displayEndpoint(method: string, path: string, description: string): void {
  const methodText = methodColor(method)(method.padEnd(6));
  const pathText = c.cyan(path.padEnd(28));
  console.log(`    • ${methodText} ${pathText} ${c.dim(description)}`);
}

export function displayStartup(info: StartupInfo): void {
  console.log(`\n  ${c.dim('Initializing...')}\n`);

  logStep('Configuration loaded');
  logStep('Neo4j connected', info.graphUri);
  logStep(
    'Embedding client ready',
    `${info.embedding.provider}/${info.embedding.model} (${info.embedding.dimensions}d)`
  );
  logStep('Summarizer ready', info.llm ? `${info.llm.provider}/${info.llm.model}` : 'rule-based');

  console.log(`\n  ${c.dim(DIVIDER)}\n`);

  const url = `http://localhost:${info.port}`;
  console.log(`  ${c.white('Server ready on')} ${c.brightCyan(url)}\n`);

  console.log(`  ${c.white('Endpoints:')}`);
  for (const [method, path, description] of ENDPOINTS) {
    displayEndpoint(method, path, description);
  }

  console.log(`\n  ${c.dim(DIVIDER)}\n`);
}

export function buildStartupInfo(config: Config): StartupInfo {
  return {
    graphUri: config.graph.uri,
    embedding: {
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions
    },
    llm: config.llm ? { provider: config.llm.provider, model: config.llm.model } : null,
    port: config.server.port
  };
}
