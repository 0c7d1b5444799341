/**
 * API Routes
 *
 * Routes:
 * - POST   /v1/retrieve                 ranked entities and prompt context
 * - POST   /v1/scope                    scope decision only
 * - GET    /v1/memory/:id               stored conversation memory
 * - GET    /v1/memory/:id/stats         memory summary statistics
 * - DELETE /v1/memory/:id               forget a conversation
 * - POST   /v1/memory/cleanup           sweep expired documents
 * - GET    /v1/clusters                 list clusters
 * - POST   /v1/clusters                 create a cluster
 * - POST   /v1/clusters/:key/entities   add a member entity
 * - POST   /v1/clusters/bootstrap       seed the bundled clusters
 * - GET    /v1/traces                   recent workflow traces
 * - GET    /v1/traces/:id               one workflow trace
 */

import { Hono } from 'hono';
import type { Services } from '@/server/services';
import {
  createAddMemberHandler,
  createBootstrapHandler,
  createCleanupHandler,
  createClusterHandler,
  createDeleteMemoryHandler,
  createGetMemoryHandler,
  createGetTraceHandler,
  createListClustersHandler,
  createListTracesHandler,
  createMemoryStatsHandler,
  createRetrieveHandler,
  createScopeHandler
} from './handlers';

export function createRoutes(services: Services): Hono {
  const app = new Hono();

  app.post('/v1/retrieve', createRetrieveHandler(services));
  app.post('/v1/scope', createScopeHandler(services));

  app.post('/v1/memory/cleanup', createCleanupHandler(services));
  app.get('/v1/memory/:id', createGetMemoryHandler(services));
  app.get('/v1/memory/:id/stats', createMemoryStatsHandler(services));
  app.delete('/v1/memory/:id', createDeleteMemoryHandler(services));

  app.get('/v1/clusters', createListClustersHandler(services));
  app.post('/v1/clusters', createClusterHandler(services));
  app.post('/v1/clusters/bootstrap', createBootstrapHandler(services));
  app.post('/v1/clusters/:key/entities', createAddMemberHandler(services));

  app.get('/v1/traces', createListTracesHandler(services));
  app.get('/v1/traces/:id', createGetTraceHandler(services));

  return app;
}
