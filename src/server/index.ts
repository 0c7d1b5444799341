/**
 * Server Module
 *
 * Creates and configures the Hono application.
 * Composition root that wires together all endpoints.
 */

import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { GraphClientError, type GraphErrorType } from '@/providers/graph/types';
import { logError } from '@/utils/logger';
import { createRoutes } from './routes';
import type { Services } from './services';

const GRAPH_ERROR_STATUS: Partial<Record<GraphErrorType, ContentfulStatusCode>> = {
  NOT_FOUND: 404,
  CONSTRAINT_VIOLATION: 409,
  CONNECTION_ERROR: 503,
  TRANSIENT_ERROR: 503
};

export function createApp(services: Services): Hono {
  const app = new Hono();

  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/', createRoutes(services));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status);
    }
    if (err instanceof GraphClientError) {
      const status = GRAPH_ERROR_STATUS[err.type] ?? 500;
      if (status >= 500) logError(`${c.req.method} ${c.req.path}`, err);
      return c.json({ error: err.message, type: err.type }, status);
    }
    logError(`${c.req.method} ${c.req.path}`, err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export { createServices, startServices, stopServices, type Services } from './services';
