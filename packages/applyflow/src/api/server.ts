import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import type { Orchestrator } from '../orchestrator/Orchestrator.js';
import { getLogger, requestLoggingMiddleware } from '../monitoring/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import {
  createApplicationRoutes,
  createEventRoutes,
  createFollowUpRoutes,
  createResumeRoutes,
} from './routes/applications.js';
import { createHealthRoutes } from './routes/health.js';

/**
 * Create the control-surface Hono app around an orchestrator.
 * Designed to be mounted by the worker entry point or used in tests.
 */
export function createApp(orchestrator: Orchestrator) {
  const app = new Hono();

  // ─── Global Middleware ─────────────────────────────────────────

  app.use('*', requestLoggingMiddleware());
  app.onError(errorHandler);

  // ─── Routes ────────────────────────────────────────────────────

  app.route('/health', createHealthRoutes(orchestrator));
  app.route('/resumes', createResumeRoutes(orchestrator));
  app.route('/applications', createApplicationRoutes(orchestrator));
  app.route('/events', createEventRoutes(orchestrator));
  app.route('/follow-ups', createFollowUpRoutes(orchestrator));

  // ─── 404 Fallback ─────────────────────────────────────────────

  app.notFound((c) => {
    return c.json({ error: 'not_found', message: 'Route not found' }, 404);
  });

  return app;
}

export function startServer(orchestrator: Orchestrator, port = 3200): ServerType {
  const app = createApp(orchestrator);
  const server = serve({ fetch: app.fetch, port });
  getLogger().info('API listening', { port });
  return server;
}
