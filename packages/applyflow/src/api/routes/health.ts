import { Hono } from 'hono';
import type { Orchestrator } from '../../orchestrator/Orchestrator.js';

const startedAt = Date.now();

export function createHealthRoutes(orchestrator: Orchestrator) {
  const health = new Hono();

  health.get('/', (c) => {
    const { scheduler, sessions } = orchestrator.stats();
    return c.json({
      status: scheduler.running ? 'ok' : 'stopped',
      service: 'applyflow',
      uptimeMs: Date.now() - startedAt,
      scheduler,
      sessions,
    });
  });

  return health;
}
