import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { OrchestrationError } from '../../lifecycle/errors.js';
import { getLogger } from '../../monitoring/logger.js';

/**
 * Global error handler for the Hono app. Domain errors carry their own
 * status; anything else is a 500.
 */
export function errorHandler(err: Error, c: Context) {
  if (err instanceof OrchestrationError) {
    getLogger().warn('API request rejected', { code: err.code, message: err.message });
    return c.json({ error: err.code, message: err.message }, err.httpStatus);
  }

  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  getLogger().error('API error', { message: err.message, stack: err.stack });
  return c.json({ error: 'internal_error', message: 'An unexpected error occurred' }, 500);
}
