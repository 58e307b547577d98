import type { Context, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { NotFoundError, type Logger } from '@marketdesk/utils';

/**
 * Error handler for app.onError
 */
export function createErrorHandler(logger: Logger): ErrorHandler {
  return (error, c) => {
    if (error instanceof NotFoundError) {
      logger.debug({ resource: error.resource, key: error.key }, 'Lookup missed');
      return c.json({ error: error.message }, 404);
    }

    // Zod validation error
    if (error instanceof ZodError) {
      return c.json(
        {
          error: 'Validation error',
          details: error.errors.map(e => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
        400
      );
    }

    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    logger.error({ err: error, method: c.req.method, path: c.req.path }, 'API Error');

    return c.json({ error: 'Internal server error' }, 500);
  };
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context) {
  return c.json({ error: 'Not found' }, 404);
}
