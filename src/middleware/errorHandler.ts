import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from '../logger';

/**
 * Last-resort handler for errors thrown by routes.
 */
export const errorHandler: ErrorHandler = (error, c) => {
  if (error instanceof HTTPException) {
    return error.getResponse();
  }

  logger.error(
    {
      path: c.req.path,
      method: c.req.method,
      error: error.message,
      stack: error.stack,
    },
    'Request error'
  );

  return c.json(
    {
      error: 'Internal server error',
      message: error.message,
    },
    500
  );
};
