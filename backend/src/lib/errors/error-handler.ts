import type { ErrorHandler, Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger } from '../../logger';
import { captureError } from '../../sentry';
import { AppError } from './index';

/**
 * Translate a domain error into the JSON error envelope.
 * This is the only place where errors become HTTP responses.
 */
export function respondWithError(c: Context, err: AppError): Response {
  const { code, message, statusCode } = err;
  const logMethod = statusCode >= 500 ? 'error' : 'warn';
  logger[logMethod]({ err, statusCode, requestId: c.get('requestId') }, `AppError: ${code}`);

  if (statusCode >= 500) {
    captureError(err);
  }

  return c.json({ error: { code, message, statusCode } }, statusCode as ContentfulStatusCode);
}

export function createHonoErrorHandler(): ErrorHandler {
  return (err, c) => {
    if (err instanceof AppError) {
      return respondWithError(c, err);
    }

    logger.error({ err }, 'Unhandled error');
    captureError(err);

    return c.json(
      { error: { code: 'INTERNAL_SERVER_ERROR', message: 'Internal Server Error', statusCode: 500 } },
      500
    );
  };
}
