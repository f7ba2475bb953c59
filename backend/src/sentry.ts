/**
 * Sentry Error Tracking v1.0.0
 *
 * Initializes Sentry for error monitoring.
 * Must be imported BEFORE other modules in server.ts.
 *
 * Setup:
 *   1. Set SENTRY_DSN in .env
 *   2. Import this module at the very top of entry points
 */

import * as Sentry from '@sentry/node';
import { config } from './config';
import { logger } from './logger';

const dsn = config.sentry.dsn;

if (dsn) {
  Sentry.init({
    dsn,
    environment: config.sentry.environment,
    release: `escrow-ledger-api@${process.env.npm_package_version || '1.0.0'}`,
    tracesSampleRate: config.sentry.tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization'];
        delete event.request.headers['x-paystack-signature'];
      }
      return event;
    },

    enabled: config.app.isProduction || !!process.env.SENTRY_FORCE_ENABLE,

    ignoreErrors: [
      'ECONNRESET',
      'EPIPE',
      'AbortError',
    ],
  });

  logger.info('Sentry error tracking initialized');
} else {
  logger.debug('Sentry DSN not configured, error tracking disabled');
}

/**
 * Report an error to Sentry. No-op when Sentry was never initialized.
 */
export function captureError(error: unknown, extra?: Record<string, unknown>): void {
  try {
    Sentry.captureException(error, extra ? { extra } : undefined);
  } catch (sentryError) {
    logger.debug({ err: sentryError }, 'Sentry capture failed');
  }
}

export { Sentry };
