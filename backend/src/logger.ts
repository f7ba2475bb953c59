/**
 * Structured Logger v1.0.0
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 *
 * Usage:
 *   import { logger } from './logger';
 *   logger.info({ escrowId }, 'Escrow funded');
 *   logger.error({ err, escrowId }, 'Escrow release failed');
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'webhook' });
 */

import pino from 'pino';
import { config } from './config';

const isDev = config.app.isDevelopment;
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : isDev ? 'debug' : 'info'),

  // Redact sensitive fields from log output
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers["x-paystack-signature"]',
      'secret',
      'secretKey',
      'signature',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'escrow-ledger-api',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev && !isTest
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export const escrowLogger = logger.child({ module: 'escrow' });
export const webhookLogger = logger.child({ module: 'webhook' });
export const dbLogger = logger.child({ module: 'db' });
export const httpLogger = logger.child({ module: 'http' });
