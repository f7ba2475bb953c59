/**
 * Escrow Ledger Server v1.0.0
 *
 * Process bootstrap: owns the storage handle and passes it to every
 * component explicitly.
 *
 * Architecture:
 * - Hono for HTTP handling (@hono/node-server)
 * - Neon PostgreSQL ledger store, or the in-process store (LEDGER_STORE=memory)
 * - Pino logging, Sentry error tracking, Prometheus metrics
 */

// Sentry must be imported first to capture all errors
import { Sentry } from './sentry';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { config } from './config';
import { createDatabase, createPool } from './db';
import { ConfigurationError } from './lib/errors';
import { GracefulShutdown } from './lib/shutdown';
import { logger } from './logger';
import { EscrowService } from './services/EscrowService';
import { PaystackWebhookService } from './services/PaystackWebhookService';
import type { LedgerStore } from './store/LedgerStore';
import { MemoryLedgerStore } from './store/MemoryLedgerStore';
import { PgLedgerStore } from './store/PgLedgerStore';

function createStore(): LedgerStore {
  const { store, url, maxConnections, lockTimeoutMs } = config.database;

  if (store === 'memory') {
    logger.warn('Using in-process ledger store; data is lost on restart');
    return new MemoryLedgerStore({ lockTimeoutMs });
  }

  if (!url) {
    throw new ConfigurationError('DATABASE_URL is required when LEDGER_STORE=postgres', 'MISSING_DATABASE_URL');
  }
  return new PgLedgerStore(createDatabase(createPool(url, maxConnections)), { lockTimeoutMs });
}

async function startServer(): Promise<void> {
  const store = createStore();

  const storage = await store.healthCheck();
  if (!storage.connected) {
    logger.error({ storage }, 'Ledger store unreachable at startup');
  }

  if (!config.paystack.secretKey) {
    logger.warn('PAYSTACK_SECRET_KEY not set; webhook deliveries will be rejected');
  }

  const escrowService = new EscrowService({
    store,
    fundingProvider: config.paystack.provider,
    checkoutBaseUrl: config.paystack.checkoutBaseUrl,
  });
  const webhookService = new PaystackWebhookService({
    store,
    secretKey: config.paystack.secretKey,
    provider: config.paystack.provider,
  });

  const app = createApp({ store, escrowService, webhookService });

  const httpServer = serve({
    fetch: app.fetch,
    port: config.app.port,
  });

  const shutdown = new GracefulShutdown();
  shutdown.registerDefaults({ httpServer, store });
  shutdown.setup();

  logger.info({
    port: config.app.port,
    env: config.app.env,
    store: config.database.store,
  }, `Escrow ledger listening on http://localhost:${config.app.port}`);
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  Sentry.captureException(reason);
});

process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught exception, shutting down');
  Sentry.captureException(error);
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), 2000);
});

startServer().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
