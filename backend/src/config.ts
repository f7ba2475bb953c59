/**
 * Escrow Ledger Configuration v1.0.0
 *
 * Centralized configuration for all backend services.
 * Values come from the environment (see .env.example); services receive
 * what they need through their constructors and never read process.env.
 */

import 'dotenv/config';

export type LedgerStoreKind = 'postgres' | 'memory';

function parseStoreKind(value: string | undefined): LedgerStoreKind {
  return value === 'memory' ? 'memory' : 'postgres';
}

export const config = {
  app: {
    name: 'Escrow Ledger API',
    port: parseInt(process.env.PORT || '3000', 10),
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV !== 'production',
    isProduction: process.env.NODE_ENV === 'production',
  },

  // Ledger storage (PostgreSQL via Neon driver, or in-process for local runs)
  database: {
    store: parseStoreKind(process.env.LEDGER_STORE),
    url: process.env.DATABASE_URL || '',
    maxConnections: 10,
    // Row lock waits longer than this abort the unit with a retryable error
    lockTimeoutMs: parseInt(process.env.DB_LOCK_TIMEOUT_MS || '5000', 10),
  },

  // Payments (Paystack)
  paystack: {
    provider: 'paystack',
    secretKey: process.env.PAYSTACK_SECRET_KEY || '',
    checkoutBaseUrl: process.env.CHECKOUT_BASE_URL || 'https://pay.example/checkout/',
  },

  // Error tracking
  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.NODE_ENV || 'development',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
  },
};

export type Config = typeof config;

export default config;
