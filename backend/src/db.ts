/**
 * Escrow Ledger Database Client v1.0.0
 *
 * Uses the Neon PostgreSQL serverless driver (pg-compatible Pool over WebSocket).
 * The pool is created by the process bootstrap and handed to the ledger store;
 * nothing in this module holds a global connection.
 *
 * @see backend/database/schema.sql
 */

import { Pool, neonConfig } from '@neondatabase/serverless';
import ws from 'ws';
import { dbLogger } from './logger';

// Enable WebSocket for Neon serverless
neonConfig.webSocketConstructor = ws;

// ============================================================================
// POSTGRES ERROR CODES
// ============================================================================

export const PG_ERROR_CODES = {
  LOCK_NOT_AVAILABLE: '55P03',
} as const;

export interface DatabaseError extends Error {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Check if error is a lock wait that exceeded lock_timeout
 */
export function isLockTimeout(error: unknown): error is DatabaseError {
  return errorCode(error) === PG_ERROR_CODES.LOCK_NOT_AVAILABLE;
}

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T = Record<string, unknown>>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

/** The slice of a pg-compatible pool client this module relies on. */
export interface PoolClientLike {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  release(): void;
}

export interface PoolLike {
  connect(): Promise<PoolClientLike>;
  end(): Promise<void>;
}

export interface TransactionOptions {
  /** Upper bound for any row-lock wait inside the transaction. */
  lockTimeoutMs?: number;
}

export interface DatabaseClient {
  query: QueryFn;
  transaction<T>(fn: (query: QueryFn) => Promise<T>, options?: TransactionOptions): Promise<T>;
  healthCheck(): Promise<{ connected: boolean; latencyMs: number }>;
  close(): Promise<void>;
}

export function createPool(connectionString: string, max: number = 10): PoolLike {
  return new Pool({
    connectionString,
    max,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });
}

function bindQuery(client: PoolClientLike): QueryFn {
  return async <T = Record<string, unknown>>(sql: string, params?: unknown[]) => {
    const result = await client.query(sql, params);
    return {
      rows: result.rows as T[],
      rowCount: result.rowCount ?? 0,
    };
  };
}

export function createDatabase(pool: PoolLike): DatabaseClient {
  const db: DatabaseClient = {
    /**
     * Execute a single SQL statement on a pooled connection
     */
    query: async <T = Record<string, unknown>>(sql: string, params?: unknown[]) => {
      const client = await pool.connect();
      try {
        return await bindQuery(client)<T>(sql, params);
      } finally {
        client.release();
      }
    },

    /**
     * Execute queries within a transaction.
     * Row locks taken with SELECT ... FOR UPDATE are held until COMMIT/ROLLBACK.
     */
    transaction: async <T>(fn: (query: QueryFn) => Promise<T>, options?: TransactionOptions) => {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        if (options?.lockTimeoutMs !== undefined) {
          await client.query("SELECT set_config('lock_timeout', $1, true)", [
            `${options.lockTimeoutMs}ms`,
          ]);
        }

        const result = await fn(bindQuery(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          dbLogger.error(
            { originalError: error, rollbackError },
            'ROLLBACK failed - original error may be lost'
          );
        }
        throw error;
      } finally {
        client.release();
      }
    },

    /**
     * Health check - verify database connection
     */
    healthCheck: async () => {
      const start = Date.now();
      try {
        await db.query('SELECT 1');
        return { connected: true, latencyMs: Date.now() - start };
      } catch (error) {
        dbLogger.warn({ err: error }, 'Database health check failed');
        return { connected: false, latencyMs: Date.now() - start };
      }
    },

    /**
     * Close all connections (for graceful shutdown)
     */
    close: async () => {
      await pool.end();
      dbLogger.info('Database pool closed');
    },
  };

  return db;
}
