/**
 * PostgreSQL Ledger Store
 *
 * Each unit is one database transaction. `getForUpdate` issues
 * SELECT ... FOR UPDATE, so the row lock lives until COMMIT/ROLLBACK.
 * `lock_timeout` bounds the wait; Postgres reports 55P03 when it fires.
 *
 * @see backend/database/schema.sql
 */

import type { DatabaseClient } from '../db';
import { isLockTimeout } from '../db';
import { LockTimeoutError, toAppError } from '../lib/errors';
import {
  EscrowRepository,
  TransactionRepository,
  WebhookDeliveryRepository,
  type RepositoryContext,
} from '../repositories';
import type { Escrow, Transaction } from '../types';
import type { LedgerStore, LedgerUnit } from './LedgerStore';

export interface PgLedgerStoreOptions {
  lockTimeoutMs: number;
}

export class PgLedgerStore implements LedgerStore {
  private readonly escrows = new EscrowRepository();
  private readonly transactions = new TransactionRepository();
  private readonly deliveries = new WebhookDeliveryRepository();

  constructor(
    private readonly db: DatabaseClient,
    private readonly options: PgLedgerStoreOptions
  ) {}

  async transaction<T>(fn: (unit: LedgerUnit) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(
        (query) => fn(this.createUnit({ query })),
        { lockTimeoutMs: this.options.lockTimeoutMs }
      );
    } catch (error) {
      throw toAppError(error);
    }
  }

  async findEscrow(escrowId: string): Promise<Escrow | null> {
    try {
      return await this.escrows.findById(escrowId, { query: this.db.query });
    } catch (error) {
      throw toAppError(error);
    }
  }

  async listTransactions(escrowId: string): Promise<Transaction[]> {
    try {
      return await this.transactions.findByEscrow(escrowId, { query: this.db.query });
    } catch (error) {
      throw toAppError(error);
    }
  }

  healthCheck(): Promise<{ connected: boolean; latencyMs: number }> {
    return this.db.healthCheck();
  }

  close(): Promise<void> {
    return this.db.close();
  }

  private createUnit(ctx: RepositoryContext): LedgerUnit {
    return {
      insertEscrow: (escrow) => this.escrows.create(escrow, ctx),

      getForUpdate: async (escrowId) => {
        try {
          return await this.escrows.findForUpdate(escrowId, ctx);
        } catch (error) {
          if (isLockTimeout(error)) {
            throw new LockTimeoutError(escrowId);
          }
          throw error;
        }
      },

      updateStatus: async (escrowId, status) => {
        const updated = await this.escrows.updateStatus(escrowId, status, ctx);
        if (!updated) {
          throw new Error(`Escrow ${escrowId} disappeared while locked`);
        }
        return updated;
      },

      findTransactionByRef: (kind, providerRef) =>
        this.transactions.findByRef(kind, providerRef, ctx),

      insertTransaction: (entry) => this.transactions.insert(entry, ctx),

      insertWebhookDelivery: (provider, eventId, signature) =>
        this.deliveries.insert(provider, eventId, signature, ctx),
    };
  }
}
