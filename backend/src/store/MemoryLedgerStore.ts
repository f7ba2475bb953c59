/**
 * In-Memory Ledger Store
 *
 * In-process implementation for tests and local development
 * (LEDGER_STORE=memory). Mirrors the Postgres store's guarantees:
 * - per-escrow exclusive locks held until the unit ends, with bounded wait
 * - writes staged in the unit and applied only on commit
 * - unique (kind, provider_ref) and (provider, event_id)
 *
 * A unique key inserted by a still-open unit counts as taken for everyone
 * else; it is freed again if that unit rolls back.
 */

import { LockTimeoutError, toAppError } from '../lib/errors';
import type {
  Escrow,
  EscrowStatus,
  InsertOutcome,
  NewEscrow,
  NewTransaction,
  Transaction,
  TransactionKind,
  WebhookDelivery,
} from '../types';
import type { LedgerStore, LedgerUnit } from './LedgerStore';

export interface MemoryLedgerStoreOptions {
  lockTimeoutMs?: number;
}

type Release = () => void;

/**
 * FIFO mutex per key. Waiters queue behind the current holder.
 */
class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async acquire(key: string, timeoutMs: number): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let releaseSlot: Release = () => undefined;
    const slot = new Promise<void>((resolve) => {
      releaseSlot = resolve;
    });
    const tail = previous.then(() => slot);
    this.tails.set(key, tail);

    let timer: NodeJS.Timeout | undefined;
    const acquired = await Promise.race([
      previous.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (!acquired) {
      // Give up our place in line without letting followers overtake the holder.
      void previous.then(releaseSlot);
      throw new LockTimeoutError(key);
    }

    return () => {
      releaseSlot();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}

const txKey = (kind: TransactionKind, providerRef: string) => `${kind}:${providerRef}`;
const deliveryKey = (provider: string, eventId: string) => `${provider}:${eventId}`;

export class MemoryLedgerStore implements LedgerStore {
  private readonly escrows = new Map<string, Escrow>();
  private readonly transactions: Transaction[] = [];
  private readonly txKeys = new Set<string>();
  private readonly deliveryKeys = new Set<string>();
  private readonly deliveries: WebhookDelivery[] = [];
  private readonly locks = new KeyedMutex();
  private readonly lockTimeoutMs: number;

  constructor(options: MemoryLedgerStoreOptions = {}) {
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
  }

  async transaction<T>(fn: (unit: LedgerUnit) => Promise<T>): Promise<T> {
    const held = new Map<string, Release>();
    const stagedEscrows = new Map<string, Escrow>();
    const stagedTransactions: Transaction[] = [];
    const stagedDeliveries: WebhookDelivery[] = [];
    const reservedTxKeys: string[] = [];
    const reservedDeliveryKeys: string[] = [];

    const read = (escrowId: string): Escrow | undefined =>
      stagedEscrows.get(escrowId) ?? this.escrows.get(escrowId);

    const unit: LedgerUnit = {
      insertEscrow: async (escrow: NewEscrow) => {
        if (read(escrow.id)) {
          throw new Error(`Escrow ${escrow.id} already exists`);
        }
        const now = new Date();
        const row: Escrow = { ...structuredClone(escrow), status: 'created', created_at: now, updated_at: now };
        stagedEscrows.set(row.id, row);
        return structuredClone(row);
      },

      getForUpdate: async (escrowId: string) => {
        if (!held.has(escrowId)) {
          held.set(escrowId, await this.locks.acquire(escrowId, this.lockTimeoutMs));
        }
        const row = read(escrowId);
        return row ? structuredClone(row) : null;
      },

      updateStatus: async (escrowId: string, status: EscrowStatus) => {
        const row = read(escrowId);
        if (!row) {
          throw new Error(`Escrow ${escrowId} disappeared while locked`);
        }
        const updated: Escrow = { ...row, status, updated_at: new Date() };
        stagedEscrows.set(escrowId, updated);
        return structuredClone(updated);
      },

      findTransactionByRef: async (kind: TransactionKind, providerRef: string) => {
        const match = [...this.transactions, ...stagedTransactions].find(
          (entry) => entry.kind === kind && entry.provider_ref === providerRef
        );
        return match ? { ...match } : null;
      },

      insertTransaction: async (entry: NewTransaction): Promise<InsertOutcome> => {
        if (entry.provider_ref !== null) {
          const key = txKey(entry.kind, entry.provider_ref);
          if (this.txKeys.has(key)) {
            return 'duplicate';
          }
          this.txKeys.add(key);
          reservedTxKeys.push(key);
        }
        stagedTransactions.push({ ...entry, created_at: new Date() });
        return 'inserted';
      },

      insertWebhookDelivery: async (provider: string, eventId: string, signature: string | null): Promise<InsertOutcome> => {
        const key = deliveryKey(provider, eventId);
        if (this.deliveryKeys.has(key)) {
          return 'duplicate';
        }
        this.deliveryKeys.add(key);
        reservedDeliveryKeys.push(key);
        stagedDeliveries.push({ provider, event_id: eventId, signature, received_at: new Date() });
        return 'inserted';
      },
    };

    try {
      const result = await fn(unit);

      // COMMIT
      for (const [id, row] of stagedEscrows) {
        this.escrows.set(id, row);
      }
      this.transactions.push(...stagedTransactions);
      this.deliveries.push(...stagedDeliveries);
      return result;
    } catch (error) {
      // ROLLBACK
      for (const key of reservedTxKeys) this.txKeys.delete(key);
      for (const key of reservedDeliveryKeys) this.deliveryKeys.delete(key);
      throw toAppError(error);
    } finally {
      for (const release of held.values()) {
        release();
      }
    }
  }

  async findEscrow(escrowId: string): Promise<Escrow | null> {
    const row = this.escrows.get(escrowId);
    return row ? structuredClone(row) : null;
  }

  async listTransactions(escrowId: string): Promise<Transaction[]> {
    return this.transactions
      .filter((entry) => entry.escrow_id === escrowId)
      .map((entry) => ({ ...entry }));
  }

  /** Committed webhook deliveries, oldest first. */
  async listWebhookDeliveries(): Promise<WebhookDelivery[]> {
    return this.deliveries.map((delivery) => ({ ...delivery }));
  }

  async healthCheck(): Promise<{ connected: boolean; latencyMs: number }> {
    return { connected: true, latencyMs: 0 };
  }

  async close(): Promise<void> {
    this.escrows.clear();
    this.transactions.length = 0;
    this.txKeys.clear();
    this.deliveryKeys.clear();
    this.deliveries.length = 0;
  }
}
