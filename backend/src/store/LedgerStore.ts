/**
 * Ledger Store contract
 *
 * Owns all persisted escrow state. Every mutation happens inside one
 * `transaction()` unit: either all of its writes persist or none do.
 *
 * `getForUpdate` takes an exclusive lock on one escrow row that is held
 * until the unit commits or rolls back; the unit itself is the release token.
 * Units for the same escrow id serialize, units for different ids never
 * block each other. A lock wait longer than the configured bound rejects
 * with `LockTimeoutError`.
 */

import type {
  Escrow,
  EscrowStatus,
  InsertOutcome,
  NewEscrow,
  NewTransaction,
  Transaction,
  TransactionKind,
} from '../types';

export interface LedgerUnit {
  insertEscrow(escrow: NewEscrow): Promise<Escrow>;
  getForUpdate(escrowId: string): Promise<Escrow | null>;
  updateStatus(escrowId: string, status: EscrowStatus): Promise<Escrow>;
  findTransactionByRef(kind: TransactionKind, providerRef: string): Promise<Transaction | null>;
  insertTransaction(entry: NewTransaction): Promise<InsertOutcome>;
  insertWebhookDelivery(provider: string, eventId: string, signature: string | null): Promise<InsertOutcome>;
}

export interface LedgerStore {
  transaction<T>(fn: (unit: LedgerUnit) => Promise<T>): Promise<T>;
  findEscrow(escrowId: string): Promise<Escrow | null>;
  listTransactions(escrowId: string): Promise<Transaction[]>;
  healthCheck(): Promise<{ connected: boolean; latencyMs: number }>;
  close(): Promise<void>;
}
