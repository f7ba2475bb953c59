/**
 * Transaction Repository
 *
 * Data access for the append-only transactions ledger. Entries are written
 * once; this repository has no update or delete.
 * (kind, provider_ref) is unique; NULL refs never collide.
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import type { InsertOutcome, NewTransaction, Transaction, TransactionKind } from '../types';

export interface TransactionRow {
  id: string;
  escrow_id: string;
  kind: TransactionKind;
  provider: string | null;
  provider_ref: string | null;
  amount: string | number;
  created_at: Date | string;
}

export class TransactionRepository extends BaseRepository<Transaction, TransactionRow> {
  protected readonly tableName = 'transactions';

  protected fromRow(row: TransactionRow): Transaction {
    return {
      id: row.id,
      escrow_id: row.escrow_id,
      kind: row.kind,
      provider: row.provider,
      provider_ref: row.provider_ref,
      amount: Number(row.amount),
      created_at: new Date(row.created_at),
    };
  }

  async findByRef(
    kind: TransactionKind,
    providerRef: string,
    ctx: RepositoryContext
  ): Promise<Transaction | null> {
    const result = await ctx.query<TransactionRow>(
      `SELECT * FROM ${this.tableName} WHERE kind = $1 AND provider_ref = $2 LIMIT 1`,
      [kind, providerRef]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }

  async findByEscrow(escrowId: string, ctx: RepositoryContext): Promise<Transaction[]> {
    const result = await ctx.query<TransactionRow>(
      `SELECT * FROM ${this.tableName} WHERE escrow_id = $1 ORDER BY created_at ASC, id ASC`,
      [escrowId]
    );
    return result.rows.map((row) => this.fromRow(row));
  }

  /**
   * Append an entry. A conflicting (kind, provider_ref) is reported, not thrown.
   */
  async insert(entry: NewTransaction, ctx: RepositoryContext): Promise<InsertOutcome> {
    const result = await ctx.query<{ id: string }>(
      `INSERT INTO ${this.tableName} (id, escrow_id, kind, provider, provider_ref, amount, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW())
       ON CONFLICT DO NOTHING
       RETURNING id`,
      [entry.id, entry.escrow_id, entry.kind, entry.provider, entry.provider_ref, entry.amount]
    );
    return result.rowCount === 0 ? 'duplicate' : 'inserted';
  }
}
