/**
 * Escrow Repository
 *
 * Data access layer for the escrows table. Status is the only column that
 * changes after insert; amount and parties are immutable.
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import { ESCROW_STATUSES, type Escrow, type EscrowStatus, type JsonValue, type NewEscrow } from '../types';

export interface EscrowRow {
  id: string;
  title: string;
  amount: string | number; // BIGINT arrives as string
  currency: string;
  buyer_id: string;
  seller_id: string;
  status: string;
  metadata: JsonValue; // jsonb arrives parsed
  created_at: Date | string;
  updated_at: Date | string;
}

function parseStatus(value: string): EscrowStatus {
  const status = ESCROW_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown escrow status in storage: ${value}`);
  }
  return status;
}

export class EscrowRepository extends BaseRepository<Escrow, EscrowRow> {
  protected readonly tableName = 'escrows';

  protected fromRow(row: EscrowRow): Escrow {
    return {
      id: row.id,
      title: row.title,
      amount: Number(row.amount),
      currency: row.currency,
      buyer_id: row.buyer_id,
      seller_id: row.seller_id,
      status: parseStatus(row.status),
      metadata: row.metadata ?? {},
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at),
    };
  }

  /**
   * Lock the escrow row until the enclosing transaction ends.
   */
  async findForUpdate(escrowId: string, ctx: RepositoryContext): Promise<Escrow | null> {
    const result = await ctx.query<EscrowRow>(
      `SELECT * FROM ${this.tableName} WHERE id = $1 FOR UPDATE`,
      [escrowId]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }

  /**
   * Create a new escrow record in status `created`.
   */
  async create(data: NewEscrow, ctx: RepositoryContext): Promise<Escrow> {
    const result = await ctx.query<EscrowRow>(
      `INSERT INTO ${this.tableName} (
        id, title, amount, currency, buyer_id, seller_id, status, metadata, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, 'created', $7::jsonb, NOW(), NOW())
      RETURNING *`,
      [
        data.id,
        data.title,
        data.amount,
        data.currency,
        data.buyer_id,
        data.seller_id,
        JSON.stringify(data.metadata),
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Insert of escrow ${data.id} returned no row`);
    }
    return this.fromRow(row);
  }

  /**
   * Update escrow status and refresh updated_at.
   */
  async updateStatus(
    escrowId: string,
    status: EscrowStatus,
    ctx: RepositoryContext
  ): Promise<Escrow | null> {
    const result = await ctx.query<EscrowRow>(
      `UPDATE ${this.tableName} SET status = $1, updated_at = NOW() WHERE id = $2 RETURNING *`,
      [status, escrowId]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }
}
