/**
 * Base Repository Pattern
 *
 * Provides a standard interface for data access, decoupling the ledger store
 * from raw SQL. Every call takes a QueryFn so it can run inside a transaction.
 */

import type { QueryFn } from '../db';

/**
 * Context for repository operations.
 * Pass a transaction-scoped query function to run within a transaction.
 */
export interface RepositoryContext {
  query: QueryFn;
}

/**
 * Abstract base repository with primary-key lookup.
 * Subclasses define the table name, the row shape and the row mapping.
 */
export abstract class BaseRepository<T, Row extends object, ID = string> {
  protected abstract readonly tableName: string;

  protected abstract fromRow(row: Row): T;

  /**
   * Find a single record by primary key.
   */
  async findById(id: ID, ctx: RepositoryContext): Promise<T | null> {
    const result = await ctx.query<Row>(
      `SELECT * FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }
}
