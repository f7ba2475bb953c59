/**
 * Webhook Delivery Repository
 *
 * One row per (provider, event_id). The insert is the idempotency gate for
 * inbound provider events.
 */

import type { RepositoryContext } from './BaseRepository';
import type { InsertOutcome } from '../types';

export class WebhookDeliveryRepository {
  protected readonly tableName = 'webhook_deliveries';

  async insert(
    provider: string,
    eventId: string,
    signature: string | null,
    ctx: RepositoryContext
  ): Promise<InsertOutcome> {
    const result = await ctx.query<{ id: string }>(
      `INSERT INTO ${this.tableName} (provider, event_id, signature, received_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (provider, event_id) DO NOTHING
       RETURNING id`,
      [provider, eventId, signature]
    );
    return result.rowCount === 0 ? 'duplicate' : 'inserted';
  }
}
