/**
 * Repository Layer
 *
 * Data access abstractions that keep SQL out of the ledger store.
 * Every call takes a RepositoryContext carrying the transaction's QueryFn:
 *
 *   await db.transaction(async (query) => {
 *     const escrow = await escrowRepository.findForUpdate(escrowId, { query });
 *     await escrowRepository.updateStatus(escrowId, 'funded', { query });
 *   });
 */

export { BaseRepository, type RepositoryContext } from './BaseRepository';
export { EscrowRepository, type EscrowRow } from './EscrowRepository';
export { TransactionRepository, type TransactionRow } from './TransactionRepository';
export { WebhookDeliveryRepository } from './WebhookDeliveryRepository';
