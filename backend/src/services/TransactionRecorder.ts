/**
 * TransactionRecorder
 *
 * Appends one immutable ledger entry per state-changing event, inside the
 * caller's unit. When a provider ref is present, (kind, provider_ref) is the
 * idempotency key: a second record for the same key is a no-op reported as
 * `already_recorded`. Entries without a ref always insert.
 */

import { newId } from '../lib/ids';
import type { LedgerUnit } from '../store/LedgerStore';
import type { TransactionKind } from '../types';

export interface RecordParams {
  escrowId: string;
  kind: TransactionKind;
  provider: string | null;
  providerRef: string | null;
  amount: number;
}

export type RecordResult =
  | { status: 'recorded'; transactionId: string }
  | { status: 'already_recorded'; transactionId: string | null };

export async function record(unit: LedgerUnit, params: RecordParams): Promise<RecordResult> {
  const { escrowId, kind, provider, providerRef, amount } = params;

  if (providerRef !== null) {
    const existing = await unit.findTransactionByRef(kind, providerRef);
    if (existing) {
      return { status: 'already_recorded', transactionId: existing.id };
    }
  }

  const transactionId = newId('tx_');
  const outcome = await unit.insertTransaction({
    id: transactionId,
    escrow_id: escrowId,
    kind,
    provider,
    provider_ref: providerRef,
    amount,
  });

  // Lost a race with another unit between the lookup and the insert
  if (outcome === 'duplicate') {
    return { status: 'already_recorded', transactionId: null };
  }

  return { status: 'recorded', transactionId };
}

export const TransactionRecorder = {
  record,
};

export default TransactionRecorder;
