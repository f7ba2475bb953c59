/**
 * Transaction Recorder Unit Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { record } from '../../src/services/TransactionRecorder';
import { MemoryLedgerStore } from '../../src/store/MemoryLedgerStore';
import type { LedgerUnit } from '../../src/store/LedgerStore';
import type { InsertOutcome, NewTransaction, Transaction } from '../../src/types';

let store: MemoryLedgerStore;
let escrowId: string;

beforeEach(async () => {
  store = new MemoryLedgerStore();
  escrowId = 'esc_recorder';
  await store.transaction((unit) =>
    unit.insertEscrow({
      id: escrowId,
      title: 'Recorder',
      amount: 700,
      currency: 'NGN',
      buyer_id: 'b1',
      seller_id: 's1',
      metadata: {},
    })
  );
});

describe('record', () => {
  it('inserts an entry and returns its id', async () => {
    const result = await store.transaction((unit) =>
      record(unit, { escrowId, kind: 'fund', provider: 'paystack', providerRef: 'ref_1', amount: 700 })
    );

    expect(result.status).toBe('recorded');
    const entries = await store.listTransactions(escrowId);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      escrow_id: escrowId,
      kind: 'fund',
      provider: 'paystack',
      provider_ref: 'ref_1',
      amount: 700,
    });
    expect(result.status === 'recorded' && result.transactionId).toBe(entries[0]?.id);
    expect(entries[0]?.id.startsWith('tx_')).toBe(true);
  });

  it('is a no-op for a repeated (kind, provider_ref)', async () => {
    const params = { escrowId, kind: 'fund' as const, provider: 'paystack', providerRef: 'ref_1', amount: 700 };
    const first = await store.transaction((unit) => record(unit, params));
    const second = await store.transaction((unit) => record(unit, params));

    expect(second).toEqual({
      status: 'already_recorded',
      transactionId: first.transactionId,
    });
    expect(await store.listTransactions(escrowId)).toHaveLength(1);
  });

  it('records the same ref under a different kind', async () => {
    await store.transaction((unit) =>
      record(unit, { escrowId, kind: 'fund', provider: 'paystack', providerRef: 'ref_1', amount: 700 })
    );
    const refund = await store.transaction((unit) =>
      record(unit, { escrowId, kind: 'refund', provider: 'paystack', providerRef: 'ref_1', amount: 700 })
    );

    expect(refund.status).toBe('recorded');
    expect(await store.listTransactions(escrowId)).toHaveLength(2);
  });

  it('always inserts when there is no provider ref', async () => {
    const params = { escrowId, kind: 'release' as const, provider: null, providerRef: null, amount: 700 };
    await store.transaction((unit) => record(unit, params));
    const second = await store.transaction((unit) => record(unit, params));

    expect(second.status).toBe('recorded');
    expect(await store.listTransactions(escrowId)).toHaveLength(2);
  });

  it('reports already_recorded when the insert loses a race after the lookup', async () => {
    const inserted: NewTransaction[] = [];
    const unit: LedgerUnit = {
      insertEscrow: () => Promise.reject(new Error('unused')),
      getForUpdate: () => Promise.resolve(null),
      updateStatus: () => Promise.reject(new Error('unused')),
      findTransactionByRef: (): Promise<Transaction | null> => Promise.resolve(null),
      insertTransaction: (entry): Promise<InsertOutcome> => {
        inserted.push(entry);
        return Promise.resolve('duplicate');
      },
      insertWebhookDelivery: () => Promise.resolve('inserted'),
    };

    const result = await record(unit, { escrowId, kind: 'fund', provider: 'paystack', providerRef: 'ref_race', amount: 1 });

    expect(result).toEqual({ status: 'already_recorded', transactionId: null });
    expect(inserted).toHaveLength(1);
  });
});
