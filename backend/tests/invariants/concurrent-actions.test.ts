/**
 * Concurrent Mutation Invariant
 *
 * INVARIANT: actions on one escrow serialize on its row lock. The loser of
 * a race re-reads the committed status, so no transition is applied twice
 * and no ledger entry is written for a rejected action.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryLedgerStore } from '../../src/store/MemoryLedgerStore';
import { createEscrow, createTestContext, paystackEvent, signed, type TestContext } from '../helpers';

let ctx: TestContext;

beforeEach(() => {
  ctx = createTestContext();
});

describe('Concurrent direct actions', () => {
  it('two parallel fund calls both succeed with one fund entry', async () => {
    const id = await createEscrow(ctx.escrowService);

    const [a, b] = await Promise.all([ctx.escrowService.fund(id), ctx.escrowService.fund(id)]);

    expect(a.success && a.data.status).toBe('funding_pending');
    expect(b.success && b.data.status).toBe('funding_pending');
    expect(await ctx.store.listTransactions(id)).toHaveLength(1);
  });

  it('parallel releases: exactly one wins', async () => {
    const id = await createEscrow(ctx.escrowService);
    await ctx.escrowService.fund(id);

    const results = await Promise.all([
      ctx.escrowService.release(id),
      ctx.escrowService.release(id),
      ctx.escrowService.release(id),
    ]);

    expect(results.filter((result) => result.success)).toHaveLength(1);
    const rejected = results.filter((result) => !result.success);
    expect(rejected.map((result) => (result.success ? null : result.error.code))).toEqual(['INVALID_STATE', 'INVALID_STATE']);
    const releases = (await ctx.store.listTransactions(id)).filter((entry) => entry.kind === 'release');
    expect(releases).toHaveLength(1);
  });

  it('dispute racing release leaves one consistent outcome', async () => {
    const id = await createEscrow(ctx.escrowService);
    await ctx.escrowService.fund(id);

    const [release, dispute] = await Promise.all([ctx.escrowService.release(id), ctx.escrowService.dispute(id)]);

    // Exactly one of the two can apply; the other sees the winner's status
    expect([release.success, dispute.success].filter(Boolean)).toHaveLength(1);
    const status = (await ctx.store.findEscrow(id))?.status;
    const releases = (await ctx.store.listTransactions(id)).filter((entry) => entry.kind === 'release');
    if (release.success) {
      expect(status).toBe('released');
      expect(releases).toHaveLength(1);
    } else {
      expect(status).toBe('disputed');
      expect(releases).toHaveLength(0);
    }
  });

  it('different escrows proceed independently', async () => {
    const ids = await Promise.all([1, 2, 3].map(() => createEscrow(ctx.escrowService)));

    const results = await Promise.all(ids.map((id) => ctx.escrowService.fund(id)));

    expect(results.every((result) => result.success)).toBe(true);
    for (const id of ids) {
      expect(await ctx.store.listTransactions(id)).toHaveLength(1);
    }
  });
});

describe('Direct action racing a provider event', () => {
  it('release and charge.success converge on released with one release entry', async () => {
    const id = await createEscrow(ctx.escrowService);
    await ctx.escrowService.fund(id);
    const { rawBody, signature } = signed(paystackEvent({ id: 'evt_conc', reference: 'ref_conc', escrowId: id }));

    const [release, webhook] = await Promise.all([
      ctx.escrowService.release(id),
      ctx.webhookService.handle(rawBody, signature),
    ]);

    expect(release.success).toBe(true);
    expect(webhook.success).toBe(true);
    expect((await ctx.store.findEscrow(id))?.status).toBe('released');
    const kinds = (await ctx.store.listTransactions(id)).map((entry) => entry.kind);
    expect(kinds.filter((kind) => kind === 'release')).toHaveLength(1);
  });
});

describe('Lock wait timeout', () => {
  it('a blocked direct action fails with LOCK_TIMEOUT and changes nothing', async () => {
    const short = createTestContext(new MemoryLedgerStore({ lockTimeoutMs: 50 }));
    const id = await createEscrow(short.escrowService);
    await short.escrowService.fund(id);

    let open: () => void = () => undefined;
    const opened = new Promise<void>((resolve) => {
      open = resolve;
    });
    const holder = short.store.transaction(async (unit) => {
      await unit.getForUpdate(id);
      await opened;
    });

    const [fund, release] = await Promise.all([short.escrowService.fund(id), short.escrowService.release(id)]);

    expect(fund.success ? null : { code: fund.error.code, statusCode: fund.error.statusCode }).toEqual({
      code: 'LOCK_TIMEOUT',
      statusCode: 503,
    });
    expect(release.success ? null : release.error.code).toBe('LOCK_TIMEOUT');

    open();
    await holder;
    expect((await short.store.findEscrow(id))?.status).toBe('funding_pending');
    expect((await short.store.listTransactions(id)).map((entry) => entry.kind)).toEqual(['fund']);
  });
});
