/**
 * Validator Unit Tests
 *
 * Create-escrow payload and Paystack envelope parsing.
 */
import { describe, it, expect } from 'vitest';
import { parseCreateEscrow, webhookEnvelopeSchema } from '../../src/lib/validators';

const base = {
  title: 'Logo design',
  amount: 5000,
  currency: 'usd',
  buyer_id: 'b1',
  seller_id: 's1',
};

describe('parseCreateEscrow', () => {
  it('accepts a complete payload and upper-cases the currency', () => {
    const result = parseCreateEscrow(base);
    expect(result).toEqual({
      success: true,
      data: { ...base, currency: 'USD', metadata: {} },
    });
  });

  it('keeps structured metadata', () => {
    const result = parseCreateEscrow({ ...base, metadata: { plan: 'basic', tags: ['a', 1], nested: { ok: true } } });
    expect(result.success && result.data.metadata).toEqual({ plan: 'basic', tags: ['a', 1], nested: { ok: true } });
  });

  it.each([
    ['an array', ['a', 'b']],
    ['a string', 'note'],
    ['a number', 42],
  ])('keeps %s as metadata unchanged', (_label, metadata) => {
    const result = parseCreateEscrow({ ...base, metadata });
    expect(result).toEqual({ success: true, data: { ...base, currency: 'USD', metadata } });
  });

  it('treats null metadata as empty', () => {
    const result = parseCreateEscrow({ ...base, metadata: null });
    expect(result.success && result.data.metadata).toEqual({});
  });

  it('coerces integer strings for amount', () => {
    const result = parseCreateEscrow({ ...base, amount: '1200' });
    expect(result.success && result.data.amount).toBe(1200);
  });

  for (const field of ['title', 'amount', 'currency', 'buyer_id', 'seller_id'] as const) {
    it(`reports a missing ${field} by name`, () => {
      const { [field]: _omitted, ...rest } = base;
      const result = parseCreateEscrow(rest);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(`missing_field:${field}`);
        expect(result.error.statusCode).toBe(422);
      }
    });
  }

  it('reports an empty string as missing', () => {
    const result = parseCreateEscrow({ ...base, seller_id: '' });
    expect(!result.success && result.error.message).toBe('missing_field:seller_id');
  });

  it('reports the first missing field in declaration order', () => {
    const result = parseCreateEscrow({ title: 'x' });
    expect(!result.success && result.error.message).toBe('missing_field:amount');
  });

  it('rejects a negative amount', () => {
    const result = parseCreateEscrow({ ...base, amount: -1 });
    expect(!result.success && result.error.code).toBe('VALIDATION_ERROR');
    expect(!result.success && result.error.message).toBe('amount: must not be negative');
  });

  it('rejects a fractional amount', () => {
    const result = parseCreateEscrow({ ...base, amount: 10.5 });
    expect(!result.success && result.error.message).toBe('amount: must be an integer');
  });

  it('rejects non-object bodies', () => {
    for (const input of [null, 'text', 42, ['a']]) {
      const result = parseCreateEscrow(input);
      expect(!result.success && result.error.message).toBe('Request body must be a JSON object');
    }
  });
});

describe('webhookEnvelopeSchema', () => {
  it('reads event, id, reference, amount and escrow id', () => {
    const parsed = webhookEnvelopeSchema.parse({
      event: 'charge.success',
      data: { id: 123, reference: 'ref_1', amount: '500000', metadata: { escrow_id: 'esc_1' } },
    });
    expect(parsed.event).toBe('charge.success');
    expect(parsed.data?.id).toBe('123');
    expect(parsed.data?.reference).toBe('ref_1');
    expect(parsed.data?.amount).toBe(500000);
    expect(parsed.data?.metadata?.escrow_id).toBe('esc_1');
  });

  it('treats wrongly typed fields as absent', () => {
    const parsed = webhookEnvelopeSchema.parse({ event: 7, data: { id: { nested: true }, metadata: 'x' } });
    expect(parsed.event).toBeUndefined();
    expect(parsed.data?.id).toBeUndefined();
    expect(parsed.data?.metadata).toBeUndefined();
  });

  it('drops amounts that are not safe non-negative integers', () => {
    const amountOf = (amount: unknown) => webhookEnvelopeSchema.parse({ data: { amount } }).data?.amount;

    expect(amountOf(Infinity)).toBeUndefined();
    expect(amountOf(2 ** 60)).toBeUndefined();
    expect(amountOf(12.5)).toBeUndefined();
    expect(amountOf(-1)).toBeUndefined();
    expect(amountOf(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
  });

  it('rejects a non-object envelope', () => {
    expect(webhookEnvelopeSchema.safeParse([1, 2]).success).toBe(false);
  });
});
