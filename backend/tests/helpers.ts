/**
 * Shared test fixtures: an in-process ledger, services wired to it,
 * and signed Paystack deliveries.
 */

import { createApp } from '../src/app';
import { EscrowService } from '../src/services/EscrowService';
import { PaystackWebhookService, computeSignature } from '../src/services/PaystackWebhookService';
import { MemoryLedgerStore } from '../src/store/MemoryLedgerStore';
import type { LedgerStore } from '../src/store/LedgerStore';

export const TEST_SECRET = 'test-secret';
export const CHECKOUT_BASE_URL = 'https://pay.example/checkout/';

export interface TestContext {
  store: LedgerStore;
  escrowService: EscrowService;
  webhookService: PaystackWebhookService;
}

export function createTestContext(store: LedgerStore = new MemoryLedgerStore({ lockTimeoutMs: 1000 })): TestContext {
  return {
    store,
    escrowService: new EscrowService({
      store,
      fundingProvider: 'paystack',
      checkoutBaseUrl: CHECKOUT_BASE_URL,
    }),
    webhookService: new PaystackWebhookService({ store, secretKey: TEST_SECRET }),
  };
}

export function createTestApp(ctx: TestContext = createTestContext()) {
  return { ...ctx, app: createApp(ctx) };
}

export const validEscrowInput = {
  title: 'Logo design',
  amount: 5000,
  currency: 'usd',
  buyer_id: 'b1',
  seller_id: 's1',
};

/**
 * Create an escrow and return its id, failing the test on error.
 */
export async function createEscrow(service: EscrowService, input: Record<string, unknown> = validEscrowInput): Promise<string> {
  const result = await service.createEscrow(input);
  if (!result.success) {
    throw result.error;
  }
  return result.data.id;
}

export interface PaystackEventOptions {
  event?: string;
  id?: string | number;
  reference?: string;
  amount?: number;
  escrowId?: string;
}

export function paystackEvent({
  event = 'charge.success',
  id,
  reference,
  amount = 500000,
  escrowId,
}: PaystackEventOptions): string {
  return JSON.stringify({
    event,
    data: {
      id,
      reference,
      amount,
      metadata: escrowId === undefined ? undefined : { escrow_id: escrowId },
    },
  });
}

export function signed(body: string, secret: string = TEST_SECRET): { rawBody: Buffer; signature: string } {
  const rawBody = Buffer.from(body, 'utf8');
  return { rawBody, signature: computeSignature(rawBody, secret) };
}
