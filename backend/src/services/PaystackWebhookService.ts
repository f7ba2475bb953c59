/**
 * PaystackWebhookService v1.0.0
 *
 * Reconciles escrow state with payment-provider events.
 *
 * Pipeline for one delivery:
 *   1. authenticate  HMAC-SHA512 of the raw body, constant-time compare
 *   2. parse         missing event type or id → ignored
 *   3. deduplicate   insert (provider, event_id); conflict → duplicate
 *   4. map           event type → mark_funded | mark_released | mark_refunded
 *   5. apply         same locked unit as direct actions, idempotent mark_* transitions,
 *                    ledger entry keyed by the provider reference
 *
 * Hard rules:
 * - Nothing is written before the signature checks out, so a corrected
 *   resend is never mistaken for a duplicate.
 * - The delivery row commits on its own before step 5. If step 5 fails the
 *   failure is logged for manual reconciliation and the delivery is still
 *   acknowledged: a provider retry would only hit the dedup gate.
 */

import { createHmac, timingSafeEqual } from 'crypto';
import {
  type AppError,
  ConfigurationError,
  MalformedEventError,
  SignatureInvalidError,
  toAppError,
} from '../lib/errors';
import { webhookEnvelopeSchema } from '../lib/validators';
import { webhookLogger } from '../logger';
import { webhookEventsTotal } from '../monitoring/metrics';
import type { LedgerStore } from '../store/LedgerStore';
import type { EscrowStatus, ProviderAction, ServiceResult, TransactionKind } from '../types';
import { transition } from './EscrowStateMachine';
import { record, type RecordResult } from './TransactionRecorder';

// ============================================================================
// TYPES
// ============================================================================

export interface PaystackWebhookServiceConfig {
  store: LedgerStore;
  secretKey: string;
  provider?: string;
}

export type IgnoreReason =
  | 'missing_event_fields'
  | 'unhandled_event_type'
  | 'missing_escrow_id'
  | 'unknown_escrow'
  | 'invalid_state'
  | 'apply_failed';

export type WebhookOutcome =
  | {
      status: 'processed';
      eventId: string;
      action: ProviderAction;
      escrowId: string;
      escrowStatus: EscrowStatus;
      changed: boolean;
      ledger: RecordResult['status'];
    }
  | { status: 'duplicate'; eventId: string }
  | { status: 'ignored'; reason: IgnoreReason; eventId?: string };

interface ProviderEvent {
  eventId: string;
  eventType: string;
  escrowId: string | null;
  reference: string;
  amount: number;
}

// ============================================================================
// EVENT MAP
// ============================================================================

export const PAYSTACK_EVENT_ACTIONS: ReadonlyMap<string, ProviderAction> = new Map<string, ProviderAction>([
  ['charge.success', 'mark_funded'],
  ['transfer.success', 'mark_released'],
  ['refund.processed', 'mark_refunded'],
]);

const ACTION_LEDGER_KIND: Record<ProviderAction, TransactionKind> = {
  mark_funded: 'fund',
  mark_released: 'release',
  mark_refunded: 'refund',
};

// ============================================================================
// SIGNATURE
// ============================================================================

export function computeSignature(rawBody: Buffer, secret: string): string {
  return createHmac('sha512', secret).update(rawBody).digest('hex');
}

/**
 * Constant-time comparison of the provider signature against our own.
 */
export function verifySignature(rawBody: Buffer, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const expected = Buffer.from(computeSignature(rawBody, secret), 'utf8');
  const provided = Buffer.from(signature, 'utf8');
  if (expected.length !== provided.length) return false;
  return timingSafeEqual(expected, provided);
}

// ============================================================================
// SERVICE
// ============================================================================

export class PaystackWebhookService {
  private readonly store: LedgerStore;
  private readonly secretKey: string;
  private readonly provider: string;

  constructor(config: PaystackWebhookServiceConfig) {
    this.store = config.store;
    this.secretKey = config.secretKey;
    this.provider = config.provider ?? 'paystack';
  }

  async handle(rawBody: Buffer, signature: string | undefined): Promise<ServiceResult<WebhookOutcome>> {
    if (rawBody.length === 0) {
      return this.fail(new MalformedEventError('Empty webhook body', 'EMPTY_BODY'));
    }
    if (!this.secretKey) {
      return this.fail(new ConfigurationError('Webhook secret not configured', 'MISSING_WEBHOOK_SECRET'));
    }

    // 1. Authenticate
    if (!verifySignature(rawBody, signature, this.secretKey)) {
      return this.fail(new SignatureInvalidError());
    }

    // 2. Parse
    const parsed = this.parse(rawBody);
    if (!parsed.success) {
      return this.fail(parsed.error);
    }
    const event = parsed.data;
    if (!event.eventType || !event.eventId) {
      return this.succeed({ status: 'ignored', reason: 'missing_event_fields' });
    }

    // 3. Deduplicate
    let delivery: 'inserted' | 'duplicate';
    try {
      delivery = await this.store.transaction((unit) =>
        unit.insertWebhookDelivery(this.provider, event.eventId, signature ?? null)
      );
    } catch (error) {
      return this.fail(toAppError(error));
    }
    if (delivery === 'duplicate') {
      webhookLogger.info({ eventId: event.eventId }, 'Duplicate webhook delivery');
      return this.succeed({ status: 'duplicate', eventId: event.eventId });
    }

    // 4. Map
    const action = PAYSTACK_EVENT_ACTIONS.get(event.eventType);
    if (!action) {
      webhookLogger.info({ eventId: event.eventId, eventType: event.eventType }, 'Unhandled webhook event type');
      return this.succeed({ status: 'ignored', reason: 'unhandled_event_type', eventId: event.eventId });
    }
    if (!event.escrowId) {
      return this.succeed({ status: 'ignored', reason: 'missing_escrow_id', eventId: event.eventId });
    }

    // 5. Apply
    try {
      return this.succeed(await this.apply(event, event.escrowId, action));
    } catch (error) {
      webhookLogger.error(
        {
          err: toAppError(error),
          eventId: event.eventId,
          eventType: event.eventType,
          escrowId: event.escrowId,
          needsManualReconciliation: true,
        },
        'Webhook apply failed after delivery was recorded'
      );
      return this.succeed({ status: 'ignored', reason: 'apply_failed', eventId: event.eventId });
    }
  }

  private parse(rawBody: Buffer): ServiceResult<ProviderEvent> {
    let json: unknown;
    try {
      json = JSON.parse(rawBody.toString('utf8'));
    } catch {
      return { success: false, error: new MalformedEventError('Webhook body is not valid JSON') };
    }

    const envelope = webhookEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      return {
        success: false,
        error: new MalformedEventError('Webhook body must be a JSON object', 'MALFORMED_EVENT'),
      };
    }

    const { event, data } = envelope.data;
    const eventId = data?.id ?? data?.reference ?? '';
    const metaEscrowId = data?.metadata?.escrow_id;
    const amountMinor = data?.amount ?? 0;

    return {
      success: true,
      data: {
        eventId,
        eventType: event ?? '',
        escrowId: typeof metaEscrowId === 'string' && metaEscrowId !== '' ? metaEscrowId : null,
        reference: data?.reference || eventId,
        // Provider amounts are in subunits; the ledger stores whole units
        amount: Math.floor(Math.max(amountMinor, 0) / 100),
      },
    };
  }

  private async apply(event: ProviderEvent, escrowId: string, action: ProviderAction): Promise<WebhookOutcome> {
    return this.store.transaction(async (unit): Promise<WebhookOutcome> => {
      const escrow = await unit.getForUpdate(escrowId);
      if (!escrow) {
        webhookLogger.info({ eventId: event.eventId, escrowId }, 'Webhook references unknown escrow');
        return { status: 'ignored', reason: 'unknown_escrow', eventId: event.eventId };
      }

      const decision = transition(escrow.status, action);
      if (!decision.ok) {
        webhookLogger.warn(
          { eventId: event.eventId, escrowId, action, status: escrow.status, needsManualReconciliation: true },
          'Provider event conflicts with escrow status'
        );
        return { status: 'ignored', reason: 'invalid_state', eventId: event.eventId };
      }

      const current = decision.changed ? await unit.updateStatus(escrowId, decision.to) : escrow;

      const recorded = await record(unit, {
        escrowId,
        kind: ACTION_LEDGER_KIND[action],
        provider: this.provider,
        providerRef: event.reference,
        amount: event.amount,
      });

      webhookLogger.info(
        { eventId: event.eventId, escrowId, action, status: current.status, ledger: recorded.status },
        'Webhook applied'
      );

      return {
        status: 'processed',
        eventId: event.eventId,
        action,
        escrowId,
        escrowStatus: current.status,
        changed: decision.changed,
        ledger: recorded.status,
      };
    });
  }

  private succeed(outcome: WebhookOutcome): ServiceResult<WebhookOutcome> {
    const label = outcome.status === 'ignored' ? `ignored_${outcome.reason}` : outcome.status;
    webhookEventsTotal.inc({ provider: this.provider, outcome: label });
    return { success: true, data: outcome };
  }

  private fail(error: AppError): ServiceResult<WebhookOutcome> {
    webhookEventsTotal.inc({ provider: this.provider, outcome: error.code.toLowerCase() });
    webhookLogger.warn({ code: error.code }, 'Webhook rejected');
    return { success: false, error };
  }
}
