/**
 * EscrowService v1.0.0
 *
 * Direct actions requested by a buyer, seller or operator.
 *
 * Every state change runs as one ledger unit:
 *   lock escrow row → consult state machine → update status → record entry → commit
 * A rejected or failed action rolls back and leaves no trace.
 *
 * Ledger entries: fund and release and refund write one entry each;
 * dispute is a pure status change; creation writes none.
 */

import { AppError, toAppError } from '../lib/errors';
import { newId } from '../lib/ids';
import { parseCreateEscrow } from '../lib/validators';
import { escrowLogger } from '../logger';
import { escrowTransitionsTotal } from '../monitoring/metrics';
import type { LedgerStore } from '../store/LedgerStore';
import type {
  DirectAction,
  Escrow,
  EscrowStatus,
  ServiceResult,
  Transaction,
  TransactionKind,
} from '../types';
import { transition } from './EscrowStateMachine';
import { record, type RecordResult } from './TransactionRecorder';

// ============================================================================
// TYPES
// ============================================================================

export interface EscrowServiceConfig {
  store: LedgerStore;
  /** Provider name stamped on `fund` entries. */
  fundingProvider: string;
  /** Prefix for checkout links handed back by `fund`. */
  checkoutBaseUrl: string;
}

export interface CreatedEscrow {
  id: string;
  status: EscrowStatus;
  amount: number;
  currency: string;
  funding: {
    payment_intent_id: string;
  };
}

export interface ActionOutcome {
  escrow: Escrow;
  changed: boolean;
  ledger: RecordResult['status'] | null;
}

export interface FundOutcome {
  status: EscrowStatus;
  checkout_url: string;
}

interface LedgerPlan {
  kind: TransactionKind;
  provider: string;
  refPrefix: 'PSK_' | 'REL_' | 'RFD_';
}

// ============================================================================
// SERVICE
// ============================================================================

export class EscrowService {
  private readonly store: LedgerStore;
  private readonly ledgerPlans: Record<DirectAction, LedgerPlan | null>;
  private readonly checkoutBaseUrl: string;

  constructor(config: EscrowServiceConfig) {
    this.store = config.store;
    this.checkoutBaseUrl = config.checkoutBaseUrl;
    this.ledgerPlans = {
      fund: { kind: 'fund', provider: config.fundingProvider, refPrefix: 'PSK_' },
      release: { kind: 'release', provider: 'wallet', refPrefix: 'REL_' },
      refund: { kind: 'refund', provider: 'wallet', refPrefix: 'RFD_' },
      dispute: null,
    };
  }

  // --------------------------------------------------------------------------
  // READ OPERATIONS
  // --------------------------------------------------------------------------

  async getEscrow(escrowId: string): Promise<ServiceResult<Escrow>> {
    try {
      const escrow = await this.store.findEscrow(escrowId);
      if (!escrow) {
        return { success: false, error: AppError.notFound('Escrow', escrowId) };
      }
      return { success: true, data: escrow };
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  async listTransactions(escrowId: string): Promise<ServiceResult<Transaction[]>> {
    const escrow = await this.getEscrow(escrowId);
    if (!escrow.success) {
      return escrow;
    }
    try {
      return { success: true, data: await this.store.listTransactions(escrowId) };
    } catch (error) {
      return { success: false, error: toAppError(error) };
    }
  }

  // --------------------------------------------------------------------------
  // CREATION
  // --------------------------------------------------------------------------

  /**
   * Create escrow in `created` status. No ledger entry.
   */
  async createEscrow(input: unknown): Promise<ServiceResult<CreatedEscrow>> {
    const parsed = parseCreateEscrow(input);
    if (!parsed.success) {
      return parsed;
    }
    const { title, amount, currency, buyer_id, seller_id, metadata } = parsed.data;

    try {
      const escrow = await this.store.transaction((unit) =>
        unit.insertEscrow({
          id: newId('esc_'),
          title,
          amount,
          currency,
          buyer_id,
          seller_id,
          metadata,
        })
      );

      escrowLogger.info({ escrowId: escrow.id, amount, currency }, 'Escrow created');

      return {
        success: true,
        data: {
          id: escrow.id,
          status: escrow.status,
          amount: escrow.amount,
          currency: escrow.currency,
          funding: { payment_intent_id: newId('pi_') },
        },
      };
    } catch (error) {
      const appError = toAppError(error);
      escrowLogger.error({ err: appError }, 'Escrow creation failed');
      return { success: false, error: appError };
    }
  }

  // --------------------------------------------------------------------------
  // STATE TRANSITIONS
  // --------------------------------------------------------------------------

  /**
   * Fund escrow: created → funding_pending.
   * Already funding_pending is an accepted no-op without a new entry.
   */
  async fund(escrowId: string): Promise<ServiceResult<FundOutcome>> {
    const result = await this.apply(escrowId, 'fund');
    if (!result.success) {
      return result;
    }
    return {
      success: true,
      data: {
        status: result.data.escrow.status,
        checkout_url: `${this.checkoutBaseUrl}${escrowId}`,
      },
    };
  }

  /**
   * Release escrow to seller: funded | funding_pending → released
   */
  release(escrowId: string): Promise<ServiceResult<ActionOutcome>> {
    return this.apply(escrowId, 'release');
  }

  /**
   * Refund escrow to buyer: any status except refunded → refunded
   */
  refund(escrowId: string): Promise<ServiceResult<ActionOutcome>> {
    return this.apply(escrowId, 'refund');
  }

  /**
   * Freeze escrow: any non-terminal status → disputed
   */
  dispute(escrowId: string): Promise<ServiceResult<ActionOutcome>> {
    return this.apply(escrowId, 'dispute');
  }

  private async apply(escrowId: string, action: DirectAction): Promise<ServiceResult<ActionOutcome>> {
    const plan = this.ledgerPlans[action];

    try {
      const outcome = await this.store.transaction(async (unit): Promise<ActionOutcome> => {
        const escrow = await unit.getForUpdate(escrowId);
        if (!escrow) {
          throw AppError.notFound('Escrow', escrowId);
        }

        const decision = transition(escrow.status, action);
        if (!decision.ok) {
          throw AppError.invalidState(action, escrow.status);
        }
        if (!decision.changed) {
          return { escrow, changed: false, ledger: null };
        }

        const updated = await unit.updateStatus(escrowId, decision.to);
        if (!plan) {
          return { escrow: updated, changed: true, ledger: null };
        }

        const recorded = await record(unit, {
          escrowId,
          kind: plan.kind,
          provider: plan.provider,
          providerRef: newId(plan.refPrefix),
          amount: escrow.amount,
        });
        return { escrow: updated, changed: true, ledger: recorded.status };
      });

      escrowTransitionsTotal.inc({ action, outcome: outcome.changed ? 'applied' : 'noop' });
      escrowLogger.info(
        { escrowId, action, status: outcome.escrow.status, changed: outcome.changed },
        `Escrow ${action} accepted`
      );
      return { success: true, data: outcome };
    } catch (error) {
      const appError = toAppError(error);
      escrowTransitionsTotal.inc({ action, outcome: appError.code.toLowerCase() });
      if (appError.statusCode >= 500) {
        escrowLogger.error({ err: appError, escrowId, action }, `Escrow ${action} failed`);
      } else {
        escrowLogger.warn({ escrowId, action, code: appError.code }, `Escrow ${action} rejected`);
      }
      return { success: false, error: appError };
    }
  }
}
