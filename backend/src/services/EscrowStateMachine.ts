/**
 * ESCROW STATE MACHINE
 *
 * Pure decision logic: (current status, action) → new status | rejection.
 * No I/O; callers hold the escrow row lock while they consult it.
 *
 * STATUSES:
 * - created: escrow recorded, nothing paid
 * - funding_pending: buyer sent to checkout
 * - funded: provider confirmed payment
 * - disputed: frozen; leaves only by refund or provider-confirmed release
 * - released / refunded / canceled: terminal
 *
 * Direct actions are guarded: an invalid source status is rejected.
 * Provider-confirmed actions (mark_*) are idempotent: reaching a status the
 * escrow already has is an accepted no-op.
 */

import type { EscrowAction, EscrowStatus } from '../types';
import { ESCROW_STATUSES, TERMINAL_ESCROW_STATUSES } from '../types';

// ============================================================================
// TYPES
// ============================================================================

interface TransitionRule {
  from: readonly EscrowStatus[];
  to: EscrowStatus;
}

export type TransitionResult =
  | { ok: true; from: EscrowStatus; to: EscrowStatus; changed: boolean }
  | { ok: false; from: EscrowStatus; reason: 'INVALID_STATE' };

const allExcept = (...excluded: EscrowStatus[]): readonly EscrowStatus[] =>
  ESCROW_STATUSES.filter((status) => !excluded.includes(status));

// ============================================================================
// TRANSITION TABLE
// ============================================================================

export const ESCROW_TRANSITIONS: Record<EscrowAction, TransitionRule> = {
  fund: { from: ['created', 'funding_pending'], to: 'funding_pending' },
  mark_funded: { from: ['funding_pending', 'created', 'funded'], to: 'funded' },
  release: { from: ['funded', 'funding_pending'], to: 'released' },
  mark_released: { from: allExcept('released'), to: 'released' },
  refund: { from: allExcept('refunded'), to: 'refunded' },
  mark_refunded: { from: allExcept('refunded'), to: 'refunded' },
  dispute: { from: allExcept('released', 'refunded', 'canceled'), to: 'disputed' },
};

const PROVIDER_ACTIONS: readonly EscrowAction[] = ['mark_funded', 'mark_released', 'mark_refunded'];

export function isProviderAction(action: EscrowAction): boolean {
  return PROVIDER_ACTIONS.includes(action);
}

export function isTerminalStatus(status: EscrowStatus): boolean {
  return TERMINAL_ESCROW_STATUSES.includes(status);
}

/**
 * Decide the outcome of `action` on an escrow currently in `current`.
 */
export function transition(current: EscrowStatus, action: EscrowAction): TransitionResult {
  const rule = ESCROW_TRANSITIONS[action];

  if (isProviderAction(action) && current === rule.to) {
    return { ok: true, from: current, to: current, changed: false };
  }

  if (!rule.from.includes(current)) {
    return { ok: false, from: current, reason: 'INVALID_STATE' };
  }

  return { ok: true, from: current, to: rule.to, changed: current !== rule.to };
}

/**
 * Statuses reachable from `status` by any single action.
 */
export function reachableFrom(status: EscrowStatus): EscrowStatus[] {
  const targets = new Set<EscrowStatus>();
  for (const rule of Object.values(ESCROW_TRANSITIONS)) {
    if (rule.from.includes(status) && rule.to !== status) {
      targets.add(rule.to);
    }
  }
  return [...targets];
}

export const EscrowStateMachine = {
  transition,
  isProviderAction,
  isTerminalStatus,
  reachableFrom,
};

export default EscrowStateMachine;
