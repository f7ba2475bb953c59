/**
 * Escrow Ledger Type Definitions v1.0.0
 *
 * These types MUST match backend/database/schema.sql.
 */

import type { AppError } from './lib/errors';

// ============================================================================
// ENUMS (Match CHECK constraints in schema.sql)
// ============================================================================

export const ESCROW_STATUSES = [
  'created',
  'funding_pending',
  'funded',
  'released',  // TERMINAL
  'refunded',  // TERMINAL
  'canceled',  // TERMINAL
  'disputed',
] as const;

export type EscrowStatus = (typeof ESCROW_STATUSES)[number];

export const TERMINAL_ESCROW_STATUSES: readonly EscrowStatus[] = ['released', 'refunded', 'canceled'];

export type TransactionKind = 'fund' | 'release' | 'refund';

/** Actions a buyer, seller or operator can request directly. */
export type DirectAction = 'fund' | 'release' | 'refund' | 'dispute';

/** Actions driven by a provider confirming money movement. */
export type ProviderAction = 'mark_funded' | 'mark_released' | 'mark_refunded';

export type EscrowAction = DirectAction | ProviderAction;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ============================================================================
// CORE DOMAIN TYPES
// ============================================================================

export interface Escrow {
  id: string;
  title: string;
  amount: number; // minor currency unit
  currency: string;
  buyer_id: string;
  seller_id: string;
  status: EscrowStatus;
  metadata: JsonValue;
  created_at: Date;
  updated_at: Date;
}

export interface Transaction {
  id: string;
  escrow_id: string;
  kind: TransactionKind;
  provider: string | null;
  provider_ref: string | null;
  amount: number;
  created_at: Date;
}

export interface WebhookDelivery {
  provider: string;
  event_id: string;
  signature: string | null;
  received_at: Date;
}

export interface NewEscrow {
  id: string;
  title: string;
  amount: number;
  currency: string;
  buyer_id: string;
  seller_id: string;
  metadata: JsonValue;
}

export interface NewTransaction {
  id: string;
  escrow_id: string;
  kind: TransactionKind;
  provider: string | null;
  provider_ref: string | null;
  amount: number;
}

/** Outcome of an insert guarded by a unique key. */
export type InsertOutcome = 'inserted' | 'duplicate';

// ============================================================================
// SERVICE RESULT
// ============================================================================

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: AppError };
