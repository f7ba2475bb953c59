import { z } from 'zod';
import { AppError, ValidationError } from './errors';
import type { JsonValue, ServiceResult } from '../types';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValue),
    z.record(jsonValue),
  ])
);

const nonEmptyText = (max: number) => z.coerce.string().min(1).max(max);

const minorUnitAmount = z
  .union([z.number(), z.string().regex(/^-?\d+$/, 'must be an integer')])
  .transform((value) => Number(value))
  .pipe(z.number().int('must be an integer').nonnegative('must not be negative').max(Number.MAX_SAFE_INTEGER));

export const createEscrowSchema = z.object({
  title: nonEmptyText(160),
  amount: minorUnitAmount,
  currency: nonEmptyText(8).transform((code) => code.toUpperCase()),
  buyer_id: nonEmptyText(64),
  seller_id: nonEmptyText(64),
  // Opaque to the ledger: any JSON value is stored as given
  metadata: jsonValue.optional().transform((value): JsonValue => value ?? {}),
});

export type CreateEscrowInput = z.infer<typeof createEscrowSchema>;

/** Fields that must be present and non-empty, checked in this order. */
export const REQUIRED_ESCROW_FIELDS = ['title', 'amount', 'currency', 'buyer_id', 'seller_id'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a create-escrow payload. A missing or empty required field is
 * reported by name (`missing_field:<name>`) before any type checks run.
 */
export function parseCreateEscrow(input: unknown): ServiceResult<CreateEscrowInput> {
  if (!isRecord(input)) {
    return { success: false, error: AppError.validation('Request body must be a JSON object') };
  }

  for (const field of REQUIRED_ESCROW_FIELDS) {
    const value = input[field];
    if (value === undefined || value === null || value === '') {
      return { success: false, error: AppError.missingField(field) };
    }
  }

  const parsed = createEscrowSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') || 'body';
    return {
      success: false,
      error: new ValidationError(`${path}: ${issue?.message ?? 'invalid value'}`),
    };
  }

  return { success: true, data: parsed.data };
}

// ============================================================================
// WEBHOOK ENVELOPE (Paystack)
// ============================================================================

const idLike = z.union([z.string(), z.number()]).transform((value) => String(value));

export const webhookEnvelopeSchema = z.object({
  event: z.string().optional().catch(undefined),
  data: z
    .object({
      id: idLike.optional().catch(undefined),
      reference: idLike.optional().catch(undefined),
      amount: z.coerce
        .number()
        .finite()
        .int()
        .nonnegative()
        .max(Number.MAX_SAFE_INTEGER)
        .optional()
        .catch(undefined),
      metadata: z
        .object({ escrow_id: z.unknown().optional() })
        .passthrough()
        .nullish()
        .catch(undefined),
    })
    .passthrough()
    .optional()
    .catch(undefined),
}).passthrough();

