import type { EscrowAction, EscrowStatus } from '../../types';

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    isOperational: boolean = true
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static validation(message: string): ValidationError {
    return new ValidationError(message);
  }

  static missingField(field: string): ValidationError {
    return new ValidationError(`missing_field:${field}`, 'MISSING_FIELD', 422);
  }

  static notFound(resource: string, id: string): NotFoundError {
    return new NotFoundError(`${resource} with id '${id}' not found`);
  }

  static invalidState(action: EscrowAction, currentStatus: EscrowStatus): InvalidStateError {
    return new InvalidStateError(action, currentStatus);
  }

  static storage(cause: unknown): StorageFailureError {
    return new StorageFailureError(cause);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    statusCode: number = 400
  ) {
    super(message, code, statusCode, true);
  }
}

export class NotFoundError extends AppError {
  constructor(
    message: string,
    code: string = 'NOT_FOUND',
    statusCode: number = 404
  ) {
    super(message, code, statusCode, true);
  }
}

/**
 * The state machine refused the requested action from the current status.
 */
export class InvalidStateError extends AppError {
  public readonly action: EscrowAction;
  public readonly currentStatus: EscrowStatus;

  constructor(action: EscrowAction, currentStatus: EscrowStatus) {
    super(`Cannot ${action} escrow in status ${currentStatus}`, 'INVALID_STATE', 409, true);
    this.action = action;
    this.currentStatus = currentStatus;
  }
}

export class SignatureInvalidError extends AppError {
  constructor(message: string = 'Webhook signature mismatch') {
    super(message, 'INVALID_SIGNATURE', 400, true);
  }
}

export class MalformedEventError extends AppError {
  constructor(message: string, code: string = 'INVALID_JSON') {
    super(message, code, 400, true);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, code: string = 'CONFIGURATION_ERROR') {
    super(message, code, 500, false);
  }
}

/**
 * Waiting for an escrow row lock took longer than the configured bound.
 * Nothing was written; the caller may retry.
 */
export class LockTimeoutError extends AppError {
  public readonly retryable = true;

  constructor(escrowId: string) {
    super(`Timed out waiting for lock on escrow ${escrowId}`, 'LOCK_TIMEOUT', 503, true);
  }
}

export class StorageFailureError extends AppError {
  constructor(cause: unknown) {
    super(
      cause instanceof Error ? cause.message : 'Storage operation failed',
      'STORAGE_FAILURE',
      500,
      false
    );
    this.cause = cause;
  }
}

/**
 * Normalize anything thrown inside a storage call into the error taxonomy.
 * AppErrors pass through untouched.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new StorageFailureError(error);
}
