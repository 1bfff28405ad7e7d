import type { Family } from '../types/index.js';

export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status = 500, code = 'INTERNAL') {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

// Malformed input at an intake or dashboard boundary. Nothing has been written.
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION');
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401, 'UNAUTHENTICATED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Record not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

// Pool exhausted, pool closed or store unreachable.
export class StoreUnavailableError extends AppError {
  readonly store: string;

  constructor(store: string, message: string) {
    super(message, 503, 'STORE_UNAVAILABLE');
    this.store = store;
  }
}

// The sibling node could not be reached or answered with an error.
export class PeerUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 502, 'PEER_UNAVAILABLE');
    if (cause !== undefined) this.cause = cause;
  }
}

/**
 * The job order row exists but the complaint could not be linked to it.
 * Needs manual reconciliation; never retried automatically.
 */
export class CrossStoreInconsistencyError extends AppError {
  readonly family: Family;
  readonly recordId: number;
  readonly jobOrderId: string;

  constructor(family: Family, recordId: number, jobOrderId: string, cause?: unknown) {
    super(
      `Job order ${jobOrderId} was created but could not be linked to ${family}/${recordId}`,
      500,
      'CROSS_STORE_INCONSISTENCY',
    );
    this.family = family;
    this.recordId = recordId;
    this.jobOrderId = jobOrderId;
    if (cause !== undefined) this.cause = cause;
  }
}

// One family failed during aggregation. Logged only.
export class PartialFailureError extends AppError {
  readonly family: Family;

  constructor(family: Family, cause: unknown) {
    super(`Aggregation skipped ${family}: ${cause instanceof Error ? cause.message : String(cause)}`, 500, 'PARTIAL_FAILURE');
    this.family = family;
    this.cause = cause;
  }
}

// Broadcast to one observer failed. Logged only.
export class NotificationDeliveryError extends AppError {
  readonly observerId: string;

  constructor(observerId: string, cause: unknown) {
    super(`Delivery to observer ${observerId} failed`, 500, 'NOTIFICATION_DELIVERY');
    this.observerId = observerId;
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
