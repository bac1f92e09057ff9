/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the reconciliation core can surface is described by a
 * TypedError. Services throw it wrapped in a GeoSyncError subclass so callers
 * can branch on `instanceof` while transports serialize `typedError` as-is.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'HIERARCHY'
  | 'REGISTRY'
  | 'CONFLICT'
  | 'SYNC'
  | 'PERSISTENCE'
  | 'VALIDATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "HIERARCHY.INVALID"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Tenant unit the error concerns, if any. */
  unitId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  unitId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    unitId: params.unitId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
    details: { resourceType, resourceId },
  });
}

export function invalidHierarchyError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'HIERARCHY.INVALID',
    message,
    retryable: false,
    details,
    suggestedFixes: [
      {
        type: 'FIX_PARENT',
        params: {},
        description: 'Submit the unit under a parent exactly one level above it, or at level 0 without a parent',
      },
    ],
  });
}

export function duplicateCreateError(key: string, existingId: string): TypedError {
  return createTypedError({
    code: 'REGISTRY.DUPLICATE_CREATE',
    message: `Canonical unit already exists for key ${key}`,
    retryable: true,
    details: { key, existingId },
  });
}

export function syncPersistenceError(message: string, unitId?: string, cause?: string): TypedError {
  return createTypedError({
    code: 'PERSISTENCE.SYNC_FAILED',
    message,
    unitId,
    retryable: true,
    details: cause ? { cause } : undefined,
    suggestedFixes: [
      { type: 'WAIT_AND_RETRY', params: { delayMs: 1000 }, description: 'Re-run sync for the unit' },
    ],
  });
}

export function conflictUnresolvedError(caseId: string, unitId?: string): TypedError {
  return createTypedError({
    code: 'CONFLICT.UNRESOLVED',
    message: `Unit is awaiting review in conflict case ${caseId}`,
    unitId,
    retryable: false,
    details: { caseId },
    suggestedFixes: [
      { type: 'AWAIT_REVIEW', params: { caseId }, description: 'An administrator must resolve the case' },
    ],
  });
}

export function conflictAlreadyResolvedError(caseId: string): TypedError {
  return createTypedError({
    code: 'CONFLICT.ALREADY_RESOLVED',
    message: `Conflict case already resolved: ${caseId}`,
    retryable: false,
    details: { caseId },
  });
}

export function syncInvalidTransitionError(unitId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'SYNC.INVALID_TRANSITION',
    message: `Cannot transition unit from "${from}" to "${to}"`,
    unitId,
    retryable: false,
    details: { from, to },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/** Base class for errors thrown by the reconciliation core. */
export class GeoSyncError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'GeoSyncError';
  }
}

/** Level/parent submission is malformed. Rejected immediately, never retried. */
export class InvalidHierarchyError extends GeoSyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(invalidHierarchyError(message, details));
    this.name = 'InvalidHierarchyError';
  }
}

/**
 * Two first-sighting submissions collided on the canonical unique key.
 * The ingest service recovers by re-running the match path.
 */
export class DuplicateCreateRace extends GeoSyncError {
  constructor(
    public readonly key: string,
    public readonly existingId: string,
  ) {
    super(duplicateCreateError(key, existingId));
    this.name = 'DuplicateCreateRace';
  }
}

/** The ledger append or the registry write of an atomic unit failed. Retryable. */
export class SyncPersistenceError extends GeoSyncError {
  constructor(message: string, unitId?: string, cause?: unknown) {
    super(syncPersistenceError(message, unitId, cause instanceof Error ? cause.message : undefined));
    this.name = 'SyncPersistenceError';
  }
}
