/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the driftguard reconciler.
 * Provides typed error codes for consistent error handling across the application.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes (4xx, 5xx mapped)
 */
export const HttpErrorCodes = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UNAUTHORIZED: 'UNAUTHORIZED',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  TIMEOUT: 'TIMEOUT',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Source loading error codes
 */
export const SourceErrorCodes = {
  SOURCE_UNREACHABLE: 'SOURCE_UNREACHABLE',
  MALFORMED_RESOURCE: 'MALFORMED_RESOURCE',
  INVALID_APPLICATION: 'INVALID_APPLICATION',
} as const;

export type SourceErrorCode = typeof SourceErrorCodes[keyof typeof SourceErrorCodes];

/**
 * Target runtime error codes
 */
export const RuntimeErrorCodes = {
  OBSERVATION_ERROR: 'OBSERVATION_ERROR',
  APPLY_CONFLICT: 'APPLY_CONFLICT',
  APPLY_REJECTED: 'APPLY_REJECTED',
  RUNTIME_UNAVAILABLE: 'RUNTIME_UNAVAILABLE',
  UNKNOWN_DESTINATION: 'UNKNOWN_DESTINATION',
} as const;

export type RuntimeErrorCode = typeof RuntimeErrorCodes[keyof typeof RuntimeErrorCodes];

/**
 * Sync and application graph error codes
 */
export const SyncErrorCodes = {
  DEPENDENCY_FAILED: 'DEPENDENCY_FAILED',
  CYCLIC_APPLICATION_GRAPH: 'CYCLIC_APPLICATION_GRAPH',
  OWNERSHIP_CONFLICT: 'OWNERSHIP_CONFLICT',
  SYNC_CANCELLED: 'SYNC_CANCELLED',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  APPLICATION_NOT_FOUND: 'APPLICATION_NOT_FOUND',
  NO_PENDING_PLAN: 'NO_PENDING_PLAN',
} as const;

export type SyncErrorCode = typeof SyncErrorCodes[keyof typeof SyncErrorCodes];

/**
 * Configuration and persistence error codes
 */
export const InfrastructureErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
} as const;

export type InfrastructureErrorCode =
  typeof InfrastructureErrorCodes[keyof typeof InfrastructureErrorCodes];

/**
 * Union of all error codes
 */
export type ErrorCode =
  | HttpErrorCode
  | SourceErrorCode
  | RuntimeErrorCode
  | SyncErrorCode
  | InfrastructureErrorCode;

// ============================================================================
// HTTP Status Mapping
// ============================================================================

const errorCodeToHttpStatus: Record<ErrorCode, number> = {
  [HttpErrorCodes.BAD_REQUEST]: 400,
  [HttpErrorCodes.VALIDATION_ERROR]: 400,
  [HttpErrorCodes.UNAUTHORIZED]: 401,
  [HttpErrorCodes.NOT_FOUND]: 404,
  [HttpErrorCodes.CONFLICT]: 409,
  [HttpErrorCodes.INTERNAL_ERROR]: 500,
  [HttpErrorCodes.SERVICE_UNAVAILABLE]: 503,
  [HttpErrorCodes.TIMEOUT]: 504,

  [SourceErrorCodes.SOURCE_UNREACHABLE]: 502,
  [SourceErrorCodes.MALFORMED_RESOURCE]: 422,
  [SourceErrorCodes.INVALID_APPLICATION]: 422,

  [RuntimeErrorCodes.OBSERVATION_ERROR]: 502,
  [RuntimeErrorCodes.APPLY_CONFLICT]: 409,
  [RuntimeErrorCodes.APPLY_REJECTED]: 422,
  [RuntimeErrorCodes.RUNTIME_UNAVAILABLE]: 503,
  [RuntimeErrorCodes.UNKNOWN_DESTINATION]: 422,

  [SyncErrorCodes.DEPENDENCY_FAILED]: 424,
  [SyncErrorCodes.CYCLIC_APPLICATION_GRAPH]: 422,
  [SyncErrorCodes.OWNERSHIP_CONFLICT]: 409,
  [SyncErrorCodes.SYNC_CANCELLED]: 409,
  [SyncErrorCodes.INVALID_STATE_TRANSITION]: 409,
  [SyncErrorCodes.APPLICATION_NOT_FOUND]: 404,
  [SyncErrorCodes.NO_PENDING_PLAN]: 409,

  [InfrastructureErrorCodes.CONFIGURATION_ERROR]: 500,
  [InfrastructureErrorCodes.DATABASE_ERROR]: 500,
};

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: ErrorCode): number {
  return errorCodeToHttpStatus[code] ?? 500;
}

/**
 * Check if an error code represents a client error (4xx)
 */
export function isClientError(code: ErrorCode): boolean {
  const status = getHttpStatusForCode(code);
  return status >= 400 && status < 500;
}

const retryableCodes: ReadonlySet<string> = new Set<ErrorCode>([
  HttpErrorCodes.TIMEOUT,
  HttpErrorCodes.SERVICE_UNAVAILABLE,
  SourceErrorCodes.SOURCE_UNREACHABLE,
  RuntimeErrorCodes.OBSERVATION_ERROR,
  RuntimeErrorCodes.APPLY_CONFLICT,
  RuntimeErrorCodes.RUNTIME_UNAVAILABLE,
]);

/**
 * Check if an error should be retried
 */
export function isRetryableError(code: string): boolean {
  return retryableCodes.has(code);
}
