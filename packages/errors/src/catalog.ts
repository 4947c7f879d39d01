/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised across the fanout packages is declared here with
 * its domain and the base error type it belongs to.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, validation, resource, emitter, stream, pool
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "RateLimitError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown failures
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // GENERIC ERRORS - Defaults for the base types
  // ============================================================================
  VALIDATION_FAILED: {
    domain: "validation",
    baseType: "ValidationError",
    isExpected: true,
    title: "Validation failed",
    description: "One or more inputs failed validation",
  },
  RESOURCE_NOT_FOUND: {
    domain: "resource",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Resource not found",
    description: "The requested resource does not exist",
  },
  RESOURCE_CONFLICT: {
    domain: "resource",
    baseType: "ConflictError",
    isExpected: true,
    title: "Resource conflict",
    description: "The operation conflicts with the current state of the resource",
  },

  // ============================================================================
  // EMITTER ERRORS - Registration, lookup and lifecycle
  // ============================================================================
  EMITTER_NIL_LISTENER: {
    domain: "emitter",
    baseType: "ValidationError",
    isExpected: true,
    title: "Missing listener",
    description: "A listener must be a function",
  },
  EMITTER_INVALID_TOPIC_NAME: {
    domain: "emitter",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid topic name",
    description: "Topic names must be non-empty and must not contain '?' or '['",
  },
  EMITTER_INVALID_PRIORITY: {
    domain: "emitter",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid priority",
    description: "A listener priority must be an orderable number",
  },
  EMITTER_CONFIGURATION_INVALID: {
    domain: "emitter",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid emitter configuration",
    description: "The emitter configuration failed validation",
  },
  EMITTER_TOPIC_NOT_FOUND: {
    domain: "emitter",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Topic not found",
    description: "No listener registry exists for the topic pattern",
  },
  EMITTER_LISTENER_NOT_FOUND: {
    domain: "emitter",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Listener not found",
    description: "No listener with the given ID is registered on the topic",
  },
  EMITTER_CLOSED: {
    domain: "emitter",
    baseType: "ConflictError",
    isExpected: true,
    title: "Emitter closed",
    description: "The emitter has been closed and no longer dispatches events",
  },
  EMITTER_ALREADY_CLOSED: {
    domain: "emitter",
    baseType: "ConflictError",
    isExpected: true,
    title: "Emitter already closed",
    description: "close() was called on an emitter that is already closed",
  },

  // ============================================================================
  // STREAM ERRORS - Async error delivery
  // ============================================================================
  STREAM_CLOSED: {
    domain: "stream",
    baseType: "ConflictError",
    isExpected: false,
    title: "Stream closed",
    description: "A value was sent on an error stream after it was closed",
  },

  // ============================================================================
  // POOL ERRORS - Worker pool used for async dispatch
  // ============================================================================
  POOL_CAPACITY_EXCEEDED: {
    domain: "pool",
    baseType: "RateLimitError",
    isExpected: true,
    title: "Pool capacity exceeded",
    description: "The worker pool queue is full and cannot accept more tasks",
  },
  POOL_RELEASED: {
    domain: "pool",
    baseType: "ConflictError",
    isExpected: true,
    title: "Pool released",
    description: "The worker pool has been released and no longer accepts tasks",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
