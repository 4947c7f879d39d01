/**
 * @fanout/errors
 *
 * Shared error taxonomy for the fanout event dispatch packages.
 *
 * Errors are grouped under five behavioral base types:
 * ValidationError, NotFoundError, ConflictError, RateLimitError, InternalError
 *
 * Each error carries a `.code` from the catalog that discriminates
 * the specific error condition. Use `error.code === "XXX"` for
 * fine-grained matching, or `instanceof BaseType` for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, FanoutError, isError, isFanoutError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  wrapError,
} from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export {
  ConflictError,
  InternalError,
  NotFoundError,
  RateLimitError,
  ValidationError,
} from "./bases/index.js";

// ============================================================================
// TYPE INFRASTRUCTURE
// ============================================================================

export type {
  ConflictCodes,
  FanoutErrorOptions,
  InternalCodes,
  NotFoundCodes,
  RateLimitCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isConflictError,
  isExpectedError,
  isInternalError,
  isNotFoundError,
  isRateLimitError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// EMITTER ERRORS
// ============================================================================

export {
  EmitterAlreadyClosedError,
  EmitterClosedError,
  EmitterConfigurationError,
  ErrorStreamClosedError,
  InvalidPriorityError,
  InvalidTopicNameError,
  ListenerNotFoundError,
  NilListenerError,
  PoolCapacityExceededError,
  PoolReleasedError,
  TopicNotFoundError,
} from "./emitter.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@fanout/errors";
export const PACKAGE_VERSION = "0.1.0";
