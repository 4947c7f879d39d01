/**
 * Type guards for the base error types + code-level discrimination.
 */

import { FanoutError } from "./base.js";
import { ConflictError } from "./bases/conflict-error.js";
import { InternalError } from "./bases/internal-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ErrorCode } from "./catalog.js";

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/** Check if an error is a NotFoundError (topic or listener missing) */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/** Check if an error is a ConflictError (lifecycle state conflict) */
export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/** Check if an error is a RateLimitError (bounded resource exhausted) */
export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

/** Check if an error is an InternalError (bug) */
export function isInternalError(error: unknown): error is InternalError {
  return error instanceof InternalError;
}

/**
 * Check if a FanoutError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: FanoutError,
  code: C,
): error is FanoutError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition (caller mistake or
 * lifecycle state rather than a bug). Returns false for foreign errors.
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof FanoutError && error.isExpected;
}
