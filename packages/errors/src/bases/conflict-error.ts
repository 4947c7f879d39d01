import { FanoutError } from "../base.js";
import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { FanoutErrorOptions } from "../types.js";

type ConflictCode = CodesForBase<"ConflictError">;

/**
 * Errors when an operation conflicts with the current lifecycle state.
 * The `.code` field discriminates the specific error.
 */
export class ConflictError<C extends ConflictCode = ConflictCode> extends FanoutError {
  readonly _tag = "ConflictError" as const;
  override readonly code: C;
  override readonly domain: ErrorDomain;
  override readonly isExpected: boolean;

  constructor(options: FanoutErrorOptions<C>) {
    super(
      options.message,
      options.metadata,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    const entry = ERROR_CATALOG[options.code];
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
  }
}
