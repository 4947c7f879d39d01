import { FanoutError } from "../base.js";
import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { FanoutErrorOptions } from "../types.js";

type RateLimitCode = CodesForBase<"RateLimitError">;

/**
 * Errors when a bounded resource (queue, pool) is exhausted.
 * The `.code` field discriminates the specific error.
 */
export class RateLimitError<C extends RateLimitCode = RateLimitCode> extends FanoutError {
  readonly _tag = "RateLimitError" as const;
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
