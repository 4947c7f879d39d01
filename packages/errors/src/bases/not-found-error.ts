import { FanoutError } from "../base.js";
import { type CodesForBase, ERROR_CATALOG, type ErrorDomain } from "../catalog.js";
import type { FanoutErrorOptions } from "../types.js";

type NotFoundCode = CodesForBase<"NotFoundError">;

/**
 * Errors when a requested topic, listener or other resource does not exist.
 * The `.code` field discriminates the specific error.
 */
export class NotFoundError<C extends NotFoundCode = NotFoundCode> extends FanoutError {
  readonly _tag = "NotFoundError" as const;
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
