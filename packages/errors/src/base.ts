import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by {@link FanoutError.toJSON}.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  timestamp: string;
  metadata?: Record<string, string> | undefined;
  cause?: string | undefined;
  stack?: string | undefined;
}

/**
 * Root of the fanout error hierarchy.
 *
 * Concrete classes declare `_tag`, `code`, `domain` and `isExpected`; the
 * values for the last two come from the catalog entry of the code.
 */
export abstract class FanoutError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Readonly<Record<string, string>> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Error.captureStackTrace(this, new.target);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      ...(this.metadata ? { metadata: { ...this.metadata } } : {}),
      ...(this.cause !== undefined ? { cause: describeCause(this.cause) } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }

  override toString(): string {
    const meta = this.metadata ? ` ${JSON.stringify(this.metadata)}` : "";
    return `${this.name} [${this.code}]: ${this.message}${meta}`;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Check whether a value is an Error instance */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/** Check whether a value belongs to the fanout error hierarchy */
export function isFanoutError(value: unknown): value is FanoutError {
  return value instanceof FanoutError;
}
