import { randomUUID } from "node:crypto";
import { EmitterConfigurationError } from "@fanout/errors";
import { z } from "zod";
import { DEFAULT_ERROR_BUFFER_SIZE } from "./constants.js";
import { isPool } from "./pool.js";
import type {
  EmitterConfig,
  ErrorHandler,
  IdGenerator,
  PanicHandler,
  Pool,
  ResolvedEmitterConfig,
} from "./types.js";
import { formatIssues, functionSchema, toValidationIssues } from "./validation.js";

export const ErrorBufferSizeSchema = z.number().int().positive();

export const EmitterConfigSchema = z.object({
  errorHandler: functionSchema<ErrorHandler>("errorHandler").optional(),
  idGenerator: functionSchema<IdGenerator>("idGenerator").optional(),
  panicHandler: functionSchema<PanicHandler>("panicHandler").optional(),
  pool: z
    .custom<Pool>(isPool, { message: "pool must implement submit(), running() and release()" })
    .optional(),
  errorBufferSize: ErrorBufferSizeSchema.optional(),
});

const identityErrorHandler: ErrorHandler = (_event, error) => error;

const defaultPanicHandler: PanicHandler = (panic) => {
  console.error("[fanout] Listener panic during dispatch:", panic);
};

/** Defaults applied to every option the caller leaves out */
export const DEFAULT_CONFIG: ResolvedEmitterConfig = Object.freeze({
  errorHandler: identityErrorHandler,
  idGenerator: () => randomUUID(),
  panicHandler: defaultPanicHandler,
  pool: undefined,
  errorBufferSize: DEFAULT_ERROR_BUFFER_SIZE,
});

function invalid(error: z.ZodError): EmitterConfigurationError {
  const issues = toValidationIssues(error);
  return new EmitterConfigurationError(formatIssues(issues), issues);
}

/**
 * Validate user config and fill in defaults.
 *
 * @throws {EmitterConfigurationError} listing every invalid field
 */
export function resolveEmitterConfig(config: EmitterConfig = {}): ResolvedEmitterConfig {
  const result = EmitterConfigSchema.safeParse(config);
  if (!result.success) {
    throw invalid(result.error);
  }
  const parsed = result.data;
  return {
    errorHandler: parsed.errorHandler ?? DEFAULT_CONFIG.errorHandler,
    idGenerator: parsed.idGenerator ?? DEFAULT_CONFIG.idGenerator,
    panicHandler: parsed.panicHandler ?? DEFAULT_CONFIG.panicHandler,
    pool: parsed.pool,
    errorBufferSize: parsed.errorBufferSize ?? DEFAULT_CONFIG.errorBufferSize,
  };
}

/**
 * @throws {EmitterConfigurationError} unless size is a positive integer
 */
export function validateErrorBufferSize(size: number): number {
  const result = ErrorBufferSizeSchema.safeParse(size);
  if (!result.success) {
    const issues = toValidationIssues(result.error).map((i) => ({ ...i, field: "errorBufferSize" }));
    throw new EmitterConfigurationError(formatIssues(issues), issues);
  }
  return result.data;
}
