/**
 * Span helper utilities: span creation with error handling.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with automatic:
 * - Attribute setting
 * - Error recording + status propagation
 * - Span ending (even on error)
 */

import { type Span, SpanStatusCode, trace } from "@opentelemetry/api";
import type { SpanAttributes } from "./types.js";

const TRACER_NAME = "fanout";

/**
 * Execute a synchronous function within a named OTel span.
 *
 * - Sets provided attributes on the span
 * - Passes the span to fn so it can add attributes from its result
 * - Records exceptions and sets ERROR status on failure
 * - Sets OK status on success
 * - Always ends the span (even on error)
 *
 * When no tracer provider is registered (OTel disabled), the function
 * still executes with a no-op span.
 *
 * @param name - Span name (e.g., "fanout.emit_sync")
 * @throws Re-throws any error from fn after recording it on the span
 */
export function withSpan<T>(name: string, attributes: SpanAttributes, fn: (span: Span) => T): T {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
