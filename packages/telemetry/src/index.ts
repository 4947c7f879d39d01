/**
 * @fanout/telemetry: OpenTelemetry instrumentation for fanout emitters.
 *
 * Public API:
 * - withTelemetry() / TracedEmitter: emitter wrapper
 * - withSpan(): span creation helper
 * - emissions / listenerErrors / panics / dispatchLatency: OTel metrics
 *
 * Selective OTel API re-exports for advanced users.
 */

// Selective OTel re-exports for advanced users
export { context, SpanStatusCode, trace } from "@opentelemetry/api";
export {
  createEmitterInstruments,
  type EmitterInstruments,
  getDispatchLatency,
  getEmissions,
  getListenerErrors,
  getPanics,
} from "./metrics.js";
export { withSpan } from "./span-helpers.js";
export { EMIT_SYNC_SPAN, TracedEmitter, withTelemetry } from "./traced-emitter.js";
export type { SpanAttributes, SpanAttributeValue, TelemetryConfig } from "./types.js";
