/**
 * Telemetry configuration types.
 */

import type { PanicHandler } from "@fanout/emitter";
import type { Meter } from "@opentelemetry/api";

/**
 * Configuration for an instrumented emitter.
 * All fields are optional.
 */
export interface TelemetryConfig {
  /** Meter for the emitter instruments (default: the global "fanout" meter) */
  meter?: Meter;
  /**
   * Handler that receives panics after they are counted
   * (default: the emitter package's logging handler)
   */
  panicHandler?: PanicHandler;
}

/**
 * Standard span attribute types accepted by OpenTelemetry.
 */
export type SpanAttributeValue = string | number | boolean;

/**
 * Record of span attributes.
 */
export type SpanAttributes = Record<string, SpanAttributeValue>;
