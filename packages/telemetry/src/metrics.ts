/**
 * OTel metrics for event dispatch.
 *
 * Lazily initialized: meters are only created on first access.
 * When no meter provider is registered, these return no-op instruments.
 */

import type { Counter, Histogram, Meter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";

const METER_NAME = "fanout";

let _emissions: Counter | undefined;
let _listenerErrors: Counter | undefined;
let _panics: Counter | undefined;
let _dispatchLatency: Histogram | undefined;

/** Instruments recorded by a traced emitter */
export interface EmitterInstruments {
  readonly emissions: Counter;
  readonly listenerErrors: Counter;
  readonly panics: Counter;
  readonly dispatchLatency: Histogram;
}

function createEmissions(meter: Meter): Counter {
  return meter.createCounter("fanout.emissions", {
    description: "Total emit and emitSync calls",
  });
}

function createListenerErrors(meter: Meter): Counter {
  return meter.createCounter("fanout.listener_errors", {
    description: "Listener errors returned by emitSync",
  });
}

function createPanics(meter: Meter): Counter {
  return meter.createCounter("fanout.panics", {
    description: "Dispatch passes ended by a thrown value",
  });
}

function createDispatchLatency(meter: Meter): Histogram {
  return meter.createHistogram("fanout.dispatch.latency_ms", {
    description: "Synchronous dispatch latency in milliseconds",
    unit: "ms",
  });
}

/**
 * Get the counter for total emissions, sync and async.
 * Lazily creates the counter on first access.
 */
export function getEmissions(): Counter {
  if (_emissions === undefined) {
    _emissions = createEmissions(metrics.getMeter(METER_NAME));
  }
  return _emissions;
}

/**
 * Get the counter for listener errors.
 * Lazily creates the counter on first access.
 */
export function getListenerErrors(): Counter {
  if (_listenerErrors === undefined) {
    _listenerErrors = createListenerErrors(metrics.getMeter(METER_NAME));
  }
  return _listenerErrors;
}

/**
 * Get the counter for panics caught during dispatch.
 * Lazily creates the counter on first access.
 */
export function getPanics(): Counter {
  if (_panics === undefined) {
    _panics = createPanics(metrics.getMeter(METER_NAME));
  }
  return _panics;
}

/**
 * Get the histogram for sync dispatch latency in milliseconds.
 * Lazily creates the histogram on first access.
 */
export function getDispatchLatency(): Histogram {
  if (_dispatchLatency === undefined) {
    _dispatchLatency = createDispatchLatency(metrics.getMeter(METER_NAME));
  }
  return _dispatchLatency;
}

/**
 * Instruments from the given meter, or the shared global ones when omitted.
 */
export function createEmitterInstruments(meter?: Meter): EmitterInstruments {
  if (meter === undefined) {
    return {
      emissions: getEmissions(),
      listenerErrors: getListenerErrors(),
      panics: getPanics(),
      dispatchLatency: getDispatchLatency(),
    };
  }
  return {
    emissions: createEmissions(meter),
    listenerErrors: createListenerErrors(meter),
    panics: createPanics(meter),
    dispatchLatency: createDispatchLatency(meter),
  };
}
