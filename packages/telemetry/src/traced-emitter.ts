/**
 * TracedEmitter: non-invasive OTel instrumentation for an Emitter.
 *
 * emitSync runs inside a `fanout.emit_sync` span. Both emission modes are
 * counted, sync listener errors and latency are recorded, and panics are
 * counted before they reach the configured panic handler.
 */

import {
  DEFAULT_CONFIG,
  type Emitter,
  type ErrorHandler,
  type ErrorStream,
  type IdGenerator,
  type Listener,
  type ListenerOptions,
  type PanicHandler,
  type Pool,
  type Topic,
} from "@fanout/emitter";
import { createEmitterInstruments, type EmitterInstruments } from "./metrics.js";
import { withSpan } from "./span-helpers.js";
import type { TelemetryConfig } from "./types.js";

export const EMIT_SYNC_SPAN = "fanout.emit_sync";

export class TracedEmitter implements Emitter {
  private readonly instruments: EmitterInstruments;
  private panicHandler: PanicHandler;

  constructor(
    private readonly inner: Emitter,
    config: TelemetryConfig = {},
  ) {
    this.instruments = createEmitterInstruments(config.meter);
    this.panicHandler = config.panicHandler ?? DEFAULT_CONFIG.panicHandler;
    this.inner.setPanicHandler((panic) => {
      this.instruments.panics.add(1);
      this.panicHandler(panic);
    });
  }

  on(topicName: string, listener: Listener, options?: ListenerOptions): string {
    return this.inner.on(topicName, listener, options);
  }

  off(topicName: string, listenerId: string): void {
    this.inner.off(topicName, listenerId);
  }

  emit(topicName: string, payload?: unknown): ErrorStream {
    this.instruments.emissions.add(1, { "fanout.mode": "async" });
    return this.inner.emit(topicName, payload);
  }

  emitSync(topicName: string, payload?: unknown): Error[] {
    // A closed emitter dispatches nothing; its EmitterClosedError is not a listener error
    if (this.inner.isClosed) {
      return this.inner.emitSync(topicName, payload);
    }
    this.instruments.emissions.add(1, { "fanout.mode": "sync" });
    const start = performance.now();
    return withSpan(EMIT_SYNC_SPAN, { "fanout.topic": topicName }, (span) => {
      const errors = this.inner.emitSync(topicName, payload);
      span.setAttribute("fanout.error_count", errors.length);
      if (errors.length > 0) {
        this.instruments.listenerErrors.add(errors.length);
      }
      this.instruments.dispatchLatency.record(performance.now() - start, { "fanout.mode": "sync" });
      return errors;
    });
  }

  getTopic(topicName: string): Topic {
    return this.inner.getTopic(topicName);
  }

  ensureTopic(topicName: string): Topic {
    return this.inner.ensureTopic(topicName);
  }

  setErrorHandler(handler: ErrorHandler): void {
    this.inner.setErrorHandler(handler);
  }

  setIdGenerator(generator: IdGenerator): void {
    this.inner.setIdGenerator(generator);
  }

  /** Replace the handler behind the panic counter */
  setPanicHandler(handler: PanicHandler): void {
    this.panicHandler = handler;
  }

  setPool(pool: Pool | undefined): void {
    this.inner.setPool(pool);
  }

  setErrorBufferSize(size: number): void {
    this.inner.setErrorBufferSize(size);
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  get isClosed(): boolean {
    return this.inner.isClosed;
  }
}

/**
 * Wrap an emitter with OpenTelemetry instrumentation.
 *
 * The wrapper installs its own panic handler on the inner emitter; pass the
 * handler that should receive panics in `config.panicHandler`.
 */
export function withTelemetry(emitter: Emitter, config?: TelemetryConfig): TracedEmitter {
  return new TracedEmitter(emitter, config);
}
