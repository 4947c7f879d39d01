import type { ErrorStream } from "./error-stream.js";
import type { Topic } from "./topic.js";

// ---------------------------------------------------------------------------
// Event
// ---------------------------------------------------------------------------

/**
 * The value handed to every listener of one emission.
 *
 * A single instance is shared by all listeners invoked during a dispatch
 * pass, across every matching pattern, so payload and abort changes made by
 * one listener are visible to the listeners that run after it.
 */
export interface Event {
  /** The concrete topic name the event was emitted on */
  readonly topic: string;
  payload: unknown;
  /** When set, no further listeners of the current topic pattern run */
  aborted: boolean;
  abort(): void;
}

// ---------------------------------------------------------------------------
// Handler Types
// ---------------------------------------------------------------------------

/** What a listener may return: an Error to report, or nothing */
export type ListenerResult = Error | null | undefined | void;

/**
 * Listener callback. Returned errors are collected; thrown values are treated
 * as panics and end the dispatch pass.
 */
export type Listener = (event: Event) => ListenerResult;

/**
 * Transforms each listener error before it reaches the caller.
 * Returning null or undefined suppresses the error.
 */
export type ErrorHandler = (event: Event, error: Error) => Error | null | undefined;

/** Receives the value thrown out of a dispatch pass */
export type PanicHandler = (panic: unknown) => void;

/** Produces listener IDs; uniqueness is not checked */
export type IdGenerator = () => string;

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

/** Executor for asynchronous dispatch passes */
export interface Pool {
  /** Enqueue a task. May throw when the pool cannot accept it. */
  submit(task: () => Promise<void>): void;
  /** Number of tasks currently executing */
  running(): number;
  /** Stop accepting tasks and resolve once every accepted task has finished */
  release(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/** Options for listener registration */
export interface ListenerOptions {
  /** Execution priority; defaults to PRIORITY.NORMAL */
  readonly priority?: number;
}

/** Internal listener entry */
export interface ListenerRecord {
  readonly id: string;
  readonly listener: Listener;
  readonly priority: number;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configuration for MemoryEmitter */
export interface EmitterConfig {
  /** Transform hook for listener errors (default: identity) */
  readonly errorHandler?: ErrorHandler;
  /** Listener ID factory (default: crypto.randomUUID) */
  readonly idGenerator?: IdGenerator;
  /** Receives values thrown during a dispatch pass (default: console.error) */
  readonly panicHandler?: PanicHandler;
  /** Runs asynchronous dispatch passes (default: one macrotask per emit) */
  readonly pool?: Pool;
  /** Capacity of the error stream returned by emit() (default: 10) */
  readonly errorBufferSize?: number;
}

/** Fully resolved config (no optionals except the pool) */
export interface ResolvedEmitterConfig {
  readonly errorHandler: ErrorHandler;
  readonly idGenerator: IdGenerator;
  readonly panicHandler: PanicHandler;
  readonly pool: Pool | undefined;
  readonly errorBufferSize: number;
}

// ---------------------------------------------------------------------------
// Emitter
// ---------------------------------------------------------------------------

/**
 * Contract of an event emitter: listener registration, synchronous and
 * asynchronous emission, runtime configuration and shutdown.
 */
export interface Emitter {
  /** Register a listener on a topic pattern and return its ID */
  on(topicName: string, listener: Listener, options?: ListenerOptions): string;
  /** Remove a listener by ID from a topic pattern */
  off(topicName: string, listenerId: string): void;
  /** Dispatch asynchronously; listener errors arrive on the returned stream */
  emit(topicName: string, payload?: unknown): ErrorStream;
  /** Dispatch on the caller's stack and return the listener errors */
  emitSync(topicName: string, payload?: unknown): Error[];
  /** Look up the listener registry of a pattern */
  getTopic(topicName: string): Topic;
  /** Look up or create the listener registry of a pattern */
  ensureTopic(topicName: string): Topic;
  setErrorHandler(handler: ErrorHandler): void;
  setIdGenerator(generator: IdGenerator): void;
  setPanicHandler(handler: PanicHandler): void;
  setPool(pool: Pool | undefined): void;
  setErrorBufferSize(size: number): void;
  /** Stop dispatching, drop every topic and release the pool */
  close(): Promise<void>;
  readonly isClosed: boolean;
}
