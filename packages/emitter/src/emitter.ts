import {
  EmitterAlreadyClosedError,
  EmitterClosedError,
  InvalidTopicNameError,
  NilListenerError,
  TopicNotFoundError,
  wrapError,
} from "@fanout/errors";
import { resolveEmitterConfig, validateErrorBufferSize } from "./config.js";
import { PRIORITY } from "./constants.js";
import { ErrorStream } from "./error-stream.js";
import { BaseEvent } from "./event.js";
import { isValidTopicName, matchTopicPattern } from "./match.js";
import { clampPriority } from "./priority.js";
import { Topic } from "./topic.js";
import type {
  Emitter,
  EmitterConfig,
  ErrorHandler,
  IdGenerator,
  Listener,
  ListenerOptions,
  PanicHandler,
  Pool,
} from "./types.js";

/**
 * In-memory event emitter with wildcard topic patterns.
 *
 * Listeners subscribe to patterns (`user.*`, `order.**`); an emission on a
 * concrete topic runs the listeners of every matching pattern, highest
 * priority first within each pattern. Listener errors are collected and
 * returned (emitSync) or streamed (emit).
 *
 * @example
 * ```typescript
 * const emitter = new MemoryEmitter();
 * emitter.on("user.*", (event) => {
 *   console.log(event.topic, event.payload);
 * });
 * const errors = emitter.emitSync("user.created", { id: 1 });
 * ```
 */
export class MemoryEmitter implements Emitter {
  private readonly topics = new Map<string, Topic>();
  private errorHandler: ErrorHandler;
  private idGenerator: IdGenerator;
  private panicHandler: PanicHandler;
  private pool: Pool | undefined;
  private errorBufferSize: number;
  private closed = false;

  constructor(config?: EmitterConfig) {
    const resolved = resolveEmitterConfig(config);
    this.errorHandler = resolved.errorHandler;
    this.idGenerator = resolved.idGenerator;
    this.panicHandler = resolved.panicHandler;
    this.pool = resolved.pool;
    this.errorBufferSize = resolved.errorBufferSize;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a listener on a topic pattern.
   *
   * Registration stays possible after close(); such listeners never run.
   *
   * @returns The generated listener ID, needed for off()
   * @throws {NilListenerError} if the listener is not a function
   * @throws {InvalidTopicNameError} if the pattern is empty or contains `?` or `[`
   * @throws {InvalidPriorityError} if the priority is NaN
   */
  on(topicName: string, listener: Listener, options: ListenerOptions = {}): string {
    if (typeof listener !== "function") {
      throw new NilListenerError();
    }
    if (!isValidTopicName(topicName)) {
      throw new InvalidTopicNameError(topicName);
    }
    const priority = clampPriority(options.priority ?? PRIORITY.NORMAL);
    const id = this.idGenerator();
    this.ensureTopic(topicName).add(id, listener, priority);
    return id;
  }

  /**
   * @throws {TopicNotFoundError} if nothing was ever registered on the pattern
   * @throws {ListenerNotFoundError} if the pattern has no listener with this ID
   */
  off(topicName: string, listenerId: string): void {
    const topic = this.topics.get(topicName);
    if (topic === undefined) {
      throw new TopicNotFoundError(topicName);
    }
    topic.remove(listenerId);
  }

  /**
   * @throws {TopicNotFoundError} if the pattern has no registry
   */
  getTopic(topicName: string): Topic {
    const topic = this.topics.get(topicName);
    if (topic === undefined) {
      throw new TopicNotFoundError(topicName);
    }
    return topic;
  }

  ensureTopic(topicName: string): Topic {
    let topic = this.topics.get(topicName);
    if (topic === undefined) {
      topic = new Topic(topicName);
      this.topics.set(topicName, topic);
    }
    return topic;
  }

  // -------------------------------------------------------------------------
  // Emission
  // -------------------------------------------------------------------------

  /**
   * Run every matching listener on the caller's stack.
   *
   * @returns Listener errors after the error handler, in invocation order
   */
  emitSync(topicName: string, payload?: unknown): Error[] {
    if (this.closed) {
      return [new EmitterClosedError()];
    }
    return [...this.dispatch(topicName, payload)];
  }

  /**
   * Schedule a dispatch pass and return its error stream immediately.
   *
   * The pass runs on the configured pool, or on its own macrotask when no
   * pool is set. It waits whenever the stream buffer is full. The stream
   * closes when the pass ends; closing it earlier discards the remaining
   * errors without stopping the pass.
   */
  emit(topicName: string, payload?: unknown): ErrorStream {
    if (this.closed) {
      return ErrorStream.of(new EmitterClosedError());
    }

    const stream = new ErrorStream(this.errorBufferSize);
    const pass = this.dispatch(topicName, payload);
    const task = async (): Promise<void> => {
      try {
        for (const error of pass) {
          // Closed early by the consumer: drop the error, finish the pass
          if (!stream.closed) {
            await stream.send(error);
          }
        }
      } finally {
        stream.close();
      }
    };

    const pool = this.pool;
    if (pool === undefined) {
      setImmediate(() => {
        void task().catch((error: unknown) => {
          this.panicHandler(error);
        });
      });
      return stream;
    }

    try {
      pool.submit(task);
    } catch (error) {
      return ErrorStream.of(error instanceof Error ? error : wrapError(error));
    }
    return stream;
  }

  /**
   * One dispatch pass, yielding handled errors as listeners produce them.
   *
   * The topic map is iterated live. A thrown value ends the pass and goes to
   * the panic handler exactly once.
   */
  private *dispatch(topicName: string, payload: unknown): Generator<Error, void, undefined> {
    const event = new BaseEvent(topicName, payload);
    try {
      for (const [pattern, topic] of this.topics) {
        if (!matchTopicPattern(pattern, topicName)) {
          continue;
        }
        for (const error of topic.trigger(event)) {
          const handled = this.errorHandler(event, error);
          if (handled !== null && handled !== undefined) {
            yield handled;
          }
        }
      }
    } catch (panic) {
      this.panicHandler(panic);
    }
  }

  // -------------------------------------------------------------------------
  // Runtime configuration
  // -------------------------------------------------------------------------

  setErrorHandler(handler: ErrorHandler): void {
    this.errorHandler = handler;
  }

  setIdGenerator(generator: IdGenerator): void {
    this.idGenerator = generator;
  }

  setPanicHandler(handler: PanicHandler): void {
    this.panicHandler = handler;
  }

  /** Replace the pool; undefined restores one macrotask per emit */
  setPool(pool: Pool | undefined): void {
    this.pool = pool;
  }

  /**
   * @throws {EmitterConfigurationError} unless size is a positive integer
   */
  setErrorBufferSize(size: number): void {
    this.errorBufferSize = validateErrorBufferSize(size);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Refuse further emissions, drop every topic and release the pool.
   * Passes already running are not interrupted.
   *
   * @throws {EmitterAlreadyClosedError} on the second call
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new EmitterAlreadyClosedError();
    }
    this.closed = true;
    this.topics.clear();
    if (this.pool !== undefined) {
      await this.pool.release();
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/** Create a MemoryEmitter from validated config */
export function createEmitter(config?: EmitterConfig): MemoryEmitter {
  return new MemoryEmitter(config);
}
