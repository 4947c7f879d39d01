import { ErrorStreamClosedError } from "@fanout/errors";
import { BoundedFifoQueue } from "./bounded-fifo.js";

interface PendingSend {
  readonly error: Error;
  readonly resolve: () => void;
}

type Receiver = (result: IteratorResult<Error, undefined>) => void;

/**
 * Bounded channel carrying the listener errors of one asynchronous emission.
 *
 * The producer awaits `send()`, which stays pending while the buffer is full,
 * so a slow consumer holds back the dispatch pass instead of losing errors.
 * Consumers read with `for await`, `next()` or `collect()`; iteration ends
 * once the stream is closed and the buffer has drained.
 */
export class ErrorStream implements AsyncIterable<Error> {
  private readonly buffer: BoundedFifoQueue<Error>;
  private readonly pendingSends: PendingSend[] = [];
  private readonly receivers: Receiver[] = [];
  private _closed = false;

  constructor(capacity: number) {
    this.buffer = new BoundedFifoQueue<Error>(capacity);
  }

  /** A closed stream pre-filled with the given errors */
  static of(...errors: Error[]): ErrorStream {
    const stream = new ErrorStream(Math.max(1, errors.length));
    for (const error of errors) {
      stream.buffer.enqueue(error);
    }
    stream.close();
    return stream;
  }

  /**
   * Deliver an error. Resolves once it is buffered or handed to a waiting
   * consumer.
   */
  send(error: Error): Promise<void> {
    if (this._closed) {
      return Promise.reject(new ErrorStreamClosedError());
    }

    const receiver = this.receivers.shift();
    if (receiver !== undefined) {
      receiver({ done: false, value: error });
      return Promise.resolve();
    }

    if (this.buffer.enqueue(error)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.pendingSends.push({ error, resolve });
    });
  }

  /**
   * Mark the end of the stream. Buffered errors, including those of senders
   * still waiting for a slot, stay readable; waiting senders are released.
   */
  close(): void {
    if (this._closed) {
      return;
    }
    this._closed = true;
    for (const pending of this.pendingSends) {
      pending.resolve();
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true, value: undefined });
    }
  }

  next(): Promise<IteratorResult<Error, undefined>> {
    const value = this.buffer.dequeue();
    if (value !== undefined) {
      // A slot opened up: admit the oldest blocked sender
      const pending = this.pendingSends.shift();
      if (pending !== undefined) {
        this.buffer.enqueue(pending.error);
        pending.resolve();
      }
      return Promise.resolve({ done: false, value });
    }

    if (this._closed) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<Error, undefined> {
    return { next: () => this.next() };
  }

  /** Read every remaining error until the stream ends */
  async collect(): Promise<Error[]> {
    const errors: Error[] = [];
    for await (const error of this) {
      errors.push(error);
    }
    return errors;
  }

  /** Number of buffered errors */
  get size(): number {
    return this.buffer.size;
  }

  get capacity(): number {
    return this.buffer.capacity;
  }

  get closed(): boolean {
    return this._closed;
  }
}
