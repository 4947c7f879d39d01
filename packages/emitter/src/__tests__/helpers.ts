import type { Event, IdGenerator, Listener, Pool } from "../types.js";

// ---------------------------------------------------------------------------
// ID generation
// ---------------------------------------------------------------------------

/** Deterministic IDs: "listener-1", "listener-2", ... */
export function makeSequentialIds(prefix = "listener"): IdGenerator {
  let next = 0;
  return () => {
    next++;
    return `${prefix}-${next}`;
  };
}

// ---------------------------------------------------------------------------
// Listeners
// ---------------------------------------------------------------------------

/** Listener that appends its label to a shared call log */
export function recordingListener(calls: string[], label: string): Listener {
  return () => {
    calls.push(label);
  };
}

/** Listener that records its label and returns an error named after it */
export function failingListener(calls: string[], label: string): Listener {
  return () => {
    calls.push(label);
    return new Error(label);
  };
}

/** Listener that records its label and aborts the event */
export function abortingListener(calls: string[], label: string): Listener {
  return (event: Event) => {
    calls.push(label);
    event.abort();
  };
}

// ---------------------------------------------------------------------------
// Pools
// ---------------------------------------------------------------------------

/**
 * Pool that only queues tasks; the test decides when they run.
 */
export class ManualPool implements Pool {
  readonly tasks: (() => Promise<void>)[] = [];
  released = false;
  private active = 0;

  submit(task: () => Promise<void>): void {
    this.tasks.push(task);
  }

  running(): number {
    return this.active;
  }

  async release(): Promise<void> {
    this.released = true;
  }

  /** Run every queued task to completion, in submission order */
  async runAll(): Promise<void> {
    while (this.tasks.length > 0) {
      const task = this.tasks.shift();
      if (task === undefined) {
        break;
      }
      this.active++;
      try {
        await task();
      } finally {
        this.active--;
      }
    }
  }
}

/** Pool whose submit always throws the given error */
export class RejectingPool implements Pool {
  constructor(private readonly error: Error) {}

  submit(): void {
    throw this.error;
  }

  running(): number {
    return 0;
  }

  async release(): Promise<void> {}
}

/** Resolve after pending macrotasks (setImmediate) have run */
export function flushMacrotasks(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}
