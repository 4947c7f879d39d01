import { PoolCapacityExceededError, PoolReleasedError, ValidationError } from "@fanout/errors";
import { z } from "zod";
import type { Pool } from "./types.js";
import { formatIssues, functionSchema, toValidationIssues } from "./validation.js";

type Task = () => Promise<void>;

/** Receives the rejection of a task run by the pool */
export type TaskErrorHandler = (error: unknown) => void;

export const WorkerPoolOptionsSchema = z.object({
  /** Maximum tasks running at once */
  maxWorkers: z.number().int().positive(),
  /** Maximum tasks waiting for a worker (default: unbounded) */
  maxCapacity: z.number().int().nonnegative().optional(),
  onTaskError: functionSchema<TaskErrorHandler>("onTaskError").optional(),
});

export type WorkerPoolOptions = z.input<typeof WorkerPoolOptionsSchema>;

const defaultTaskErrorHandler: TaskErrorHandler = (error) => {
  console.error("[WorkerPool] Task failed:", error);
};

/** Structural check for a Pool implementation */
export function isPool(value: unknown): value is Pool {
  return (
    typeof value === "object" &&
    value !== null &&
    "submit" in value &&
    typeof value.submit === "function" &&
    "running" in value &&
    typeof value.running === "function" &&
    "release" in value &&
    typeof value.release === "function"
  );
}

/**
 * Fixed-size worker pool for asynchronous dispatch passes.
 *
 * Runs at most `maxWorkers` tasks at a time; further tasks wait in FIFO
 * order. Tasks start on a microtask, never inside `submit()`.
 */
export class WorkerPool implements Pool {
  private readonly maxWorkers: number;
  private readonly maxCapacity: number | undefined;
  private readonly onTaskError: TaskErrorHandler;
  private readonly queue: Task[] = [];
  private readonly idleWaiters: (() => void)[] = [];
  private active = 0;
  private released = false;

  /**
   * @throws {ValidationError} when the options fail validation
   */
  constructor(options: WorkerPoolOptions) {
    const result = WorkerPoolOptionsSchema.safeParse(options);
    if (!result.success) {
      const issues = toValidationIssues(result.error);
      throw new ValidationError({
        code: "VALIDATION_FAILED",
        message: `Invalid worker pool options: ${formatIssues(issues)}`,
        issues,
      });
    }
    this.maxWorkers = result.data.maxWorkers;
    this.maxCapacity = result.data.maxCapacity;
    this.onTaskError = result.data.onTaskError ?? defaultTaskErrorHandler;
  }

  /**
   * @throws {PoolReleasedError} after release()
   * @throws {PoolCapacityExceededError} when every worker is busy and the wait queue is full
   */
  submit(task: Task): void {
    if (this.released) {
      throw new PoolReleasedError();
    }
    if (this.active < this.maxWorkers) {
      this.start(task);
      return;
    }
    if (this.maxCapacity !== undefined && this.queue.length >= this.maxCapacity) {
      throw new PoolCapacityExceededError(this.maxCapacity);
    }
    this.queue.push(task);
  }

  running(): number {
    return this.active;
  }

  /** Tasks accepted but not yet started */
  get waiting(): number {
    return this.queue.length;
  }

  get isReleased(): boolean {
    return this.released;
  }

  release(): Promise<void> {
    this.released = true;
    if (this.active === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private start(task: Task): void {
    this.active++;
    void Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        this.onTaskError(error);
      })
      .finally(() => {
        this.finish();
      });
  }

  private finish(): void {
    this.active--;
    const next = this.queue.shift();
    if (next !== undefined) {
      this.start(next);
      return;
    }
    if (this.active === 0) {
      for (const resolve of this.idleWaiters.splice(0)) {
        resolve();
      }
    }
  }
}
