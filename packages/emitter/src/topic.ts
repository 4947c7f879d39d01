import { ListenerNotFoundError } from "@fanout/errors";
import { clampPriority } from "./priority.js";
import type { Event, Listener, ListenerRecord } from "./types.js";

/**
 * Binary search for the insertion index into a list sorted by descending priority.
 * Inserts after existing entries of the same priority, so equal priorities run FIFO.
 */
function findInsertIndex(records: readonly ListenerRecord[], priority: number): number {
  let low = 0;
  let high = records.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const midRecord = records[mid];
    if (midRecord !== undefined && midRecord.priority >= priority) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * The listeners registered under one topic pattern, kept in invocation order.
 *
 * The ordered array is replaced on every mutation, so a trigger that is
 * already iterating keeps its own snapshot while listeners add or remove
 * entries from inside a callback.
 */
export class Topic {
  private ordered: readonly ListenerRecord[] = [];
  private readonly records = new Map<string, ListenerRecord>();

  constructor(readonly pattern: string) {}

  /**
   * Register a listener. The priority is clamped into range; IDs are not
   * checked for uniqueness, a duplicate replaces the earlier entry's lookup.
   */
  add(id: string, listener: Listener, priority: number): void {
    const record: ListenerRecord = { id, listener, priority: clampPriority(priority) };
    const previous = this.records.get(id);
    const base =
      previous === undefined ? this.ordered : this.ordered.filter((r) => r !== previous);
    const index = findInsertIndex(base, record.priority);
    this.ordered = [...base.slice(0, index), record, ...base.slice(index)];
    this.records.set(id, record);
  }

  /**
   * @throws {ListenerNotFoundError} when no listener with this ID is registered
   */
  remove(id: string): void {
    const record = this.records.get(id);
    if (record === undefined) {
      throw new ListenerNotFoundError(id, this.pattern);
    }
    this.records.delete(id);
    this.ordered = this.ordered.filter((r) => r !== record);
  }

  /**
   * Invoke listeners from highest to lowest priority and collect the errors
   * they return. Stops after the listener that aborts the event.
   * Thrown values propagate to the caller.
   */
  trigger(event: Event): Error[] {
    const errors: Error[] = [];
    const snapshot = this.ordered;
    for (const record of snapshot) {
      // Removed since the snapshot was taken
      if (this.records.get(record.id) !== record) {
        continue;
      }
      const result = record.listener(event);
      if (result instanceof Error) {
        errors.push(result);
      }
      if (event.aborted) {
        break;
      }
    }
    return errors;
  }

  get listenerCount(): number {
    return this.ordered.length;
  }

  /** Listener IDs in invocation order */
  listenerIds(): string[] {
    return this.ordered.map((r) => r.id);
  }

  hasListener(id: string): boolean {
    return this.records.has(id);
  }
}
