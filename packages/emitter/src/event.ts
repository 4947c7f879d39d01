import type { Event } from "./types.js";

/**
 * Default Event implementation. One instance is created per emission.
 */
export class BaseEvent implements Event {
  aborted = false;

  constructor(
    readonly topic: string,
    public payload: unknown,
  ) {}

  abort(): void {
    this.aborted = true;
  }
}
