import { InvalidPriorityError } from "@fanout/errors";
import { PRIORITY } from "./constants.js";

/** Whether a priority lies within [PRIORITY.LOWEST, PRIORITY.HIGHEST] */
export function isValidPriority(priority: number): boolean {
  return priority >= PRIORITY.LOWEST && priority <= PRIORITY.HIGHEST;
}

/**
 * Clamp a priority into the supported range.
 * NaN has no position in the ordering and is rejected.
 */
export function clampPriority(priority: number): number {
  if (Number.isNaN(priority)) {
    throw new InvalidPriorityError(priority);
  }
  return Math.min(PRIORITY.HIGHEST, Math.max(PRIORITY.LOWEST, priority));
}
