/**
 * Named priority levels for listener execution ordering.
 * Higher number = higher priority = executes first.
 * Any number works; values outside [LOWEST, HIGHEST] are clamped on registration.
 */
export const PRIORITY = {
  /** Priority 0: runs last */
  LOWEST: 0,
  /** Priority 25: runs late, for non-critical observers */
  LOW: 25,
  /** Priority 50: default priority */
  NORMAL: 50,
  /** Priority 75: runs early, for validation and guards */
  HIGH: 75,
  /** Priority 100: runs first */
  HIGHEST: 100,
} as const;

/** Matches exactly one topic segment */
export const SINGLE_WILDCARD = "*";

/** Matches zero or more topic segments */
export const MULTI_WILDCARD = "**";

/** Separator between topic segments */
export const SEGMENT_SEPARATOR = ".";

/** Characters a topic pattern may not contain */
export const RESERVED_TOPIC_CHARACTERS = ["?", "["] as const;

/** Default capacity of the error stream returned by emit() */
export const DEFAULT_ERROR_BUFFER_SIZE = 10;
