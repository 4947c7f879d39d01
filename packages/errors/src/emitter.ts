/**
 * Emitter errors: registration, lookup, lifecycle, stream and pool failures.
 */

import { ConflictError } from "./bases/conflict-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { RateLimitError } from "./bases/rate-limit-error.js";
import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

// ============================================================================
// REGISTRATION ERRORS
// ============================================================================

export class NilListenerError extends ValidationError<"EMITTER_NIL_LISTENER"> {
  constructor() {
    super({
      code: "EMITTER_NIL_LISTENER",
      message: "Listener cannot be nil: expected a function",
    });
  }
}

export class InvalidTopicNameError extends ValidationError<"EMITTER_INVALID_TOPIC_NAME"> {
  constructor(public readonly topicName: string) {
    super({
      code: "EMITTER_INVALID_TOPIC_NAME",
      message: `Invalid topic name '${topicName}'`,
      metadata: { topicName },
    });
  }
}

export class InvalidPriorityError extends ValidationError<"EMITTER_INVALID_PRIORITY"> {
  constructor(public readonly priority: number) {
    super({
      code: "EMITTER_INVALID_PRIORITY",
      message: `Invalid priority: ${String(priority)}`,
    });
  }
}

export class EmitterConfigurationError extends ValidationError<"EMITTER_CONFIGURATION_INVALID"> {
  constructor(message: string, issues?: readonly ValidationIssue[]) {
    super({
      code: "EMITTER_CONFIGURATION_INVALID",
      message: `Invalid emitter configuration: ${message}`,
      ...(issues ? { issues } : {}),
    });
  }
}

// ============================================================================
// LOOKUP ERRORS
// ============================================================================

export class TopicNotFoundError extends NotFoundError<"EMITTER_TOPIC_NOT_FOUND"> {
  constructor(public readonly topicName: string) {
    super({
      code: "EMITTER_TOPIC_NOT_FOUND",
      message: `Topic not found: unable to find topic '${topicName}'`,
      metadata: { topicName },
    });
  }
}

export class ListenerNotFoundError extends NotFoundError<"EMITTER_LISTENER_NOT_FOUND"> {
  constructor(
    public readonly listenerId: string,
    public readonly topicName?: string,
  ) {
    super({
      code: "EMITTER_LISTENER_NOT_FOUND",
      message:
        topicName === undefined
          ? `Listener not found: '${listenerId}'`
          : `Listener not found: '${listenerId}' on topic '${topicName}'`,
      metadata: topicName === undefined ? { listenerId } : { listenerId, topicName },
    });
  }
}

// ============================================================================
// LIFECYCLE ERRORS
// ============================================================================

export class EmitterClosedError extends ConflictError<"EMITTER_CLOSED"> {
  constructor() {
    super({ code: "EMITTER_CLOSED", message: "Emitter is closed" });
  }
}

export class EmitterAlreadyClosedError extends ConflictError<"EMITTER_ALREADY_CLOSED"> {
  constructor() {
    super({ code: "EMITTER_ALREADY_CLOSED", message: "Emitter is already closed" });
  }
}

// ============================================================================
// STREAM + POOL ERRORS
// ============================================================================

export class ErrorStreamClosedError extends ConflictError<"STREAM_CLOSED"> {
  constructor() {
    super({ code: "STREAM_CLOSED", message: "Cannot send on a closed error stream" });
  }
}

export class PoolCapacityExceededError extends RateLimitError<"POOL_CAPACITY_EXCEEDED"> {
  constructor(public readonly maxCapacity: number) {
    super({
      code: "POOL_CAPACITY_EXCEEDED",
      message: `Worker pool queue is full (capacity ${maxCapacity})`,
      metadata: { maxCapacity: String(maxCapacity) },
    });
  }
}

export class PoolReleasedError extends ConflictError<"POOL_RELEASED"> {
  constructor() {
    super({ code: "POOL_RELEASED", message: "Worker pool has been released" });
  }
}
