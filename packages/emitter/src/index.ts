export const PACKAGE_NAME = "@fanout/emitter" as const;

// Config
export {
  DEFAULT_CONFIG,
  EmitterConfigSchema,
  ErrorBufferSizeSchema,
  resolveEmitterConfig,
  validateErrorBufferSize,
} from "./config.js";
// Constants
export {
  DEFAULT_ERROR_BUFFER_SIZE,
  MULTI_WILDCARD,
  PRIORITY,
  SEGMENT_SEPARATOR,
  SINGLE_WILDCARD,
} from "./constants.js";
// Emitter
export { createEmitter, MemoryEmitter } from "./emitter.js";
// Error stream
export { ErrorStream } from "./error-stream.js";
// Event
export { BaseEvent } from "./event.js";
// Pattern matching
export { isValidTopicName, matchTopicPattern } from "./match.js";
// Pool
export {
  isPool,
  type TaskErrorHandler,
  WorkerPool,
  type WorkerPoolOptions,
  WorkerPoolOptionsSchema,
} from "./pool.js";
// Priority
export { clampPriority, isValidPriority } from "./priority.js";
// Topic
export { Topic } from "./topic.js";
// Types
export type {
  Emitter,
  EmitterConfig,
  ErrorHandler,
  Event,
  IdGenerator,
  Listener,
  ListenerOptions,
  ListenerRecord,
  ListenerResult,
  PanicHandler,
  Pool,
  ResolvedEmitterConfig,
} from "./types.js";
