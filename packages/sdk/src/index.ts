/**
 * jawadb SDK
 *
 * An embedded, file-backed JSON document store with change tracking and atomic saves
 */

// Re-export types
export type {
  JsonPrimitive,
  JsonObject,
  JsonArray,
  JsonValue,
  JsonInput,
  TrackedContainer,
  TrackedValue,
  ContainerKind,
  RootKind,
  ChangeSink,
  SerializeOptions,
} from "./types.js";
export type { OpenOptions, ResolvedOpenOptions } from "./options.js";
export type { Flushable, ProcessLike, RegistryOptions, FlushReport } from "./registry.js";
export type { AtomicWriteOptions } from "./io.js";
export type { LogLevel, LogEvent } from "./observability/logger.js";

// Documents
export { open, withDocument, JsonDocument } from "./document.js";

// Tracked containers
export { TrackedMap, TrackedList, wrap, toPlain, isPlainObject } from "./tracked.js";

// Lifecycle
export { LifecycleRegistry, defaultRegistry } from "./registry.js";

// Re-export utilities
export { serialize, parseJson, parseTracked } from "./format.js";
export { OpenOptionsSchema, resolveOpenOptions } from "./options.js";
export { atomicWriteSync, readDocumentSync, tempPathFor } from "./io.js";
export { Logger, logger } from "./observability/logger.js";

// Re-export errors
export {
  JawaDBError,
  LoadParseError,
  DocumentReadError,
  KindMismatchError,
  KeyTypeError,
  KeyNotFoundError,
  IndexOutOfRangeError,
  PersistenceError,
  SerializationError,
  DocumentClosedError,
  InvalidOptionsError,
} from "./errors.js";
