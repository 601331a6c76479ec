/**
 * Error types for jawadb operations
 *
 * Invariants:
 * - Errors that concern a file include its absolute path in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { ContainerKind } from "./types.js";

/**
 * Base class for all jawadb errors
 */
export abstract class JawaDBError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by open() when the file holds malformed JSON
 */
export class LoadParseError extends JawaDBError {
  readonly code = "E_PARSE";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to parse document: ${filePath}`, options);
  }
}

/**
 * Thrown by open() when the file exists but cannot be read
 */
export class DocumentReadError extends JawaDBError {
  readonly code = "E_READ";

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a mapping operation hits a sequence, or the reverse.
 * `actual` is a root kind or, for nested values, the JSON type found.
 */
export class KindMismatchError extends JawaDBError {
  readonly code = "E_KIND";

  constructor(
    public readonly expected: ContainerKind,
    public readonly actual: string,
    options?: ErrorOptions
  ) {
    super(`Cannot use ${actual} as a ${expected}`, options);
  }
}

/**
 * Thrown when a mapping key is not a string
 */
export class KeyTypeError extends JawaDBError {
  readonly code = "E_KEY_TYPE";

  constructor(key: unknown, options?: ErrorOptions) {
    super(`Mapping keys must be strings, got ${describeType(key)}`, options);
  }
}

/**
 * Thrown when deleting a key that is not present
 */
export class KeyNotFoundError extends JawaDBError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key not found: ${JSON.stringify(key)}`, options);
  }
}

/**
 * Thrown when a sequence index is not an integer or falls outside the sequence
 */
export class IndexOutOfRangeError extends JawaDBError {
  readonly code = "E_INDEX";

  constructor(
    public readonly index: number,
    public readonly length: number,
    options?: ErrorOptions
  ) {
    super(`Index ${index} out of range for sequence of length ${length}`, options);
  }
}

/**
 * Thrown when writing the temp file or replacing the target fails.
 * The target file is untouched and the document stays dirty.
 */
export class PersistenceError extends JawaDBError {
  readonly code = "E_PERSIST";

  constructor(
    public readonly filePath: string,
    public readonly tempPath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to write document: ${filePath} (via ${tempPath})`, options);
  }
}

/**
 * Thrown at save time when a value in the tree has no JSON representation
 */
export class SerializationError extends JawaDBError {
  readonly code = "E_SERIALIZE";

  constructor(
    public readonly pointer: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot serialize value at "${pointer}": ${reason}`, options);
  }
}

/**
 * Thrown when a closed document is used
 */
export class DocumentClosedError extends JawaDBError {
  readonly code = "E_CLOSED";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Document is closed: ${filePath}`, options);
  }
}

/**
 * Thrown when open() receives options that fail validation
 */
export class InvalidOptionsError extends JawaDBError {
  readonly code = "E_OPTIONS";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid document options: ${issues.join("; ")}`, options);
  }
}

/**
 * JSON type name of a runtime value, for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/**
 * Escape one JSON pointer segment (RFC 6901)
 */
export function escapePointer(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}
