/**
 * Core types for jawadb
 */

import type { TrackedList, TrackedMap } from "./tracked.js";

/**
 * A JSON primitive
 */
export type JsonPrimitive = null | boolean | number | string;

/**
 * A plain JSON mapping
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * A plain JSON sequence
 */
export type JsonArray = JsonValue[];

/**
 * A plain JSON value
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * A tracked container of either kind
 */
export type TrackedContainer = TrackedMap | TrackedList;

/**
 * Values read back out of a document: primitives stay as-is,
 * mappings and sequences come back tracked.
 */
export type TrackedValue = JsonPrimitive | TrackedContainer;

/**
 * Anything a caller may hand to a mutation. Plain containers are wrapped on the way in;
 * containers may nest tracked values from the same document.
 */
export type JsonInput =
  | JsonPrimitive
  | TrackedContainer
  | { [key: string]: JsonInput }
  | JsonInput[];

/**
 * Kind of a container
 */
export type ContainerKind = "mapping" | "sequence";

/**
 * Kind of a document root. `scalar` roots come only from loading a file whose
 * top-level value is not an object or array, and are read-only.
 */
export type RootKind = "uninitialized" | ContainerKind | "scalar";

/**
 * Receiver of change notifications from tracked containers
 */
export interface ChangeSink {
  markModified(): void;
}

/**
 * Output layout used when a document is serialized
 */
export interface SerializeOptions {
  /** Spaces per indentation level (default: 2) */
  indent?: number;
  /** Emit mapping keys in code-point order instead of insertion order (default: false) */
  sortKeys?: boolean;
}
