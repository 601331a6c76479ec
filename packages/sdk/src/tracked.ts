/**
 * Tracked containers: mappings and sequences that report every mutation
 * to the document that owns them.
 *
 * Invariants:
 * - Every mapping or sequence stored in a tracked container is itself tracked
 *   and bound to the same change sink
 * - Every mutation calls `markModified()` on the sink after it is applied
 * - Reads never notify the sink, except `getOrInsert` when it inserts
 * - Only the operations declared here exist; nothing is forwarded to the
 *   underlying Map or array
 */

import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  KeyTypeError,
  KindMismatchError,
  SerializationError,
  describeType,
  escapePointer,
} from "./errors.js";
import type {
  ChangeSink,
  JsonArray,
  JsonInput,
  JsonObject,
  JsonValue,
  TrackedValue,
} from "./types.js";

/**
 * Wrap a value for storage under `sink`.
 *
 * Plain objects and arrays become tracked containers (recursively). A container
 * already bound to `sink` is kept as-is; one bound to another document is copied,
 * so the tree never reaches a container owned elsewhere. Primitives pass through.
 * Dates, class instances and other non-plain objects are stored as given and,
 * like every value JSON cannot represent, rejected at save time.
 *
 * @throws SerializationError if `value` contains itself; the pointer is relative to `value`
 */
export function wrap(value: JsonInput, sink: ChangeSink): TrackedValue {
  return wrapAt(value, sink, new Set(), "");
}

function wrapAt(
  value: JsonInput,
  sink: ChangeSink,
  ancestors: Set<object>,
  pointer: string
): TrackedValue {
  if (value instanceof TrackedMap || value instanceof TrackedList) {
    return value.isBoundTo(sink) ? value : wrapAt(value.toJSON(), sink, ancestors, pointer);
  }
  if (Array.isArray(value)) {
    const list = value;
    return within(list, ancestors, pointer, () => {
      const items = list.map((item, i) => wrapAt(item, sink, ancestors, `${pointer}/${i}`));
      return new TrackedList(sink, items);
    });
  }
  if (isPlainObject(value)) {
    const object = value;
    return within(object, ancestors, pointer, () => {
      const entries = Object.entries(object).map(
        ([key, child]): [string, TrackedValue] => [
          key,
          wrapAt(child, sink, ancestors, `${pointer}/${escapePointer(key)}`),
        ]
      );
      return new TrackedMap(sink, entries);
    });
  }
  return value;
}

function within<T>(node: object, ancestors: Set<object>, pointer: string, build: () => T): T {
  if (ancestors.has(node)) {
    throw new SerializationError(pointer, "circular reference");
  }
  ancestors.add(node);
  try {
    return build();
  } finally {
    ancestors.delete(node);
  }
}

/**
 * True for objects whose prototype is `Object.prototype` or `null`
 */
export function isPlainObject(value: JsonInput): value is { [key: string]: JsonInput } {
  if (value === null || typeof value !== "object") return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Deep-copy a tracked value back into plain JSON
 */
export function toPlain(value: TrackedValue): JsonValue {
  if (value instanceof TrackedMap || value instanceof TrackedList) {
    return value.toJSON();
  }
  return value;
}

/**
 * Kind name of a stored value, used in mismatch errors
 */
export function kindOf(value: TrackedValue | undefined): string {
  if (value instanceof TrackedMap) return "mapping";
  if (value instanceof TrackedList) return "sequence";
  if (value === undefined) return "undefined";
  return describeType(value);
}

function assertKey(key: unknown): asserts key is string {
  if (typeof key !== "string") {
    throw new KeyTypeError(key);
  }
}

/**
 * Mapping from string keys to values, insertion-ordered
 */
export class TrackedMap implements Iterable<[string, TrackedValue]> {
  readonly kind = "mapping" as const;

  readonly #sink: ChangeSink;
  readonly #entries = new Map<string, TrackedValue>();

  constructor(sink: ChangeSink, entries: Iterable<[string, JsonInput]> = []) {
    this.#sink = sink;
    for (const [key, value] of entries) {
      assertKey(key);
      this.#entries.set(key, wrap(value, sink));
    }
  }

  /**
   * @internal True when mutations of this container notify `sink`
   */
  isBoundTo(sink: ChangeSink): boolean {
    return this.#sink === sink;
  }

  get size(): number {
    return this.#entries.size;
  }

  /**
   * Pure lookup. Returns `undefined` for an absent key and never inserts.
   */
  get(key: string): TrackedValue | undefined {
    assertKey(key);
    return this.#entries.get(key);
  }

  /**
   * Read with materialization: when `key` is absent, `fallback` is wrapped,
   * inserted under `key` and returned, and the document is marked modified.
   * Mutating the returned container is therefore tracked like any other.
   */
  getOrInsert(key: string, fallback: JsonInput = null): TrackedValue {
    assertKey(key);
    const existing = this.#entries.get(key);
    if (existing !== undefined) return existing;
    const wrapped = wrap(fallback, this.#sink);
    this.#entries.set(key, wrapped);
    this.#sink.markModified();
    return wrapped;
  }

  /**
   * `getOrInsert(key, {})`, narrowed to a mapping
   * @throws KindMismatchError if the existing value is not a mapping
   */
  getOrInsertMap(key: string): TrackedMap {
    const value = this.getOrInsert(key, {});
    if (!(value instanceof TrackedMap)) {
      throw new KindMismatchError("mapping", kindOf(value));
    }
    return value;
  }

  /**
   * `getOrInsert(key, [])`, narrowed to a sequence
   * @throws KindMismatchError if the existing value is not a sequence
   */
  getOrInsertList(key: string): TrackedList {
    const value = this.getOrInsert(key, []);
    if (!(value instanceof TrackedList)) {
      throw new KindMismatchError("sequence", kindOf(value));
    }
    return value;
  }

  /**
   * Pure lookup narrowed to a mapping; `undefined` when absent
   */
  getMap(key: string): TrackedMap | undefined {
    const value = this.get(key);
    if (value === undefined || value instanceof TrackedMap) return value;
    throw new KindMismatchError("mapping", kindOf(value));
  }

  /**
   * Pure lookup narrowed to a sequence; `undefined` when absent
   */
  getList(key: string): TrackedList | undefined {
    const value = this.get(key);
    if (value === undefined || value instanceof TrackedList) return value;
    throw new KindMismatchError("sequence", kindOf(value));
  }

  set(key: string, value: JsonInput): void {
    assertKey(key);
    this.#entries.set(key, wrap(value, this.#sink));
    this.#sink.markModified();
  }

  /**
   * @throws KeyNotFoundError if `key` is absent
   */
  delete(key: string): void {
    assertKey(key);
    if (!this.#entries.delete(key)) {
      throw new KeyNotFoundError(key);
    }
    this.#sink.markModified();
  }

  has(key: string): boolean {
    assertKey(key);
    return this.#entries.has(key);
  }

  keys(): IterableIterator<string> {
    return this.#entries.keys();
  }

  values(): IterableIterator<TrackedValue> {
    return this.#entries.values();
  }

  entries(): IterableIterator<[string, TrackedValue]> {
    return this.#entries.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, TrackedValue]> {
    return this.#entries.entries();
  }

  toJSON(): JsonObject {
    const out: JsonObject = {};
    for (const [key, value] of this.#entries) {
      Object.defineProperty(out, key, {
        value: toPlain(value),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
}

/**
 * Indexable sequence of values
 */
export class TrackedList implements Iterable<TrackedValue> {
  readonly kind = "sequence" as const;

  readonly #sink: ChangeSink;
  readonly #items: TrackedValue[] = [];

  constructor(sink: ChangeSink, items: Iterable<JsonInput> = []) {
    this.#sink = sink;
    for (const item of items) {
      this.#items.push(wrap(item, sink));
    }
  }

  /**
   * @internal True when mutations of this container notify `sink`
   */
  isBoundTo(sink: ChangeSink): boolean {
    return this.#sink === sink;
  }

  get length(): number {
    return this.#items.length;
  }

  /**
   * Read by index; negative indices count from the end.
   * Returns `undefined` when out of range.
   */
  at(index: number): TrackedValue | undefined {
    if (!Number.isInteger(index)) return undefined;
    return this.#items.at(index);
  }

  append(value: JsonInput): void {
    this.#items.push(wrap(value, this.#sink));
    this.#sink.markModified();
  }

  extend(values: Iterable<JsonInput>): void {
    // A throwing iterator leaves the list unchanged
    const wrapped = Array.from(values, (value) => wrap(value, this.#sink));
    this.#items.push(...wrapped);
    this.#sink.markModified();
  }

  /**
   * In-place concatenation; same as `extend`
   */
  concatInPlace(values: Iterable<JsonInput>): this {
    this.extend(values);
    return this;
  }

  /**
   * @throws IndexOutOfRangeError if `index` is not an integer or is out of range
   */
  setAt(index: number, value: JsonInput): void {
    const position = this.#resolve(index);
    this.#items[position] = wrap(value, this.#sink);
    this.#sink.markModified();
  }

  /**
   * @throws IndexOutOfRangeError if `index` is not an integer or is out of range
   */
  deleteAt(index: number): void {
    const position = this.#resolve(index);
    this.#items.splice(position, 1);
    this.#sink.markModified();
  }

  values(): IterableIterator<TrackedValue> {
    return this.#items.values();
  }

  [Symbol.iterator](): IterableIterator<TrackedValue> {
    return this.#items.values();
  }

  toJSON(): JsonArray {
    return this.#items.map(toPlain);
  }

  #resolve(index: number): number {
    const length = this.#items.length;
    if (!Number.isInteger(index)) {
      throw new IndexOutOfRangeError(index, length);
    }
    const position = index < 0 ? index + length : index;
    if (position < 0 || position >= length) {
      throw new IndexOutOfRangeError(index, length);
    }
    return position;
  }
}
