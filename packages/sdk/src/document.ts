/**
 * File-backed JSON document
 *
 * A document binds one file path to an in-memory tree of tracked containers.
 * The root starts out in one of four states and only ever moves from
 * `uninitialized` to `mapping` or `sequence`:
 *
 * - uninitialized: the file did not exist; the first mapping or sequence
 *   operation decides the kind
 * - mapping / sequence: fixed for the lifetime of the document
 * - scalar: the file held a bare string, number, boolean or null; read-only
 *
 * Invariants:
 * - Every container reachable from the root is bound to this document's state
 * - `isDirty === false` means the tree serializes to the last persisted snapshot
 * - A failed save leaves the file untouched and the document dirty
 */

import { resolve } from "node:path";
import { DocumentClosedError, KindMismatchError, LoadParseError } from "./errors.js";
import { parseTracked, serialize } from "./format.js";
import { atomicWriteSync, readDocumentSync } from "./io.js";
import { errorFields, logger } from "./observability/logger.js";
import { resolveOpenOptions, type OpenOptions, type ResolvedOpenOptions } from "./options.js";
import { defaultRegistry, type Flushable, type LifecycleRegistry } from "./registry.js";
import { TrackedList, TrackedMap } from "./tracked.js";
import type {
  ChangeSink,
  JsonInput,
  JsonPrimitive,
  JsonValue,
  RootKind,
  TrackedValue,
} from "./types.js";

type RootState =
  | { kind: "uninitialized" }
  | { kind: "mapping"; container: TrackedMap }
  | { kind: "sequence"; container: TrackedList }
  | { kind: "scalar"; value: JsonPrimitive };

/**
 * @internal Mutable state behind a document handle. Containers notify this object,
 * and the lifecycle registry flushes it, so it must never reference the handle.
 */
export class DocumentState implements ChangeSink, Flushable {
  root: RootState = { kind: "uninitialized" };
  snapshot: string | null = null;
  #dirty = false;
  #saving = false;

  constructor(
    readonly path: string,
    readonly options: ResolvedOpenOptions
  ) {}

  get isDirty(): boolean {
    return this.#dirty;
  }

  get isSaving(): boolean {
    return this.#saving;
  }

  markModified(): void {
    this.#dirty = true;
  }

  load(): void {
    const text = readDocumentSync(this.path);
    if (text === null) {
      logger.debug("document.open", { path: this.path, kind: "uninitialized" });
      return;
    }

    let parsed: TrackedValue;
    try {
      parsed = parseTracked(text, this);
    } catch (err) {
      throw new LoadParseError(this.path, { cause: err });
    }

    if (parsed instanceof TrackedList) {
      this.root = { kind: "sequence", container: parsed };
    } else if (parsed instanceof TrackedMap) {
      this.root = { kind: "mapping", container: parsed };
    } else {
      this.root = { kind: "scalar", value: parsed };
    }
    this.snapshot = this.render();
    logger.debug("document.open", { path: this.path, kind: this.root.kind });
  }

  /**
   * Serialized form of the current root, with trailing newline
   */
  render(): string {
    const { indent, sortKeys } = this.options;
    switch (this.root.kind) {
      case "uninitialized":
        return "{}\n";
      case "scalar":
        return serialize(this.root.value, { indent, sortKeys });
      default:
        return serialize(this.root.container, { indent, sortKeys });
    }
  }

  save(): boolean {
    if (!this.#dirty) return false;
    const root = this.root;
    if (root.kind === "uninitialized" || root.kind === "scalar") return false;

    this.#saving = true;
    try {
      const text = serialize(root.container, {
        indent: this.options.indent,
        sortKeys: this.options.sortKeys,
      });
      if (text === this.snapshot) {
        this.#dirty = false;
        logger.debug("document.save.skipped", { path: this.path });
        return false;
      }

      atomicWriteSync(this.path, text, { fsync: this.options.fsync });
      this.snapshot = text;
      this.#dirty = false;
      logger.debug("document.save", { path: this.path, bytes: Buffer.byteLength(text) });
      return true;
    } finally {
      this.#saving = false;
    }
  }
}

/**
 * Handle to a file-backed document
 *
 * Mapping operations (`get`, `set`, ...) and sequence operations (`append`, ...)
 * fix the root kind on first use and fail with KindMismatchError afterwards if the
 * other kind is requested. Pure reads never fix the kind.
 */
export class JsonDocument {
  readonly #state: DocumentState;
  readonly #registry: LifecycleRegistry | null;
  #closed = false;

  /**
   * @internal Use open()
   */
  constructor(state: DocumentState, registry: LifecycleRegistry | null) {
    this.#state = state;
    this.#registry = registry;
    registry?.register(this, state);
  }

  /** Absolute path of the backing file */
  get path(): string {
    return this.#state.path;
  }

  get kind(): RootKind {
    return this.#state.root.kind;
  }

  get isDirty(): boolean {
    return this.#state.isDirty;
  }

  get isClosed(): boolean {
    return this.#closed;
  }

  /**
   * The root value: a tracked container, a scalar, or undefined while uninitialized
   */
  get root(): TrackedValue | undefined {
    const root = this.#state.root;
    switch (root.kind) {
      case "uninitialized":
        return undefined;
      case "scalar":
        return root.value;
      default:
        return root.container;
    }
  }

  /**
   * Fix the root as a mapping, creating an empty one if uninitialized
   * @throws KindMismatchError if the root is a sequence or scalar
   */
  ensureMapping(): TrackedMap {
    this.#assertOpen();
    const root = this.#state.root;
    if (root.kind === "mapping") return root.container;
    if (root.kind !== "uninitialized") {
      throw new KindMismatchError("mapping", root.kind);
    }
    const container = new TrackedMap(this.#state);
    this.#state.root = { kind: "mapping", container };
    this.#state.markModified();
    return container;
  }

  /**
   * Fix the root as a sequence, creating an empty one if uninitialized
   * @throws KindMismatchError if the root is a mapping or scalar
   */
  ensureSequence(): TrackedList {
    this.#assertOpen();
    const root = this.#state.root;
    if (root.kind === "sequence") return root.container;
    if (root.kind !== "uninitialized") {
      throw new KindMismatchError("sequence", root.kind);
    }
    const container = new TrackedList(this.#state);
    this.#state.root = { kind: "sequence", container };
    this.#state.markModified();
    return container;
  }

  // Mapping side

  /**
   * Pure lookup; never inserts and never fixes the root kind
   */
  get(key: string): TrackedValue | undefined {
    return this.#peekMapping()?.get(key);
  }

  /**
   * Read with materialization: inserts `fallback` when `key` is absent.
   * See TrackedMap.getOrInsert.
   */
  getOrInsert(key: string, fallback: JsonInput = null): TrackedValue {
    return this.ensureMapping().getOrInsert(key, fallback);
  }

  getOrInsertMap(key: string): TrackedMap {
    return this.ensureMapping().getOrInsertMap(key);
  }

  getOrInsertList(key: string): TrackedList {
    return this.ensureMapping().getOrInsertList(key);
  }

  getMap(key: string): TrackedMap | undefined {
    return this.#peekMapping()?.getMap(key);
  }

  getList(key: string): TrackedList | undefined {
    return this.#peekMapping()?.getList(key);
  }

  set(key: string, value: JsonInput): void {
    this.ensureMapping().set(key, value);
  }

  /**
   * @throws KeyNotFoundError if `key` is absent
   */
  delete(key: string): void {
    this.ensureMapping().delete(key);
  }

  has(key: string): boolean {
    return this.#peekMapping()?.has(key) ?? false;
  }

  keys(): string[] {
    const mapping = this.#peekMapping();
    return mapping ? Array.from(mapping.keys()) : [];
  }

  // Sequence side

  get length(): number {
    return this.#peekSequence()?.length ?? 0;
  }

  at(index: number): TrackedValue | undefined {
    return this.#peekSequence()?.at(index);
  }

  append(value: JsonInput): void {
    this.ensureSequence().append(value);
  }

  extend(values: Iterable<JsonInput>): void {
    this.ensureSequence().extend(values);
  }

  /**
   * In-place concatenation; same as `extend`
   */
  concatInPlace(values: Iterable<JsonInput>): this {
    this.ensureSequence().concatInPlace(values);
    return this;
  }

  setAt(index: number, value: JsonInput): void {
    this.ensureSequence().setAt(index, value);
  }

  deleteAt(index: number): void {
    this.ensureSequence().deleteAt(index);
  }

  // Persistence

  markModified(): void {
    this.#state.markModified();
  }

  /**
   * Persist the tree if it changed since the last save or load
   * @returns true when the file was rewritten
   * @throws SerializationError or PersistenceError; the document stays dirty
   */
  save(): boolean {
    this.#assertOpen();
    return this.#state.save();
  }

  /**
   * Save if dirty, then leave the lifecycle registry. Idempotent.
   * If the save throws, the document stays open and registered.
   */
  close(): void {
    if (this.#closed) return;
    this.#state.save();
    this.#registry?.unregister(this.#state);
    this.#closed = true;
  }

  toJSON(): JsonValue {
    const root = this.root;
    if (root instanceof TrackedMap || root instanceof TrackedList) {
      return root.toJSON();
    }
    return root ?? {};
  }

  toString(): string {
    return this.#state.render().trimEnd();
  }

  #assertOpen(): void {
    if (this.#closed) {
      throw new DocumentClosedError(this.#state.path);
    }
  }

  #peekMapping(): TrackedMap | undefined {
    const root = this.#state.root;
    if (root.kind === "mapping") return root.container;
    if (root.kind === "uninitialized") return undefined;
    throw new KindMismatchError("mapping", root.kind);
  }

  #peekSequence(): TrackedList | undefined {
    const root = this.#state.root;
    if (root.kind === "sequence") return root.container;
    if (root.kind === "uninitialized") return undefined;
    throw new KindMismatchError("sequence", root.kind);
  }
}

/**
 * Open a document, loading `filePath` if it exists
 * @throws LoadParseError on malformed JSON, DocumentReadError on other read failures,
 *   InvalidOptionsError on bad options
 */
export function open(filePath: string, options: OpenOptions = {}): JsonDocument {
  const resolved = resolveOpenOptions(options);
  const state = new DocumentState(resolve(filePath), resolved);
  state.load();
  const registry = resolved.register ? (resolved.registry ?? defaultRegistry) : null;
  return new JsonDocument(state, registry);
}

/**
 * Scoped acquisition: open a document, run `fn`, and close it afterwards.
 * A close failure is reported only when `fn` itself succeeded.
 */
export async function withDocument<T>(
  filePath: string,
  fn: (doc: JsonDocument) => T | Promise<T>,
  options?: OpenOptions
): Promise<T> {
  const doc = open(filePath, options);
  let fnError: unknown;
  try {
    return await fn(doc);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    try {
      doc.close();
    } catch (closeErr) {
      if (!fnError) {
        // eslint-disable-next-line no-unsafe-finally
        throw closeErr;
      }
      logger.warn("document.close.failed", { path: doc.path, ...errorFields(closeErr) });
    }
  }
}
