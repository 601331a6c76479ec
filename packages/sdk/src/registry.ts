/**
 * Process-wide lifecycle registry
 *
 * Keeps every live document so that dirty ones are flushed when the process
 * exits, when SIGINT/SIGTERM arrive, and when an unclosed handle is garbage
 * collected. Membership never keeps a handle alive: the registry holds each
 * document's internal state, and the handle is only watched through a
 * FinalizationRegistry.
 *
 * Invariants:
 * - Sweep and reclaim saves log and discard their errors; one failure never
 *   stops the others
 * - Process hooks are installed while at least one document is registered
 * - A signal sweep removes the hooks (restoring default handling) and exits with status 1
 *
 * Saves are synchronous and Node delivers signals on the event loop, so a
 * signal can never land in the middle of a save. The `isSaving` check below
 * covers a sweep started from inside a save (e.g. a throwing exit path).
 */

import { errorFields, logger } from "./observability/logger.js";

/**
 * What the registry needs from a document
 */
export interface Flushable {
  readonly path: string;
  readonly isDirty: boolean;
  readonly isSaving: boolean;
  /** Persist if dirty; returns true when the file was written */
  save(): boolean;
}

/**
 * The subset of `process` the registry hooks into
 */
export interface ProcessLike {
  on(event: string, listener: () => void): unknown;
  removeListener(event: string, listener: () => void): unknown;
}

export interface RegistryOptions {
  /** Event source for `exit` and signals (default: process) */
  process?: ProcessLike;
  /** Signals that trigger a sweep followed by exit (default: SIGINT, SIGTERM) */
  signals?: readonly NodeJS.Signals[];
  /** Called with status 1 after a signal sweep (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Outcome of a sweep
 */
export interface FlushReport {
  /** Documents whose file was rewritten */
  written: number;
  /** Documents that were clean or had nothing to write */
  unchanged: number;
  /** Documents skipped because a save was already running */
  skipped: number;
  /** Documents whose save threw */
  failed: number;
}

const DEFAULT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export class LifecycleRegistry {
  readonly #entries = new Set<Flushable>();
  readonly #finalizer = new FinalizationRegistry<Flushable>((entry) => this.release(entry));
  readonly #process: ProcessLike;
  readonly #signals: readonly NodeJS.Signals[];
  readonly #exit: (code: number) => void;
  readonly #signalHandlers = new Map<NodeJS.Signals, () => void>();
  #installed = false;

  constructor(options: RegistryOptions = {}) {
    this.#process = options.process ?? process;
    this.#signals = options.signals ?? DEFAULT_SIGNALS;
    this.#exit = options.exit ?? ((code) => process.exit(code));
  }

  get size(): number {
    return this.#entries.size;
  }

  /**
   * True while process hooks are attached
   */
  get isInstalled(): boolean {
    return this.#installed;
  }

  has(entry: Flushable): boolean {
    return this.#entries.has(entry);
  }

  /**
   * Track `entry` until it is unregistered or `handle` is garbage collected
   * @param handle - Public object whose reclamation triggers a best-effort flush
   * @param entry - State that performs the flush; must not reference `handle`
   */
  register(handle: object, entry: Flushable): void {
    if (this.#entries.has(entry)) return;
    this.#entries.add(entry);
    this.#finalizer.register(handle, entry, entry);
    this.#install();
  }

  unregister(entry: Flushable): void {
    if (!this.#entries.delete(entry)) return;
    this.#finalizer.unregister(entry);
    if (this.#entries.size === 0) {
      this.#uninstall();
    }
  }

  /**
   * Save every registered document, discarding per-document errors
   */
  flushAll(): FlushReport {
    const report: FlushReport = { written: 0, unchanged: 0, skipped: 0, failed: 0 };

    for (const entry of this.#entries) {
      if (entry.isSaving) {
        report.skipped++;
        continue;
      }
      try {
        if (entry.save()) {
          report.written++;
        } else {
          report.unchanged++;
        }
      } catch (err) {
        report.failed++;
        logger.error("registry.flush.error", { path: entry.path, ...errorFields(err) });
      }
    }

    if (this.#entries.size > 0) {
      logger.debug("registry.flush", { ...report });
    }
    return report;
  }

  /**
   * Flush `entry` best-effort and stop tracking it. Runs when the handle that
   * owned the entry has been reclaimed without being closed.
   */
  release(entry: Flushable): void {
    if (!this.#entries.has(entry)) return;
    try {
      const written = entry.save();
      logger.debug("registry.reclaim", { path: entry.path, written });
    } catch (err) {
      logger.error("registry.flush.error", { path: entry.path, ...errorFields(err) });
    } finally {
      this.unregister(entry);
    }
  }

  #onExit = (): void => {
    this.flushAll();
  };

  #install(): void {
    if (this.#installed) return;
    this.#installed = true;

    this.#process.on("exit", this.#onExit);
    for (const signal of this.#signals) {
      const handler = (): void => this.#onSignal(signal);
      this.#signalHandlers.set(signal, handler);
      this.#process.on(signal, handler);
    }
  }

  #uninstall(): void {
    if (!this.#installed) return;
    this.#installed = false;

    this.#process.removeListener("exit", this.#onExit);
    for (const [signal, handler] of this.#signalHandlers) {
      this.#process.removeListener(signal, handler);
    }
    this.#signalHandlers.clear();
  }

  #onSignal(signal: NodeJS.Signals): void {
    logger.warn("registry.signal", { signal, documents: this.#entries.size });
    this.flushAll();
    this.#uninstall();
    this.#exit(1);
  }
}

/**
 * Registry used by open() unless another one is given
 */
export const defaultRegistry = new LifecycleRegistry();
