/**
 * Atomic file I/O for document persistence
 *
 * Invariants:
 * - Writes are atomic: readers never observe partial file contents
 * - The temp file is `<path>.tmp`, beside the target (same filesystem for atomic rename)
 * - On any failure the target is left byte-identical and the temp file is removed best-effort
 * - Reads are UTF-8 only; a missing file reads as null
 * - Everything is synchronous so it can run inside exit and signal handlers
 *
 * Pattern: write → fsync → close → rename → fsync directory
 * No locking: a single writer per path is assumed.
 */

import * as fs from "node:fs";
import { dirname } from "node:path";
import { DocumentReadError, PersistenceError } from "./errors.js";
import { errorFields, logger } from "./observability/logger.js";

export interface AtomicWriteOptions {
  /** Flush file data and the parent directory to disk (default: true) */
  fsync?: boolean;
}

/**
 * Path of the temp file used while saving `filePath`
 */
export function tempPathFor(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Atomically replace `filePath` with `content` using write-rename-sync
 * @throws PersistenceError carrying the target and temp paths
 */
export function atomicWriteSync(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  const fsync = options.fsync ?? true;
  const tmp = tempPathFor(filePath);
  let fd: number | null = null;

  try {
    fd = fs.openSync(tmp, "w", 0o644);
    fs.writeFileSync(fd, content, "utf-8");

    if (fsync) {
      // Prefer datasync, fall back to a full sync where it is unsupported
      try {
        fs.fdatasyncSync(fd);
      } catch (err) {
        if (!isUnsupported(err)) throw err;
        fs.fsyncSync(fd);
      }
    }

    fs.closeSync(fd);
    fd = null;

    fs.renameSync(tmp, filePath);
  } catch (err) {
    if (fd !== null) {
      try {
        fs.closeSync(fd);
      } catch (closeErr) {
        logger.debug("io.close.failed", { path: tmp, ...errorFields(closeErr) });
      }
    }
    removeTempFile(tmp);
    throw new PersistenceError(filePath, tmp, { cause: err });
  }

  if (fsync) {
    syncDirectory(dirname(filePath));
  }
}

/**
 * Read a document file
 * @returns File contents as UTF-8, or null if the file does not exist
 * @throws DocumentReadError for other read failures
 */
export function readDocumentSync(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Errno code of a Node system error, if any
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// ENOTSUP/ENOSYS: not supported on this platform
// EINVAL: some CIFS/FUSE mounts report this instead
function isUnsupported(err: unknown): boolean {
  const code = errorCode(err);
  return code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL";
}

function removeTempFile(tmp: string): void {
  try {
    fs.unlinkSync(tmp);
  } catch (err) {
    if (errorCode(err) !== "ENOENT") {
      logger.debug("io.temp.cleanup.failed", { path: tmp, ...errorFields(err) });
    }
  }
}

/**
 * Best-effort fsync of a directory so the rename itself is durable
 */
function syncDirectory(dir: string): void {
  let fd: number | null = null;
  try {
    fd = fs.openSync(dir, "r");
    fs.fsyncSync(fd);
  } catch (err) {
    // Platforms without directory fsync report EINVAL, ENOTSUP, EBADF or EISDIR
    logger.debug("io.dir.fsync.failed", { path: dir, ...errorFields(err) });
  } finally {
    if (fd !== null) {
      try {
        fs.closeSync(fd);
      } catch (err) {
        logger.debug("io.dir.close.failed", { path: dir, ...errorFields(err) });
      }
    }
  }
}
