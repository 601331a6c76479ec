/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { IndexOutOfRangeError, KeyNotFoundError, KindMismatchError } from "@jawadb/sdk";

/**
 * Map errors to CLI exit codes
 * - 0: success (help and version output)
 * - 1: usage, parse, IO or unknown error
 * - 2: key or index not found
 * - 3: document root is the wrong kind for the command
 */
export function mapErrorToExitCode(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof KeyNotFoundError || error instanceof IndexOutOfRangeError) {
    return 2;
  }

  if (error instanceof KindMismatchError) {
    return 3;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
