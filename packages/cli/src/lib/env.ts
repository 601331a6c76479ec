/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the document file
 * Priority: CLI option > JAWADB_FILE env var > default "./db.json"
 */
export function resolveFile(cliFile?: string): string {
  const file = cliFile ?? process.env.JAWADB_FILE ?? "./db.json";
  return path.resolve(expandTilde(file));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.JAWADB_CLI_DEBUG === "1";
}
