/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { parseJson as parseJsonText, type JsonArray, type JsonValue } from "@jawadb/sdk";

/**
 * Parse the --indent option
 */
export function parseIndent(value: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("indent must be a non-negative integer");
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed > 10) {
    throw new InvalidArgumentError("indent must be <= 10");
  }

  return parsed;
}

/**
 * Parse a sequence index; negative values count from the end
 */
export function parseIndex(value: string): number {
  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`index must be an integer, got "${value}"`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): JsonValue {
  try {
    return parseJsonText(value);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a JSON argument that must hold an array
 */
export function parseJsonArray(value: string, source: string): JsonArray {
  const parsed = parseJson(value, source);
  if (!Array.isArray(parsed)) {
    throw new InvalidArgumentError(`${source} must be a JSON array`);
  }
  return parsed;
}
