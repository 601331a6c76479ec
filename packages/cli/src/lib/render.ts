/**
 * Output rendering helpers
 */

import { serialize, type SerializeOptions, type TrackedValue } from "@jawadb/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Render a value read from a document as JSON text with a trailing newline
 * @param value - Tracked or primitive value
 * @param options - Layout options (indent 0 gives compact output)
 */
export function renderJson(value: TrackedValue, options?: SerializeOptions): string {
  return serialize(value, options);
}

/**
 * Render lines (one per line)
 */
export function renderLines(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join("");
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
