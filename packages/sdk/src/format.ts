/**
 * Deterministic JSON text for documents
 *
 * Layout matches JSON.stringify(value, null, indent), plus a trailing newline,
 * except that mapping keys keep their insertion order even when they look like
 * integers (plain objects would hoist those). Loading keeps the file's key order
 * for the same reason. Validation happens here rather than at insertion time,
 * so every unrepresentable value surfaces on save.
 */

import { parseTree, type Node as SyntaxNode } from "jsonc-parser";
import { SerializationError, escapePointer } from "./errors.js";
import { TrackedList, TrackedMap } from "./tracked.js";
import type { ChangeSink, JsonValue, SerializeOptions, TrackedValue } from "./types.js";

const DEFAULT_INDENT = 2;

/**
 * Serialize a document tree (tracked or plain) to JSON text
 * @throws SerializationError naming the JSON pointer of the first bad value
 */
export function serialize(value: unknown, options: SerializeOptions = {}): string {
  const indent = options.indent ?? DEFAULT_INDENT;
  const sortKeys = options.sortKeys ?? false;
  const stack = new Set<object>();

  const pad = (depth: number): string => " ".repeat(indent * depth);

  const block = (open: string, close: string, parts: string[], depth: number): string => {
    if (parts.length === 0) return open + close;
    if (indent === 0) return open + parts.join(",") + close;
    const inner = pad(depth + 1);
    return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${pad(depth)}${close}`;
  };

  const emit = (node: unknown, depth: number, pointer: string): string => {
    if (typeof node !== "object") return emitScalar(node, pointer);
    if (node === null) return "null";

    if (stack.has(node)) {
      throw new SerializationError(pointer, "circular reference");
    }
    stack.add(node);
    try {
      const items = listItems(node);
      if (items) {
        const parts = items.map((item, i) => emit(item, depth + 1, `${pointer}/${i}`));
        return block("[", "]", parts, depth);
      }

      const entries = mapEntries(node);
      if (!entries) {
        const name = node.constructor?.name ?? "object";
        throw new SerializationError(pointer, `${name} is not a plain object`);
      }
      if (sortKeys) {
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      }
      const separator = indent === 0 ? ":" : ": ";
      const parts = entries.map(
        ([key, child]) =>
          JSON.stringify(key) + separator + emit(child, depth + 1, `${pointer}/${escapePointer(key)}`)
      );
      return block("{", "}", parts, depth);
    } finally {
      stack.delete(node);
    }
  };

  return emit(value, 0, "") + "\n";
}

/**
 * Parse JSON text, ignoring a leading byte-order mark
 * @throws SyntaxError on malformed input
 */
export function parseJson(text: string): JsonValue {
  return JSON.parse(stripBom(text));
}

/**
 * Parse document text straight into tracked containers bound to `sink`,
 * keeping mapping keys in the order they appear in the text
 * @throws SyntaxError on malformed input
 */
export function parseTracked(text: string, sink: ChangeSink): TrackedValue {
  const cleaned = stripBom(text);
  // JSON.parse is the strict validator; the syntax tree only supplies key order
  JSON.parse(cleaned);
  const tree = parseTree(cleaned, [], { disallowComments: true, allowTrailingComma: false });
  if (!tree) {
    throw new SyntaxError("Unexpected end of JSON input");
  }
  return fromSyntax(tree, sink);
}

function fromSyntax(node: SyntaxNode, sink: ChangeSink): TrackedValue {
  switch (node.type) {
    case "object": {
      const entries: Array<[string, TrackedValue]> = [];
      for (const property of node.children ?? []) {
        const [keyNode, valueNode] = property.children ?? [];
        if (keyNode === undefined || valueNode === undefined) {
          throw new SyntaxError(`Incomplete property at offset ${property.offset}`);
        }
        entries.push([String(keyNode.value), fromSyntax(valueNode, sink)]);
      }
      return new TrackedMap(sink, entries);
    }
    case "array":
      return new TrackedList(
        sink,
        (node.children ?? []).map((child) => fromSyntax(child, sink))
      );
    case "string":
      return String(node.value);
    case "number":
      return Number(node.value);
    case "boolean":
      return node.value === true;
    case "null":
      return null;
    default:
      throw new SyntaxError(`Unexpected ${node.type} at offset ${node.offset}`);
  }
}

function stripBom(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function emitScalar(node: unknown, pointer: string): string {
  if (typeof node === "string") return JSON.stringify(node);
  if (typeof node === "boolean") return node ? "true" : "false";
  if (typeof node === "number") {
    if (!Number.isFinite(node)) {
      throw new SerializationError(pointer, `${node} is not a finite number`);
    }
    return JSON.stringify(node);
  }
  throw new SerializationError(pointer, `${typeof node} has no JSON representation`);
}

function listItems(node: object): unknown[] | null {
  if (node instanceof TrackedList) return Array.from(node);
  if (Array.isArray(node)) return node;
  return null;
}

function mapEntries(node: object): Array<[string, unknown]> | null {
  if (node instanceof TrackedMap) return Array.from(node);
  const proto: unknown = Object.getPrototypeOf(node);
  if (proto === Object.prototype || proto === null) {
    return Object.entries(node);
  }
  return null;
}
