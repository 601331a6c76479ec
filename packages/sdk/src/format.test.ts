import { describe, it, expect } from "vitest";
import { parseJson, parseTracked, serialize } from "./format.js";
import { TrackedList, TrackedMap } from "./tracked.js";
import { SerializationError } from "./errors.js";
import type { ChangeSink } from "./types.js";

const sink: ChangeSink = { markModified: () => {} };

describe("serialize", () => {
  it("should match JSON.stringify with 2-space indentation plus a newline", () => {
    const value = { a: 1, b: [true, null, "x"], c: { d: {} }, e: [] };
    expect(serialize(value)).toBe(JSON.stringify(value, null, 2) + "\n");
  });

  it("should write a mapping document", () => {
    expect(serialize(new TrackedMap(sink, [["a", 1]]))).toBe('{\n  "a": 1\n}\n');
  });

  it("should write a sequence document", () => {
    expect(serialize(new TrackedList(sink, [1, 2]))).toBe("[\n  1,\n  2\n]\n");
  });

  it("should write empty containers inline", () => {
    expect(serialize(new TrackedMap(sink))).toBe("{}\n");
    expect(serialize(new TrackedList(sink))).toBe("[]\n");
  });

  it("should keep insertion order for integer-like keys", () => {
    const map = new TrackedMap(sink);
    map.set("b", 1);
    map.set("2", 2);
    map.set("1", 3);

    expect(serialize(map, { indent: 0 })).toBe('{"b":1,"2":2,"1":3}\n');
  });

  it("should sort keys when asked", () => {
    const map = new TrackedMap(sink, [
      ["b", 1],
      ["a", { z: 1, y: 2 }],
    ]);

    expect(serialize(map, { indent: 0, sortKeys: true })).toBe('{"a":{"y":2,"z":1},"b":1}\n');
  });

  it("should honor the indent option", () => {
    expect(serialize({ a: [1] }, { indent: 4 })).toBe('{\n    "a": [\n        1\n    ]\n}\n');
  });

  it("should escape strings and keys", () => {
    expect(serialize({ 'q"k': "line\nbreak" }, { indent: 0 })).toBe('{"q\\"k":"line\\nbreak"}\n');
  });

  it("should serialize scalars", () => {
    expect(serialize("hello")).toBe('"hello"\n');
    expect(serialize(null)).toBe("null\n");
    expect(serialize(-1.5)).toBe("-1.5\n");
  });

  it("should reject non-finite numbers with a pointer", () => {
    const list = new TrackedList(sink, [1, { n: Number.NaN }]);

    expect(() => serialize(list)).toThrow(SerializationError);
    expect(() => serialize(list)).toThrow('Cannot serialize value at "/1/n": NaN is not a finite number');
  });

  it("should reject values JSON cannot represent", () => {
    expect(() => serialize({ a: undefined })).toThrow('at "/a": undefined has no JSON representation');
    expect(() => serialize([() => 1])).toThrow('at "/0": function has no JSON representation');
    expect(() => serialize({ big: 10n })).toThrow("bigint has no JSON representation");
    expect(() => serialize({ when: new Date(0) })).toThrow('at "/when": Date is not a plain object');
  });

  it("should escape pointer segments", () => {
    expect(() => serialize({ "a/b": { "c~d": Infinity } })).toThrow('at "/a~1b/c~0d"');
  });

  it("should detect cycles", () => {
    const map = new TrackedMap(sink);
    map.set("self", map);

    expect(() => serialize(map)).toThrow('Cannot serialize value at "/self": circular reference');
  });

  it("should allow the same container in two places", () => {
    const shared = new TrackedList(sink, [1]);
    const map = new TrackedMap(sink, [
      ["x", shared],
      ["y", shared],
    ]);

    expect(serialize(map, { indent: 0 })).toBe('{"x":[1],"y":[1]}\n');
  });
});

describe("parseJson", () => {
  it("should parse JSON text", () => {
    expect(parseJson('{"a":[1,2]}')).toEqual({ a: [1, 2] });
  });

  it("should strip a leading byte-order mark", () => {
    expect(parseJson("\uFEFF[1]")).toEqual([1]);
  });

  it("should throw SyntaxError on malformed input", () => {
    expect(() => parseJson("{oops")).toThrow(SyntaxError);
  });
});

describe("parseTracked", () => {
  it("should build tracked containers in text order", () => {
    const value = parseTracked('{"b": [1, {"2": true, "1": null}], "10": "x"}', sink);

    expect(value).toBeInstanceOf(TrackedMap);
    if (!(value instanceof TrackedMap)) return;
    expect(Array.from(value.keys())).toEqual(["b", "10"]);
    expect(value.getList("b")?.at(1)).toBeInstanceOf(TrackedMap);
    expect(serialize(value, { indent: 0 })).toBe('{"b":[1,{"2":true,"1":null}],"10":"x"}\n');
  });

  it("should bind every container to the sink", () => {
    const value = parseTracked('[{"a": []}]', sink);

    expect(value).toBeInstanceOf(TrackedList);
    if (!(value instanceof TrackedList)) return;
    expect(value.isBoundTo(sink)).toBe(true);
    const inner = value.at(0);
    expect(inner instanceof TrackedMap && inner.isBoundTo(sink)).toBe(true);
  });

  it("should return scalars as primitives", () => {
    expect(parseTracked('"text"', sink)).toBe("text");
    expect(parseTracked("-2.5e1", sink)).toBe(-25);
    expect(parseTracked("false", sink)).toBe(false);
    expect(parseTracked("null", sink)).toBeNull();
  });

  it("should decode escaped strings and keys", () => {
    const value = parseTracked('{"q\\"k": "line\\nbreak"}', sink);

    expect(value).toBeInstanceOf(TrackedMap);
    if (!(value instanceof TrackedMap)) return;
    expect(value.get('q"k')).toBe("line\nbreak");
  });

  it("should strip a leading byte-order mark", () => {
    expect(parseTracked("\uFEFF7", sink)).toBe(7);
  });

  it("should throw SyntaxError on malformed or lenient input", () => {
    expect(() => parseTracked("{oops", sink)).toThrow(SyntaxError);
    expect(() => parseTracked("[1,]", sink)).toThrow(SyntaxError);
    expect(() => parseTracked("// note\n1", sink)).toThrow(SyntaxError);
    expect(() => parseTracked("", sink)).toThrow(SyntaxError);
  });
});
