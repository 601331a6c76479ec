import { describe, it, expect, beforeEach } from "vitest";
import { TrackedList, TrackedMap, isPlainObject, kindOf, toPlain, wrap } from "./tracked.js";
import {
  IndexOutOfRangeError,
  KeyNotFoundError,
  KeyTypeError,
  KindMismatchError,
  SerializationError,
} from "./errors.js";
import type { ChangeSink, JsonInput } from "./types.js";

class CountingSink implements ChangeSink {
  count = 0;

  markModified(): void {
    this.count++;
  }
}

describe("tracked containers", () => {
  let sink: CountingSink;

  beforeEach(() => {
    sink = new CountingSink();
  });

  describe("wrap", () => {
    it("should wrap plain objects and arrays recursively", () => {
      const value = wrap({ a: [1, { b: [] }] }, sink);

      expect(value).toBeInstanceOf(TrackedMap);
      if (!(value instanceof TrackedMap)) return;

      const list = value.get("a");
      expect(list).toBeInstanceOf(TrackedList);
      if (!(list instanceof TrackedList)) return;

      const inner = list.at(1);
      expect(inner).toBeInstanceOf(TrackedMap);
      if (!(inner instanceof TrackedMap)) return;
      expect(inner.get("b")).toBeInstanceOf(TrackedList);
    });

    it("should pass primitives through unchanged", () => {
      expect(wrap(1, sink)).toBe(1);
      expect(wrap("x", sink)).toBe("x");
      expect(wrap(true, sink)).toBe(true);
      expect(wrap(null, sink)).toBe(null);
    });

    it("should keep a container already bound to the same sink", () => {
      const map = new TrackedMap(sink, [["a", 1]]);
      expect(wrap(map, sink)).toBe(map);
    });

    it("should copy a container bound to another sink", () => {
      const other = new CountingSink();
      const foreign = new TrackedMap(other, [["a", [1, 2]]]);

      const copy = wrap(foreign, sink);

      expect(copy).not.toBe(foreign);
      expect(copy).toBeInstanceOf(TrackedMap);
      if (!(copy instanceof TrackedMap)) return;
      expect(copy.isBoundTo(sink)).toBe(true);
      expect(copy.toJSON()).toEqual({ a: [1, 2] });

      copy.getOrInsertList("a").append(3);
      expect(sink.count).toBe(1);
      expect(other.count).toBe(0);
      expect(foreign.toJSON()).toEqual({ a: [1, 2] });
    });

    it("should store non-plain objects as given", () => {
      const when = new Date(0);
      const value: unknown = Reflect.apply(wrap, undefined, [when, sink]);

      expect(value).toBe(when);
    });

    it("should copy a value shared in two places without treating it as a cycle", () => {
      const shared: JsonInput = { n: 1 };
      const value = wrap({ x: shared, y: [shared] }, sink);

      expect(value).toBeInstanceOf(TrackedMap);
      if (!(value instanceof TrackedMap)) return;
      expect(value.toJSON()).toEqual({ x: { n: 1 }, y: [{ n: 1 }] });
      expect(value.get("x")).not.toBe(value.getList("y")?.at(0));
    });

    it("should reject cycles with a pointer relative to the wrapped value", () => {
      const items: JsonInput[] = [1];
      items.push({ back: items });

      expect(() => wrap(items, sink)).toThrow(SerializationError);
      expect(() => wrap(items, sink)).toThrow('Cannot serialize value at "/1/back": circular reference');
    });

    it("should leave a list unchanged when appending a cyclic value", () => {
      const list = new TrackedList(sink, [1]);
      const cyclic: { [key: string]: JsonInput } = {};
      cyclic["a/b"] = cyclic;

      expect(() => list.append(cyclic)).toThrow('at "/a~1b"');
      expect(list.toJSON()).toEqual([1]);
      expect(sink.count).toBe(0);
    });

    it("should not notify the sink while wrapping", () => {
      wrap({ a: { b: [1, 2, 3] } }, sink);
      expect(sink.count).toBe(0);
    });
  });

  describe("TrackedMap", () => {
    it("should mark modified on set and store wrapped values", () => {
      const map = new TrackedMap(sink);

      map.set("list", [1]);

      expect(sink.count).toBe(1);
      expect(map.get("list")).toBeInstanceOf(TrackedList);
      expect(map.toJSON()).toEqual({ list: [1] });
    });

    it("should treat get as a pure lookup", () => {
      const map = new TrackedMap(sink, [["a", 1]]);

      expect(map.get("a")).toBe(1);
      expect(map.get("missing")).toBeUndefined();
      expect(map.has("missing")).toBe(false);
      expect(sink.count).toBe(0);
    });

    it("should insert the fallback on getOrInsert when the key is absent", () => {
      const map = new TrackedMap(sink);

      const value = map.getOrInsert("list", []);

      expect(value).toBeInstanceOf(TrackedList);
      expect(map.has("list")).toBe(true);
      expect(sink.count).toBe(1);

      if (!(value instanceof TrackedList)) return;
      value.append(1);
      expect(sink.count).toBe(2);
      expect(map.toJSON()).toEqual({ list: [1] });
    });

    it("should insert null when getOrInsert has no fallback", () => {
      const map = new TrackedMap(sink);

      expect(map.getOrInsert("k")).toBeNull();
      expect(map.toJSON()).toEqual({ k: null });
      expect(sink.count).toBe(1);
    });

    it("should return the existing value from getOrInsert without marking modified", () => {
      const map = new TrackedMap(sink, [["a", "present"]]);

      expect(map.getOrInsert("a", "fallback")).toBe("present");
      expect(sink.count).toBe(0);
    });

    it("should narrow with getOrInsertList and getOrInsertMap", () => {
      const map = new TrackedMap(sink, [["n", 5]]);

      map.getOrInsertList("items").append("x");
      map.getOrInsertMap("meta").set("v", 1);

      expect(map.toJSON()).toEqual({ n: 5, items: ["x"], meta: { v: 1 } });
      expect(() => map.getOrInsertList("n")).toThrow(KindMismatchError);
      expect(() => map.getOrInsertMap("items")).toThrow("Cannot use sequence as a mapping");
    });

    it("should narrow with getMap and getList", () => {
      const map = new TrackedMap(sink, [
        ["m", {}],
        ["l", []],
      ]);

      expect(map.getMap("m")).toBeInstanceOf(TrackedMap);
      expect(map.getList("l")).toBeInstanceOf(TrackedList);
      expect(map.getMap("absent")).toBeUndefined();
      expect(() => map.getList("m")).toThrow("Cannot use mapping as a sequence");
      expect(sink.count).toBe(0);
    });

    it("should delete keys and mark modified", () => {
      const map = new TrackedMap(sink, [["a", 1]]);

      map.delete("a");

      expect(map.has("a")).toBe(false);
      expect(sink.count).toBe(1);
    });

    it("should throw KeyNotFoundError when deleting an absent key", () => {
      const map = new TrackedMap(sink);

      expect(() => map.delete("nope")).toThrow(KeyNotFoundError);
      expect(() => map.delete("nope")).toThrow('Key not found: "nope"');
      expect(sink.count).toBe(0);
    });

    it("should reject non-string keys", () => {
      const map = new TrackedMap(sink);
      const key: string = JSON.parse("42");

      expect(() => map.set(key, 1)).toThrow(KeyTypeError);
      expect(() => map.get(key)).toThrow("Mapping keys must be strings, got number");
      expect(map.size).toBe(0);
      expect(sink.count).toBe(0);
    });

    it("should preserve insertion order, including integer-like keys", () => {
      const map = new TrackedMap(sink);
      map.set("b", 1);
      map.set("10", 2);
      map.set("a", 3);

      expect(Array.from(map.keys())).toEqual(["b", "10", "a"]);
    });

    it("should store __proto__ as an ordinary key", () => {
      const map = new TrackedMap(sink);
      map.set("__proto__", { x: 1 });

      expect(map.has("__proto__")).toBe(true);
      expect(Object.keys(map.toJSON())).toEqual(["__proto__"]);
    });
  });

  describe("TrackedList", () => {
    it("should append and extend with wrapping", () => {
      const list = new TrackedList(sink);

      list.append({ a: 1 });
      list.extend([[2], 3]);

      expect(list.length).toBe(3);
      expect(list.at(0)).toBeInstanceOf(TrackedMap);
      expect(list.at(1)).toBeInstanceOf(TrackedList);
      expect(list.toJSON()).toEqual([{ a: 1 }, [2], 3]);
      expect(sink.count).toBe(2);
    });

    it("should treat concatInPlace as extend and return itself", () => {
      const list = new TrackedList(sink, [1]);

      const result = list.concatInPlace([2, 3]);

      expect(result).toBe(list);
      expect(list.toJSON()).toEqual([1, 2, 3]);
      expect(sink.count).toBe(1);
    });

    it("should read with negative indices and return undefined out of range", () => {
      const list = new TrackedList(sink, ["a", "b", "c"]);

      expect(list.at(-1)).toBe("c");
      expect(list.at(3)).toBeUndefined();
      expect(list.at(1.5)).toBeUndefined();
    });

    it("should set and delete by index", () => {
      const list = new TrackedList(sink, ["a", "b", "c"]);

      list.setAt(0, "A");
      list.setAt(-1, ["C"]);
      list.deleteAt(1);

      expect(list.toJSON()).toEqual(["A", ["C"]]);
      expect(list.at(1)).toBeInstanceOf(TrackedList);
      expect(sink.count).toBe(3);
    });

    it("should throw IndexOutOfRangeError for bad indices", () => {
      const list = new TrackedList(sink, [1, 2]);

      expect(() => list.setAt(2, 0)).toThrow(IndexOutOfRangeError);
      expect(() => list.deleteAt(-3)).toThrow("Index -3 out of range for sequence of length 2");
      expect(() => list.setAt(0.5, 0)).toThrow(IndexOutOfRangeError);
      expect(list.toJSON()).toEqual([1, 2]);
      expect(sink.count).toBe(0);
    });

    it("should iterate over its values", () => {
      const list = new TrackedList(sink, [1, 2, 3]);
      expect(Array.from(list)).toEqual([1, 2, 3]);
    });
  });

  describe("dirty propagation", () => {
    it("should notify the sink for mutations two levels deep", () => {
      const root = new TrackedMap(sink, [["a", { b: [] }]]);

      root.getMap("a")?.getList("b")?.append(1);

      expect(sink.count).toBe(1);
      expect(root.toJSON()).toEqual({ a: { b: [1] } });
    });

    it("should notify the sink for values added after construction", () => {
      const root = new TrackedList(sink);
      root.append({ nested: { deeper: [] } });
      sink.count = 0;

      const first = root.at(0);
      if (!(first instanceof TrackedMap)) throw new Error("expected a mapping");
      first.getOrInsertMap("nested").getOrInsertList("deeper").append("x");

      expect(sink.count).toBe(1);
    });
  });

  describe("helpers", () => {
    it("should convert tracked values back to plain JSON", () => {
      const map = new TrackedMap(sink, [["a", [1, { b: null }]]]);
      const plain = toPlain(map);

      expect(plain).toEqual({ a: [1, { b: null }] });
      expect(plain).not.toBeInstanceOf(TrackedMap);
      expect(toPlain("s")).toBe("s");
    });

    it("should classify plain objects", () => {
      expect(isPlainObject({ a: 1 })).toBe(true);
      expect(isPlainObject(Object.create(null))).toBe(true);
      expect(isPlainObject([])).toBe(false);
      expect(isPlainObject(null)).toBe(false);
      expect(isPlainObject(new TrackedMap(sink))).toBe(false);
    });

    it("should name kinds for error messages", () => {
      expect(kindOf(new TrackedMap(sink))).toBe("mapping");
      expect(kindOf(new TrackedList(sink))).toBe("sequence");
      expect(kindOf(null)).toBe("null");
      expect(kindOf(3)).toBe("number");
      expect(kindOf(undefined)).toBe("undefined");
    });
  });
});
