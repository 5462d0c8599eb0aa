import { describe, it, expect } from "vitest";
import { ChainingHashTable } from "../src/ChainingHashTable";
import { LinearProbingHashTable } from "../src/OpenAddressingHashTable";
import { deepSizeOf } from "../src/sizeof";

describe("deepSizeOf", () => {
  it("should size primitives", () => {
    expect(deepSizeOf(42)).toBe(8);
    expect(deepSizeOf("abc")).toBe(18);
    expect(deepSizeOf(null)).toBe(0);
    expect(deepSizeOf(undefined)).toBe(0);
    expect(deepSizeOf(true)).toBe(0);
    expect(deepSizeOf(10n)).toBe(24);
    expect(deepSizeOf(2n ** 64n)).toBe(32);
    expect(deepSizeOf(Symbol("s"))).toBe(16);
  });

  it("should walk arrays, objects and collections", () => {
    expect(deepSizeOf([1, "ab"])).toBe(16 + 2 * 8 + 8 + 16);
    expect(deepSizeOf({ a: 1, b: "x" })).toBe(16 + 2 * 8 + 8 + 14);
    expect(deepSizeOf(new Map([["a", 1]]))).toBe(16 + 16 + 14 + 8);
    expect(deepSizeOf(new Set([1, 2]))).toBe(16 + 2 * 16 + 2 * 8);
    expect(deepSizeOf(new Uint8Array(10))).toBe(16 + 10);
    expect(deepSizeOf(() => 0)).toBe(32);
  });

  it("should add a function's own properties to its base cost", () => {
    const format = Object.assign((n: number) => n, { label: "ab", width: 3 });
    expect(deepSizeOf(format)).toBe(32 + 2 * 8 + 16 + 8);

    const recursive = Object.assign(() => 0, { self: {} });
    recursive.self = recursive;
    expect(deepSizeOf(recursive)).toBe(32 + 8);
  });

  it("should count shared objects and cycles once", () => {
    const shared = {};
    expect(deepSizeOf([shared, shared])).toBe(16 + 2 * 8 + 16);

    const node: { self?: unknown } = {};
    node.self = node;
    expect(deepSizeOf(node)).toBe(16 + 8);
  });

  it("should charge a hash table per bucket plus its live entries", () => {
    const table = new ChainingHashTable<number, number>({ capacity: 4 });
    table.set(1, 2);
    // header + 4 bucket pointers + one [key, value] pair
    expect(deepSizeOf(table)).toBe(16 + 4 * 8 + (16 + 2 * 8 + 8 + 8));
  });

  it("should grow with capacity but ignore tombstones", () => {
    const table = new LinearProbingHashTable<number, number>({ capacity: 8 });
    table.set(1, 1).set(2, 2);
    table.delete(2);
    expect(deepSizeOf(table)).toBe(16 + 8 * 8 + 48);
  });
});
