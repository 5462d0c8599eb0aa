import { describe, it, expect } from "vitest";
import { ChainingHashTable } from "../src/ChainingHashTable";
import { HashTable } from "../src/HashTable";
import {
  LinearProbingHashTable,
  QuadraticProbingHashTable,
} from "../src/OpenAddressingHashTable";

type Factory = () => HashTable<string, unknown, unknown>;

const variants: Array<[string, Factory]> = [
  ["ChainingHashTable", () => new ChainingHashTable<string, unknown>()],
  ["LinearProbingHashTable", () => new LinearProbingHashTable<string, unknown>()],
  ["QuadraticProbingHashTable", () => new QuadraticProbingHashTable<string, unknown>()],
];

describe.each(variants)("%s Basic Operations", (_name, create) => {
  it("should store and retrieve string keys", () => {
    const table = create();
    const bar = { bar: 123 };
    table.set("hello", "world");
    table.set("foo", bar);

    expect(table.get("hello")).toBe("world");
    expect(table.get("foo")).toBe(bar);
    expect(table.size).toBe(2);
  });

  it("should handle updates without growing", () => {
    const table = create();
    table.set("a", 1);
    expect(table.get("a")).toBe(1);

    table.set("a", 2);
    table.set("a", 2);
    expect(table.get("a")).toBe(2);
    expect(table.size).toBe(1);
  });

  it("should handle deletes", () => {
    const table = create();
    table.set("a", 1);
    expect(table.has("a")).toBe(true);

    table.delete("a");
    expect(table.has("a")).toBe(false);
    expect(table.size).toBe(0);

    table.set("a", 3);
    expect(table.get("a")).toBe(3);
    expect(table.size).toBe(1);
  });

  it("should track size as distinct keys inserted minus deleted", () => {
    const table = create();
    for (let i = 0; i < 100; i++) table.set(`k${i % 40}`, i);
    expect(table.size).toBe(40);

    for (let i = 0; i < 40; i += 2) table.delete(`k${i}`);
    expect(table.size).toBe(20);
    expect(Array.from(table.keys()).sort()).toEqual(
      Array.from({ length: 20 }, (_, i) => `k${2 * i + 1}`).sort(),
    );
  });

  it("should store undefined and null values", () => {
    const table = create();
    table.set("u", undefined);
    table.set("n", null);

    expect(table.get("u")).toBeUndefined();
    expect(table.get("n")).toBeNull();
    expect(table.has("u")).toBe(true);
  });
});
