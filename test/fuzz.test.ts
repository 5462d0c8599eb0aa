import { describe, it, expect } from "vitest";
import { ChainingHashTable } from "../src/ChainingHashTable";
import { KeyNotFoundError } from "../src/errors";
import { HashTable } from "../src/HashTable";
import {
  LinearProbingHashTable,
  QuadraticProbingHashTable,
} from "../src/OpenAddressingHashTable";

type Factory = () => HashTable<string, number, unknown>;

const variants: Array<[string, Factory]> = [
  ["ChainingHashTable", () => new ChainingHashTable<string, number>({ capacity: 2, maxLoadFactor: 1.5 })],
  ["LinearProbingHashTable", () => new LinearProbingHashTable<string, number>({ capacity: 2, maxLoadFactor: 0.75 })],
  ["QuadraticProbingHashTable", () => new QuadraticProbingHashTable<string, number>({ capacity: 2, maxLoadFactor: 0.5 })],
];

describe.each(variants)("%s Fuzz Testing", (_name, create) => {
  it("should maintain consistency with native Map over 10,000 random operations", () => {
    const table = create();
    const native = new Map<string, number>();

    const OPERATIONS = 10_000;
    const KEY_SPACE = 500; // small enough for plenty of overwrites and deletes of absent keys

    for (let i = 0; i < OPERATIONS; i++) {
      const op = Math.random();
      const key = `key_${Math.floor(Math.random() * KEY_SPACE)}`;
      const val = Math.floor(Math.random() * 10000);

      if (op < 0.6) {
        // SET (60%)
        table.set(key, val);
        native.set(key, val);
      } else if (op < 0.8) {
        // DELETE (20%)
        if (native.has(key)) {
          table.delete(key);
          native.delete(key);
        } else {
          expect(() => table.delete(key)).toThrow(KeyNotFoundError);
        }
      } else {
        // GET (20%)
        if (native.has(key)) {
          expect(table.get(key)).toBe(native.get(key));
        } else {
          expect(() => table.get(key)).toThrow(KeyNotFoundError);
        }
      }

      if (i % 1000 === 0) {
        expect(table.size).toBe(native.size);
        expect(table.loadFactor).toBeLessThanOrEqual(table.maxLoadFactor);
      }
    }

    expect(table.size).toBe(native.size);
    native.forEach((v, k) => {
      expect(table.get(k)).toBe(v);
    });
    expect(new Map(table.entries())).toEqual(native);
  });
});
