import { describe, it, expect } from "vitest";
import { ChainingHashTable } from "../src/ChainingHashTable";
import { KeyNotFoundError } from "../src/errors";
import { chain, EMPTY } from "../src/slots";

const identity = (key: number) => key;

function createTable(maxLoadFactor = 0.9) {
  return new ChainingHashTable<number, number>({
    capacity: 4,
    maxLoadFactor,
    hasher: identity,
  });
}

describe("ChainingHashTable", () => {
  it("should append colliding keys to the same bucket", () => {
    const table = createTable();

    table.set(2, 100);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 100]), EMPTY]);
    expect(table.size).toBe(1);

    table.set(3, 101);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 100]), chain([3, 101])]);
    expect(table.size).toBe(2);

    table.set(6, 200);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 100], [6, 200]), chain([3, 101])]);
    expect(table.size).toBe(3);
  });

  it("should overwrite in place without growing", () => {
    const table = createTable();
    table.set(2, 100).set(3, 101).set(6, 200);

    table.set(2, 90);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 90], [6, 200]), chain([3, 101])]);
    expect(table.size).toBe(3);

    table.set(6, 115);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 90], [6, 115]), chain([3, 101])]);
    expect(table.size).toBe(3);
  });

  it("should resize when the max load factor is exceeded", () => {
    const table = createTable();
    table.set(2, 90).set(3, 101).set(6, 115);

    table.set(0, 25);
    expect(table.capacity).toBe(8);
    expect(table.buckets()).toEqual([
      chain([0, 25]),
      EMPTY,
      chain([2, 90]),
      chain([3, 101]),
      EMPTY,
      EMPTY,
      chain([6, 115]),
      EMPTY,
    ]);
  });

  it("should allow a load factor above 1.0", () => {
    const table = createTable(1.5);
    table.set(0, 0).set(4, 4).set(8, 8).set(12, 12).set(1, 1).set(5, 5);
    expect(table.capacity).toBe(4);
    expect(table.loadFactor).toBe(1.5);
    expect(table.buckets()[0]).toEqual(chain([0, 0], [4, 4], [8, 8], [12, 12]));

    table.set(9, 9);
    expect(table.capacity).toBe(8);
  });

  it("should look up keys within a bucket", () => {
    const table = createTable();
    table.set(2, 100).set(3, 101).set(6, 200);

    expect(table.get(2)).toBe(100);
    expect(table.get(3)).toBe(101);
    expect(table.get(6)).toBe(200);
    expect(() => table.get(0)).toThrow(KeyNotFoundError);
    // Same bucket as 2 and 6, but absent.
    expect(() => table.get(10)).toThrow(KeyNotFoundError);
  });

  it("should reset a bucket to empty when its last entry is deleted", () => {
    const table = createTable();
    table.set(2, 100).set(3, 101).set(6, 200);

    table.delete(6);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, chain([2, 100]), chain([3, 101])]);
    expect(table.size).toBe(2);

    table.delete(2);
    expect(table.buckets()).toEqual([EMPTY, EMPTY, EMPTY, chain([3, 101])]);
    expect(table.size).toBe(1);
    expect(table.tombstones).toBe(0);

    expect(() => table.delete(0)).toThrow(KeyNotFoundError);
    expect(() => table.delete(7)).toThrow(KeyNotFoundError);
  });

  it("should iterate in bucket order", () => {
    const table = createTable(0.8);
    table.set(2, 100).set(3, 101);
    expect(Array.from(table.keys())).toEqual([2, 3]);
  });

  it("should return copies from buckets()", () => {
    const table = createTable();
    table.set(2, 100);

    const snapshot = table.buckets();
    const bucket = snapshot[2];
    if (bucket.kind === "chain") bucket.entries[0][1] = -1;

    expect(table.get(2)).toBe(100);
  });
});
