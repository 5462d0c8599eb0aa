import { HashTable } from "./HashTable";

// Rough V8 figures on a 64-bit build. Good enough to compare tables against
// each other, not to predict heap snapshots.
const OBJECT_HEADER = 16;
const POINTER = 8;
const NUMBER = 8;
const STRING_HEADER = 12;
const BIGINT_HEADER = 16;
const SYMBOL = 16;
const FUNCTION = 32;
const COLLECTION_ENTRY = 16;

function sizeOfPrimitive(value: unknown): number {
  switch (typeof value) {
    case "number":
      return NUMBER;
    case "string":
      return STRING_HEADER + 2 * value.length;
    case "bigint": {
      const bits = (value < 0n ? -value : value).toString(2).length;
      return BIGINT_HEADER + POINTER * Math.ceil(bits / 64);
    }
    case "symbol":
      return SYMBOL;
    default:
      return 0;
  }
}

function sizeOfProperties(value: object, seen: Set<object>): number {
  const keys = Object.keys(value);
  let total = POINTER * keys.length;
  for (const key of keys) {
    total += deepSize(Reflect.get(value, key), seen);
  }
  return total;
}

function deepSize(value: unknown, seen: Set<object>): number {
  if (typeof value === "function") {
    if (seen.has(value)) return 0;
    seen.add(value);
    return FUNCTION + sizeOfProperties(value, seen);
  }
  if (typeof value !== "object" || value === null) {
    return sizeOfPrimitive(value);
  }
  if (seen.has(value)) return 0;
  seen.add(value);

  if (value instanceof HashTable) {
    // Each live entry is counted as the [key, value] pair it is yielded as.
    let total = OBJECT_HEADER + POINTER * value.capacity;
    for (const [k, v] of value.entries()) {
      total += OBJECT_HEADER + 2 * POINTER + deepSize(k, seen) + deepSize(v, seen);
    }
    return total;
  }
  if (Array.isArray(value)) {
    let total = OBJECT_HEADER + POINTER * value.length;
    for (const item of value) total += deepSize(item, seen);
    return total;
  }
  if (value instanceof Map) {
    let total = OBJECT_HEADER + COLLECTION_ENTRY * value.size;
    for (const [k, v] of value) total += deepSize(k, seen) + deepSize(v, seen);
    return total;
  }
  if (value instanceof Set) {
    let total = OBJECT_HEADER + COLLECTION_ENTRY * value.size;
    for (const item of value) total += deepSize(item, seen);
    return total;
  }
  if (ArrayBuffer.isView(value)) {
    return OBJECT_HEADER + value.byteLength;
  }

  return OBJECT_HEADER + sizeOfProperties(value, seen);
}

/**
 * Estimates the memory footprint of a value in bytes by walking everything it
 * references. Shared objects and cycles are counted once.
 *
 * For a hash table the backing array is charged one pointer per bucket and
 * every live entry is charged as a `[key, value]` pair.
 */
export function deepSizeOf(value: unknown): number {
  return deepSize(value, new Set());
}
