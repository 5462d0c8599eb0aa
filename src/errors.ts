import { inspect } from "util";

/**
 * Base class for every error thrown by the hash tables.
 */
export class HashTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Thrown by `get()` and `delete()` when the key is not in the table.
 */
export class KeyNotFoundError extends HashTableError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`HashTable: Key not found: ${inspect(key)}`);
    this.key = key;
  }
}

/**
 * Thrown when an open-addressing probe walks `capacity` slots without
 * finding the key, an empty slot or a tombstone. Only reachable when the
 * max load factor is 1.0 or more.
 */
export class TableFullError extends HashTableError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`HashTable: Hash table full (capacity ${capacity})`);
    this.capacity = capacity;
  }
}

/**
 * Thrown when a hasher returns NaN or an infinite value.
 */
export class InvalidHashError extends HashTableError {
  readonly key: unknown;
  readonly hash: number;

  constructor(key: unknown, hash: number) {
    super(`HashTable: Hasher returned ${hash} for key ${inspect(key)}`);
    this.key = key;
    this.hash = hash;
  }
}

export class InvalidOptionError extends HashTableError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`HashTable: Invalid option '${option}': ${message}`);
    this.option = option;
  }
}
