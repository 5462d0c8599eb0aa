import { EventEmitter } from "events";
import { inspect } from "util";
import { InvalidHashError, InvalidOptionError } from "./errors";
import { Hasher, HashTableLike, HashTableOptions, KeyEquals } from "./interfaces";
import { defaultHasher, sameValueZero } from "./utils";

export const DEFAULT_CAPACITY = 8;
export const DEFAULT_GROWTH_FACTOR = 2;

/**
 * Shared state and resize protocol for every hash table variant.
 *
 * Subclasses own the meaning of a bucket `B` and implement the key operations;
 * this class owns the counters, the load-factor check and the rehash.
 *
 * Events:
 * - `set` (key, value) after every insert or update
 * - `delete` (key) after every successful delete
 * - `resize` (previousCapacity, capacity) after the table grows
 * - `clear` after `clear()`
 *
 * @template K Type of keys
 * @template V Type of values
 * @template B Type of one bucket in the backing array
 */
export abstract class HashTable<K, V, B>
  extends EventEmitter
  implements HashTableLike<K, V>
{
  protected table: B[];
  protected _capacity: number;
  protected _size: number = 0;
  protected _tombstones: number = 0;

  readonly maxLoadFactor: number;
  readonly growthFactor: number;
  protected readonly hasher: Hasher<K>;
  protected readonly equals: KeyEquals<K>;

  /**
   * @param options Configuration options
   * @param defaultMaxLoadFactor Used when `options.maxLoadFactor` is not set
   */
  constructor(options: HashTableOptions<K>, defaultMaxLoadFactor: number) {
    super();
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new InvalidOptionError(
        "capacity",
        `expected a positive integer, got ${capacity}`,
      );
    }
    const maxLoadFactor = options.maxLoadFactor ?? defaultMaxLoadFactor;
    if (!Number.isFinite(maxLoadFactor) || maxLoadFactor <= 0) {
      throw new InvalidOptionError(
        "maxLoadFactor",
        `expected a positive number, got ${maxLoadFactor}`,
      );
    }
    const growthFactor = options.growthFactor ?? DEFAULT_GROWTH_FACTOR;
    if (!Number.isSafeInteger(growthFactor) || growthFactor < 2) {
      throw new InvalidOptionError(
        "growthFactor",
        `expected an integer of at least 2, got ${growthFactor}`,
      );
    }

    this._capacity = capacity;
    this.maxLoadFactor = maxLoadFactor;
    this.growthFactor = growthFactor;
    this.hasher = options.hasher ?? defaultHasher;
    this.equals = options.equals ?? sameValueZero;
    this.table = this.allocate(capacity);
  }

  /**
   * Number of live entries.
   */
  get size(): number {
    return this._size;
  }

  /**
   * Number of buckets in the backing array.
   */
  get capacity(): number {
    return this._capacity;
  }

  /**
   * Deleted slots still occupying space. Always 0 for chaining.
   */
  get tombstones(): number {
    return this._tombstones;
  }

  get loadFactor(): number {
    return (this._size + this._tombstones) / this._capacity;
  }

  abstract set(key: K, value: V): this;
  abstract get(key: K): V;
  abstract has(key: K): boolean;
  abstract delete(key: K): void;
  abstract entries(): IterableIterator<[K, V]>;

  /**
   * A backing array of `capacity` empty buckets.
   */
  protected abstract allocate(capacity: number): B[];

  /**
   * An empty table of the same variant and options with the given capacity.
   */
  protected abstract createTable(capacity: number): HashTable<K, V, B>;

  /**
   * Fractional hashes are truncated toward zero.
   */
  protected homeIndex(key: K): number {
    const hash = this.hasher(key);
    if (!Number.isFinite(hash)) {
      throw new InvalidHashError(key, hash);
    }
    const index = Math.trunc(hash) % this._capacity;
    return index < 0 ? index + this._capacity : index;
  }

  /**
   * Runs after every insertion. The table may sit above `maxLoadFactor`
   * between the write and this check.
   */
  protected maybeResize(): void {
    if (this.loadFactor > this.maxLoadFactor) {
      this.resize();
    }
  }

  /**
   * Rehashes every live entry into a table `growthFactor` times larger,
   * then takes over its storage. Tombstones are not carried over.
   */
  resize(): void {
    const previousCapacity = this._capacity;
    const next = this.createTable(previousCapacity * this.growthFactor);
    for (const [key, value] of this.entries()) {
      next.set(key, value);
    }

    this.table = next.table;
    this._capacity = next._capacity;
    this._size = next._size;
    this._tombstones = next._tombstones;
    this.emit("resize", previousCapacity, this._capacity);
  }

  /**
   * Removes all entries, keeping the current capacity.
   */
  clear(): void {
    this.table = this.allocate(this._capacity);
    this._size = 0;
    this._tombstones = 0;
    this.emit("clear");
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value;
    }
  }

  /**
   * Iteration follows bucket order, not insertion order, and may change
   * after any mutation.
   */
  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  /**
   * Executes a provided function once per each key/value pair.
   *
   * @param callback Function to execute for each element.
   * @param thisArg Value to use as this when executing callback.
   */
  forEach(
    callback: (value: V, key: K, table: this) => void,
    thisArg?: unknown,
  ): void {
    for (const [key, value] of this.entries()) {
      callback.call(thisArg, value, key, this);
    }
  }

  /**
   * `{key: value, ...}` with pairs sorted by their rendered text.
   */
  toString(): string {
    const pairs: string[] = [];
    for (const [key, value] of this.entries()) {
      pairs.push(`${inspect(key)}: ${inspect(value)}`);
    }
    return "{" + pairs.sort().join(", ") + "}";
  }
}
