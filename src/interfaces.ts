/**
 * Maps a key to an integer. Equal keys must hash equally; the table takes the
 * result modulo its capacity, so any integer (including negatives) is fine.
 * Fractions are truncated; NaN and infinities raise `InvalidHashError`.
 */
export type Hasher<K> = (key: K) => number;

export type KeyEquals<K> = (a: K, b: K) => boolean;

/**
 * Configuration options shared by every hash table variant.
 */
export interface HashTableOptions<K> {
  /**
   * Initial number of buckets. Defaults to 8.
   */
  capacity?: number;
  /**
   * Resize once the load factor exceeds this value.
   * Chaining may go above 1.0; open addressing should stay below it.
   */
  maxLoadFactor?: number;
  /**
   * Capacity multiplier applied on resize. Integer, at least 2. Defaults to 2.
   */
  growthFactor?: number;
  /**
   * Custom hash function for keys. Defaults to `defaultHasher`.
   */
  hasher?: Hasher<K>;
  /**
   * Key equality. Defaults to SameValueZero, the same rule `Map` uses.
   */
  equals?: KeyEquals<K>;
}

/**
 * The map surface every variant exposes, and the one the benchmark harness drives.
 */
export interface HashTableLike<K, V> extends Iterable<[K, V]> {
  readonly size: number;
  readonly capacity: number;
  readonly loadFactor: number;
  readonly maxLoadFactor: number;
  set(key: K, value: V): this;
  /**
   * @throws KeyNotFoundError
   */
  get(key: K): V;
  has(key: K): boolean;
  /**
   * @throws KeyNotFoundError
   */
  delete(key: K): void;
  entries(): IterableIterator<[K, V]>;
}
