import { KeyNotFoundError } from "./errors";
import { HashTable } from "./HashTable";
import { HashTableOptions } from "./interfaces";
import { Bucket, chain, EMPTY } from "./slots";

export const CHAINING_MAX_LOAD_FACTOR = 1.0;

/**
 * Hash table that resolves collisions by keeping a list of entries per bucket.
 * Deletes are local to a bucket, so no tombstones are needed and the load
 * factor may go above 1.0.
 */
export class ChainingHashTable<K = unknown, V = unknown> extends HashTable<
  K,
  V,
  Bucket<K, V>
> {
  private readonly options: HashTableOptions<K>;

  constructor(options: HashTableOptions<K> = {}) {
    super(options, CHAINING_MAX_LOAD_FACTOR);
    this.options = options;
  }

  protected allocate(capacity: number): Bucket<K, V>[] {
    return new Array<Bucket<K, V>>(capacity).fill(EMPTY);
  }

  protected createTable(capacity: number): ChainingHashTable<K, V> {
    return new ChainingHashTable<K, V>({
      ...this.options,
      capacity,
      maxLoadFactor: this.maxLoadFactor,
    });
  }

  set(key: K, value: V): this {
    const index = this.homeIndex(key);
    let bucket = this.table[index];
    if (bucket.kind === "empty") {
      bucket = chain<K, V>();
      this.table[index] = bucket;
    }

    const entry = bucket.entries.find(([k]) => this.equals(k, key));
    if (entry) {
      entry[1] = value;
    } else {
      bucket.entries.push([key, value]);
      this._size++;
    }

    this.emit("set", key, value);
    this.maybeResize();
    return this;
  }

  get(key: K): V {
    const bucket = this.table[this.homeIndex(key)];
    if (bucket.kind === "chain") {
      for (const [k, v] of bucket.entries) {
        if (this.equals(k, key)) return v;
      }
    }
    throw new KeyNotFoundError(key);
  }

  has(key: K): boolean {
    const bucket = this.table[this.homeIndex(key)];
    return (
      bucket.kind === "chain" &&
      bucket.entries.some(([k]) => this.equals(k, key))
    );
  }

  delete(key: K): void {
    const index = this.homeIndex(key);
    const bucket = this.table[index];
    if (bucket.kind === "empty") {
      throw new KeyNotFoundError(key);
    }

    const position = bucket.entries.findIndex(([k]) => this.equals(k, key));
    if (position === -1) {
      throw new KeyNotFoundError(key);
    }
    bucket.entries.splice(position, 1);
    if (bucket.entries.length === 0) {
      this.table[index] = EMPTY;
    }
    this._size--;
    this.emit("delete", key);
  }

  *entries(): IterableIterator<[K, V]> {
    for (const bucket of this.table) {
      if (bucket.kind === "empty") continue;
      for (const [key, value] of bucket.entries) {
        yield [key, value];
      }
    }
  }

  /**
   * A copy of the backing array, for inspection.
   */
  buckets(): Bucket<K, V>[] {
    return this.table.map(
      (bucket): Bucket<K, V> =>
        bucket.kind === "empty"
          ? EMPTY
          : chain(...bucket.entries.map(([k, v]): [K, V] => [k, v])),
    );
  }
}
