import { KeyNotFoundError, TableFullError } from "./errors";
import { HashTable } from "./HashTable";
import { HashTableOptions } from "./interfaces";
import { linearProbe, ProbeSequence, quadraticProbe } from "./probing";
import { EMPTY, occupied, Slot, TOMBSTONE } from "./slots";

export const OPEN_ADDRESSING_MAX_LOAD_FACTOR = 0.6;

/**
 * Hash table that stores one entry per slot and resolves collisions by
 * walking a probe sequence from the key's home index.
 *
 * Deleted entries leave a tombstone so that keys placed further along the
 * same sequence stay reachable. Tombstones count towards the load factor and
 * are dropped on resize.
 */
export class OpenAddressingHashTable<K = unknown, V = unknown> extends HashTable<
  K,
  V,
  Slot<K, V>
> {
  private readonly options: HashTableOptions<K>;
  private readonly probe: ProbeSequence;

  constructor(probe: ProbeSequence, options: HashTableOptions<K> = {}) {
    super(options, OPEN_ADDRESSING_MAX_LOAD_FACTOR);
    this.probe = probe;
    this.options = options;
  }

  protected allocate(capacity: number): Slot<K, V>[] {
    return new Array<Slot<K, V>>(capacity).fill(EMPTY);
  }

  protected createTable(capacity: number): OpenAddressingHashTable<K, V> {
    return new OpenAddressingHashTable<K, V>(this.probe, this.withCapacity(capacity));
  }

  protected withCapacity(capacity: number): HashTableOptions<K> {
    return { ...this.options, capacity, maxLoadFactor: this.maxLoadFactor };
  }

  /**
   * The first `capacity` indices of the key's probe sequence.
   */
  private *probeFrom(key: K): Generator<number, void, undefined> {
    const capacity = this._capacity;
    const sequence = this.probe(this.homeIndex(key), capacity);
    for (let attempt = 0; attempt < capacity; attempt++) {
      yield sequence.next().value;
    }
  }

  /**
   * Index of the slot holding `key`, or -1. Tombstones never end the search;
   * an empty slot does.
   */
  private find(key: K): number {
    for (const index of this.probeFrom(key)) {
      const slot = this.table[index];
      if (slot.kind === "empty") return -1;
      if (slot.kind === "occupied" && this.equals(slot.key, key)) return index;
    }
    return -1;
  }

  set(key: K, value: V): this {
    let candidate = -1;
    let target = -1;

    for (const index of this.probeFrom(key)) {
      const slot = this.table[index];
      if (slot.kind === "occupied") {
        if (this.equals(slot.key, key)) {
          slot.value = value;
          this.emit("set", key, value);
          this.maybeResize();
          return this;
        }
      } else if (slot.kind === "tombstone") {
        if (candidate === -1) candidate = index;
      } else {
        target = index;
        break;
      }
    }

    // Every live key sits within the first `capacity` probes of its home, so
    // reaching an empty slot or running out of probes proves `key` is absent.
    if (candidate !== -1) {
      target = candidate;
      this._tombstones--;
    } else if (target === -1) {
      throw new TableFullError(this._capacity);
    }

    this.table[target] = occupied(key, value);
    this._size++;
    this.emit("set", key, value);
    this.maybeResize();
    return this;
  }

  get(key: K): V {
    const index = this.find(key);
    const slot = index === -1 ? EMPTY : this.table[index];
    if (slot.kind !== "occupied") {
      throw new KeyNotFoundError(key);
    }
    return slot.value;
  }

  has(key: K): boolean {
    return this.find(key) !== -1;
  }

  delete(key: K): void {
    const index = this.find(key);
    if (index === -1) {
      throw new KeyNotFoundError(key);
    }
    this.table[index] = TOMBSTONE;
    this._tombstones++;
    this._size--;
    this.emit("delete", key);
  }

  *entries(): IterableIterator<[K, V]> {
    for (const slot of this.table) {
      if (slot.kind === "occupied") {
        yield [slot.key, slot.value];
      }
    }
  }

  /**
   * A copy of the backing array, for inspection.
   */
  slots(): Slot<K, V>[] {
    return this.table.map((slot) =>
      slot.kind === "occupied" ? occupied(slot.key, slot.value) : slot,
    );
  }
}

/**
 * Open addressing with stride 1.
 */
export class LinearProbingHashTable<
  K = unknown,
  V = unknown,
> extends OpenAddressingHashTable<K, V> {
  constructor(options: HashTableOptions<K> = {}) {
    super(linearProbe, options);
  }

  protected createTable(capacity: number): LinearProbingHashTable<K, V> {
    return new LinearProbingHashTable<K, V>(this.withCapacity(capacity));
  }
}

/**
 * Open addressing with triangular-number strides, which avoids the primary
 * clustering of linear probing.
 */
export class QuadraticProbingHashTable<
  K = unknown,
  V = unknown,
> extends OpenAddressingHashTable<K, V> {
  constructor(options: HashTableOptions<K> = {}) {
    super(quadraticProbe, options);
  }

  protected createTable(capacity: number): QuadraticProbingHashTable<K, V> {
    return new QuadraticProbingHashTable<K, V>(this.withCapacity(capacity));
  }
}
