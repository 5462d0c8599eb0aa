/**
 * A slot that has never held an entry since the last resize or clear.
 */
export interface EmptySlot {
  readonly kind: "empty";
}

/**
 * A slot whose entry was deleted. Probes walk past it; inserts may reuse it.
 */
export interface TombstoneSlot {
  readonly kind: "tombstone";
}

export interface OccupiedSlot<K, V> {
  readonly kind: "occupied";
  readonly key: K;
  value: V;
}

/**
 * One position of an open-addressing table.
 */
export type Slot<K, V> = EmptySlot | TombstoneSlot | OccupiedSlot<K, V>;

export interface ChainBucket<K, V> {
  readonly kind: "chain";
  // Never empty: a bucket whose last entry is removed goes back to EMPTY.
  readonly entries: Array<[K, V]>;
}

/**
 * One position of a chaining table.
 */
export type Bucket<K, V> = EmptySlot | ChainBucket<K, V>;

export const EMPTY: EmptySlot = Object.freeze({ kind: "empty" });
export const TOMBSTONE: TombstoneSlot = Object.freeze({ kind: "tombstone" });

export function occupied<K, V>(key: K, value: V): OccupiedSlot<K, V> {
  return { kind: "occupied", key, value };
}

export function chain<K, V>(...entries: Array<[K, V]>): ChainBucket<K, V> {
  return { kind: "chain", entries };
}
