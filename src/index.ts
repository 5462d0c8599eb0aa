export { HashTable, DEFAULT_CAPACITY, DEFAULT_GROWTH_FACTOR } from "./HashTable";
export { ChainingHashTable, CHAINING_MAX_LOAD_FACTOR } from "./ChainingHashTable";
export {
  OpenAddressingHashTable,
  LinearProbingHashTable,
  QuadraticProbingHashTable,
  OPEN_ADDRESSING_MAX_LOAD_FACTOR,
} from "./OpenAddressingHashTable";
export { linearProbe, quadraticProbe } from "./probing";
export type { ProbeSequence } from "./probing";
export { EMPTY, TOMBSTONE, occupied, chain } from "./slots";
export type {
  Slot,
  Bucket,
  EmptySlot,
  TombstoneSlot,
  OccupiedSlot,
  ChainBucket,
} from "./slots";
export type {
  Hasher,
  KeyEquals,
  HashTableOptions,
  HashTableLike,
} from "./interfaces";
export {
  HashTableError,
  KeyNotFoundError,
  TableFullError,
  InvalidHashError,
  InvalidOptionError,
} from "./errors";
export { murmurHash3, numberHash, defaultHasher, sameValueZero } from "./utils";
export { deepSizeOf } from "./sizeof";
