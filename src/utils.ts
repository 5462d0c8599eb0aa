/**
 * MurmurHash3 32-bit hash of a string.
 * Char codes are truncated to their low byte, so this is exact for Latin-1
 * and a fast approximation for the rest of UTF-16.
 *
 * @param key The string to hash.
 * @param seed Optional seed value (default 0).
 * @returns A 32-bit unsigned integer hash.
 */
export function murmurHash3(key: string, seed: number = 0): number {
  let h1 = seed | 0;
  let k1 = 0;
  let i = 0;
  const c1 = 0xcc9e2d51;
  const c2 = 0x1b873593;

  const len = key.length;
  const len4 = len & ~3;

  for (i = 0; i < len4; i += 4) {
    k1 =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);

    k1 = Math.imul(k1, c1);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, c2);

    h1 ^= k1;
    h1 = (h1 << 13) | (h1 >>> 19);
    h1 = Math.imul(h1, 5) + 0xe6546b64;
  }

  k1 = 0;
  const rem = len & 3;
  if (rem === 3) k1 ^= (key.charCodeAt(i + 2) & 0xff) << 16;
  if (rem >= 2) k1 ^= (key.charCodeAt(i + 1) & 0xff) << 8;
  if (rem >= 1) {
    k1 ^= key.charCodeAt(i) & 0xff;
    k1 = Math.imul(k1, c1);
    k1 = (k1 << 15) | (k1 >>> 17);
    k1 = Math.imul(k1, c2);
    h1 ^= k1;
  }

  // Finalization
  h1 ^= len;
  h1 ^= h1 >>> 16;
  h1 = Math.imul(h1, 0x85ebca6b);
  h1 ^= h1 >>> 13;
  h1 = Math.imul(h1, 0xc2b2ae35);
  h1 ^= h1 >>> 16;

  return h1 >>> 0;
}

/**
 * Thomas Wang's 32-bit integer mix hash function.
 *
 * @param num The number to hash. Only the low 32 bits take part.
 * @returns A 32-bit unsigned integer hash.
 */
export function numberHash(num: number): number {
  num = ~num + (num << 15);
  num = num ^ (num >>> 12);
  num = num + (num << 2);
  num = num ^ (num >>> 4);
  num = Math.imul(num, 2057);
  num = num ^ (num >>> 16);
  return num >>> 0;
}

// Unregistered symbols can be weak keys; Symbol.for symbols cannot, and hash
// by their registry key instead.
const identityIds = new WeakMap<object | symbol, number>();
let nextId = 1;

function identityHash(key: object | symbol): number {
  if (typeof key === "symbol") {
    const registered = Symbol.keyFor(key);
    if (registered !== undefined) return murmurHash3(`Symbol.for(${registered})`);
  }
  let id = identityIds.get(key);
  if (id === undefined) {
    id = nextId++;
    identityIds.set(key, id);
  }
  return numberHash(id);
}

/**
 * Hash inference used when no `hasher` option is given. Consistent with
 * SameValueZero: primitives hash by value, objects by identity.
 */
export function defaultHasher(key: unknown): number {
  if (typeof key === "string") return murmurHash3(key);
  if (typeof key === "number") {
    // -0 passes the int32 test and hashes like 0.
    if ((key | 0) === key) return numberHash(key);
    return murmurHash3(String(key));
  }
  if (typeof key === "bigint") return murmurHash3(`${key}n`);
  if (typeof key === "boolean") return key ? 1 : 0;
  if (typeof key === "symbol" || typeof key === "function") {
    return identityHash(key);
  }
  if (typeof key === "object" && key !== null) {
    return identityHash(key);
  }
  // null, undefined
  return key === null ? 3 : 2;
}

/**
 * SameValueZero: `===`, except NaN equals NaN.
 */
export function sameValueZero<K>(a: K, b: K): boolean {
  return a === b || (a !== a && b !== b);
}
