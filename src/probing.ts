/**
 * Produces the candidate indices for a key whose home index is `start`.
 * Sequences are infinite; callers take the first `capacity` terms.
 */
export type ProbeSequence = (
  start: number,
  capacity: number,
) => Generator<number, never, undefined>;

/**
 * Stride 1: start, start + 1, start + 2, ... (mod capacity).
 */
export function* linearProbe(
  start: number,
  capacity: number,
): Generator<number, never, undefined> {
  let index = start % capacity;
  while (true) {
    yield index;
    index = index + 1 === capacity ? 0 : index + 1;
  }
}

/**
 * Triangular stride: start + i(i+1)/2 (mod capacity).
 * Each step adds i to the previous index, so no multiplication is needed.
 * With a power-of-two capacity the first `capacity` terms hit every slot;
 * other capacities may repeat indices before that.
 */
export function* quadraticProbe(
  start: number,
  capacity: number,
): Generator<number, never, undefined> {
  let index = start % capacity;
  for (let i = 1; ; i++) {
    yield index;
    index = (index + (i % capacity)) % capacity;
  }
}
