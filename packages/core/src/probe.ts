// ============================================================================
// @probekit/core — Probe Sequencing
// ============================================================================
//
// A probe sequence starts at primaryHash(key, tableSize) and advances by a
// fixed stride modulo tableSize:
//
//   start, start + stride, start + 2·stride, …
//
// With a secondary hash the stride is secondaryHash(key, tableSize - 1) + 1,
// which lies in [1, tableSize - 1]; without one it is 1 (linear probing).
// Because tableSize is prime, any such stride visits every slot once before
// returning to the start.
// ============================================================================

import { HashRangeError } from './errors.js';
import type { HashFunction } from './types.js';

function checkHash(role: 'primary' | 'secondary', raw: number, modulus: number): number {
  if (!Number.isSafeInteger(raw) || raw < 0) {
    throw new HashRangeError(role, raw);
  }
  return raw % modulus;
}

/** Index of the first slot probed for `key`. */
export function probeStart(key: string, tableSize: number, primaryHash: HashFunction): number {
  return checkHash('primary', primaryHash(key, tableSize), tableSize);
}

/** Step between consecutive probes for `key`. */
export function probeStride(
  key: string,
  tableSize: number,
  secondaryHash: HashFunction | undefined,
): number {
  if (!secondaryHash || tableSize < 2) return 1;
  const modulus = tableSize - 1;
  return checkHash('secondary', secondaryHash(key, modulus), modulus) + 1;
}

/**
 * Yield the slot indices of one probe cycle: at most `tableSize` indices,
 * stopping early if the walk returns to `start`.
 */
export function* probeSequence(start: number, stride: number, tableSize: number): Generator<number> {
  let index = start;
  for (let step = 0; step < tableSize; step++) {
    yield index;
    index = (index + stride) % tableSize;
    if (index === start) return;
  }
}
