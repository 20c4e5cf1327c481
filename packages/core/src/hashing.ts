// ============================================================================
// @probekit/core — String Hash Functions
// ============================================================================
//
// Every function here has the HashFunction shape `(key, modulus) => index`
// and returns an integer in [0, modulus). Intermediate state is kept in
// unsigned 32-bit range so results are identical on every platform.
// ============================================================================

import type { HashFunction } from './types.js';

/** Sum of UTF-16 code units, reduced by the modulus. */
export const simpleHash: HashFunction = (key, modulus) => {
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash += key.charCodeAt(i);
  }
  return hash % modulus;
};

/**
 * Robert Sedgewick's hash: a multiplicative hash whose multiplier itself
 * evolves with every character.
 */
export const rsHash: HashFunction = (key, modulus) => {
  const b = 378551;
  let a = 63689;
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash = (Math.imul(hash, a) + key.charCodeAt(i)) >>> 0;
    a = Math.imul(a, b) >>> 0;
  }
  return hash % modulus;
};

/**
 * Polynomial hash with a pseudo-random multiplier sequence, in the style of
 * a universal hash family member with fixed seeds.
 */
export const universalHash: HashFunction = (key, modulus) => {
  const b = 27183;
  let a = 31415;
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash = (Math.imul(a, hash) + key.charCodeAt(i)) >>> 0;
    a = Math.imul(a, b) >>> 0;
  }
  return hash % modulus;
};

/** P. J. Weinberger's hash, as used for ELF symbol tables. */
export const pjwHash: HashFunction = (key, modulus) => {
  let hash = 0;
  for (let i = 0; i < key.length; i++) {
    hash = ((hash << 4) + key.charCodeAt(i)) >>> 0;
    const high = (hash & 0xf0000000) >>> 0;
    if (high !== 0) {
      hash = (hash ^ (high >>> 24)) >>> 0;
      hash = (hash & ~high) >>> 0;
    }
  }
  return hash % modulus;
};

/** Named registry of the built-in hash functions. */
export const hashFunctions = {
  simple: simpleHash,
  rs: rsHash,
  universal: universalHash,
  pjw: pjwHash,
} as const satisfies Record<string, HashFunction>;

export type HashName = keyof typeof hashFunctions;

export const HASH_NAMES: readonly HashName[] = ['simple', 'rs', 'universal', 'pjw'];

export function isHashName(name: string): name is HashName {
  return Object.hasOwn(hashFunctions, name);
}
