// ============================================================================
// @probekit/core — Prime Sizing
// ============================================================================
//
// Table capacities are always prime so that every stride in
// [1, tableSize - 1] visits each slot exactly once per cycle.
// ============================================================================

/** Trial-division primality test. */
export function isPrime(n: number): boolean {
  if (!Number.isInteger(n) || n < 2) return false;
  if (n < 4) return true;
  if (n % 2 === 0 || n % 3 === 0) return false;

  for (let i = 5; i * i <= n; i += 6) {
    if (n % i === 0 || n % (i + 2) === 0) return false;
  }
  return true;
}

/**
 * Smallest prime greater than or equal to `n`.
 *
 * @example
 * ```ts
 * nextPrime(14); // 17
 * nextPrime(7);  // 7
 * nextPrime(0);  // 2
 * ```
 */
export function nextPrime(n: number): number {
  let candidate = Math.max(2, Math.ceil(n));
  while (!isPrime(candidate)) {
    candidate++;
  }
  return candidate;
}
