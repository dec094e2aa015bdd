/**
 * Process-wide memo of n! values.
 *
 * Entries are never evicted. Computation is synchronous and happens before
 * the insert, so a reader never sees a partially built entry.
 */

import { BigInteger } from './BigInteger.js';
import log from '../../log.js';

const logger = log.withScope('factorial-cache');

const factorials = new Map<number, BigInteger>();

/**
 * n!, computed at most once per distinct n for the lifetime of the process.
 *
 * @throws DomainError when n is not a non-negative integer
 */
export function cachedFactorial(n: number): BigInteger {
  const hit = factorials.get(n);
  if (hit) return hit;

  const value = BigInteger.factorial(n);
  factorials.set(n, value);
  logger.debug('factorial cache miss', { n, size: factorials.size });
  return value;
}

export function factorialCacheSize(): number {
  return factorials.size;
}

// For testing: start from an empty table
export function clearFactorialCache() {
  factorials.clear();
}
