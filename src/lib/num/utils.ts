/**
 * Stateless helpers built on the BigInteger public contract
 */

import { randomBytes } from 'node:crypto';
import { BigInteger } from './BigInteger.js';
import type { Coercible } from './coerce.js';
import { DomainError, RandomSourceError } from './errors.js';
import { getRuntime } from '../../config/runtime.js';
import log from '../../log.js';
import { normalizeError } from '../../utils/errors.js';

export { cachedFactorial } from './factorialCache.js';

const logger = log.withScope('random');

/** Secure byte source; replaced in tests to simulate entropy failures. */
export const randomSource = {
  bytes: (size: number): Uint8Array => randomBytes(size),
};

/**
 * GCD of two operands of any accepted kind.
 */
export function gcd(a: Coercible, b: Coercible): BigInteger {
  return BigInteger.of(a).gcd(b);
}

/**
 * Cryptographically secure random value of `sizeBytes` bytes, read big-endian.
 *
 * @throws DomainError when sizeBytes is negative, fractional or above the configured maximum
 * @throws RandomSourceError when the secure source cannot supply the bytes
 */
export function random(sizeBytes: number): BigInteger {
  const { maxRandomBytes } = getRuntime();
  if (!Number.isSafeInteger(sizeBytes) || sizeBytes < 0 || sizeBytes > maxRandomBytes) {
    throw new DomainError(`Random size must be an integer in 0..${maxRandomBytes}, got ${sizeBytes}`);
  }

  let bytes: Uint8Array;
  try {
    bytes = randomSource.bytes(sizeBytes);
  } catch (err) {
    logger.error('secure random source failed', { sizeBytes, error: normalizeError(err) });
    throw new RandomSourceError(`Secure random source failed to supply ${sizeBytes} bytes`, err);
  }

  if (bytes.length !== sizeBytes) {
    throw new RandomSourceError(`Secure random source returned ${bytes.length} of ${sizeBytes} bytes`);
  }

  logger.debug('random draw', { sizeBytes });
  return BigInteger.fromBuffer(bytes, false);
}
