/**
 * Exact arbitrary-precision integers
 *
 * BigInteger is the value type; gcd, random and cachedFactorial are the
 * free helpers built on top of it.
 */

export { BigInteger } from './BigInteger.js';

export type { Coercible, IntegerLike } from './coerce.js';
export { parseInteger, MIN_BASE, MAX_BASE } from './coerce.js';

export type { RoundingMode } from './engine.js';
export { ROUNDING_MODES } from './engine.js';

export {
  BigIntegerError,
  ParseError,
  OverflowError,
  DivisionByZeroError,
  DomainError,
  RandomSourceError
} from './errors.js';

export type { BigIntegerErrorCode } from './errors.js';

export { gcd, random, cachedFactorial } from './utils.js';
