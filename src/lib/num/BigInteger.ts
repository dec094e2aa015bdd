/**
 * Immutable arbitrary-precision signed integer
 *
 * Wraps a native bigint and gives it one contract for construction,
 * conversion, comparison and arithmetic:
 * - every operand may be a BigInteger, a decimal string, a safe-integer number or a bigint
 * - division-like operations check for a zero divisor before touching the engine
 * - buffers carry the unsigned magnitude only, little-endian by default
 */

import { magnitudeToBytes, bytesToHex } from './bytes.js';
import {
  toEngine,
  parseInteger,
  numberToEngine,
  assertBase,
  MIN_BASE,
  MAX_BASE,
  type Coercible,
  type IntegerLike,
} from './coerce.js';
import {
  abs,
  divRound,
  remRound,
  modNonNegative,
  isqrt,
  gcd,
  modPow,
  modInverse,
  factorial,
  type RoundingMode,
} from './engine.js';
import { DivisionByZeroError, DomainError, OverflowError } from './errors.js';

export class BigInteger implements IntegerLike {
  private static zeroValue: BigInteger | null = null;
  private static oneValue: BigInteger | null = null;

  private readonly value: bigint;

  private constructor(value: bigint) {
    this.value = value;
  }

  // ============================================================================
  // Construction
  // ============================================================================

  /**
   * Create from a string in `base` (0 auto-detects 0x / 0b / 0 prefixes),
   * a safe-integer number or a bigint. The base only matters for strings.
   *
   * @throws ParseError when a string is not numeric in the base, or a number is not a safe integer
   * @throws DomainError when the base is unsupported, whatever the value
   */
  static from(value: string | number | bigint, base = 10): BigInteger {
    assertBase(base);
    if (typeof value === 'bigint') return new BigInteger(value);
    if (typeof value === 'number') return new BigInteger(numberToEngine(value));
    return new BigInteger(parseInteger(value, base));
  }

  /**
   * Read an unsigned magnitude from raw bytes. With `reverse` (the default)
   * the bytes are little-endian. The input buffer is left untouched.
   */
  static fromBuffer(buffer: Uint8Array, reverse = true): BigInteger {
    const hex = bytesToHex(buffer, reverse);
    if (hex.length === 0) return BigInteger.zero();
    return new BigInteger(BigInt(`0x${hex}`));
  }

  static of(value: Coercible): BigInteger {
    if (value instanceof BigInteger) return value;
    return new BigInteger(toEngine(value));
  }

  static zero(): BigInteger {
    if (BigInteger.zeroValue === null) {
      BigInteger.zeroValue = new BigInteger(0n);
    }
    return BigInteger.zeroValue;
  }

  static one(): BigInteger {
    if (BigInteger.oneValue === null) {
      BigInteger.oneValue = new BigInteger(1n);
    }
    return BigInteger.oneValue;
  }

  /**
   * n! computed on every call. See cachedFactorial for the memoised variant.
   */
  static factorial(n: number): BigInteger {
    if (!Number.isSafeInteger(n) || n < 0) {
      throw new DomainError(`Factorial requires a non-negative integer, got ${n}`);
    }
    return new BigInteger(factorial(n));
  }

  // ============================================================================
  // Conversion
  // ============================================================================

  /**
   * @throws OverflowError outside [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER]
   */
  toInt(): number {
    if (this.value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new OverflowError('The number is greater than Number.MAX_SAFE_INTEGER');
    }
    if (this.value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new OverflowError('The number is less than Number.MIN_SAFE_INTEGER');
    }
    return Number(this.value);
  }

  toBigInt(): bigint {
    return this.value;
  }

  /**
   * Canonical representation: leading '-' for negatives, no leading zeros.
   */
  toString(radix = 10): string {
    if (!Number.isInteger(radix) || radix < MIN_BASE || radix > MAX_BASE) {
      throw new DomainError(`Unsupported radix ${radix}, expected ${MIN_BASE}..${MAX_BASE}`);
    }
    return this.value.toString(radix);
  }

  /**
   * Minimal bytes of the magnitude; the sign is dropped. Zero encodes as an empty buffer.
   */
  toBuffer(reverse = true): Buffer {
    return magnitudeToBytes(abs(this.value), reverse);
  }

  toJSON(): string {
    return this.toString();
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  /**
   * Returns: -1 if this < rhs, 0 if equal, 1 if this > rhs
   */
  compare(rhs: Coercible): -1 | 0 | 1 {
    const other = toEngine(rhs);
    if (this.value < other) return -1;
    if (this.value > other) return 1;
    return 0;
  }

  lessThan(rhs: Coercible): boolean { return this.compare(rhs) < 0; }
  lessThanEqual(rhs: Coercible): boolean { return this.compare(rhs) <= 0; }
  equal(rhs: Coercible): boolean { return this.compare(rhs) === 0; }
  greaterThan(rhs: Coercible): boolean { return this.compare(rhs) > 0; }
  greaterThanEqual(rhs: Coercible): boolean { return this.compare(rhs) >= 0; }

  /**
   * Membership in [left, right], or (left, right) when exclusive.
   */
  between(left: Coercible, right: Coercible, exclusive = false): boolean {
    if (exclusive) {
      return !(this.lessThanEqual(left) || this.greaterThanEqual(right));
    }
    return !(this.lessThan(left) || this.greaterThan(right));
  }

  isZero(): boolean {
    return this.value === 0n;
  }

  isNegative(): boolean {
    return this.value < 0n;
  }

  isPositive(): boolean {
    return this.value > 0n;
  }

  sign(): -1 | 0 | 1 {
    return this.compare(0n);
  }

  // ============================================================================
  // Arithmetic
  // ============================================================================

  add(rhs: Coercible): BigInteger {
    return new BigInteger(this.value + toEngine(rhs));
  }

  sub(rhs: Coercible): BigInteger {
    return new BigInteger(this.value - toEngine(rhs));
  }

  mul(rhs: Coercible): BigInteger {
    return new BigInteger(this.value * toEngine(rhs));
  }

  /**
   * Same as div_q.
   */
  div(rhs: Coercible, round: RoundingMode = 'truncate'): BigInteger {
    return this.div_q(rhs, round);
  }

  /**
   * Quotient rounded toward zero, -infinity ('floor') or +infinity ('ceil').
   *
   * @throws DivisionByZeroError
   */
  div_q(rhs: Coercible, round: RoundingMode = 'truncate'): BigInteger {
    const divisor = nonZero(rhs);
    return new BigInteger(divRound(this.value, divisor, round));
  }

  /**
   * Remainder paired with div_q under the same rounding, so that
   * this == div_q(rhs, round) * rhs + div_r(rhs, round).
   *
   * @throws DivisionByZeroError
   */
  div_r(rhs: Coercible, round: RoundingMode = 'truncate'): BigInteger {
    const divisor = nonZero(rhs);
    return new BigInteger(remRound(this.value, divisor, round));
  }

  /**
   * Non-negative remainder in [0, |rhs|).
   *
   * @throws DivisionByZeroError
   */
  mod(rhs: Coercible): BigInteger {
    const divisor = nonZero(rhs);
    return new BigInteger(modNonNegative(this.value, divisor));
  }

  /**
   * @throws DomainError for negative exponents
   */
  pow(exponent: Coercible): BigInteger {
    const e = toEngine(exponent);
    if (e < 0n) {
      throw new DomainError(`Negative exponent ${e} is not supported`);
    }
    if (e > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new DomainError(`Exponent ${e} is too large`);
    }
    return new BigInteger(this.value ** e);
  }

  /**
   * this^exponent mod modulus, in [0, modulus). A negative exponent raises the
   * modular inverse instead.
   *
   * @throws DomainError when modulus <= 0, or the inverse does not exist
   */
  powMod(exponent: Coercible, modulus: Coercible): BigInteger {
    const e = toEngine(exponent);
    const m = toEngine(modulus);
    if (m <= 0n) {
      throw new DomainError(`Modulus must be positive, got ${m}`);
    }

    if (e >= 0n) {
      return new BigInteger(modPow(this.value, e, m));
    }

    const inverse = modInverse(this.value, m);
    if (inverse === null) {
      throw new DomainError(`${this.value} has no inverse modulo ${m}`);
    }
    return new BigInteger(modPow(inverse, -e, m));
  }

  /**
   * floor(sqrt(this))
   *
   * @throws DomainError on negative values
   */
  sqrt(): BigInteger {
    if (this.value < 0n) {
      throw new DomainError('Square root of a negative number');
    }
    return new BigInteger(isqrt(this.value));
  }

  abs(): BigInteger {
    if (this.value >= 0n) return this;
    return new BigInteger(-this.value);
  }

  negate(): BigInteger {
    return new BigInteger(-this.value);
  }

  /**
   * Non-negative greatest common divisor; gcd(0, 0) is 0.
   */
  gcd(rhs: Coercible): BigInteger {
    return new BigInteger(gcd(this.value, toEngine(rhs)));
  }
}

function nonZero(rhs: Coercible): bigint {
  const divisor = toEngine(rhs);
  if (divisor === 0n) {
    throw new DivisionByZeroError();
  }
  return divisor;
}
