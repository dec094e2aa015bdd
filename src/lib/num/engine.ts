/**
 * Integer primitives composed from the native bigint operators.
 *
 * The bigint engine supplies + - * / % ** and radix conversion for the
 * usual prefixes; everything below is built only from those. Callers are
 * expected to have validated operands (non-zero divisors, non-negative
 * radicands, positive moduli).
 */

export type RoundingMode = 'truncate' | 'floor' | 'ceil';

export const ROUNDING_MODES: readonly RoundingMode[] = ['truncate', 'floor', 'ceil'];

const DIGITS = '0123456789abcdefghijklmnopqrstuvwxyz';

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

/**
 * True when `digits` is non-empty and every character is a digit of `radix`.
 * Expects lowercase input.
 */
export function isRadixDigits(digits: string, radix: number): boolean {
  if (digits.length === 0) return false;
  for (const ch of digits) {
    const d = DIGITS.indexOf(ch);
    if (d < 0 || d >= radix) return false;
  }
  return true;
}

/**
 * Parse unsigned lowercase digits already checked with isRadixDigits.
 */
export function parseRadix(digits: string, radix: number): bigint {
  switch (radix) {
    case 2: return BigInt(`0b${digits}`);
    case 8: return BigInt(`0o${digits}`);
    case 10: return BigInt(digits);
    case 16: return BigInt(`0x${digits}`);
  }

  const r = BigInt(radix);
  let acc = 0n;
  for (const ch of digits) {
    acc = acc * r + BigInt(DIGITS.indexOf(ch));
  }
  return acc;
}

/**
 * Quotient of a / b rounded per mode. b must be non-zero.
 */
export function divRound(a: bigint, b: bigint, mode: RoundingMode): bigint {
  const q = a / b;
  if (mode === 'truncate' || a % b === 0n) return q;

  // The exact quotient is negative when the truncated remainder and divisor differ in sign
  const negative = (a % b < 0n) !== (b < 0n);
  if (mode === 'floor') return negative ? q - 1n : q;
  return negative ? q : q + 1n;
}

/**
 * Remainder matching divRound: a === divRound(a, b, mode) * b + remRound(a, b, mode).
 */
export function remRound(a: bigint, b: bigint, mode: RoundingMode): bigint {
  return a - divRound(a, b, mode) * b;
}

/**
 * Non-negative remainder in [0, |b|).
 */
export function modNonNegative(a: bigint, b: bigint): bigint {
  const r = a % b;
  return r < 0n ? r + abs(b) : r;
}

/**
 * floor(sqrt(n)) by Newton's method. n must be non-negative.
 */
export function isqrt(n: bigint): bigint {
  if (n < 2n) return n;

  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Inverse of a modulo m, or null when gcd(a, m) !== 1. m must be positive.
 */
export function modInverse(a: bigint, m: bigint): bigint | null {
  let [oldR, r] = [modNonNegative(a, m), m];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
  }

  if (oldR !== 1n) return null;
  return modNonNegative(oldS, m);
}

/**
 * base^exp mod m by square-and-multiply. exp >= 0, m > 0.
 */
export function modPow(base: bigint, exp: bigint, m: bigint): bigint {
  if (m === 1n) return 0n;

  let result = 1n;
  let b = modNonNegative(base, m);
  let e = exp;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % m;
    b = (b * b) % m;
    e >>= 1n;
  }
  return result;
}

/**
 * Product of the integers in [lo, hi], split in halves so the
 * multiplications stay balanced.
 */
function rangeProduct(lo: bigint, hi: bigint): bigint {
  if (lo > hi) return 1n;
  if (hi - lo < 8n) {
    let p = lo;
    for (let i = lo + 1n; i <= hi; i++) p *= i;
    return p;
  }
  const mid = (lo + hi) / 2n;
  return rangeProduct(lo, mid) * rangeProduct(mid + 1n, hi);
}

/**
 * n! for a non-negative integer n.
 */
export function factorial(n: number): bigint {
  if (n < 2) return 1n;
  return rangeProduct(2n, BigInt(n));
}
