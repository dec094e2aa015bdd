/**
 * Operand coercion: every BigInteger method accepts a Coercible and funnels
 * it through toEngine, so call sites never convert by hand.
 */

import { isRadixDigits, parseRadix } from './engine.js';
import { DomainError, ParseError } from './errors.js';

/** Anything that can hand over its exact engine value. BigInteger implements this. */
export interface IntegerLike {
  toBigInt(): bigint;
}

export type Coercible = IntegerLike | string | number | bigint;

export const MIN_BASE = 2;
export const MAX_BASE = 36;

/**
 * Resolve base 0 from the standard prefixes: 0x → 16, 0b → 2, leading 0 → 8, else 10.
 * Returns the detected radix and the digits with the prefix removed.
 */
function detectBase(body: string): [number, string] {
  if (body.startsWith('0x')) return [16, body.slice(2)];
  if (body.startsWith('0b')) return [2, body.slice(2)];
  if (body.length > 1 && body.startsWith('0')) return [8, body.slice(1)];
  return [10, body];
}

export function assertBase(base: number): void {
  if (base === 0) return;
  if (!Number.isInteger(base) || base < MIN_BASE || base > MAX_BASE) {
    throw new DomainError(`Unsupported base ${base}, expected 0 or ${MIN_BASE}..${MAX_BASE}`);
  }
}

/**
 * Parse a signed integer string in the given base (0 = auto-detect).
 *
 * @throws ParseError when the string is not a number in that base
 * @throws DomainError when the base itself is unsupported
 */
export function parseInteger(input: string, base = 10): bigint {
  assertBase(base);

  let body = input.trim().toLowerCase();
  let negative = false;
  if (body.startsWith('-') || body.startsWith('+')) {
    negative = body.startsWith('-');
    body = body.slice(1);
  }

  let radix = base;
  if (base === 0) {
    [radix, body] = detectBase(body);
  } else if ((base === 16 && body.startsWith('0x')) || (base === 2 && body.startsWith('0b'))) {
    body = body.slice(2);
  }

  if (!isRadixDigits(body, radix)) {
    throw new ParseError(`String value does not represent a number in base ${radix}: "${input}"`, input);
  }

  const magnitude = parseRadix(body, radix);
  return negative ? -magnitude : magnitude;
}

/**
 * Native numbers must be exact integers; anything else would silently round.
 */
export function numberToEngine(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new ParseError(`Number is not a safe integer: ${value}`, String(value));
  }
  return BigInt(value);
}

/**
 * The single coercion path from any accepted operand to the engine value.
 */
export function toEngine(value: Coercible): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') return numberToEngine(value);
  if (typeof value === 'string') return parseInteger(value, 10);
  return value.toBigInt();
}
