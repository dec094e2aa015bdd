import { describe, it, expect } from '@jest/globals';
import { BigInteger, gcd, DivisionByZeroError, ROUNDING_MODES } from '../src/index.js';

const SAMPLES = [
  '0',
  '1',
  '-1',
  '7',
  '-7',
  '255',
  '256',
  '65535',
  '18446744073709551617',
  '-18446744073709551617',
  '1000000000000000000000000000000',
].map((s) => BigInteger.from(s));

const NON_NEGATIVE = SAMPLES.filter((x) => !x.isNegative());
const DIVISORS = [1, 2, 3, -3, 7, -256].map((n) => BigInteger.from(n));

describe('BigInteger properties', () => {
  it('buffer round-trip preserves non-negative values', () => {
    for (const x of NON_NEGATIVE) {
      for (const reverse of [true, false]) {
        expect(BigInteger.fromBuffer(x.toBuffer(reverse), reverse).equal(x)).toBe(true);
      }
    }
  });

  it('buffer round-trip of a negative value yields its magnitude', () => {
    const x = BigInteger.from('-18446744073709551617');
    expect(BigInteger.fromBuffer(x.toBuffer()).toString()).toBe('18446744073709551617');
  });

  it('compare is antisymmetric and agrees with equal', () => {
    for (const a of SAMPLES) {
      for (const b of SAMPLES) {
        expect(a.compare(b)).toBe(-b.compare(a) || 0);
        expect(a.equal(b)).toBe(a.compare(b) === 0);
      }
    }
  });

  it('quotient and remainder recombine for every rounding mode', () => {
    for (const a of SAMPLES) {
      for (const b of DIVISORS) {
        for (const mode of ROUNDING_MODES) {
          expect(a.div(b, mode).mul(b).add(a.div_r(b, mode)).equal(a)).toBe(true);
        }
      }
    }
  });

  it('truncating division and mod agree for non-negative dividends and positive divisors', () => {
    for (const a of NON_NEGATIVE) {
      for (const b of DIVISORS.filter((d) => d.isPositive())) {
        expect(a.div(b, 'truncate').mul(b).add(a.mod(b)).equal(a)).toBe(true);
        expect(a.div_r(b).equal(a.mod(b))).toBe(true);
      }
    }
  });

  it('gcd with zero is the absolute value', () => {
    expect(gcd(0, 0).toString()).toBe('0');
    for (const a of SAMPLES) {
      expect(gcd(a, 0).equal(a.abs())).toBe(true);
    }
  });

  it('every division operation rejects a zero divisor', () => {
    for (const a of SAMPLES) {
      for (const mode of ROUNDING_MODES) {
        expect(() => a.div(0, mode)).toThrow(DivisionByZeroError);
        expect(() => a.div_q(0, mode)).toThrow(DivisionByZeroError);
        expect(() => a.div_r(0, mode)).toThrow(DivisionByZeroError);
      }
    }
  });
});
