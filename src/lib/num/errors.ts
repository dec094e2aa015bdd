/**
 * Typed failures raised by BigInteger and the utility helpers.
 * Every error carries a stable `code` so callers can branch without instanceof chains.
 */

export type BigIntegerErrorCode =
  | 'bad_number'
  | 'overflow'
  | 'division_by_zero'
  | 'domain'
  | 'random_source';

export class BigIntegerError extends Error {
  constructor(
    message: string,
    public readonly code: BigIntegerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BigIntegerError';
  }
}

/** Input is not a number in the requested base. */
export class ParseError extends BigIntegerError {
  constructor(message: string, public readonly input: string) {
    super(message, 'bad_number');
    this.name = 'ParseError';
  }
}

export class OverflowError extends BigIntegerError {
  constructor(message: string) {
    super(message, 'overflow');
    this.name = 'OverflowError';
  }
}

export class DivisionByZeroError extends BigIntegerError {
  constructor(message = 'Division by zero') {
    super(message, 'division_by_zero');
    this.name = 'DivisionByZeroError';
  }
}

/** Operand outside the domain of the operation (negative sqrt, bad modulus, ...). */
export class DomainError extends BigIntegerError {
  constructor(message: string) {
    super(message, 'domain');
    this.name = 'DomainError';
  }
}

export class RandomSourceError extends BigIntegerError {
  constructor(message: string, cause?: unknown) {
    super(message, 'random_source', { cause });
    this.name = 'RandomSourceError';
  }
}
