// src/utils/errors.ts
import { BigIntegerError } from '../lib/num/errors.js';

export type ErrorInfo = {
  name: string;
  message: string;
  code?: string;
  stack: string;
};

export function normalizeError(err: unknown): ErrorInfo {
  if (err instanceof BigIntegerError) {
    return {
      name: err.name,
      message: err.message,
      code: err.code,
      stack: err.stack || '',
    };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

