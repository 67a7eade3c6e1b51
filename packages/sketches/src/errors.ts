// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------
// Sketch operations report bad input through `Result` values. `unwrap` is for
// callers that would rather deal in exceptions.
// ---------------------------------------------------------------------------

import type { Result, SketchError, SketchErrorCode } from './types.js';

const CODE_LABELS: Record<SketchErrorCode, string> = {
  INVALID_PARAMETER: 'invalid parameter',
  INCOMPATIBLE_SKETCHES: 'incompatible sketches',
};

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err(code: SketchErrorCode, message: string, field?: string): Result<never> {
  const error: SketchError = field === undefined ? { code, message } : { code, message, field };
  return { ok: false, error };
}

/** A constructor or query received an out-of-domain value. */
export function invalidParameter(message: string, field?: string): Result<never> {
  return err('INVALID_PARAMETER', message, field);
}

/** Two sketches of different shape were combined. */
export function incompatibleSketches(message: string): Result<never> {
  return err('INCOMPATIBLE_SKETCHES', message);
}

/** Human-readable form, e.g. `invalid parameter: k must be at least 2`. */
export function formatSketchError(error: SketchError): string {
  return `${CODE_LABELS[error.code]}: ${error.message}`;
}

/** Thrown by `unwrap` when the result holds an error. */
export class SketchException extends Error {
  constructor(public readonly error: SketchError) {
    super(formatSketchError(error));
    this.name = 'SketchException';
  }

  get code(): SketchErrorCode {
    return this.error.code;
  }
}

/**
 * Run an allocation whose size came from the caller. The engine's `RangeError`
 * for a buffer it cannot provide becomes an `INVALID_PARAMETER` on `field`.
 */
export function tryAllocate<T>(field: string, allocate: () => T): Result<T> {
  try {
    return ok(allocate());
  } catch (error) {
    if (error instanceof RangeError) {
      return invalidParameter(`${field} is too large to allocate`, field);
    }
    throw error;
  }
}

export function isOk<T>(result: Result<T>): result is { readonly ok: true; readonly value: T } {
  return result.ok;
}

/**
 * Return the value of a successful result.
 *
 * @throws SketchException carrying the error of a failed result.
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw new SketchException(result.error);
}
