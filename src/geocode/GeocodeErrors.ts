/**
 * Error types raised by the geocode system.
 *
 * Each error extends the closest built-in so callers can keep using
 * `instanceof RangeError` / `instanceof TypeError`, and carries a stable `code`.
 */

export type GeocodeErrorCode = 'OUT_OF_RANGE' | 'INVALID_ARGUMENT' | 'PRECONDITION_VIOLATION';

/**
 * A value outside its valid interval: a longitude/latitude, a code
 * precision, or a negative integer handed to the code alphabet.
 */
export class OutOfRangeError extends RangeError {
  readonly code = 'OUT_OF_RANGE' as const;

  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

/**
 * An argument of the wrong kind: unsupported bits per char, a character
 * outside the code alphabet, a bad curve level.
 */
export class InvalidArgumentError extends TypeError {
  readonly code = 'INVALID_ARGUMENT' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A grid cell or curve index that does not fit the grid it was given.
 * Only reachable by calling the curve transform directly, or through the
 * 'reject' boundary policy.
 */
export class PreconditionViolationError extends Error {
  readonly code = 'PRECONDITION_VIOLATION' as const;

  constructor(message: string) {
    super(message);
    this.name = 'PreconditionViolationError';
  }
}

export type GeocodeError = OutOfRangeError | InvalidArgumentError | PreconditionViolationError;

/**
 * Type guard for errors raised by this library
 */
export function isGeocodeError(error: unknown): error is GeocodeError {
  return (
    error instanceof OutOfRangeError ||
    error instanceof InvalidArgumentError ||
    error instanceof PreconditionViolationError
  );
}
