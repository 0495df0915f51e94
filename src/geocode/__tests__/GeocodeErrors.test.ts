import { describe, it, expect } from 'vitest';
import {
  OutOfRangeError,
  InvalidArgumentError,
  PreconditionViolationError,
  isGeocodeError,
} from '../GeocodeErrors';
import { encode } from '../HilbertGeohash';
import { encodeInt } from '../CodeAlphabet';

describe('GeocodeErrors', () => {
  it('extends the matching built-in errors', () => {
    expect(new OutOfRangeError('x')).toBeInstanceOf(RangeError);
    expect(new InvalidArgumentError('x')).toBeInstanceOf(TypeError);
    expect(new PreconditionViolationError('x')).toBeInstanceOf(Error);
  });

  it('carries a stable code and name', () => {
    const error = new OutOfRangeError('Longitude out of range');
    expect(error.code).toBe('OUT_OF_RANGE');
    expect(error.name).toBe('OutOfRangeError');
    expect(error.message).toBe('Longitude out of range');
    expect(new InvalidArgumentError('x').code).toBe('INVALID_ARGUMENT');
    expect(new PreconditionViolationError('x').code).toBe('PRECONDITION_VIOLATION');
  });

  it('recognises its own errors only', () => {
    expect(isGeocodeError(new InvalidArgumentError('x'))).toBe(true);
    expect(isGeocodeError(new RangeError('x'))).toBe(false);
    expect(isGeocodeError('OUT_OF_RANGE')).toBe(false);
  });

  it('reports the offending value', () => {
    expect(() => encode(-180.1, 0)).toThrow('Longitude must be within [-180, 180]; got -180.1');
    expect(() => encode(0, 0, 5, 5)).toThrow('bitsPerChar must be one of 2, 4, 6; got 5');
  });

  it('uses one out-of-range error for coordinates, precision and negative integers', () => {
    for (const fail of [() => encode(0, 91), () => encode(0, 0, -1), () => encodeInt(-1n, 6)]) {
      try {
        fail();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(OutOfRangeError);
        expect(isGeocodeError(error) && error.code).toBe('OUT_OF_RANGE');
      }
    }
    expect(() => encode(0, 0, -1)).toThrow('Precision must be a non-negative integer; got -1');
  });
});
