/**
 * HilbertGeohash - encode lng/lat coordinates as geohashes along a Hilbert curve.
 *
 * A code of length `precision` with `bitsPerChar` bits per character carries
 * precision * bitsPerChar bits, which is a Hilbert curve of level bits / 2
 * over the globe. The defaults (10 characters, 6 bits) use 60 bits: a level 30 curve.
 *
 * Codes of different bitsPerChar must not be mixed; the length of a code is its precision.
 */

import { logger } from '@/utils/logger';
import { EncodingDefaults, MAX_CURVE_LEVEL, ZERO_CHAR } from './GeocodeConstants';
import { OutOfRangeError, InvalidArgumentError } from './GeocodeErrors';
import { assertBitsPerChar, decodeInt, encodeInt } from './CodeAlphabet';
import {
  type BoundaryPolicy,
  type Coordinate,
  assertCoordinate,
  cellToCoordinate,
  coordinateToCell,
  dimForLevel,
} from './GridQuantizer';
import { cellToIndex, indexToCell } from './HilbertCurve';
import { type ErrorMargin, errorForLevel } from './ErrorMargin';

/**
 * A decoded code: cell centre plus its error margins
 */
export interface DecodedCode extends Coordinate, ErrorMargin {}

export interface EncodeOptions {
  /** Handling of lng = 180 / lat = 90; 'clamp' unless given */
  boundaryPolicy?: BoundaryPolicy;
}

/**
 * Curve level for a code of the given precision.
 * An odd bit total loses its lowest bit: each level needs one bit per axis.
 */
export function levelFor(precision: number, bitsPerChar: number): number {
  return Math.floor((precision * bitsPerChar) / 2);
}

function assertPrecision(precision: number): void {
  if (!Number.isInteger(precision) || precision < 0) {
    throw new OutOfRangeError(`Precision must be a non-negative integer; got ${precision}`);
  }
}

/**
 * Encode a lng/lat position as a geohash on a Hilbert curve.
 *
 * @param lng Longitude in degrees (-180 to 180)
 * @param lat Latitude in degrees (-90 to 90)
 * @param precision Number of characters in the code
 * @param bitsPerChar Bits encoded per character: 2, 4 or 6
 * @returns Code of exactly `precision` characters
 */
export function encode(
  lng: number,
  lat: number,
  precision: number = EncodingDefaults.PRECISION,
  bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR,
  options: EncodeOptions = {}
): string {
  assertCoordinate(lng, lat);
  assertPrecision(precision);
  assertBitsPerChar(bitsPerChar);

  const level = levelFor(precision, bitsPerChar);
  if (level > MAX_CURVE_LEVEL) {
    throw new OutOfRangeError(
      `Precision ${precision} at ${bitsPerChar} bits per char needs a level ${level} curve; the maximum is ${MAX_CURVE_LEVEL}`
    );
  }

  const dim = dimForLevel(level);
  const { x, y } = coordinateToCell(lng, lat, dim, options.boundaryPolicy ?? 'clamp');

  if (x >= dim || y >= dim) {
    logger.debug({ lng, lat, level }, 'Coordinate on the outer grid boundary, curve transform will reject it');
  }

  return encodeInt(cellToIndex(x, y, dim), bitsPerChar).padStart(precision, ZERO_CHAR);
}

/**
 * Decode a geohash to its cell centre together with the error margins.
 *
 * The true coordinate lies within lng ± lngError, lat ± latError.
 */
export function decodeExactly(code: string, bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR): DecodedCode {
  assertBitsPerChar(bitsPerChar);

  const level = levelFor(code.length, bitsPerChar);
  if (level > MAX_CURVE_LEVEL) {
    throw new InvalidArgumentError(`Code of ${code.length} characters exceeds the maximum curve level ${MAX_CURVE_LEVEL}`);
  }

  const index = decodeInt(code, bitsPerChar);
  const dim = dimForLevel(level);

  const { x, y } = indexToCell(index, dim);
  const corner = cellToCoordinate(x, y, dim);
  const { lngError, latError } = errorForLevel(level);

  return {
    lng: corner.lng + lngError,
    lat: corner.lat + latError,
    lngError,
    latError,
  };
}

/**
 * Decode a geohash to the lng/lat of its cell centre.
 */
export function decode(code: string, bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR): Coordinate {
  const { lng, lat } = decodeExactly(code, bitsPerChar);
  return { lng, lat };
}
