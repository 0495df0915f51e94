/**
 * Geocode constants for the Hilbert geohash system.
 *
 * Coordinates are WGS 84 degrees. The globe is mapped onto a square
 * dim × dim grid where:
 *   - x = column from west to east (0 to dim - 1), longitude axis
 *   - y = row from south to north (0 to dim - 1), latitude axis
 *   - dim = 2^level, level = floor(precision * bitsPerChar / 2)
 */

/**
 * Valid coordinate intervals (inclusive on both ends)
 */
export const CoordinateIntervals = {
  LNG: { min: -180.0, max: 180.0 },
  LAT: { min: -90.0, max: 90.0 },
} as const;

/**
 * Number of bits a single code character carries.
 */
export const BITS_PER_CHAR_OPTIONS = [2, 4, 6] as const;

export type BitsPerChar = (typeof BITS_PER_CHAR_OPTIONS)[number];

/**
 * Code alphabets keyed by bits per character.
 *
 * The 64-character alphabet is in ASCII order ('0' < '9' < '@' < 'A' < 'Z' < '_' < 'a' < 'z'),
 * so lexicographic code order equals curve order.
 */
export const CodeAlphabets = {
  2: '0123',
  4: '0123456789abcdef',
  6: '0123456789@ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz',
} as const satisfies Record<BitsPerChar, string>;

/** Padding character; index 0 of every alphabet */
export const ZERO_CHAR = '0';

/**
 * Built-in encoding defaults, used when no configuration overrides them.
 * precision=10 with 6 bits per char is a level 30 curve (60 bits).
 */
export const EncodingDefaults = {
  PRECISION: 10,
  BITS_PER_CHAR: 6,
} as const satisfies { PRECISION: number; BITS_PER_CHAR: BitsPerChar };

/**
 * Deepest supported curve level; 2^1023 is the largest power of two a double holds.
 * Coordinates only carry 53 bits of mantissa, so levels past ~60 add no information.
 */
export const MAX_CURVE_LEVEL = 1023;

/**
 * Largest curve rendered by hilbertCurve(), in total bits (precision * bitsPerChar).
 * 16 bits is a level 8 curve: 256 × 256 = 65536 points.
 */
export const MAX_CURVE_BITS = 16;

/**
 * Check whether a number is one of the supported bits-per-char values
 */
export function isBitsPerChar(value: number): value is BitsPerChar {
  return BITS_PER_CHAR_OPTIONS.some((option) => option === value);
}
