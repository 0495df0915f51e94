/**
 * ErrorMargin - coordinate error of a decoded code, per curve level.
 */

import { InvalidArgumentError } from './GeocodeErrors';

/**
 * Half the width/height of a grid cell in degrees
 */
export interface ErrorMargin {
  lngError: number;
  latError: number;
}

/**
 * Get the lng/lat error for a Hilbert curve of the given level.
 *
 * Level 0 is a single cell covering the globe: ±180 lng, ±90 lat.
 * Every further level halves both.
 */
export function errorForLevel(level: number): ErrorMargin {
  if (!Number.isInteger(level) || level < 0) {
    throw new InvalidArgumentError(`Curve level must be a non-negative integer; got ${level}`);
  }

  const unit = 1 / 2 ** level;
  return {
    lngError: 180 * unit,
    latError: 90 * unit,
  };
}
