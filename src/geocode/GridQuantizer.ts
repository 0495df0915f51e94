/**
 * GridQuantizer - maps lng/lat coordinates onto a dim × dim grid and back.
 */

import { CoordinateIntervals } from './GeocodeConstants';
import { OutOfRangeError, PreconditionViolationError } from './GeocodeErrors';

/**
 * A geographic coordinate in degrees
 */
export interface Coordinate {
  lng: number;
  lat: number;
}

/**
 * A cell of the dim × dim grid. x follows longitude, y follows latitude.
 */
export interface GridCell {
  x: bigint;
  y: bigint;
}

/**
 * What to do with lng = 180 / lat = 90, which land one past the last cell.
 *   - clamp: move them into the last column/row
 *   - reject: keep x = dim / y = dim and let the curve transform refuse it
 */
export type BoundaryPolicy = 'clamp' | 'reject';

/**
 * Throw unless lng/lat are finite and within their intervals.
 */
export function assertCoordinate(lng: number, lat: number): void {
  const { LNG, LAT } = CoordinateIntervals;
  if (!Number.isFinite(lng) || lng < LNG.min || lng > LNG.max) {
    throw new OutOfRangeError(`Longitude must be within [${LNG.min}, ${LNG.max}]; got ${lng}`);
  }
  if (!Number.isFinite(lat) || lat < LAT.min || lat > LAT.max) {
    throw new OutOfRangeError(`Latitude must be within [${LAT.min}, ${LAT.max}]; got ${lat}`);
  }
}

/**
 * Grid dimension for a curve level (2^level).
 */
export function dimForLevel(level: number): bigint {
  return 1n << BigInt(level);
}

/**
 * Convert a lng/lat coordinate into the grid cell containing it.
 *
 * @param dim Cells per axis; a power of two
 * @returns Lower-left aligned cell. lng = 180 / lat = 90 land on x = dim / y = dim, and so can
 *   values within floating-point rounding of them (180 - 1e-14 rounds up to a full 360° span);
 *   the boundary policy decides whether those are clamped.
 */
export function coordinateToCell(
  lng: number,
  lat: number,
  dim: bigint,
  policy: BoundaryPolicy = 'clamp'
): GridCell {
  if (dim < 1n) {
    throw new PreconditionViolationError(`Grid dimension must be at least 1; got ${dim}`);
  }

  const size = Number(dim);
  let x = BigInt(Math.floor(((lng + CoordinateIntervals.LNG.max) / 360.0) * size));
  let y = BigInt(Math.floor(((lat + CoordinateIntervals.LAT.max) / 180.0) * size));

  if (policy === 'clamp') {
    if (x >= dim) x = dim - 1n;
    if (y >= dim) y = dim - 1n;
  }

  return { x, y };
}

/**
 * Convert a grid cell back to lng/lat. Returns the cell's lower-left (south-west) corner.
 */
export function cellToCoordinate(x: bigint, y: bigint, dim: bigint): Coordinate {
  if (dim < 1n) {
    throw new PreconditionViolationError(`Grid dimension must be at least 1; got ${dim}`);
  }
  if (x < 0n || x >= dim || y < 0n || y >= dim) {
    throw new PreconditionViolationError(`Cell (${x}, ${y}) is outside the ${dim} x ${dim} grid`);
  }

  const size = Number(dim);
  return {
    lng: (Number(x) / size) * 360 - 180,
    lat: (Number(y) / size) * 180 - 90,
  };
}
