/**
 * CellGeometry - bounds and GeoJSON shapes for Hilbert geohash cells.
 */

import { EncodingDefaults, MAX_CURVE_BITS, type BitsPerChar } from './GeocodeConstants';
import { InvalidArgumentError } from './GeocodeErrors';
import { assertBitsPerChar } from './CodeAlphabet';
import { cellToCoordinate, dimForLevel } from './GridQuantizer';
import { indexToCell } from './HilbertCurve';
import { errorForLevel } from './ErrorMargin';
import { type DecodedCode, decodeExactly, levelFor } from './HilbertGeohash';

/**
 * Latitude/longitude bounds of a cell
 */
export interface CellBounds {
  north: number;
  south: number;
  east: number;
  west: number;
}

/** GeoJSON position: [lng, lat] */
export type Position = [number, number];

/** GeoJSON Polygon geometry. First ring is the outer boundary. */
export interface PolygonGeometry {
  type: 'Polygon';
  coordinates: Position[][];
}

/** GeoJSON LineString geometry */
export interface LineStringGeometry {
  type: 'LineString';
  coordinates: Position[];
}

export interface Feature<G, P> {
  type: 'Feature';
  bbox?: [number, number, number, number];
  geometry: G;
  properties: P;
}

export interface CellProperties {
  code: string;
  lng: number;
  lat: number;
  lngError: number;
  latError: number;
  bitsPerChar: BitsPerChar;
}

export interface CurveProperties {
  precision: number;
  bitsPerChar: BitsPerChar;
  level: number;
}

/**
 * Get the lat/lng bounds of the cell a code stands for.
 */
export function cellBounds(code: string, bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR): CellBounds {
  return boundsOf(decodeExactly(code, bitsPerChar));
}

function boundsOf({ lng, lat, lngError, latError }: DecodedCode): CellBounds {
  return {
    north: lat + latError,
    south: lat - latError,
    east: lng + lngError,
    west: lng - lngError,
  };
}

/**
 * Build a GeoJSON polygon feature outlining the cell of a code.
 * Ring order: SW, SE, NE, NW, back to SW.
 */
export function rectangle(
  code: string,
  bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR
): Feature<PolygonGeometry, CellProperties> {
  assertBitsPerChar(bitsPerChar);

  const decoded = decodeExactly(code, bitsPerChar);
  const { lng, lat, lngError, latError } = decoded;
  const { north, south, east, west } = boundsOf(decoded);

  return {
    type: 'Feature',
    bbox: [west, south, east, north],
    geometry: {
      type: 'Polygon',
      coordinates: [
        [
          [west, south],
          [east, south],
          [east, north],
          [west, north],
          [west, south],
        ],
      ],
    },
    properties: { code, lng, lat, lngError, latError, bitsPerChar },
  };
}

/**
 * Build a GeoJSON line through the centre of every cell in curve order.
 *
 * Limited to MAX_CURVE_BITS total bits; a level 8 curve already has 65536 points.
 */
export function hilbertCurve(
  precision: number,
  bitsPerChar: number = EncodingDefaults.BITS_PER_CHAR
): Feature<LineStringGeometry, CurveProperties> {
  assertBitsPerChar(bitsPerChar);
  if (!Number.isInteger(precision) || precision < 0) {
    throw new InvalidArgumentError(`Precision must be a non-negative integer; got ${precision}`);
  }
  if (precision * bitsPerChar > MAX_CURVE_BITS) {
    throw new InvalidArgumentError(
      `Curve of ${precision * bitsPerChar} bits requested; at most ${MAX_CURVE_BITS} bits can be drawn`
    );
  }

  const level = levelFor(precision, bitsPerChar);
  const dim = dimForLevel(level);
  const { lngError, latError } = errorForLevel(level);

  const coordinates: Position[] = [];
  for (let index = 0n; index < dim * dim; index++) {
    const { x, y } = indexToCell(index, dim);
    const corner = cellToCoordinate(x, y, dim);
    coordinates.push([corner.lng + lngError, corner.lat + latError]);
  }

  return {
    type: 'Feature',
    geometry: { type: 'LineString', coordinates },
    properties: { precision, bitsPerChar, level },
  };
}
