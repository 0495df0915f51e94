/**
 * Tests for coordinate ↔ grid cell conversion
 */

import { describe, it, expect } from 'vitest';
import {
  assertCoordinate,
  cellToCoordinate,
  coordinateToCell,
  dimForLevel,
} from '../GridQuantizer';
import { OutOfRangeError, PreconditionViolationError } from '../GeocodeErrors';

describe('GridQuantizer', () => {
  describe('dimForLevel', () => {
    it('returns 2^level', () => {
      expect(dimForLevel(0)).toBe(1n);
      expect(dimForLevel(1)).toBe(2n);
      expect(dimForLevel(30)).toBe(1073741824n);
      expect(dimForLevel(32)).toBe(4294967296n);
    });
  });

  describe('assertCoordinate', () => {
    it('accepts the closed intervals', () => {
      expect(() => assertCoordinate(-180, -90)).not.toThrow();
      expect(() => assertCoordinate(180, 90)).not.toThrow();
      expect(() => assertCoordinate(0, 0)).not.toThrow();
    });

    it('rejects coordinates outside the intervals', () => {
      expect(() => assertCoordinate(-180.1, 0)).toThrow(OutOfRangeError);
      expect(() => assertCoordinate(180.1, 0)).toThrow(OutOfRangeError);
      expect(() => assertCoordinate(0, -90.1)).toThrow(OutOfRangeError);
      expect(() => assertCoordinate(0, 90.1)).toThrow(OutOfRangeError);
    });

    it('rejects NaN and infinities', () => {
      expect(() => assertCoordinate(NaN, 0)).toThrow(RangeError);
      expect(() => assertCoordinate(0, Infinity)).toThrow(RangeError);
    });
  });

  describe('coordinateToCell', () => {
    it('maps everything to the single cell at level 0', () => {
      expect(coordinateToCell(-180, -90, 1n)).toEqual({ x: 0n, y: 0n });
      expect(coordinateToCell(12.5, -3.25, 1n)).toEqual({ x: 0n, y: 0n });
    });

    it('splits the globe into quadrants at level 1', () => {
      expect(coordinateToCell(-90, -45, 2n)).toEqual({ x: 0n, y: 0n });
      expect(coordinateToCell(90, -45, 2n)).toEqual({ x: 1n, y: 0n });
      expect(coordinateToCell(-90, 45, 2n)).toEqual({ x: 0n, y: 1n });
      expect(coordinateToCell(90, 45, 2n)).toEqual({ x: 1n, y: 1n });
    });

    it('puts the origin on the lower-left corner of the centre cell', () => {
      const dim = 1n << 30n;
      expect(coordinateToCell(0, 0, dim)).toEqual({ x: 1n << 29n, y: 1n << 29n });
    });

    it('clamps lng = 180 / lat = 90 into the last cell by default', () => {
      expect(coordinateToCell(180, 90, 4n)).toEqual({ x: 3n, y: 3n });
      expect(coordinateToCell(180, 0, 4n)).toEqual({ x: 3n, y: 2n });
    });

    it('keeps the out-of-range cell under the reject policy', () => {
      expect(coordinateToCell(180, 90, 4n, 'reject')).toEqual({ x: 4n, y: 4n });
      expect(coordinateToCell(0, 0, 4n, 'reject')).toEqual({ x: 2n, y: 2n });
    });

    it('lets floating-point rounding carry a longitude just below 180 onto x = dim', () => {
      const dim = 1n << 30n;
      expect(coordinateToCell(180 - 1e-14, 0, dim, 'reject')).toEqual({ x: 1073741824n, y: 536870912n });
      expect(coordinateToCell(180 - 1e-14, 0, dim)).toEqual({ x: 1073741823n, y: 536870912n });
    });

    it('rejects a dimension below 1', () => {
      expect(() => coordinateToCell(0, 0, 0n)).toThrow(PreconditionViolationError);
    });
  });

  describe('cellToCoordinate', () => {
    it('returns the lower-left corner of the cell', () => {
      expect(cellToCoordinate(0n, 0n, 1n)).toEqual({ lng: -180, lat: -90 });
      expect(cellToCoordinate(1n, 1n, 2n)).toEqual({ lng: 0, lat: 0 });
      expect(cellToCoordinate(3n, 1n, 4n)).toEqual({ lng: 90, lat: -45 });
    });

    it('inverts coordinateToCell on cell corners', () => {
      const dim = 1n << 10n;
      const corner = cellToCoordinate(517n, 300n, dim);
      expect(coordinateToCell(corner.lng, corner.lat, dim)).toEqual({ x: 517n, y: 300n });
    });

    it('rejects cells outside the grid', () => {
      expect(() => cellToCoordinate(4n, 0n, 4n)).toThrow(PreconditionViolationError);
      expect(() => cellToCoordinate(0n, -1n, 4n)).toThrow(PreconditionViolationError);
    });
  });
});
