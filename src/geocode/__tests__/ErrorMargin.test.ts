import { describe, it, expect } from 'vitest';
import { errorForLevel } from '../ErrorMargin';
import { InvalidArgumentError } from '../GeocodeErrors';

describe('errorForLevel', () => {
  it('covers the whole globe at level 0', () => {
    expect(errorForLevel(0)).toEqual({ lngError: 180, latError: 90 });
  });

  it('matches the quadrant size at level 1', () => {
    expect(errorForLevel(1)).toEqual({ lngError: 90, latError: 45 });
  });

  it('halves with every level', () => {
    for (let level = 0; level < 40; level++) {
      const current = errorForLevel(level);
      const next = errorForLevel(level + 1);
      expect(next.lngError).toBe(current.lngError / 2);
      expect(next.latError).toBe(current.latError / 2);
    }
  });

  it('is below a metre of longitude at level 30', () => {
    const { lngError, latError } = errorForLevel(30);
    expect(lngError).toBe(180 / 2 ** 30);
    expect(latError).toBe(90 / 2 ** 30);
  });

  it('rejects negative and fractional levels', () => {
    expect(() => errorForLevel(-1)).toThrow(InvalidArgumentError);
    expect(() => errorForLevel(1.5)).toThrow(InvalidArgumentError);
  });
});
