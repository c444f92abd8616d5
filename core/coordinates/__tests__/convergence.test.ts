import { convergence, DEFAULT_CONVERGENCE_TABLE } from '../convergence';
import { COORDINATE_SYSTEMS } from '../coordinates';
import { InvalidCoordinateError } from '@/types/errors';

describe('convergence', () => {
  it('should be zero on the central meridian', () => {
    expect(convergence(50, 19, COORDINATE_SYSTEMS.PL_1992)).toBeCloseTo(0, 12);
  });

  it('should follow (λ0 - λ) · sin(φ)', () => {
    expect(convergence(30, 17, COORDINATE_SYSTEMS.PL_1992)).toBeCloseTo(1, 12);
    expect(convergence(50, 21, COORDINATE_SYSTEMS.PL_1992)).toBeCloseTo(-2 * Math.sin((50 * Math.PI) / 180), 12);
  });

  it('should be positive west of the central meridian in the northern hemisphere', () => {
    expect(convergence(52, 15, COORDINATE_SYSTEMS.PL_1992)).toBeGreaterThan(0);
    expect(convergence(52, 23, COORDINATE_SYSTEMS.PL_1992)).toBeLessThan(0);
  });

  it('should return zero for a CRS without an approximation', () => {
    expect(convergence(50, 21, COORDINATE_SYSTEMS.WGS84)).toBe(0);
    expect(convergence(50, 21, 'EPSG:9999')).toBe(0);
    expect(convergence(50, 21, 'toString')).toBe(0);
  });

  it('should use a supplied table', () => {
    const table = { ...DEFAULT_CONVERGENCE_TABLE, 'EPSG:2056': { centralMeridianDeg: 7.5 } };
    expect(convergence(30, 5.5, 'EPSG:2056', table)).toBeCloseTo(1, 12);
  });

  it.each([
    [91, 19],
    [-90.5, 19],
    [50, 181],
    [Number.NaN, 19]
  ])('should reject lat=%p lon=%p', (latitude, longitude) => {
    expect(() => convergence(latitude, longitude, COORDINATE_SYSTEMS.PL_1992)).toThrow(InvalidCoordinateError);
  });
});
