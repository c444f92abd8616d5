import {
  assertAnchorFixed,
  compose,
  composeTransform,
  rotationBreakdown,
  toTransformParameters,
  TransformParameters
} from '../affine-composer';
import { AffineMatrix } from '../matrix';
import { CompositionError, InvalidMeasurementError } from '@/types/errors';
import type { AffineTransform, CompletedMeasurements, WorldPoint } from '@/types/georef';

const REFERENCE_WORLD: WorldPoint = { x: 1000, y: 2000 };

function measurements(overrides: Partial<CompletedMeasurements> = {}): CompletedMeasurements {
  return {
    referencePixel: { x: 500, y: 500 },
    scale: { start: { x: 500, y: 500 }, end: { x: 500, y: 600 }, distanceMeters: 50 },
    orientation: { kind: 'skipped' },
    declinationDeg: 0,
    ...overrides
  };
}

function params(overrides: Partial<TransformParameters> = {}): TransformParameters {
  return {
    referencePixel: { x: 500, y: 500 },
    pixelsPerMeter: 2,
    northAngleDeg: 0,
    declinationDeg: 0,
    ...overrides
  };
}

function expectTransformsClose(actual: AffineTransform, expected: AffineTransform): void {
  expect(actual.a).toBeCloseTo(expected.a, 12);
  expect(actual.b).toBeCloseTo(expected.b, 12);
  expect(actual.c).toBeCloseTo(expected.c, 6);
  expect(actual.d).toBeCloseTo(expected.d, 12);
  expect(actual.e).toBeCloseTo(expected.e, 12);
  expect(actual.f).toBeCloseTo(expected.f, 6);
}

describe('AffineComposer', () => {
  describe('reference scenario', () => {
    it('should map 100 px up to 50 m north and 100 px right to 50 m east', () => {
      const transform = compose(measurements(), REFERENCE_WORLD, 0);

      const north = AffineMatrix.apply(transform, { x: 500, y: 400 });
      expect(north.x).toBeCloseTo(1000, 9);
      expect(north.y).toBeCloseTo(2050, 9);

      const east = AffineMatrix.apply(transform, { x: 600, y: 500 });
      expect(east.x).toBeCloseTo(1050, 9);
      expect(east.y).toBeCloseTo(2000, 9);
    });

    it('should rotate after scaling when north points right on the plan', () => {
      const transform = compose(
        measurements({ orientation: { kind: 'measured', base: { x: 0, y: 0 }, tip: { x: 10, y: 0 } } }),
        REFERENCE_WORLD,
        0
      );

      const up = AffineMatrix.apply(transform, { x: 500, y: 400 });
      expect(up.x).toBeCloseTo(1050, 9);
      expect(up.y).toBeCloseTo(2000, 9);
    });
  });

  describe('anchor invariance', () => {
    const cases: Array<[string, TransformParameters, WorldPoint, number]> = [
      ['no rotation', params(), { x: 0, y: 0 }, 0],
      ['large projected coordinates', params({ referencePixel: { x: 1234, y: 987 } }), { x: 566123.45, y: 244987.12 }, 0.73],
      ['fine scale and odd angle', params({ pixelsPerMeter: 37.5, northAngleDeg: -137.2, declinationDeg: 4.4 }), { x: -51234.5, y: 7_654_321.9 }, -1.9],
      ['full turn', params({ referencePixel: { x: 0, y: 0 }, northAngleDeg: 359.9 }), { x: 10, y: -10 }, 0]
    ];

    it.each(cases)('should map the reference pixel onto the world point (%s)', (_name, p, world, conv) => {
      const transform = composeTransform(p, world, conv);
      const mapped = AffineMatrix.apply(transform, p.referencePixel);
      const tolerance = 1e-9 * Math.max(1, Math.abs(world.x), Math.abs(world.y));

      expect(Math.abs(mapped.x - world.x)).toBeLessThanOrEqual(tolerance);
      expect(Math.abs(mapped.y - world.y)).toBeLessThanOrEqual(tolerance);
    });
  });

  describe('axis flip', () => {
    it('should send pixels further down the image to the south and further right to the east', () => {
      const transform = compose(measurements(), REFERENCE_WORLD, 0);

      const below = AffineMatrix.apply(transform, { x: 500, y: 501 });
      const right = AffineMatrix.apply(transform, { x: 501, y: 500 });

      expect(below.y).toBeLessThan(REFERENCE_WORLD.y);
      expect(right.x).toBeGreaterThan(REFERENCE_WORLD.x);
      expect(transform.e).toBeLessThan(0);
      expect(transform.a).toBeGreaterThan(0);
    });
  });

  describe('scale', () => {
    it('should scale offsets in proportion to the measured distance', () => {
      const base = compose(measurements(), REFERENCE_WORLD, 0);
      const doubled = compose(
        measurements({ scale: { start: { x: 500, y: 500 }, end: { x: 500, y: 600 }, distanceMeters: 100 } }),
        REFERENCE_WORLD,
        0
      );

      expect(toTransformParameters(measurements()).pixelsPerMeter).toBe(2);
      expect(
        toTransformParameters(
          measurements({ scale: { start: { x: 500, y: 500 }, end: { x: 500, y: 600 }, distanceMeters: 100 } })
        ).pixelsPerMeter
      ).toBe(1);

      const baseOffset = AffineMatrix.apply(base, { x: 600, y: 500 }).x - REFERENCE_WORLD.x;
      const doubledOffset = AffineMatrix.apply(doubled, { x: 600, y: 500 }).x - REFERENCE_WORLD.x;
      expect(baseOffset).toBeCloseTo(50, 9);
      expect(doubledOffset).toBeCloseTo(100, 9);
    });

    it('should reject a non-positive pixels-per-meter value', () => {
      expect(() => composeTransform(params({ pixelsPerMeter: 0 }), REFERENCE_WORLD, 0))
        .toThrow(InvalidMeasurementError);
      expect(() => composeTransform(params({ pixelsPerMeter: -3 }), REFERENCE_WORLD, 0))
        .toThrow(InvalidMeasurementError);
    });

    it('should re-validate a zero-length scale line', () => {
      const degenerate = measurements({
        scale: { start: { x: 3, y: 3 }, end: { x: 3, y: 3 }, distanceMeters: 10 }
      });
      expect(() => compose(degenerate, REFERENCE_WORLD, 0)).toThrow(InvalidMeasurementError);
    });

    it('should reject a non-positive distance', () => {
      const negative = measurements({
        scale: { start: { x: 0, y: 0 }, end: { x: 0, y: 10 }, distanceMeters: -5 }
      });
      expect(() => compose(negative, REFERENCE_WORLD, 0)).toThrow(InvalidMeasurementError);
    });
  });

  describe('rotation', () => {
    it('should sum orientation, declination and convergence into one clockwise angle', () => {
      const separate = composeTransform(params({ northAngleDeg: 30, declinationDeg: 5 }), REFERENCE_WORLD, -2);
      const combined = composeTransform(params({ northAngleDeg: 33 }), REFERENCE_WORLD, 0);

      expectTransformsClose(separate, combined);
      expect(AffineMatrix.rotationAngle(separate)).toBeCloseTo(-33, 9);
    });

    it('should contribute nothing for a skipped north measurement', () => {
      const skipped = compose(measurements({ declinationDeg: 3 }), REFERENCE_WORLD, 1);
      const explicit = composeTransform(params({ declinationDeg: 3 }), REFERENCE_WORLD, 1);

      expectTransformsClose(skipped, explicit);
    });

    it('should report the rotation components', () => {
      const breakdown = rotationBreakdown(
        measurements({
          orientation: { kind: 'measured', base: { x: 10, y: 10 }, tip: { x: 0, y: 10 } },
          declinationDeg: 2.5
        }),
        -1
      );

      expect(breakdown.orientationDeg).toBeCloseTo(-90, 12);
      expect(breakdown.declinationDeg).toBe(2.5);
      expect(breakdown.convergenceDeg).toBe(-1);
      expect(breakdown.totalClockwiseDeg).toBeCloseTo(-88.5, 12);
    });
  });

  describe('assertAnchorFixed', () => {
    it('should throw when the transform misses the reference point', () => {
      const shifted = AffineMatrix.translation(5, 0);
      expect(() => assertAnchorFixed(shifted, { x: 0, y: 0 }, { x: 0, y: 0 })).toThrow(CompositionError);
    });

    it('should accept a transform that hits the reference point', () => {
      const shifted = AffineMatrix.translation(5, 0);
      expect(() => assertAnchorFixed(shifted, { x: 0, y: 0 }, { x: 5, y: 0 })).not.toThrow();
    });
  });
});
