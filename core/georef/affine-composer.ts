import { CompositionError, InvalidMeasurementError } from '@/types/errors';
import type { AffineTransform, CompletedMeasurements, PixelPoint, WorldPoint } from '@/types/georef';
import { AffineMatrix } from './matrix';
import { orientationAngle, pixelsPerMeter } from './measurements';

/**
 * Reduced inputs of the composition, one number per measurement
 */
export interface TransformParameters {
  referencePixel: PixelPoint;
  /** Number of pixels corresponding to one meter */
  pixelsPerMeter: number;
  /** Clockwise angle from the image top to north */
  northAngleDeg: number;
  /** Manual correction, added clockwise */
  declinationDeg: number;
}

export interface RotationBreakdown {
  orientationDeg: number;
  declinationDeg: number;
  convergenceDeg: number;
  totalClockwiseDeg: number;
}

const ANCHOR_TOLERANCE = 1e-9;

export function toTransformParameters(measurements: CompletedMeasurements): TransformParameters {
  return {
    referencePixel: measurements.referencePixel,
    pixelsPerMeter: pixelsPerMeter(measurements.scale),
    northAngleDeg: orientationAngle(measurements.orientation),
    declinationDeg: measurements.declinationDeg
  };
}

export function rotationBreakdown(measurements: CompletedMeasurements, convergenceDeg: number): RotationBreakdown {
  const orientationDeg = orientationAngle(measurements.orientation);
  return {
    orientationDeg,
    declinationDeg: measurements.declinationDeg,
    convergenceDeg,
    totalClockwiseDeg: orientationDeg + measurements.declinationDeg + convergenceDeg
  };
}

/**
 * Build the pixel → world transform T2 · R · S · T1:
 *
 * - T1 moves the reference pixel to the origin
 * - S converts pixels to meters and flips the y axis (image y grows down, north grows up)
 * - R rotates by the total clockwise correction, negated for the counter-clockwise primitive
 * - T2 moves the origin onto the reference world point
 */
export function composeTransform(
  params: TransformParameters,
  referenceWorld: WorldPoint,
  convergenceDeg: number
): AffineTransform {
  if (!(params.pixelsPerMeter > 0) || !Number.isFinite(params.pixelsPerMeter)) {
    throw new InvalidMeasurementError('Scale pixels per meter must be positive', {
      pixelsPerMeter: params.pixelsPerMeter
    });
  }
  const metersPerPixel = 1 / params.pixelsPerMeter;
  const totalClockwiseDeg = params.northAngleDeg + params.declinationDeg + convergenceDeg;

  const originOffset = AffineMatrix.translation(-params.referencePixel.x, -params.referencePixel.y);
  const scale = AffineMatrix.scale(metersPerPixel, -metersPerPixel);
  const rotation = AffineMatrix.rotation(-totalClockwiseDeg);
  const worldPosition = AffineMatrix.translation(referenceWorld.x, referenceWorld.y);

  const transform = AffineMatrix.chain(worldPosition, rotation, scale, originOffset);
  assertAnchorFixed(transform, params.referencePixel, referenceWorld);
  return transform;
}

/**
 * Compose the final transform from a finished measurement session
 */
export function compose(
  measurements: CompletedMeasurements,
  referenceWorld: WorldPoint,
  convergenceDeg: number
): AffineTransform {
  return composeTransform(toTransformParameters(measurements), referenceWorld, convergenceDeg);
}

/**
 * The reference pixel must land on the reference world point
 */
export function assertAnchorFixed(
  transform: AffineTransform,
  referencePixel: PixelPoint,
  referenceWorld: WorldPoint
): void {
  const mapped = AffineMatrix.apply(transform, referencePixel);
  const tolerance = ANCHOR_TOLERANCE * Math.max(1, Math.abs(referenceWorld.x), Math.abs(referenceWorld.y));
  const driftX = Math.abs(mapped.x - referenceWorld.x);
  const driftY = Math.abs(mapped.y - referenceWorld.y);
  if (!(driftX <= tolerance) || !(driftY <= tolerance)) {
    throw new CompositionError('Composed transform does not map the reference pixel onto its world point', {
      referencePixel,
      referenceWorld,
      mapped,
      tolerance
    });
  }
}
