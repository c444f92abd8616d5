import { InvalidMeasurementError } from '@/types/errors';
import type { OrientationMeasurement, PixelPoint, ScaleMeasurement } from '@/types/georef';

export function pixelDistance(p1: PixelPoint, p2: PixelPoint): number {
  return Math.hypot(p2.x - p1.x, p2.y - p1.y);
}

/**
 * Pixels per meter of a scale bar. Fails on a zero-length line or a
 * non-positive distance.
 */
export function pixelsPerMeter(scale: ScaleMeasurement): number {
  const pixels = pixelDistance(scale.start, scale.end);
  if (!(pixels > 0)) {
    throw new InvalidMeasurementError('Scale points cannot be the same', {
      start: scale.start,
      end: scale.end
    });
  }
  if (!Number.isFinite(scale.distanceMeters) || scale.distanceMeters <= 0) {
    throw new InvalidMeasurementError('Scale distance must be a positive number of meters', {
      distanceMeters: scale.distanceMeters
    });
  }
  return pixels / scale.distanceMeters;
}

/**
 * Clockwise angle in degrees from the image top to the measured north arrow.
 * A skipped measurement means north is straight up.
 */
export function orientationAngle(orientation: OrientationMeasurement): number {
  switch (orientation.kind) {
    case 'skipped':
      return 0;
    case 'measured': {
      const dx = orientation.tip.x - orientation.base.x;
      const dy = orientation.tip.y - orientation.base.y;
      if (dx === 0 && dy === 0) {
        throw new InvalidMeasurementError('North arrow base and tip cannot be the same', {
          base: orientation.base,
          tip: orientation.tip
        });
      }
      // Image y grows down, so "up" is -y
      return (Math.atan2(dx, -dy) * 180) / Math.PI;
    }
  }
}
