import type { WarningCode, ErrorCode } from './errors';

/**
 * Integer position in image pixel space (origin top-left, y grows downward)
 */
export interface PixelPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * Position in a projected CRS, in its linear units (y grows northward)
 */
export interface WorldPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * WGS84 geographic coordinate in degrees
 */
export interface GeoCoordinate {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Scale bar drawn on the plan and the real length it stands for
 */
export interface ScaleMeasurement {
  readonly start: PixelPoint;
  readonly end: PixelPoint;
  /** Real-world length of the line, meters */
  readonly distanceMeters: number;
}

/**
 * North direction on the plan: either measured as an arrow or taken as straight up
 */
export type OrientationMeasurement =
  | { readonly kind: 'skipped' }
  | { readonly kind: 'measured'; readonly base: PixelPoint; readonly tip: PixelPoint };

/** Signed manual correction in degrees, added clockwise */
export type ManualDeclination = number;

/**
 * All four measurements of a finished session
 */
export interface CompletedMeasurements {
  readonly referencePixel: PixelPoint;
  readonly scale: ScaleMeasurement;
  readonly orientation: OrientationMeasurement;
  readonly declinationDeg: ManualDeclination;
}

/**
 * Maps pixel (x, y) to world (a*x + b*y + c, d*x + e*y + f)
 */
export interface AffineTransform {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly e: number;
  readonly f: number;
}

export interface GeoreferenceResult {
  readonly transform: AffineTransform;
  readonly crs: string;
}

export interface GeoreferenceWarning {
  code: WarningCode;
  message: string;
}

export type SessionState =
  | 'awaiting-reference'
  | 'awaiting-scale'
  | 'awaiting-orientation'
  | 'awaiting-declination'
  | 'complete'
  | 'cancelled';

export type SessionOutcome =
  | { status: 'complete'; measurements: CompletedMeasurements }
  | { status: 'cancelled'; state: SessionState };

export type GeoreferenceOutcome =
  | { status: 'success'; result: GeoreferenceResult; warnings: GeoreferenceWarning[] }
  | { status: 'cancelled'; state: SessionState }
  | { status: 'failure'; reason: string; code: ErrorCode };

/**
 * WGS84 bounds of a ground overlay, as a KML LatLonBox expects them
 */
export interface LatLonBox {
  north: number;
  south: number;
  east: number;
  west: number;
}

export interface ProjectedBounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
