import type { Feature, Polygon, GeoJsonProperties } from 'geojson';
import { InvalidMeasurementError } from '@/types/errors';
import type { AffineTransform, GeoreferenceResult, LatLonBox, ProjectedBounds } from '@/types/georef';
import type { CrsProjector } from '@/core/coordinates/projector';
import { geoToPosition } from '@/core/coordinates/coordinates';
import { AffineMatrix, Vector2 } from './matrix';

function assertImageSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidMeasurementError('Image size must be positive integers', { width, height });
  }
}

/**
 * Image corners in order top-left, top-right, bottom-right, bottom-left
 */
export function imageCorners(width: number, height: number): Vector2[] {
  assertImageSize(width, height);
  return [
    { x: 0, y: 0 },
    { x: width, y: 0 },
    { x: width, y: height },
    { x: 0, y: height }
  ];
}

export function projectedBounds(transform: AffineTransform, width: number, height: number): ProjectedBounds {
  const corners = imageCorners(width, height).map(corner => AffineMatrix.apply(transform, corner));
  const xs = corners.map(c => c.x);
  const ys = corners.map(c => c.y);
  return {
    minX: Math.min(...xs),
    minY: Math.min(...ys),
    maxX: Math.max(...xs),
    maxY: Math.max(...ys)
  };
}

/**
 * WGS84 LatLonBox of the projected bounding box, from its lower-left and
 * upper-right corners
 */
export function groundOverlayBox(
  result: GeoreferenceResult,
  width: number,
  height: number,
  projector: CrsProjector
): LatLonBox {
  const bounds = projectedBounds(result.transform, width, height);
  const lowerLeft = projector.inverse({ x: bounds.minX, y: bounds.minY }, result.crs);
  const upperRight = projector.inverse({ x: bounds.maxX, y: bounds.maxY }, result.crs);
  return {
    north: Math.max(lowerLeft.latitude, upperRight.latitude),
    south: Math.min(lowerLeft.latitude, upperRight.latitude),
    east: Math.max(lowerLeft.longitude, upperRight.longitude),
    west: Math.min(lowerLeft.longitude, upperRight.longitude)
  };
}

/**
 * Footprint of the plan as a WGS84 polygon through its four reprojected corners
 */
export function footprintFeature(
  result: GeoreferenceResult,
  width: number,
  height: number,
  projector: CrsProjector,
  properties: GeoJsonProperties = {}
): Feature<Polygon> {
  const ring = imageCorners(width, height)
    .map(corner => AffineMatrix.apply(result.transform, corner))
    .map(world => geoToPosition(projector.inverse(world, result.crs)));
  ring.push([...ring[0]]);

  return {
    type: 'Feature',
    geometry: {
      type: 'Polygon',
      coordinates: [ring]
    },
    properties: { crs: result.crs, ...properties }
  };
}
