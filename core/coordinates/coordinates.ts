import { Position } from 'geojson';
import type { GeoCoordinate, WorldPoint } from '@/types/georef';

/**
 * Coordinate systems known to the default projector
 */
export const COORDINATE_SYSTEMS = {
  /** WGS84 (EPSG:4326) - Global latitude/longitude */
  WGS84: 'EPSG:4326',
  /** PL-1992 (EPSG:2180) - Polish transverse Mercator, central meridian 19°E */
  PL_1992: 'EPSG:2180',
  /** Web Mercator (EPSG:3857) - Web mapping projection */
  WEB_MERCATOR: 'EPSG:3857',
  /** Swiss LV95 (EPSG:2056) */
  SWISS_LV95: 'EPSG:2056'
} as const;

/** Type for coordinate system identifiers */
export type CoordinateSystem = typeof COORDINATE_SYSTEMS[keyof typeof COORDINATE_SYSTEMS];

/**
 * proj4 definitions registered by the default projector
 */
export const PROJ4_DEFINITIONS: Record<CoordinateSystem, string> = {
  'EPSG:4326': '+proj=longlat +datum=WGS84 +no_defs',
  'EPSG:2180': '+proj=tmerc +lat_0=0 +lon_0=19 +k=0.9993 +x_0=500000 +y_0=-5300000 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs',
  'EPSG:3857': '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +no_defs +over',
  'EPSG:2056': '+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 +x_0=2600000 +y_0=1200000 +ellps=bessel +towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs'
};

/**
 * Check that latitude and longitude are finite and within WGS84 range
 */
export function isValidGeoCoordinate(coordinate: GeoCoordinate): boolean {
  return Number.isFinite(coordinate.latitude) &&
         Number.isFinite(coordinate.longitude) &&
         coordinate.latitude >= -90 && coordinate.latitude <= 90 &&
         coordinate.longitude >= -180 && coordinate.longitude <= 180;
}

/**
 * Upstream data stores "no coordinate" as (0, 0)
 */
export function isMissingCoordinate(coordinate: GeoCoordinate): boolean {
  return coordinate.latitude === 0 && coordinate.longitude === 0;
}

/**
 * Convert a geographic coordinate to a GeoJSON Position [longitude, latitude]
 */
export function geoToPosition(coordinate: GeoCoordinate): Position {
  return [coordinate.longitude, coordinate.latitude];
}

export function isFiniteWorldPoint(point: WorldPoint): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.y);
}
