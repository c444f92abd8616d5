import proj4 from 'proj4';
import { ProjectionError } from '@/types/errors';
import type { GeoCoordinate, WorldPoint } from '@/types/georef';
import { COORDINATE_SYSTEMS, isFiniteWorldPoint, PROJ4_DEFINITIONS } from './coordinates';

/**
 * Converts between WGS84 and a projected CRS
 */
export interface CrsProjector {
  forward(geo: GeoCoordinate, targetCrs: string): WorldPoint;
  inverse(world: WorldPoint, sourceCrs: string): GeoCoordinate;
}

interface Converter {
  forward: (coords: number[]) => number[];
  inverse: (coords: number[]) => number[];
}

/**
 * proj4-backed projector. Always works in (x=longitude, y=latitude) order
 * on the geographic side.
 *
 * Definitions stay with the instance and are handed to proj4 as strings,
 * so nothing is added to proj4's global registry. Names proj4 already
 * knows (EPSG:4326, EPSG:3857, ...) resolve without a definition.
 */
export class Proj4Projector implements CrsProjector {
  private readonly cache = new Map<string, Converter>();
  private readonly definitions: Map<string, string>;

  constructor(extraDefinitions: Record<string, string> = {}) {
    this.definitions = new Map(Object.entries({ ...PROJ4_DEFINITIONS, ...extraDefinitions }));
  }

  public isKnown(crs: string): boolean {
    return this.definitions.has(crs) || proj4.defs(crs) !== undefined;
  }

  public forward(geo: GeoCoordinate, targetCrs: string): WorldPoint {
    const converter = this.getConverter(targetCrs);
    const [x, y] = converter.forward([geo.longitude, geo.latitude]);
    const world: WorldPoint = { x, y };
    if (!isFiniteWorldPoint(world)) {
      throw new ProjectionError(
        `Projection to ${targetCrs} produced a non-finite result`,
        COORDINATE_SYSTEMS.WGS84,
        targetCrs,
        { input: geo, output: world }
      );
    }
    return world;
  }

  public inverse(world: WorldPoint, sourceCrs: string): GeoCoordinate {
    const converter = this.getConverter(sourceCrs);
    const [longitude, latitude] = converter.inverse([world.x, world.y]);
    if (!Number.isFinite(longitude) || !Number.isFinite(latitude)) {
      throw new ProjectionError(
        `Projection from ${sourceCrs} produced a non-finite result`,
        sourceCrs,
        COORDINATE_SYSTEMS.WGS84,
        { input: world, output: [longitude, latitude] }
      );
    }
    return { latitude, longitude };
  }

  private getConverter(crs: string): Converter {
    const cached = this.cache.get(crs);
    if (cached) return cached;

    if (!this.isKnown(crs)) {
      throw new ProjectionError(`Unknown coordinate system: ${crs}`, COORDINATE_SYSTEMS.WGS84, crs);
    }

    const projection = proj4(this.resolve(COORDINATE_SYSTEMS.WGS84), this.resolve(crs));
    const converter: Converter = {
      forward: coords => projection.forward(coords),
      inverse: coords => projection.inverse(coords)
    };
    this.cache.set(crs, converter);
    return converter;
  }

  private resolve(crs: string): string {
    return this.definitions.get(crs) ?? crs;
  }
}
