import { InvalidCoordinateError } from '@/types/errors';
import { COORDINATE_SYSTEMS } from './coordinates';

/**
 * Parameters of the small-angle convergence approximation for one CRS
 */
export interface ConvergenceApproximation {
  /** Central meridian of the projection, degrees east */
  centralMeridianDeg: number;
}

export type ConvergenceTable = Readonly<Record<string, ConvergenceApproximation>>;

export const DEFAULT_CONVERGENCE_TABLE: ConvergenceTable = {
  [COORDINATE_SYSTEMS.PL_1992]: { centralMeridianDeg: 19 }
};

/**
 * Approximate grid (meridian) convergence at a point, in degrees.
 *
 * Computed as `(λ0 - λ) · sin(φ)`: the clockwise rotation of grid north
 * relative to true north. The result is added to the clockwise angle
 * measured from the image top.
 *
 * CRS identifiers missing from `table` return 0, meaning no correction.
 */
export function convergence(
  latitudeDeg: number,
  longitudeDeg: number,
  targetCrs: string,
  table: ConvergenceTable = DEFAULT_CONVERGENCE_TABLE
): number {
  if (!Number.isFinite(latitudeDeg) || latitudeDeg < -90 || latitudeDeg > 90 ||
      !Number.isFinite(longitudeDeg) || longitudeDeg < -180 || longitudeDeg > 180) {
    throw new InvalidCoordinateError(
      `Coordinate out of range: lat=${latitudeDeg}, lon=${longitudeDeg}`,
      { latitude: latitudeDeg, longitude: longitudeDeg }
    );
  }

  const approximation = Object.prototype.hasOwnProperty.call(table, targetCrs)
    ? table[targetCrs]
    : undefined;
  if (!approximation) {
    return 0;
  }

  const latitudeRad = (latitudeDeg * Math.PI) / 180;
  return (approximation.centralMeridianDeg - longitudeDeg) * Math.sin(latitudeRad);
}
