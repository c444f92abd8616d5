import {
  ERROR_CODES,
  errorMessage,
  GeoreferenceError,
  InvalidCoordinateError,
  WARNING_CODES
} from '@/types/errors';
import type {
  GeoCoordinate,
  GeoreferenceOutcome,
  GeoreferenceResult,
  GeoreferenceWarning
} from '@/types/georef';
import { convergence, ConvergenceTable, DEFAULT_CONVERGENCE_TABLE } from '@/core/coordinates/convergence';
import { isMissingCoordinate, isValidGeoCoordinate } from '@/core/coordinates/coordinates';
import type { CrsProjector } from '@/core/coordinates/projector';
import { compose, rotationBreakdown } from './affine-composer';
import { MeasurementSession } from './measurement-session';
import type { RunContext } from './run-context';
import type { MeasurementSurface } from './surface';

const SOURCE = 'GeoreferencingOrchestrator';

export interface OrchestratorDependencies {
  surface: MeasurementSurface;
  projector: CrsProjector;
  context: RunContext;
  convergenceTable?: ConvergenceTable;
}

/**
 * Runs projection, measurement, convergence lookup and composition in
 * order. Every outcome, including errors, comes back as a value.
 */
export class GeoreferencingOrchestrator {
  constructor(private readonly deps: OrchestratorDependencies) {}

  async run(reference: GeoCoordinate, targetCrs?: string): Promise<GeoreferenceOutcome> {
    const { surface, projector, context } = this.deps;
    const { logger, config, runId } = context;
    const crs = targetCrs ?? config.targetCrs;
    const logContext = { runId };
    const warnings: GeoreferenceWarning[] = [];

    try {
      if (!isValidGeoCoordinate(reference)) {
        throw new InvalidCoordinateError(
          `Reference coordinate out of range: lat=${reference.latitude}, lon=${reference.longitude}`,
          { latitude: reference.latitude, longitude: reference.longitude }
        );
      }
      if (isMissingCoordinate(reference)) {
        const message = 'Reference has no valid coordinates (0,0). Georeferencing will place it at null island.';
        warnings.push({ code: WARNING_CODES.MISSING_REFERENCE_COORDINATE, message });
        await logger.warn(SOURCE, message, { reference }, logContext);
      }

      await logger.info(SOURCE, 'Starting georeferencing run', { reference, targetCrs: crs }, logContext);
      const referenceWorld = projector.forward(reference, crs);
      await logger.info(SOURCE, 'Reference projected coordinates', { x: referenceWorld.x, y: referenceWorld.y }, logContext);

      const session = new MeasurementSession(surface, logger, logContext);
      const outcome = await session.run();
      if (outcome.status === 'cancelled') {
        return { status: 'cancelled', state: outcome.state };
      }

      // Convergence depends on geographic position, so it uses the WGS84 input
      const convergenceDeg = config.useMeridianConvergence
        ? convergence(reference.latitude, reference.longitude, crs, this.deps.convergenceTable ?? DEFAULT_CONVERGENCE_TABLE)
        : 0;
      await logger.info(SOURCE, 'Meridian convergence at reference', {
        convergenceDeg,
        enabled: config.useMeridianConvergence
      }, logContext);
      await logger.info(SOURCE, 'Total rotation (clockwise from image top)',
        rotationBreakdown(outcome.measurements, convergenceDeg), logContext);

      const transform = compose(outcome.measurements, referenceWorld, convergenceDeg);
      await logger.info(SOURCE, 'Final affine transform', transform, logContext);

      const result: GeoreferenceResult = Object.freeze({
        transform: Object.freeze(transform),
        crs
      });
      return { status: 'success', result, warnings };
    } catch (error) {
      const code = error instanceof GeoreferenceError ? error.code : ERROR_CODES.UNEXPECTED_ERROR;
      const reason = errorMessage(error);
      await logger.error(SOURCE, 'Georeferencing failed', { code, reason }, logContext);
      return { status: 'failure', reason, code };
    }
  }
}
