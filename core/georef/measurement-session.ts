import { SessionStateError } from '@/types/errors';
import type {
  CompletedMeasurements,
  OrientationMeasurement,
  PixelPoint,
  ScaleMeasurement,
  SessionOutcome,
  SessionState
} from '@/types/georef';
import type { ILogger } from '@/core/logging/ILogger';
import type { LogContext } from '@/core/logging/types';
import type { MeasurementSurface } from './surface';
import { orientationAngle, pixelDistance, pixelsPerMeter } from './measurements';

const SOURCE = 'MeasurementSession';

/** Keys that mean "north is already straight up" */
export const SKIP_NORTH_KEYS: readonly string[] = ['s', 'S'];

export const PROMPTS = {
  reference: 'STEP 1: MARK CAVE ENTRANCE. Click on the image to mark the point, then press SPACE or ENTER to confirm.',
  referenceMissing: 'Please mark a point first.',
  scale: 'STEP 2: MARK SCALE BAR. Click the start point, then the end point of the scale bar.',
  scaleDegenerate: 'Scale points cannot be the same. Mark the scale bar again.',
  distance: (pixels: number) => `Enter the real-world length of this line in METERS [pixels=${pixels.toFixed(1)}]: `,
  distanceInvalid: 'Invalid input. Please enter a number.',
  distanceNotPositive: 'Distance must be positive.',
  north: "STEP 3: MARK NORTH DIRECTION. Click the base of the arrow, then its tip pointing north, or press 'S' if north is straight up.",
  northDegenerate: 'Arrow base and tip cannot be the same. Mark the north arrow again.',
  declination:
    'Enter additional declination correction in degrees ' +
    '(usually 0 for plans already in geographic north; positive if the arrow is still magnetic): '
} as const;

const CANCELLED = Symbol('cancelled');
type Step<T> = T | typeof CANCELLED;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse user-typed decimal numbers. Returns null for empty, non-decimal
 * (hex, binary, octal, Infinity) or non-finite input.
 */
export function parseNumericInput(raw: string): number | null {
  const value = raw.trim();
  if (!DECIMAL_PATTERN.test(value)) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toPixelPoint(x: number, y: number): PixelPoint {
  return Object.freeze({ x: Math.round(x), y: Math.round(y) });
}

function samePixel(p1: PixelPoint, p2: PixelPoint): boolean {
  return p1.x === p2.x && p1.y === p2.y;
}

/**
 * Four-step capture of reference point, scale bar, north direction and
 * declination. Owns the surface for the whole run; runs at most once.
 */
export class MeasurementSession {
  private currentState: SessionState = 'awaiting-reference';
  private started = false;

  constructor(
    private readonly surface: MeasurementSurface,
    private readonly logger: ILogger,
    private readonly logContext: LogContext = {}
  ) {}

  get state(): SessionState {
    return this.currentState;
  }

  async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new SessionStateError('Measurement session has already been run', { state: this.currentState });
    }
    this.started = true;

    await this.surface.acquire();
    try {
      const referencePixel = await this.captureReference();
      if (referencePixel === CANCELLED) return await this.cancel();
      this.currentState = 'awaiting-scale';

      const scale = await this.captureScale();
      if (scale === CANCELLED) return await this.cancel();
      this.currentState = 'awaiting-orientation';

      const orientation = await this.captureOrientation();
      if (orientation === CANCELLED) return await this.cancel();
      this.currentState = 'awaiting-declination';

      const declinationDeg = await this.captureDeclination();
      if (declinationDeg === CANCELLED) return await this.cancel();
      this.currentState = 'complete';

      const measurements: CompletedMeasurements = Object.freeze({
        referencePixel,
        scale,
        orientation,
        declinationDeg
      });
      return { status: 'complete', measurements };
    } finally {
      await this.surface.release();
    }
  }

  private async cancel(): Promise<SessionOutcome> {
    const state = this.currentState;
    await this.logger.info(SOURCE, 'Operation cancelled by user', { state }, this.logContext);
    this.currentState = 'cancelled';
    return { status: 'cancelled', state };
  }

  private async captureReference(): Promise<Step<PixelPoint>> {
    await this.surface.notify(PROMPTS.reference);
    let point: PixelPoint | null = null;

    for (;;) {
      const event = await this.surface.nextEvent();
      switch (event.type) {
        case 'cancel':
          return CANCELLED;
        case 'click':
          point = toPixelPoint(event.x, event.y);
          await this.surface.annotate({ type: 'clear' });
          await this.surface.annotate({ type: 'point', point, role: 'reference' });
          break;
        case 'confirm':
          if (point) {
            await this.logger.info(SOURCE, 'Entrance marked', { point }, this.logContext);
            return point;
          }
          await this.surface.notify(PROMPTS.referenceMissing);
          break;
        case 'key':
          break;
      }
    }
  }

  private async captureScale(): Promise<Step<ScaleMeasurement>> {
    await this.surface.notify(PROMPTS.scale);
    const points: PixelPoint[] = [];

    while (points.length < 2) {
      const event = await this.surface.nextEvent();
      if (event.type === 'cancel') return CANCELLED;
      if (event.type !== 'click') continue;

      const point = toPixelPoint(event.x, event.y);
      points.push(point);
      await this.surface.annotate({ type: 'point', point, role: 'scale' });

      if (points.length === 2) {
        if (samePixel(points[0], points[1])) {
          await this.logger.warn(SOURCE, 'Scale points coincide, re-measuring', { point }, this.logContext);
          await this.surface.notify(PROMPTS.scaleDegenerate);
          await this.surface.annotate({ type: 'clear' });
          points.length = 0;
        } else {
          await this.surface.annotate({ type: 'line', from: points[0], to: points[1] });
        }
      }
    }

    const [start, end] = points;
    const pixels = pixelDistance(start, end);
    await this.logger.info(SOURCE, 'Scale bar length in pixels', { pixels }, this.logContext);

    for (;;) {
      const input = await this.surface.promptText(PROMPTS.distance(pixels));
      if (input.kind === 'cancel') return CANCELLED;

      const meters = parseNumericInput(input.value);
      if (meters === null) {
        await this.surface.notify(PROMPTS.distanceInvalid);
        continue;
      }
      if (meters <= 0) {
        await this.surface.notify(PROMPTS.distanceNotPositive);
        continue;
      }

      const scale: ScaleMeasurement = Object.freeze({ start, end, distanceMeters: meters });
      await this.logger.info(SOURCE, 'Calculated scale', {
        pixelsPerMeter: pixelsPerMeter(scale),
        distanceMeters: meters
      }, this.logContext);
      return scale;
    }
  }

  private async captureOrientation(): Promise<Step<OrientationMeasurement>> {
    await this.surface.notify(PROMPTS.north);
    const points: PixelPoint[] = [];

    for (;;) {
      const event = await this.surface.nextEvent();
      switch (event.type) {
        case 'cancel':
          return CANCELLED;
        case 'key': {
          if (!SKIP_NORTH_KEYS.includes(event.key)) break;
          await this.logger.info(SOURCE, 'North marking skipped. Defaulting to north = up (0 degrees)', undefined, this.logContext);
          const skipped: OrientationMeasurement = { kind: 'skipped' };
          return Object.freeze(skipped);
        }
        case 'click': {
          const point = toPixelPoint(event.x, event.y);
          points.push(point);
          await this.surface.annotate({ type: 'point', point, role: 'north' });
          if (points.length < 2) break;

          const [base, tip] = points;
          if (samePixel(base, tip)) {
            await this.surface.notify(PROMPTS.northDegenerate);
            await this.surface.annotate({ type: 'clear' });
            points.length = 0;
            break;
          }
          await this.surface.annotate({ type: 'arrow', base, tip });
          const measured: OrientationMeasurement = { kind: 'measured', base, tip };
          const orientation = Object.freeze(measured);
          await this.logger.info(SOURCE, 'Calculated north angle from top', {
            degrees: orientationAngle(orientation)
          }, this.logContext);
          return orientation;
        }
        case 'confirm':
          break;
      }
    }
  }

  private async captureDeclination(): Promise<Step<number>> {
    const input = await this.surface.promptText(PROMPTS.declination);
    if (input.kind === 'cancel') return CANCELLED;

    const raw = input.value.trim();
    let declination = 0;
    if (raw) {
      const parsed = parseNumericInput(raw);
      if (parsed === null) {
        await this.logger.warn(SOURCE, `Invalid declination input: '${raw}'. Defaulting to 0.0`, undefined, this.logContext);
      } else {
        declination = parsed;
      }
    }
    await this.logger.info(SOURCE, 'Additional (manual) declination used', { declination }, this.logContext);
    return declination;
  }
}
