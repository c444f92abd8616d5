/**
 * Error codes raised inside the georeferencing pipeline
 */
export const ERROR_CODES = {
  INVALID_MEASUREMENT: 'INVALID_MEASUREMENT',
  ANCHOR_DRIFT: 'ANCHOR_DRIFT',
  INVALID_COORDINATE: 'INVALID_COORDINATE',
  PROJECTION_ERROR: 'PROJECTION_ERROR',
  SESSION_ALREADY_RUN: 'SESSION_ALREADY_RUN',
  INPUT_EXHAUSTED: 'INPUT_EXHAUSTED',
  WORLD_FILE_ERROR: 'WORLD_FILE_ERROR',
  CAVE_RECORD_ERROR: 'CAVE_RECORD_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR'
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

/**
 * Warning codes surfaced alongside a successful run
 */
export const WARNING_CODES = {
  MISSING_REFERENCE_COORDINATE: 'MISSING_REFERENCE_COORDINATE'
} as const;

export type WarningCode = typeof WARNING_CODES[keyof typeof WARNING_CODES];

/**
 * Base class for all georeferencing errors
 */
export class GeoreferenceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GeoreferenceError';
  }
}

/**
 * Zero-length scale line, non-positive distance or a violated composer precondition
 */
export class InvalidMeasurementError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.INVALID_MEASUREMENT, details);
    this.name = 'InvalidMeasurementError';
  }
}

/**
 * The composed transform does not reproduce the anchor point
 */
export class CompositionError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.ANCHOR_DRIFT, details);
    this.name = 'CompositionError';
  }
}

export class InvalidCoordinateError extends GeoreferenceError {
  constructor(
    message: string,
    public readonly coordinate: { latitude: number; longitude: number },
    details?: Record<string, unknown>
  ) {
    super(message, ERROR_CODES.INVALID_COORDINATE, { coordinate, ...details });
    this.name = 'InvalidCoordinateError';
  }
}

/**
 * Error thrown when a CRS projection fails or the CRS is unknown
 */
export class ProjectionError extends GeoreferenceError {
  constructor(
    message: string,
    public readonly sourceSystem: string,
    public readonly targetSystem: string,
    details?: Record<string, unknown>
  ) {
    super(message, ERROR_CODES.PROJECTION_ERROR, { sourceSystem, targetSystem, ...details });
    this.name = 'ProjectionError';
  }
}

export class SessionStateError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.SESSION_ALREADY_RUN, details);
    this.name = 'SessionStateError';
  }
}

export class InputExhaustedError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.INPUT_EXHAUSTED, details);
    this.name = 'InputExhaustedError';
  }
}

export class WorldFileError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.WORLD_FILE_ERROR, details);
    this.name = 'WorldFileError';
  }
}

export class CaveRecordError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.CAVE_RECORD_ERROR, details);
    this.name = 'CaveRecordError';
  }
}

export class ConfigError extends GeoreferenceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
