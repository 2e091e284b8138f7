export type RingLabErrorCode =
  | 'invalid-image'
  | 'invalid-parameter'
  | 'invalid-series'
  | 'command-failed';

export class RingLabError extends Error {
  readonly code: RingLabErrorCode;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: RingLabErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RingLabError';
    this.code = code;
    this.details = { ...details };
  }
}

/** Raised when a pixel buffer cannot be turned into an intensity field. */
export class InvalidImageError extends RingLabError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('invalid-image', message, details);
    this.name = 'InvalidImageError';
  }
}

/** Raised for search bands, windows or calibration factors outside their domain. */
export class InvalidParameterError extends RingLabError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('invalid-parameter', message, details);
    this.name = 'InvalidParameterError';
  }
}

/** A measurement series file or message that does not describe usable records. */
export class InvalidSeriesError extends RingLabError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('invalid-series', message, details);
    this.name = 'InvalidSeriesError';
  }
}

export const isRingLabError = (error: unknown): error is RingLabError =>
  error instanceof RingLabError;
