import { InvalidParameterError } from '../errors.js';
import type { ZeemanMeasurement } from './zeeman.js';

export type PixelPoint = {
  readonly x: number;
  readonly y: number;
};

export type RingSlot = 'inner' | 'middle' | 'outer';

/** Pixel-space ring radii for one photograph; any slot may still be empty. */
export type RingMeasurement = {
  readonly centerPixel?: PixelPoint;
  readonly radiusInner?: number;
  readonly radiusMiddle?: number;
  readonly radiusOuter?: number;
};

/**
 * Fills one slot from a detected (or hand-placed) ring. The first center
 * recorded stays the measurement's center.
 */
export const assignRing = (
  measurement: RingMeasurement,
  slot: RingSlot,
  ring: { x: number; y: number; r: number },
): RingMeasurement => {
  const next: RingMeasurement = {
    ...measurement,
    centerPixel: measurement.centerPixel ?? { x: ring.x, y: ring.y },
  };
  switch (slot) {
    case 'inner':
      return { ...next, radiusInner: ring.r };
    case 'middle':
      return { ...next, radiusMiddle: ring.r };
    case 'outer':
      return { ...next, radiusOuter: ring.r };
  }
};

export const isRingMeasurementComplete = (measurement: RingMeasurement) =>
  measurement.radiusInner !== undefined &&
  measurement.radiusMiddle !== undefined &&
  measurement.radiusOuter !== undefined;

export type CalibrationContext = {
  B: number;
  wavelength: number;
  /** Physical length of one pixel, in the focal-length unit. */
  lengthPerPixel: number;
};

const requireLengthPerPixel = (lengthPerPixel: number) => {
  if (!Number.isFinite(lengthPerPixel) || lengthPerPixel <= 0) {
    throw new InvalidParameterError(
      `[calibration] lengthPerPixel must be positive (received ${lengthPerPixel})`,
      { lengthPerPixel },
    );
  }
};

/** Converts a pixel distance into the focal-length unit. */
export const pixelsToLength = (pixels: number, lengthPerPixel: number): number => {
  requireLengthPerPixel(lengthPerPixel);
  return pixels * lengthPerPixel;
};

export const calibrateRingMeasurement = (
  ring: RingMeasurement,
  context: CalibrationContext,
): ZeemanMeasurement => {
  const { lengthPerPixel } = context;
  requireLengthPerPixel(lengthPerPixel);
  return {
    B: context.B,
    wavelength: context.wavelength,
    ...(ring.radiusMiddle !== undefined && { radiusCenter: ring.radiusMiddle * lengthPerPixel }),
    ...(ring.radiusInner !== undefined && { radiusInner: ring.radiusInner * lengthPerPixel }),
    ...(ring.radiusOuter !== undefined && { radiusOuter: ring.radiusOuter * lengthPerPixel }),
  };
};
