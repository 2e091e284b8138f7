import { DEFAULT_REDUCTION_CONSTANTS, type ReductionConstants } from './constants.js';

export type ZeemanDerived = {
  readonly alphaCenter: number;
  readonly alphaInner: number;
  readonly alphaOuter: number;
  readonly betaCenter: number;
  readonly betaInner: number;
  readonly betaOuter: number;
  readonly deltaLambdaInner: number;
  readonly deltaLambdaOuter: number;
  readonly deltaEInner: number;
  readonly deltaEOuter: number;
  readonly deltaEAverage: number;
};

/**
 * One photograph's worth of data: field strength (T), line wavelength (m) and
 * the three calibrated ring radii. `derived` is filled by the reducer and is
 * either complete or absent.
 */
export type ZeemanMeasurement = {
  readonly B: number;
  readonly wavelength: number;
  readonly radiusCenter?: number;
  readonly radiusInner?: number;
  readonly radiusOuter?: number;
  readonly derived?: ZeemanDerived;
};

export type ReducedZeemanMeasurement = ZeemanMeasurement & {
  readonly radiusCenter: number;
  readonly radiusInner: number;
  readonly radiusOuter: number;
  readonly derived: ZeemanDerived;
};

export const hasAllRadii = (
  record: ZeemanMeasurement,
): record is ZeemanMeasurement & {
  radiusCenter: number;
  radiusInner: number;
  radiusOuter: number;
} =>
  record.radiusCenter !== undefined &&
  record.radiusInner !== undefined &&
  record.radiusOuter !== undefined;

export const isReduced = (record: ZeemanMeasurement): record is ReducedZeemanMeasurement =>
  hasAllRadii(record) && record.derived !== undefined;

/** Angle of the ray leaving the etalon, from the ring radius in the focal plane. */
export const incidenceAngle = (radius: number, focalLength: number) =>
  Math.atan(radius / focalLength);

/** Angle inside the etalon. NaN once the ring lies beyond the optical acceptance. */
export const refractionAngle = (alpha: number, refractiveIndex: number) => {
  const ratio = Math.sin(alpha) / refractiveIndex;
  if (ratio > 1 || ratio < -1) {
    return Number.NaN;
  }
  return Math.asin(ratio);
};

export const wavelengthShift = (wavelength: number, betaCenter: number, beta: number) =>
  wavelength * (Math.cos(betaCenter) / Math.cos(beta) - 1);

export const energyShift = (
  deltaLambda: number,
  wavelength: number,
  constants: Pick<ReductionConstants, 'planck' | 'speedOfLight'>,
) => (constants.planck * constants.speedOfLight * deltaLambda) / (wavelength * wavelength);

/**
 * Derives angles, wavelength shifts and energy shifts for a record with all
 * three radii. Records missing a radius come back as the same object.
 */
export const reduceMeasurement = (
  record: ZeemanMeasurement,
  constants: ReductionConstants = DEFAULT_REDUCTION_CONSTANTS,
): ZeemanMeasurement => {
  if (!hasAllRadii(record)) {
    return record;
  }
  const { focalLength, refractiveIndex } = constants;
  const { wavelength } = record;

  const alphaCenter = incidenceAngle(record.radiusCenter, focalLength);
  const alphaInner = incidenceAngle(record.radiusInner, focalLength);
  const alphaOuter = incidenceAngle(record.radiusOuter, focalLength);
  const betaCenter = refractionAngle(alphaCenter, refractiveIndex);
  const betaInner = refractionAngle(alphaInner, refractiveIndex);
  const betaOuter = refractionAngle(alphaOuter, refractiveIndex);

  const deltaLambdaInner = wavelengthShift(wavelength, betaCenter, betaInner);
  const deltaLambdaOuter = wavelengthShift(wavelength, betaCenter, betaOuter);
  const deltaEInner = energyShift(deltaLambdaInner, wavelength, constants);
  const deltaEOuter = energyShift(deltaLambdaOuter, wavelength, constants);

  return {
    ...record,
    derived: {
      alphaCenter,
      alphaInner,
      alphaOuter,
      betaCenter,
      betaInner,
      betaOuter,
      deltaLambdaInner,
      deltaLambdaOuter,
      deltaEInner,
      deltaEOuter,
      deltaEAverage: (Math.abs(deltaEInner) + Math.abs(deltaEOuter)) / 2,
    },
  };
};

export class MeasurementReducer {
  private readonly constants: ReductionConstants;

  constructor(constants: ReductionConstants = DEFAULT_REDUCTION_CONSTANTS) {
    this.constants = { ...constants };
  }

  reduce(record: ZeemanMeasurement): ZeemanMeasurement {
    return reduceMeasurement(record, this.constants);
  }

  reduceAll(records: readonly ZeemanMeasurement[]): ZeemanMeasurement[] {
    return records.map((record) => this.reduce(record));
  }

  getConstants(): ReductionConstants {
    return { ...this.constants };
  }
}
