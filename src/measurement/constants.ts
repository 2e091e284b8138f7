export type PhysicalConstants = {
  /** Planck constant, J·s. */
  planck: number;
  /** Speed of light in vacuum, m/s. */
  speedOfLight: number;
};

/**
 * Optics between etalon and camera. `focalLength` shares its unit with the
 * calibrated radii (millimetres on the default bench).
 */
export type InstrumentConstants = {
  focalLength: number;
  refractiveIndex: number;
};

export type ReductionConstants = PhysicalConstants & InstrumentConstants;

export const DEFAULT_PHYSICS: PhysicalConstants = {
  planck: 6.62607015e-34,
  speedOfLight: 299_792_458,
};

export const DEFAULT_INSTRUMENT: InstrumentConstants = {
  focalLength: 150,
  refractiveIndex: 1.4567,
};

export const DEFAULT_REDUCTION_CONSTANTS: ReductionConstants = {
  ...DEFAULT_PHYSICS,
  ...DEFAULT_INSTRUMENT,
};

export const reducedPlanck = (planck: number) => planck / (2 * Math.PI);
