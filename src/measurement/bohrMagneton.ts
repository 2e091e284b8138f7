import { DEFAULT_PHYSICS, reducedPlanck, type PhysicalConstants } from './constants.js';
import { fitConditionedSlope } from './regression.js';
import { isReduced, type ReducedZeemanMeasurement, type ZeemanMeasurement } from './zeeman.js';

export type BohrMagnetonResult = {
  readonly magnetonInner: number;
  readonly magnetonOuter: number;
  readonly magnetonAverage: number;
  readonly chargeInner: number;
  readonly chargeOuter: number;
  readonly chargeAverage: number;
};

export type BohrMagnetonTuple = readonly [number, number, number, number, number, number];

export const ZERO_MAGNETON_RESULT: BohrMagnetonResult = Object.freeze({
  magnetonInner: 0,
  magnetonOuter: 0,
  magnetonAverage: 0,
  chargeInner: 0,
  chargeOuter: 0,
  chargeAverage: 0,
});

export const toMagnetonTuple = (result: BohrMagnetonResult): BohrMagnetonTuple => [
  result.magnetonInner,
  result.magnetonOuter,
  result.magnetonAverage,
  result.chargeInner,
  result.chargeOuter,
  result.chargeAverage,
];

/** Records whose energy shifts are present and finite, plus a finite field. */
export const selectUsable = (
  records: readonly ZeemanMeasurement[],
): ReducedZeemanMeasurement[] =>
  records
    .filter(isReduced)
    .filter(
      (record) =>
        Number.isFinite(record.B) &&
        Number.isFinite(record.derived.deltaEInner) &&
        Number.isFinite(record.derived.deltaEOuter),
    );

const compareRecords = (a: ReducedZeemanMeasurement, b: ReducedZeemanMeasurement) =>
  a.B - b.B ||
  Math.abs(a.derived.deltaEInner) - Math.abs(b.derived.deltaEInner) ||
  Math.abs(a.derived.deltaEOuter) - Math.abs(b.derived.deltaEOuter);

/**
 * Fits |ΔE| against B separately for the inner and outer ring and turns the
 * slopes into the Bohr magneton and the specific charge e/m = 2μ/ħ.
 *
 * Input order does not matter: records are sorted before any summation, so
 * shuffled input gives bit-identical output.
 */
export const estimateMagneton = (
  records: readonly ZeemanMeasurement[],
  physics: PhysicalConstants = DEFAULT_PHYSICS,
): BohrMagnetonResult => {
  const usable = selectUsable(records).sort(compareRecords);
  if (usable.length === 0) {
    return ZERO_MAGNETON_RESULT;
  }

  const fields = usable.map((record) => record.B);
  const inner = usable.map((record) => Math.abs(record.derived.deltaEInner));
  const outer = usable.map((record) => Math.abs(record.derived.deltaEOuter));

  const magnetonInner = fitConditionedSlope(fields, inner);
  const magnetonOuter = fitConditionedSlope(fields, outer);
  const magnetonAverage = (Math.abs(magnetonInner) + Math.abs(magnetonOuter)) / 2;
  const hbar = reducedPlanck(physics.planck);

  return {
    magnetonInner,
    magnetonOuter,
    magnetonAverage,
    chargeInner: (2 * Math.abs(magnetonInner)) / hbar,
    chargeOuter: (2 * Math.abs(magnetonOuter)) / hbar,
    // magnetonAverage as is, unlike the per-ring charges
    chargeAverage: (2 * magnetonAverage) / hbar,
  };
};

export class BohrMagnetonEstimator {
  private readonly physics: PhysicalConstants;

  constructor(physics: PhysicalConstants = DEFAULT_PHYSICS) {
    this.physics = { ...physics };
  }

  estimate(records: readonly ZeemanMeasurement[]): BohrMagnetonResult {
    return estimateMagneton(records, this.physics);
  }
}
