import type { IntensityField } from '../fields/contracts.js';
import { samplePerimeter } from './scoring.js';

/** Radial spacing, in pixels, of profile samples. */
export const PROFILE_STEP = 0.25;

/** Mean perimeter intensity around one center, sampled across a radius band. */
export type RadialProfile = {
  start: number;
  step: number;
  means: Float64Array;
};

export const radialProfile = (
  field: IntensityField,
  cx: number,
  cy: number,
  rLow: number,
  rHigh: number,
): RadialProfile => {
  const count = Math.floor((rHigh - rLow) / PROFILE_STEP) + 1;
  const means = new Float64Array(count);
  for (let j = 0; j < count; j++) {
    const perimeter = samplePerimeter(field, cx, cy, rLow + j * PROFILE_STEP);
    means[j] = perimeter.onField > 0 ? perimeter.sum / perimeter.onField : 0;
  }
  return { start: rLow, step: PROFILE_STEP, means };
};

/**
 * Moves a radius estimate onto the bright ridge of the profile. The highest
 * sample within `window` pixels of the estimate is climbed to its local peak;
 * the result is the midpoint of the run that stays above half the peak's
 * height over the profile floor. A flat profile returns the estimate as is.
 */
export const refineRadius = (profile: RadialProfile, estimate: number, window: number): number => {
  const { start, step, means } = profile;
  const last = means.length - 1;
  const clampIndex = (j: number) => Math.min(last, Math.max(0, j));

  const center = clampIndex(Math.round((estimate - start) / step));
  const reach = Math.ceil(Math.max(0, window) / step);
  let peak = center;
  for (let j = clampIndex(center - reach); j <= clampIndex(center + reach); j++) {
    if (means[j] > means[peak]) peak = j;
  }
  while (peak < last && means[peak + 1] > means[peak]) peak++;
  while (peak > 0 && means[peak - 1] > means[peak]) peak--;

  let floor = means[0];
  for (let j = 1; j <= last; j++) {
    if (means[j] < floor) floor = means[j];
  }
  const rise = means[peak] - floor;
  if (!(rise > 0)) {
    return estimate;
  }

  const level = floor + rise / 2;
  let lo = peak;
  let hi = peak;
  while (lo > 0 && means[lo - 1] >= level) lo--;
  while (hi < last && means[hi + 1] >= level) hi++;
  return start + ((lo + hi) / 2) * step;
};
