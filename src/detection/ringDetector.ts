import { InvalidParameterError } from '../errors.js';
import { assertIntensityField, type IntensityField } from '../fields/contracts.js';
import { maskAnnulus } from './annulusMask.js';
import { generateCandidateCenters, type CandidateCenter } from './candidates.js';
import {
  DEFAULT_HOUGH_PARAMETERS,
  houghGradientCircles,
  type CircleDetector,
  type HoughParameters,
} from './houghCircles.js';
import { radialProfile, refineRadius, type RadialProfile } from './radiusRefinement.js';
import {
  blendSignals,
  computeSignals,
  DEFAULT_SCORING_WEIGHTS,
  type ScoreSignals,
  type ScoringWeights,
} from './scoring.js';

export type RingHypothesis = {
  readonly x: number;
  readonly y: number;
  readonly r: number;
  readonly score: number;
  readonly signals: ScoreSignals;
};

export type RingSearchStats = {
  candidates: number;
  hypotheses: number;
};

export type RingDetectionResult =
  | ({ readonly kind: 'found'; readonly ring: RingHypothesis } & RingSearchStats)
  | ({ readonly kind: 'notFound' } & RingSearchStats);

export type HypothesisEvent = {
  candidate: CandidateCenter;
  hypothesis: RingHypothesis;
  key: string;
  replaced: boolean;
};

export type RingDetectorOptions = {
  weights?: ScoringWeights;
  hough?: Partial<HoughParameters>;
  circleDetector?: CircleDetector;
  onHypothesis?: (event: HypothesisEvent) => void;
};

const requireFinite = (name: string, value: number) => {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`[detect] ${name} must be a finite number (received ${value})`, {
      [name]: value,
    });
  }
};

export const validateSearchBand = (rLow: number, rHigh: number, halfWindow: number) => {
  requireFinite('rLow', rLow);
  requireFinite('rHigh', rHigh);
  requireFinite('halfWindow', halfWindow);
  if (rLow < 0) {
    throw new InvalidParameterError(`[detect] rLow must be non-negative (received ${rLow})`, {
      rLow,
    });
  }
  if (rLow >= rHigh) {
    throw new InvalidParameterError(
      `[detect] rLow (${rLow}) must be smaller than rHigh (${rHigh})`,
      { rLow, rHigh },
    );
  }
  if (halfWindow < 0 || !Number.isInteger(halfWindow)) {
    throw new InvalidParameterError(
      `[detect] halfWindow must be a non-negative integer (received ${halfWindow})`,
      { halfWindow },
    );
  }
};

export const hypothesisKey = (x: number, y: number, r: number) =>
  `${Math.round(x)}:${Math.round(y)}:${Math.round(r)}`;

/**
 * Refines an approximate ring location. Every candidate center around the
 * guess gets its own annulus-masked circle pass; each resulting circle has its
 * radius moved onto the intensity ridge of the unmasked field, is scored
 * against that field, and the best-scoring circle over all
 * candidates wins. Circles sharing a rounded (x, y, r) key keep the score of
 * their latest evaluation but their first position in the tie-break order.
 *
 * @throws InvalidParameterError for negative or inverted bands and bad windows.
 */
export const detectRing = (
  field: IntensityField,
  x0: number,
  y0: number,
  rLow: number,
  rHigh: number,
  halfWindow: number,
  options: RingDetectorOptions = {},
): RingDetectionResult => {
  requireFinite('x0', x0);
  requireFinite('y0', y0);
  validateSearchBand(rLow, rHigh, halfWindow);
  assertIntensityField(field, 'detectRing');

  const weights = options.weights ?? DEFAULT_SCORING_WEIGHTS;
  const params: HoughParameters = { ...DEFAULT_HOUGH_PARAMETERS, ...options.hough };
  const detectCircles = options.circleDetector ?? houghGradientCircles;
  const minCenterDistance = Math.max(1, rLow / 4);
  const guess = { x: x0, y: y0 };

  const candidates = generateCandidateCenters(x0, y0, halfWindow);
  const hypotheses = new Map<string, RingHypothesis>();
  const profiles = new Map<string, RadialProfile>();
  const profileAt = (x: number, y: number) => {
    const key = `${x}:${y}`;
    let profile = profiles.get(key);
    if (!profile) {
      profile = radialProfile(field, x, y, rLow, rHigh);
      profiles.set(key, profile);
    }
    return profile;
  };

  for (const candidate of candidates) {
    const masked = maskAnnulus(field, candidate.x, candidate.y, rLow, rHigh);
    if (!masked) continue;
    const circles = detectCircles({
      field: masked.field,
      region: masked.region,
      rLow,
      rHigh,
      minCenterDistance,
      params,
    });
    for (const detected of circles) {
      const profile = profileAt(detected.x, detected.y);
      const r = refineRadius(profile, detected.r, params.radiusWindow + 1);
      const circle = { x: detected.x, y: detected.y, r };
      const signals = computeSignals(field, circle, guess, candidate);
      const hypothesis: RingHypothesis = {
        ...circle,
        score: blendSignals(signals, weights),
        signals,
      };
      const key = hypothesisKey(circle.x, circle.y, circle.r);
      const replaced = hypotheses.has(key);
      hypotheses.set(key, hypothesis);
      options.onHypothesis?.({ candidate, hypothesis, key, replaced });
    }
  }

  const stats: RingSearchStats = { candidates: candidates.length, hypotheses: hypotheses.size };
  let best: RingHypothesis | null = null;
  // Map iteration follows first insertion, so strict > keeps the earliest on ties.
  for (const hypothesis of hypotheses.values()) {
    if (best === null || hypothesis.score > best.score) {
      best = hypothesis;
    }
  }
  if (best === null) {
    return { kind: 'notFound', ...stats };
  }
  return { kind: 'found', ring: best, ...stats };
};
