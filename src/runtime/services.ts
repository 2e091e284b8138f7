import { resolve } from 'node:path';
import process from 'node:process';

import { decodeImage, readImageInfo } from '../cli/utils/ffmpeg.js';
import {
  detectRing,
  type HypothesisEvent,
  type RingHypothesis,
} from '../detection/ringDetector.js';
import { InvalidSeriesError } from '../errors.js';
import { pixelsToLength } from '../measurement/calibration.js';
import {
  estimateMagneton,
  selectUsable,
  type BohrMagnetonResult,
} from '../measurement/bohrMagneton.js';
import { MeasurementReducer, type ZeemanMeasurement } from '../measurement/zeeman.js';
import { enhance } from '../pipeline/enhance.js';
import { loadProfileFromPath } from '../profile/loader.js';
import { createDefaultProfile, ProfileValidationError } from '../profile/schema.js';
import type { InstrumentProfile, ProfileValidationIssue } from '../profile/types.js';
import { hashCanonicalJson } from '../serialization/canonicalJson.js';

export type ResolvedProfile = {
  profile: InstrumentProfile;
  issues: ProfileValidationIssue[];
  profilePath?: string;
};

export const resolveProfile = async (profilePath?: string): Promise<ResolvedProfile> => {
  if (!profilePath) {
    return { profile: createDefaultProfile(), issues: [] };
  }
  const result = await loadProfileFromPath(profilePath);
  if (result.kind === 'error') {
    throw new ProfileValidationError(`${profilePath}: ${result.message}`, result.issues ?? []);
  }
  return {
    profile: result.profile,
    issues: result.issues,
    profilePath: resolve(process.cwd(), profilePath),
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const RADIUS_KEYS = ['radiusCenter', 'radiusInner', 'radiusOuter'] as const;

/**
 * Turns a decoded series document into measurement records. Precomputed
 * `derived` blocks are dropped so every analysis reduces from the radii.
 */
export const parseSeries = (payload: unknown): ZeemanMeasurement[] => {
  if (!Array.isArray(payload)) {
    throw new InvalidSeriesError('[series] expected an array of measurements');
  }
  return payload.map((entry: unknown, index): ZeemanMeasurement => {
    if (!isRecord(entry)) {
      throw new InvalidSeriesError(`[series] entry ${index} is not an object`, { index });
    }
    const { B, wavelength } = entry;
    if (typeof B !== 'number' || !Number.isFinite(B)) {
      throw new InvalidSeriesError(`[series] entry ${index}: B must be a finite number`, {
        index,
        key: 'B',
      });
    }
    if (typeof wavelength !== 'number' || !Number.isFinite(wavelength) || wavelength <= 0) {
      throw new InvalidSeriesError(
        `[series] entry ${index}: wavelength must be a positive number`,
        { index, key: 'wavelength' },
      );
    }
    const radii: { radiusCenter?: number; radiusInner?: number; radiusOuter?: number } = {};
    for (const key of RADIUS_KEYS) {
      const value = entry[key];
      if (value === undefined || value === null) {
        continue;
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new InvalidSeriesError(`[series] entry ${index}: ${key} must be a finite number`, {
          index,
          key,
        });
      }
      radii[key] = value;
    }
    return { B, wavelength, ...radii };
  });
};

export const parseSeriesJson = (json: string): ZeemanMeasurement[] => {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidSeriesError(`[series] invalid JSON: ${reason}`);
  }
  return parseSeries(payload);
};

export type SeriesReport = {
  profile: string;
  records: ZeemanMeasurement[];
  result: BohrMagnetonResult;
  usable: number;
  skipped: number;
  digest: string;
};

export const analyzeSeries = (
  records: readonly ZeemanMeasurement[],
  profile: InstrumentProfile = createDefaultProfile(),
): SeriesReport => {
  const reducer = new MeasurementReducer({ ...profile.physics, ...profile.instrument });
  const reduced = reducer.reduceAll(records);
  const result = estimateMagneton(reduced, profile.physics);
  const usable = selectUsable(reduced).length;
  const { hash } = hashCanonicalJson({
    instrument: profile.instrument,
    physics: profile.physics,
    records: reduced,
    result,
  });
  return {
    profile: profile.name,
    records: reduced,
    result,
    usable,
    skipped: records.length - usable,
    digest: hash,
  };
};

export type DetectImageOptions = {
  input: string;
  x0: number;
  y0: number;
  rLow: number;
  rHigh: number;
  halfWindow: number;
  profile: InstrumentProfile;
  ffmpeg: string;
  ffprobe: string;
  onHypothesis?: (event: HypothesisEvent) => void;
};

/**
 * Radius of a detected ring in the focal-length unit, or null when there is
 * no ring or the profile carries no pixel calibration.
 */
export const physicalRadius = (
  ring: { r: number } | null,
  profile: InstrumentProfile,
): number | null => {
  const { lengthPerPixel } = profile.calibration;
  if (ring === null || lengthPerPixel === undefined) {
    return null;
  }
  return pixelsToLength(ring.r, lengthPerPixel);
};

export type DetectImageSummary = {
  input: string;
  width: number;
  height: number;
  ring: RingHypothesis | null;
  physicalRadius: number | null;
  candidates: number;
  hypotheses: number;
  durationMs: number;
};

export const detectRingInImage = async (
  options: DetectImageOptions,
): Promise<DetectImageSummary> => {
  const info = await readImageInfo(options.ffprobe, options.input);
  const image = await decodeImage(options.ffmpeg, options.input, info);

  const start = performance.now();
  const field = enhance(image);
  const detection = detectRing(
    field,
    options.x0,
    options.y0,
    options.rLow,
    options.rHigh,
    options.halfWindow,
    {
      weights: options.profile.detector.weights,
      hough: options.profile.detector.hough,
      onHypothesis: options.onHypothesis,
    },
  );
  const durationMs = performance.now() - start;
  const ring = detection.kind === 'found' ? detection.ring : null;

  return {
    input: resolve(process.cwd(), options.input),
    width: image.width,
    height: image.height,
    ring,
    physicalRadius: physicalRadius(ring, options.profile),
    candidates: detection.candidates,
    hypotheses: detection.hypotheses,
    durationMs,
  };
};
