import { DEFAULT_HOUGH_PARAMETERS, type HoughParameters } from '../detection/houghCircles.js';
import { DEFAULT_SCORING_WEIGHTS, type ScoringWeights } from '../detection/scoring.js';
import {
  DEFAULT_INSTRUMENT,
  DEFAULT_PHYSICS,
  type InstrumentConstants,
  type PhysicalConstants,
} from '../measurement/constants.js';
import type {
  InstrumentProfile,
  ProfileCalibration,
  ProfileDetectorSettings,
  ProfileValidationIssue,
  ProfileValidationResult,
} from './types.js';

export const PROFILE_SCHEMA_VERSION = '1.0.0';

const ROOT_KEYS = new Set([
  'schemaVersion',
  'name',
  'instrument',
  'physics',
  'detector',
  'calibration',
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const toPath = (...parts: (string | number)[]): readonly (string | number)[] => parts;

const pushIssue = (
  issues: ProfileValidationIssue[],
  code: string,
  message: string,
  path: readonly (string | number)[],
  severity: ProfileValidationIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

type NumberRule = 'positive' | 'nonNegative' | 'any';

const readNumber = (
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  rule: NumberRule,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): number => {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    pushIssue(issues, 'number/type', `${key} must be a finite number`, [...path, key]);
    return fallback;
  }
  if (rule === 'positive' && value <= 0) {
    pushIssue(issues, 'number/positive', `${key} must be greater than zero`, [...path, key]);
    return fallback;
  }
  if (rule === 'nonNegative' && value < 0) {
    pushIssue(issues, 'number/non-negative', `${key} must not be negative`, [...path, key]);
    return fallback;
  }
  return value;
};

const readSection = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): Record<string, unknown> => {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    pushIssue(issues, 'section/type', 'Profile section must be an object', path);
    return {};
  }
  return value;
};

const normaliseInstrument = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): InstrumentConstants => {
  const section = readSection(value, issues, path);
  return {
    focalLength: readNumber(
      section,
      'focalLength',
      DEFAULT_INSTRUMENT.focalLength,
      'positive',
      issues,
      path,
    ),
    refractiveIndex: readNumber(
      section,
      'refractiveIndex',
      DEFAULT_INSTRUMENT.refractiveIndex,
      'positive',
      issues,
      path,
    ),
  };
};

const normalisePhysics = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): PhysicalConstants => {
  const section = readSection(value, issues, path);
  return {
    planck: readNumber(section, 'planck', DEFAULT_PHYSICS.planck, 'positive', issues, path),
    speedOfLight: readNumber(
      section,
      'speedOfLight',
      DEFAULT_PHYSICS.speedOfLight,
      'positive',
      issues,
      path,
    ),
  };
};

const normaliseWeights = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): ScoringWeights => {
  const section = readSection(value, issues, path);
  const weights: ScoringWeights = {
    distance: readNumber(
      section,
      'distance',
      DEFAULT_SCORING_WEIGHTS.distance,
      'nonNegative',
      issues,
      path,
    ),
    edge: readNumber(section, 'edge', DEFAULT_SCORING_WEIGHTS.edge, 'nonNegative', issues, path),
    completeness: readNumber(
      section,
      'completeness',
      DEFAULT_SCORING_WEIGHTS.completeness,
      'nonNegative',
      issues,
      path,
    ),
    proximity: readNumber(
      section,
      'proximity',
      DEFAULT_SCORING_WEIGHTS.proximity,
      'nonNegative',
      issues,
      path,
    ),
  };
  const total = weights.distance + weights.edge + weights.completeness + weights.proximity;
  if (Math.abs(total - 1) > 1e-9) {
    pushIssue(
      issues,
      'detector/weights/sum',
      `Scoring weights sum to ${total}; scores will not be comparable with the default blend.`,
      path,
      'warning',
    );
  }
  return weights;
};

const normaliseHough = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): HoughParameters => {
  const section = readSection(value, issues, path);
  const maxCenters = readNumber(
    section,
    'maxCenters',
    DEFAULT_HOUGH_PARAMETERS.maxCenters,
    'positive',
    issues,
    path,
  );
  const radiusWindow = readNumber(
    section,
    'radiusWindow',
    DEFAULT_HOUGH_PARAMETERS.radiusWindow,
    'nonNegative',
    issues,
    path,
  );
  if (!Number.isInteger(maxCenters) || !Number.isInteger(radiusWindow)) {
    pushIssue(
      issues,
      'detector/hough/integer',
      'maxCenters and radiusWindow are rounded down to integers',
      path,
      'warning',
    );
  }
  return {
    gradientThreshold: readNumber(
      section,
      'gradientThreshold',
      DEFAULT_HOUGH_PARAMETERS.gradientThreshold,
      'positive',
      issues,
      path,
    ),
    accumulatorThreshold: readNumber(
      section,
      'accumulatorThreshold',
      DEFAULT_HOUGH_PARAMETERS.accumulatorThreshold,
      'nonNegative',
      issues,
      path,
    ),
    maxCenters: Math.max(1, Math.floor(maxCenters)),
    radiusWindow: Math.floor(radiusWindow),
  };
};

const normaliseDetector = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): ProfileDetectorSettings => {
  const section = readSection(value, issues, path);
  return {
    weights: normaliseWeights(section.weights, issues, [...path, 'weights']),
    hough: normaliseHough(section.hough, issues, [...path, 'hough']),
  };
};

const normaliseCalibration = (
  value: unknown,
  issues: ProfileValidationIssue[],
  path: readonly (string | number)[],
): ProfileCalibration => {
  const section = readSection(value, issues, path);
  if (section.lengthPerPixel === undefined) {
    return {};
  }
  const lengthPerPixel = readNumber(section, 'lengthPerPixel', Number.NaN, 'positive', issues, path);
  return Number.isFinite(lengthPerPixel) ? { lengthPerPixel } : {};
};

export class ProfileValidationError extends Error {
  constructor(
    message: string,
    readonly issues: ProfileValidationIssue[],
  ) {
    super(message);
    this.name = 'ProfileValidationError';
  }
}

export const createDefaultProfile = (name = 'Default'): InstrumentProfile => ({
  schemaVersion: PROFILE_SCHEMA_VERSION,
  name,
  instrument: { ...DEFAULT_INSTRUMENT },
  physics: { ...DEFAULT_PHYSICS },
  detector: {
    weights: { ...DEFAULT_SCORING_WEIGHTS },
    hough: { ...DEFAULT_HOUGH_PARAMETERS },
  },
  calibration: {},
});

export function validateProfile(payload: unknown): ProfileValidationResult {
  const issues: ProfileValidationIssue[] = [];

  if (!isRecord(payload)) {
    pushIssue(issues, 'profile/type', 'Profile root must be an object', toPath());
    throw new ProfileValidationError('Profile root must be an object', issues);
  }

  const schemaVersion = asString(payload.schemaVersion);
  if (!schemaVersion) {
    pushIssue(
      issues,
      'profile/schemaVersion',
      `Profile has no schemaVersion; assuming ${PROFILE_SCHEMA_VERSION}`,
      toPath('schemaVersion'),
      'warning',
    );
  }

  const name = asString(payload.name);
  if (payload.name !== undefined && name === null) {
    pushIssue(issues, 'profile/name', 'Profile name must be a string', toPath('name'));
  }

  for (const key of Object.keys(payload)) {
    if (!ROOT_KEYS.has(key)) {
      pushIssue(issues, 'profile/unknown-key', `Unknown profile key "${key}"`, toPath(key), 'warning');
    }
  }

  const profile: InstrumentProfile = {
    schemaVersion: schemaVersion ?? PROFILE_SCHEMA_VERSION,
    name: name ?? 'Untitled',
    instrument: normaliseInstrument(payload.instrument, issues, toPath('instrument')),
    physics: normalisePhysics(payload.physics, issues, toPath('physics')),
    detector: normaliseDetector(payload.detector, issues, toPath('detector')),
    calibration: normaliseCalibration(payload.calibration, issues, toPath('calibration')),
  };

  const hasFatalIssues = issues.some((issue) => issue.severity === 'error');
  if (hasFatalIssues) {
    throw new ProfileValidationError('Profile validation failed', issues);
  }

  return { profile, issues };
}
