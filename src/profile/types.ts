import type { HoughParameters } from '../detection/houghCircles.js';
import type { ScoringWeights } from '../detection/scoring.js';
import type { InstrumentConstants, PhysicalConstants } from '../measurement/constants.js';

export interface ProfileDetectorSettings {
  readonly weights: ScoringWeights;
  readonly hough: HoughParameters;
}

export interface ProfileCalibration {
  /** Physical length per pixel, in the focal-length unit. */
  readonly lengthPerPixel?: number;
}

export interface InstrumentProfile {
  readonly schemaVersion: string;
  readonly name: string;
  readonly instrument: InstrumentConstants;
  readonly physics: PhysicalConstants;
  readonly detector: ProfileDetectorSettings;
  readonly calibration: ProfileCalibration;
}

export interface ProfileValidationIssue {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: 'error' | 'warning';
}

export interface ProfileValidationResult {
  readonly profile: InstrumentProfile;
  readonly issues: ProfileValidationIssue[];
}
