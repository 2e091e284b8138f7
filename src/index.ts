export * from './errors.js';
export {
  createIntensityField,
  makeResolution,
  sampleField,
  INTENSITY_SCALE,
  SUPPORTED_CHANNEL_COUNTS,
  type ChannelCount,
  type FieldResolution,
  type IntensityField,
  type RawImage,
} from './fields/contracts.js';
export { enhance, type EnhanceOptions } from './pipeline/enhance.js';
export { DEFAULT_CLAHE_OPTIONS, type ClaheOptions } from './pipeline/clahe.js';
export {
  detectRing,
  type HypothesisEvent,
  type RingDetectionResult,
  type RingDetectorOptions,
  type RingHypothesis,
} from './detection/ringDetector.js';
export {
  DEFAULT_HOUGH_PARAMETERS,
  houghGradientCircles,
  type CircleDetector,
  type DetectedCircle,
  type HoughParameters,
} from './detection/houghCircles.js';
export { radialProfile, refineRadius, type RadialProfile } from './detection/radiusRefinement.js';
export {
  DEFAULT_SCORING_WEIGHTS,
  type ScoreSignals,
  type ScoringWeights,
} from './detection/scoring.js';
export * from './measurement/constants.js';
export {
  MeasurementReducer,
  reduceMeasurement,
  type ReducedZeemanMeasurement,
  type ZeemanDerived,
  type ZeemanMeasurement,
} from './measurement/zeeman.js';
export {
  BohrMagnetonEstimator,
  estimateMagneton,
  toMagnetonTuple,
  type BohrMagnetonResult,
  type BohrMagnetonTuple,
} from './measurement/bohrMagneton.js';
export * from './measurement/calibration.js';
export * from './profile/types.js';
export { createDefaultProfile, ProfileValidationError, validateProfile } from './profile/schema.js';
export { loadProfileFromJson, loadProfileFromPath } from './profile/loader.js';
export { hashCanonicalJson, writeCanonicalJson } from './serialization/canonicalJson.js';
export {
  analyzeSeries,
  detectRingInImage,
  parseSeries,
  parseSeriesJson,
  physicalRadius,
  type SeriesReport,
} from './runtime/services.js';
export { handleAnalysisMessage, startAnalysisServer } from './server/analysisSocket.js';
