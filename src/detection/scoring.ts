import { sampleField, type IntensityField } from '../fields/contracts.js';

export type ScoringWeights = {
  distance: number;
  edge: number;
  completeness: number;
  proximity: number;
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  distance: 0.2,
  edge: 0.5,
  completeness: 0.2,
  proximity: 0.1,
};

export type ScoreSignals = {
  distance: number;
  edge: number;
  completeness: number;
  proximity: number;
};

export type PerimeterStats = {
  samples: number;
  onField: number;
  nonZero: number;
  sum: number;
};

type Point = { x: number; y: number };

const TAU = Math.PI * 2;

const distanceBetween = (a: Point, b: Point) => Math.hypot(a.x - b.x, a.y - b.y);

/** Walks the 1-px perimeter with roughly one sample per pixel of arc. */
export const samplePerimeter = (
  field: IntensityField,
  cx: number,
  cy: number,
  radius: number,
): PerimeterStats => {
  const samples = Math.max(1, Math.ceil(TAU * radius));
  let onField = 0;
  let nonZero = 0;
  let sum = 0;
  for (let k = 0; k < samples; k++) {
    const theta = (TAU * k) / samples;
    const value = sampleField(
      field,
      Math.round(cx + radius * Math.cos(theta)),
      Math.round(cy + radius * Math.sin(theta)),
    );
    if (value === null) continue;
    onField++;
    sum += value;
    if (value !== 0) nonZero++;
  }
  return { samples, onField, nonZero, sum };
};

export const computeSignals = (
  field: IntensityField,
  circle: { x: number; y: number; r: number },
  guess: Point,
  candidate: Point,
): ScoreSignals => {
  const perimeter = samplePerimeter(field, circle.x, circle.y, circle.r);
  return {
    distance: 1 / (1 + 0.1 * distanceBetween(circle, guess)),
    edge: perimeter.onField > 0 ? perimeter.sum / perimeter.onField / field.scale : 0,
    completeness: Math.min(1, perimeter.nonZero / Math.max(1, TAU * circle.r)),
    proximity: 1 / (1 + distanceBetween(circle, candidate)),
  };
};

export const blendSignals = (signals: ScoreSignals, weights: ScoringWeights): number =>
  weights.distance * signals.distance +
  weights.edge * signals.edge +
  weights.completeness * signals.completeness +
  weights.proximity * signals.proximity;
