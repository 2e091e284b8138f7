import test from 'node:test';
import assert from 'node:assert/strict';

import { houghGradientCircles, DEFAULT_HOUGH_PARAMETERS } from '../src/detection/houghCircles.js';
import { maskAnnulus } from '../src/detection/annulusMask.js';
import {
  blendSignals,
  computeSignals,
  DEFAULT_SCORING_WEIGHTS,
  samplePerimeter,
} from '../src/detection/scoring.js';
import { makeConstantField, makeRingField } from './helpers/rings.js';

test('perimeter sampling takes one sample per pixel of arc', () => {
  const stats = samplePerimeter(makeConstantField(30, 30, 100), 10, 10, 5);
  assert.deepEqual(stats, { samples: 32, onField: 32, nonZero: 32, sum: 3200 });
});

test('perimeter samples outside the field are not counted', () => {
  const stats = samplePerimeter(makeConstantField(30, 30, 100), 0, 15, 5);
  assert.equal(stats.samples, 32);
  assert.ok(stats.onField < 32);
  assert.equal(stats.sum, stats.onField * 100);
});

test('signals combine position and perimeter evidence', () => {
  const field = makeConstantField(30, 30, 100);
  const signals = computeSignals(field, { x: 10, y: 10, r: 5 }, { x: 10, y: 10 }, { x: 13, y: 14 });
  assert.deepEqual(signals, {
    distance: 1,
    edge: 100 / 255,
    completeness: 1,
    proximity: 1 / 6,
  });
  assert.equal(
    blendSignals(signals, DEFAULT_SCORING_WEIGHTS),
    0.2 * 1 + 0.5 * (100 / 255) + 0.2 * 1 + 0.1 * (1 / 6),
  );
});

test('annulus mask keeps only the band around the center', () => {
  const field = makeConstantField(40, 40, 200);
  const masked = maskAnnulus(field, 20, 20, 5, 10);
  if (!masked) throw new Error('annulus missed the field');
  assert.deepEqual(masked.region, { left: 10, top: 10, right: 30, bottom: 30 });
  assert.equal(masked.field.data[20 * 40 + 20], 0);
  assert.equal(masked.field.data[20 * 40 + 27], 200);
  assert.equal(masked.field.data[20 * 40 + 31], 0);
  assert.equal(maskAnnulus(field, -50, -50, 5, 10), null);
});

test('hough circles stay inside the radius band', () => {
  const field = makeRingField({ width: 80, height: 80, cx: 40, cy: 40, radius: 18 });
  const masked = maskAnnulus(field, 40, 40, 12, 24);
  if (!masked) throw new Error('annulus missed the field');
  const circles = houghGradientCircles({
    field: masked.field,
    region: masked.region,
    rLow: 12,
    rHigh: 24,
    minCenterDistance: 3,
    params: DEFAULT_HOUGH_PARAMETERS,
  });
  assert.ok(circles.length > 0);
  for (const circle of circles) {
    assert.ok(circle.r >= 12 && circle.r <= 24, `r=${circle.r}`);
    assert.ok(circle.votes >= DEFAULT_HOUGH_PARAMETERS.accumulatorThreshold);
  }
  assert.ok(circles.some((circle) => Math.abs(circle.x - 40) <= 1 && Math.abs(circle.y - 40) <= 1));
});

test('hough finds nothing without edges', () => {
  const field = makeConstantField(40, 40, 0);
  const circles = houghGradientCircles({
    field,
    region: { left: 0, top: 0, right: 39, bottom: 39 },
    rLow: 5,
    rHigh: 10,
    minCenterDistance: 2,
    params: DEFAULT_HOUGH_PARAMETERS,
  });
  assert.deepEqual(circles, []);
});

test('strongest hough center sits on the center of a clean ring', () => {
  for (const ring of [
    { width: 80, height: 80, cx: 40, cy: 40, radius: 18, rLow: 12, rHigh: 24 },
    { width: 120, height: 120, cx: 60, cy: 60, radius: 40, rLow: 32, rHigh: 48 },
  ]) {
    const masked = maskAnnulus(makeRingField(ring), ring.cx, ring.cy, ring.rLow, ring.rHigh);
    if (!masked) throw new Error('annulus missed the field');
    const [strongest] = houghGradientCircles({
      field: masked.field,
      region: masked.region,
      rLow: ring.rLow,
      rHigh: ring.rHigh,
      minCenterDistance: ring.rLow / 4,
      params: DEFAULT_HOUGH_PARAMETERS,
    });
    if (!strongest) throw new Error(`no circle for radius ${ring.radius}`);
    assert.deepEqual({ x: strongest.x, y: strongest.y }, { x: ring.cx, y: ring.cy });
  }
});
