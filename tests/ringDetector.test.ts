import test from 'node:test';
import assert from 'node:assert/strict';

import { InvalidParameterError } from '../src/errors.js';
import { generateCandidateCenters } from '../src/detection/candidates.js';
import type { CircleDetector } from '../src/detection/houghCircles.js';
import { detectRing, type HypothesisEvent } from '../src/detection/ringDetector.js';
import { enhance } from '../src/pipeline/enhance.js';
import { makeConstantField, makeRingField, makeRingImage } from './helpers/rings.js';

const ringShape = { width: 100, height: 100, cx: 50, cy: 50, radius: 20 };

test('candidate centers walk the stride-2 grid row by row', () => {
  assert.deepEqual(generateCandidateCenters(10.4, 20.6, 0), [{ x: 10, y: 21 }]);
  assert.deepEqual(generateCandidateCenters(10.4, 20.6, 1), [
    { x: 8, y: 19 },
    { x: 10, y: 19 },
    { x: 12, y: 19 },
    { x: 8, y: 21 },
    { x: 10, y: 21 },
    { x: 12, y: 21 },
    { x: 8, y: 23 },
    { x: 10, y: 23 },
    { x: 12, y: 23 },
  ]);
  assert.equal(generateCandidateCenters(0, 0, 3).length, 49);
});

test('synthetic ring is recovered within one pixel', () => {
  const field = makeRingField(ringShape);
  const result = detectRing(field, 50, 50, 15, 25, 0);
  assert.equal(result.kind, 'found');
  if (result.kind !== 'found') return;
  assert.ok(Math.abs(result.ring.x - 50) <= 1, `x=${result.ring.x}`);
  assert.ok(Math.abs(result.ring.y - 50) <= 1, `y=${result.ring.y}`);
  assert.ok(Math.abs(result.ring.r - 20) <= 1, `r=${result.ring.r}`);
  assert.ok(result.ring.r >= 15 && result.ring.r <= 25);
  assert.equal(result.candidates, 1);
});

test('ring survives enhancement of an RGBA photograph', () => {
  const field = enhance(makeRingImage(ringShape));
  const result = detectRing(field, 51, 49, 15, 25, 0);
  assert.equal(result.kind, 'found');
  if (result.kind !== 'found') return;
  assert.ok(Math.abs(result.ring.x - 50) <= 1, `x=${result.ring.x}`);
  assert.ok(Math.abs(result.ring.y - 50) <= 1, `y=${result.ring.y}`);
  assert.ok(Math.abs(result.ring.r - 20) <= 1, `r=${result.ring.r}`);
  assert.equal(result.candidates, 1);
});

const sweepCases = [10, 20, 30, 40].flatMap((radius) =>
  [5, 8].flatMap((margin) =>
    [0, 2].map((halfWindow) => ({
      radius,
      rLow: radius - margin,
      rHigh: radius + margin,
      halfWindow,
    })),
  ),
);

const assertSweep = (source: 'raw' | 'enhanced') => {
  for (const { radius, rLow, rHigh, halfWindow } of sweepCases) {
    const shape = { width: 120, height: 120, cx: 60, cy: 60, radius };
    const field = source === 'raw' ? makeRingField(shape) : enhance(makeRingImage(shape));
    const label = `${source} r=${radius} band=[${rLow}, ${rHigh}] halfWindow=${halfWindow}`;
    const result = detectRing(field, 60, 60, rLow, rHigh, halfWindow);
    if (result.kind !== 'found') throw new Error(`${label}: no ring`);
    const { x, y, r } = result.ring;
    assert.ok(Math.abs(x - 60) <= 1, `${label}: x=${x}`);
    assert.ok(Math.abs(y - 60) <= 1, `${label}: y=${y}`);
    assert.ok(Math.abs(r - radius) <= 1, `${label}: r=${r}`);
  }
};

test('rings of every size are located within one pixel on raw fields', () => {
  assertSweep('raw');
});

test('rings of every size are located within one pixel after enhancement', () => {
  assertSweep('enhanced');
});

test('blank field reports notFound', () => {
  const result = detectRing(makeConstantField(64, 64, 0), 32, 32, 5, 20, 2);
  assert.deepEqual(result, { kind: 'notFound', candidates: 25, hypotheses: 0 });
});

test('detection is deterministic across runs', () => {
  const field = makeRingField(ringShape);
  const first = detectRing(field, 49, 51, 15, 25, 2);
  const second = detectRing(field, 49, 51, 15, 25, 2);
  assert.deepEqual(second, first);
});

test('invalid search bands are rejected', () => {
  const field = makeConstantField(32, 32, 0);
  assert.throws(() => detectRing(field, 16, 16, 10, 5, 0), InvalidParameterError);
  assert.throws(() => detectRing(field, 16, 16, 8, 8, 0), {
    message: '[detect] rLow (8) must be smaller than rHigh (8)',
  });
  assert.throws(() => detectRing(field, 16, 16, -1, 5, 0), {
    message: '[detect] rLow must be non-negative (received -1)',
  });
  assert.throws(() => detectRing(field, 16, 16, 2, 5, 1.5), {
    code: 'invalid-parameter',
  });
  assert.throws(() => detectRing(field, Number.NaN, 16, 2, 5, 0), {
    message: '[detect] x0 must be a finite number (received NaN)',
  });
});

test('a circle seen from several candidates keeps the latest score', () => {
  const fixedCircle: CircleDetector = () => [{ x: 50, y: 50, r: 20, votes: 40 }];
  const events: HypothesisEvent[] = [];
  const result = detectRing(makeConstantField(100, 100, 0), 50, 50, 15, 25, 1, {
    circleDetector: fixedCircle,
    onHypothesis: (event) => events.push(event),
  });

  assert.equal(events.length, 9);
  assert.deepEqual(
    events.map((event) => event.replaced),
    [false, true, true, true, true, true, true, true, true],
  );
  assert.equal(events[0].key, '50:50:20');

  assert.equal(result.kind, 'found');
  if (result.kind !== 'found') return;
  assert.equal(result.hypotheses, 1);
  assert.deepEqual(result.ring.signals, {
    distance: 1,
    edge: 0,
    completeness: 0,
    proximity: 1 / (1 + Math.hypot(2, 2)),
  });
  assert.equal(
    result.ring.score,
    0.2 * 1 + 0.5 * 0 + 0.2 * 0 + 0.1 * (1 / (1 + Math.hypot(2, 2))),
  );
});

test('equal scores resolve to the first circle inserted', () => {
  const twoCircles: CircleDetector = () => [
    { x: 50, y: 40, r: 10, votes: 20 },
    { x: 40, y: 50, r: 10, votes: 20 },
  ];
  const result = detectRing(makeConstantField(100, 100, 0), 50, 50, 5, 15, 0, {
    circleDetector: twoCircles,
  });
  assert.equal(result.kind, 'found');
  if (result.kind !== 'found') return;
  assert.equal(result.ring.x, 50);
  assert.equal(result.ring.y, 40);
  assert.equal(result.hypotheses, 2);
});

test('custom weights change the winning hypothesis', () => {
  const field = makeRingField(ringShape);
  const nearGuess: CircleDetector = ({ rLow }) => [
    { x: 30, y: 30, r: rLow, votes: 20 },
    { x: 50, y: 50, r: 20, votes: 20 },
  ];
  const distanceOnly = detectRing(field, 30, 30, 15, 25, 0, {
    circleDetector: nearGuess,
    weights: { distance: 1, edge: 0, completeness: 0, proximity: 0 },
  });
  const edgeOnly = detectRing(field, 30, 30, 15, 25, 0, {
    circleDetector: nearGuess,
    weights: { distance: 0, edge: 1, completeness: 0, proximity: 0 },
  });
  assert.equal(distanceOnly.kind === 'found' && distanceOnly.ring.x, 30);
  assert.equal(edgeOnly.kind === 'found' && edgeOnly.ring.x, 50);
});
