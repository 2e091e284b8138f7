import test from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_REDUCTION_CONSTANTS } from '../src/measurement/constants.js';
import {
  MeasurementReducer,
  reduceMeasurement,
  refractionAngle,
  type ZeemanMeasurement,
} from '../src/measurement/zeeman.js';

const wavelength = 6.438e-7;

test('records missing a radius are returned untouched', () => {
  const record: ZeemanMeasurement = { B: 0.5, wavelength, radiusCenter: 5, radiusInner: 4.9 };
  assert.equal(reduceMeasurement(record), record);
});

test('inner and outer energy shifts have opposite signs', () => {
  const reduced = reduceMeasurement({
    B: 0.5,
    wavelength,
    radiusCenter: 10,
    radiusInner: 8,
    radiusOuter: 12,
  });
  const derived = reduced.derived;
  if (!derived) throw new Error('expected derived quantities');
  assert.ok(derived.deltaLambdaInner < 0);
  assert.ok(derived.deltaLambdaOuter > 0);
  assert.ok(derived.deltaEInner < 0);
  assert.ok(derived.deltaEOuter > 0);
  assert.equal(
    derived.deltaEAverage,
    (Math.abs(derived.deltaEInner) + Math.abs(derived.deltaEOuter)) / 2,
  );
  assert.equal(derived.alphaCenter, Math.atan(10 / 150));
});

test('a ring at the center radius has no shift', () => {
  const reduced = reduceMeasurement({
    B: 0.3,
    wavelength,
    radiusCenter: 6,
    radiusInner: 6,
    radiusOuter: 6.2,
  });
  assert.equal(reduced.derived?.deltaLambdaInner, 0);
  assert.equal(reduced.derived?.deltaEInner, 0);
});

test('reduction is idempotent', () => {
  const record: ZeemanMeasurement = {
    B: 0.7,
    wavelength,
    radiusCenter: 5,
    radiusInner: 4.8,
    radiusOuter: 5.2,
  };
  const once = reduceMeasurement(record);
  assert.deepEqual(reduceMeasurement(once), once);
});

test('rays beyond the optical acceptance reduce to NaN', () => {
  assert.ok(Number.isNaN(refractionAngle(Math.PI / 3, 0.5)));
  const reduced = reduceMeasurement(
    { B: 0.4, wavelength, radiusCenter: 10, radiusInner: 9, radiusOuter: 100 },
    { ...DEFAULT_REDUCTION_CONSTANTS, refractiveIndex: 0.5 },
  );
  assert.ok(Number.isNaN(reduced.derived?.betaOuter));
  assert.ok(Number.isNaN(reduced.derived?.deltaEOuter));
  assert.ok(Number.isFinite(reduced.derived?.deltaEInner));
});

test('reducer applies its own constants to every record', () => {
  const reducer = new MeasurementReducer({ ...DEFAULT_REDUCTION_CONSTANTS, focalLength: 100 });
  const records: ZeemanMeasurement[] = [
    { B: 0.1, wavelength, radiusCenter: 5, radiusInner: 4.9, radiusOuter: 5.1 },
    { B: 0.2, wavelength },
  ];
  const reduced = reducer.reduceAll(records);
  assert.equal(reduced.length, 2);
  assert.equal(reduced[0].derived?.alphaCenter, Math.atan(5 / 100));
  assert.equal(reduced[1], records[1]);
  assert.equal(reducer.getConstants().focalLength, 100);
});
