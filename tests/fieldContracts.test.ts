import test from 'node:test';
import assert from 'node:assert/strict';

import { InvalidImageError } from '../src/errors.js';
import {
  assertRawImage,
  createIntensityField,
  makeResolution,
  sampleField,
} from '../src/fields/contracts.js';

test('resolution counts texels', () => {
  assert.deepEqual(makeResolution(4, 3), { width: 4, height: 3, texels: 12 });
});

test('raw images are validated before use', () => {
  const valid = assertRawImage({ width: 2, height: 1, channels: 4, data: new Uint8Array(8) });
  assert.equal(valid.channels, 4);
  assert.throws(() => assertRawImage(undefined), InvalidImageError);
  assert.throws(
    () => assertRawImage({ width: 1.5, height: 2, channels: 1, data: new Uint8Array(3) }),
    { message: '[fields:raw] invalid dimensions 1.5x2', code: 'invalid-image' },
  );
});

test('intensity fields reject mismatched buffers', () => {
  assert.throws(() => createIntensityField(3, 3, new Float32Array(8)), {
    message: '[fields:intensity] data length 8 != expected 9 (createIntensityField)',
  });
  assert.throws(() => createIntensityField(1, 1, new Float32Array(1), 0), {
    message: '[fields:intensity] scale 0 must be positive (createIntensityField)',
  });
});

test('sampling outside the field yields null', () => {
  const field = createIntensityField(2, 2, Float32Array.from([1, 2, 3, 4]));
  assert.equal(sampleField(field, 1, 1), 4);
  assert.equal(sampleField(field, 0, 1), 3);
  assert.equal(sampleField(field, -1, 0), null);
  assert.equal(sampleField(field, 2, 0), null);
  assert.equal(Object.isFrozen(field), true);
});
