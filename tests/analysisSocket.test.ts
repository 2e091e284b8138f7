import test from 'node:test';
import assert from 'node:assert/strict';

import type { CircleDetector } from '../src/detection/houghCircles.js';
import { createDefaultProfile } from '../src/profile/schema.js';
import { handleAnalysisMessage, type AnalysisReply } from '../src/server/analysisSocket.js';

const okReply = (reply: AnalysisReply) => {
  if (reply.status !== 'ok') {
    throw new Error(`expected ok reply, received ${reply.code}: ${reply.message}`);
  }
  return reply;
};

const send = (message: unknown) => handleAnalysisMessage(JSON.stringify(message));

test('unparseable messages are answered with an error', () => {
  assert.deepEqual(handleAnalysisMessage('{'), {
    id: null,
    status: 'error',
    code: 'invalid-json',
    message: '[analysis] message is not valid JSON',
  });
  assert.deepEqual(send([1]), {
    id: null,
    status: 'error',
    code: 'invalid-message',
    message: '[analysis] message must be an object',
  });
});

test('unknown kinds keep the request id', () => {
  assert.deepEqual(send({ id: 7, kind: 'render' }), {
    id: 7,
    status: 'error',
    code: 'unknown-kind',
    message: '[analysis] unknown message kind "render"',
  });
});

test('reduce requests return the reduced record', () => {
  const reply = okReply(
    send({
      id: 'r1',
      kind: 'reduce',
      record: { B: 0.5, wavelength: 6.438e-7, radiusCenter: 5, radiusInner: 4.9, radiusOuter: 5.1 },
    }),
  );
  assert.equal(reply.id, 'r1');
  const record = reply.record;
  if (typeof record !== 'object' || record === null || !('derived' in record)) {
    throw new Error('expected a reduced record');
  }
  assert.equal(typeof record.derived, 'object');
});

test('fit requests report usable and skipped counts', () => {
  const reply = okReply(
    send({
      id: 2,
      kind: 'fit',
      records: [
        { B: 0.2, wavelength: 6.438e-7, radiusCenter: 5, radiusInner: 4.96, radiusOuter: 5.04 },
        { B: 0.4, wavelength: 6.438e-7, radiusCenter: 5, radiusInner: 4.92, radiusOuter: 5.08 },
        { B: 0.6, wavelength: 6.438e-7 },
      ],
    }),
  );
  assert.equal(reply.usable, 2);
  assert.equal(reply.skipped, 1);
  assert.equal(typeof reply.digest, 'string');
});

test('fit requests with malformed records fail with the series code', () => {
  assert.deepEqual(send({ id: 3, kind: 'fit', records: [{ B: 0.2 }] }), {
    id: 3,
    status: 'error',
    code: 'invalid-series',
    message: '[series] entry 0: wavelength must be a positive number',
  });
});

test('detect requests run the ring detector on the supplied field', () => {
  const reply = okReply(
    send({
      id: 4,
      kind: 'detect',
      field: { width: 20, height: 20, data: Array.from({ length: 400 }, () => 0) },
      x0: 10,
      y0: 10,
      rLow: 3,
      rHigh: 6,
      halfWindow: 0,
    }),
  );
  assert.equal(reply.ring, null);
  assert.equal(reply.candidates, 1);
  assert.equal(reply.hypotheses, 0);
});

test('detect requests validate the field and the band', () => {
  const shortField = send({
    id: 5,
    kind: 'detect',
    field: { width: 4, height: 4, data: [0, 0] },
    x0: 2,
    y0: 2,
    rLow: 1,
    rHigh: 2,
    halfWindow: 0,
  });
  assert.equal(shortField.status, 'error');
  assert.equal(shortField.status === 'error' && shortField.code, 'invalid-image');

  const invertedBand = send({
    id: 6,
    kind: 'detect',
    field: { width: 4, height: 4, data: Array.from({ length: 16 }, () => 0) },
    x0: 2,
    y0: 2,
    rLow: 3,
    rHigh: 1,
    halfWindow: 0,
  });
  assert.deepEqual(invertedBand, {
    id: 6,
    status: 'error',
    code: 'invalid-parameter',
    message: '[detect] rLow (3) must be smaller than rHigh (1)',
  });
});

test('calibrate requests scale pixel radii before reducing', () => {
  const reply = okReply(
    send({
      id: 8,
      kind: 'calibrate',
      B: 0.5,
      wavelength: 6.438e-7,
      lengthPerPixel: 0.5,
      ring: { radiusInner: 98, radiusMiddle: 100, radiusOuter: 102 },
    }),
  );
  const record = reply.record;
  if (typeof record !== 'object' || record === null || !('derived' in record)) {
    throw new Error('expected a reduced record');
  }
  assert.deepEqual(
    {
      radiusCenter: 'radiusCenter' in record && record.radiusCenter,
      radiusInner: 'radiusInner' in record && record.radiusInner,
      radiusOuter: 'radiusOuter' in record && record.radiusOuter,
    },
    { radiusCenter: 50, radiusInner: 49, radiusOuter: 51 },
  );
});

test('calibrate requests fall back to the profile pixel length', () => {
  const context = { profile: { ...createDefaultProfile(), calibration: { lengthPerPixel: 0.25 } } };
  const reply = okReply(
    handleAnalysisMessage(
      JSON.stringify({
        id: 9,
        kind: 'calibrate',
        B: 0.1,
        wavelength: 6.438e-7,
        ring: { radiusMiddle: 40 },
      }),
      context,
    ),
  );
  const record = reply.record;
  if (typeof record !== 'object' || record === null || !('radiusCenter' in record)) {
    throw new Error('expected a calibrated record');
  }
  assert.equal(record.radiusCenter, 10);
});

test('calibrate requests without any pixel length are rejected', () => {
  assert.deepEqual(send({ id: 10, kind: 'calibrate', B: 0.1, wavelength: 6.438e-7, ring: {} }), {
    id: 10,
    status: 'error',
    code: 'invalid-parameter',
    message: '[analysis] calibrate needs lengthPerPixel in the message or the profile',
  });
});

test('unexpected failures are answered as internal errors', (t) => {
  t.mock.method(console, 'error', () => {});
  const failing: CircleDetector = () => {
    throw new Error('detector offline');
  };
  const reply = handleAnalysisMessage(
    JSON.stringify({
      id: 11,
      kind: 'detect',
      field: { width: 20, height: 20, data: Array.from({ length: 400 }, () => 0) },
      x0: 10,
      y0: 10,
      rLow: 3,
      rHigh: 6,
      halfWindow: 0,
    }),
    { profile: createDefaultProfile(), circleDetector: failing },
  );
  assert.deepEqual(reply, { id: 11, status: 'error', code: 'internal', message: 'detector offline' });
});
