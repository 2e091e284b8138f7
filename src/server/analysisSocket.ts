import { WebSocketServer, type RawData } from 'ws';

import type { CircleDetector } from '../detection/houghCircles.js';
import { detectRing } from '../detection/ringDetector.js';
import { InvalidImageError, InvalidParameterError, isRingLabError } from '../errors.js';
import { createIntensityField } from '../fields/contracts.js';
import { calibrateRingMeasurement, type RingMeasurement } from '../measurement/calibration.js';
import { reduceMeasurement } from '../measurement/zeeman.js';
import { createDefaultProfile } from '../profile/schema.js';
import type { InstrumentProfile } from '../profile/types.js';
import { analyzeSeries, parseSeries, physicalRadius } from '../runtime/services.js';

export type AnalysisContext = {
  profile: InstrumentProfile;
  /** Replaces the Hough pass for detect requests. */
  circleDetector?: CircleDetector;
};

export type AnalysisReply =
  | ({ id: string | number | null; status: 'ok' } & Record<string, unknown>)
  | { id: string | number | null; status: 'error'; code: string; message: string };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readId = (message: Record<string, unknown>): string | number | null =>
  typeof message.id === 'string' || typeof message.id === 'number' ? message.id : null;

const errorReply = (
  id: string | number | null,
  code: string,
  message: string,
): AnalysisReply => ({ id, status: 'error', code, message });

const readNumberField = (message: Record<string, unknown>, key: string): number => {
  const value = message[key];
  return typeof value === 'number' ? value : Number.NaN;
};

const readField = (value: unknown) => {
  if (!isRecord(value)) {
    throw new InvalidImageError('[analysis] detect requires a field object');
  }
  const { width, height, data } = value;
  if (
    typeof width !== 'number' ||
    typeof height !== 'number' ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new InvalidImageError('[analysis] field width and height must be positive integers');
  }
  if (!Array.isArray(data) || data.length !== width * height) {
    throw new InvalidImageError(
      `[analysis] field data must hold ${width * height} intensities`,
      { width, height },
    );
  }
  const samples = new Float32Array(data.length);
  data.forEach((entry: unknown, index) => {
    if (typeof entry !== 'number' || !Number.isFinite(entry)) {
      throw new InvalidImageError(`[analysis] field sample ${index} is not a finite number`, {
        index,
      });
    }
    samples[index] = entry;
  });
  return createIntensityField(width, height, samples);
};

const RING_SLOTS = ['radiusInner', 'radiusMiddle', 'radiusOuter'] as const;

const readRingMeasurement = (value: unknown): RingMeasurement => {
  if (!isRecord(value)) {
    throw new InvalidParameterError('[analysis] calibrate requires a ring object');
  }
  const ring: { radiusInner?: number; radiusMiddle?: number; radiusOuter?: number } = {};
  for (const slot of RING_SLOTS) {
    const radius = value[slot];
    if (radius === undefined || radius === null) continue;
    if (typeof radius !== 'number' || !Number.isFinite(radius) || radius < 0) {
      throw new InvalidParameterError(`[analysis] ring ${slot} must be a non-negative number`, {
        slot,
      });
    }
    ring[slot] = radius;
  }
  return ring;
};

const dispatch = (
  kind: unknown,
  message: Record<string, unknown>,
  context: AnalysisContext,
): Record<string, unknown> | null => {
  const { profile } = context;
  switch (kind) {
    case 'reduce': {
      const [record] = parseSeries([message.record]);
      return { record: reduceMeasurement(record, { ...profile.physics, ...profile.instrument }) };
    }
    case 'calibrate': {
      const lengthPerPixel =
        message.lengthPerPixel === undefined
          ? profile.calibration.lengthPerPixel
          : readNumberField(message, 'lengthPerPixel');
      if (lengthPerPixel === undefined) {
        throw new InvalidParameterError(
          '[analysis] calibrate needs lengthPerPixel in the message or the profile',
        );
      }
      const measurement = calibrateRingMeasurement(readRingMeasurement(message.ring), {
        B: readNumberField(message, 'B'),
        wavelength: readNumberField(message, 'wavelength'),
        lengthPerPixel,
      });
      const [record] = parseSeries([measurement]);
      return { record: reduceMeasurement(record, { ...profile.physics, ...profile.instrument }) };
    }
    case 'fit': {
      const report = analyzeSeries(parseSeries(message.records), profile);
      return {
        result: report.result,
        usable: report.usable,
        skipped: report.skipped,
        digest: report.digest,
      };
    }
    case 'detect': {
      const field = readField(message.field);
      const detection = detectRing(
        field,
        readNumberField(message, 'x0'),
        readNumberField(message, 'y0'),
        readNumberField(message, 'rLow'),
        readNumberField(message, 'rHigh'),
        readNumberField(message, 'halfWindow'),
        {
          weights: profile.detector.weights,
          hough: profile.detector.hough,
          circleDetector: context.circleDetector,
        },
      );
      const ring = detection.kind === 'found' ? detection.ring : null;
      return {
        ring,
        physicalRadius: physicalRadius(ring, profile),
        candidates: detection.candidates,
        hypotheses: detection.hypotheses,
      };
    }
    default:
      return null;
  }
};

/**
 * Answers one analysis request. Never throws: library errors keep their code,
 * anything else is logged and answered as `internal`.
 */
export const handleAnalysisMessage = (
  raw: string,
  context: AnalysisContext = { profile: createDefaultProfile() },
): AnalysisReply => {
  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch {
    return errorReply(null, 'invalid-json', '[analysis] message is not valid JSON');
  }
  if (!isRecord(message)) {
    return errorReply(null, 'invalid-message', '[analysis] message must be an object');
  }
  const id = readId(message);
  try {
    const payload = dispatch(message.kind, message, context);
    if (payload === null) {
      return errorReply(id, 'unknown-kind', `[analysis] unknown message kind "${String(message.kind)}"`);
    }
    return { id, status: 'ok', ...payload };
  } catch (error) {
    if (isRingLabError(error)) {
      return errorReply(id, error.code, error.message);
    }
    console.error('[analysis] request failed', error);
    return errorReply(id, 'internal', error instanceof Error ? error.message : String(error));
  }
};

const decodeRawData = (data: RawData): string => {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
};

export type AnalysisServerOptions = {
  port: number;
  profile: InstrumentProfile;
};

export const startAnalysisServer = (options: AnalysisServerOptions): WebSocketServer => {
  const server = new WebSocketServer({ port: options.port });
  const context: AnalysisContext = { profile: options.profile };

  server.on('connection', (socket) => {
    console.log('[analysis] client connected');
    socket.on('message', (data) => {
      const reply = handleAnalysisMessage(decodeRawData(data), context);
      if (reply.status === 'error') {
        console.warn(`[analysis] ${reply.code}: ${reply.message}`);
      }
      socket.send(JSON.stringify(reply));
    });
    socket.on('close', () => {
      console.log('[analysis] client disconnected');
    });
  });

  server.on('listening', () => {
    console.log(`[analysis] listening on ws://localhost:${options.port} (profile "${options.profile.name}")`);
  });

  return server;
};
