import { InvalidImageError } from '../errors.js';

export type FieldResolution = {
  width: number;
  height: number;
  texels: number;
};

export const makeResolution = (width: number, height: number): FieldResolution => ({
  width,
  height,
  texels: width * height,
});

export const SUPPORTED_CHANNEL_COUNTS = [1, 3, 4] as const;
export type ChannelCount = (typeof SUPPORTED_CHANNEL_COUNTS)[number];

/**
 * Raw camera frame as handed over by the acquisition side. Samples are
 * interleaved 8-bit values, `channels` per pixel.
 */
export type RawImage = {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array | Uint8ClampedArray | null;
};

/** Upper bound of the normalized intensity range. */
export const INTENSITY_SCALE = 255;

export type IntensityField = {
  readonly kind: 'intensity';
  readonly resolution: FieldResolution;
  readonly scale: number;
  readonly data: Float32Array;
};

export const isSupportedChannelCount = (value: number): value is ChannelCount =>
  SUPPORTED_CHANNEL_COUNTS.some((count) => count === value);

const assert = (condition: boolean, message: string): void => {
  if (!condition) {
    throw new Error(message);
  }
};

export const assertIntensityField = (field: IntensityField, source: string) => {
  const expected = field.resolution.texels;
  assert(
    field.data.length === expected,
    `[fields:intensity] data length ${field.data.length} != expected ${expected} (${source})`,
  );
  assert(
    field.scale > 0 && Number.isFinite(field.scale),
    `[fields:intensity] scale ${field.scale} must be positive (${source})`,
  );
};

export type ValidatedRawImage = {
  width: number;
  height: number;
  channels: ChannelCount;
  data: Uint8Array | Uint8ClampedArray;
};

export const assertRawImage = (image: RawImage | null | undefined): ValidatedRawImage => {
  if (!image || !image.data || image.data.length === 0) {
    throw new InvalidImageError('[fields:raw] image buffer is empty');
  }
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidImageError(`[fields:raw] invalid dimensions ${width}x${height}`, {
      width,
      height,
    });
  }
  if (!isSupportedChannelCount(channels)) {
    throw new InvalidImageError(
      `[fields:raw] unsupported channel count ${channels}; expected one of ${SUPPORTED_CHANNEL_COUNTS.join(', ')}`,
      { channels },
    );
  }
  const expected = width * height * channels;
  if (data.length !== expected) {
    throw new InvalidImageError(
      `[fields:raw] buffer length ${data.length} != expected ${expected} for ${width}x${height}x${channels}`,
      { length: data.length, expected },
    );
  }
  return { width, height, channels, data };
};

/**
 * Wraps an existing buffer as an intensity field without copying. Callers
 * hand over ownership; the detector never writes into it.
 */
export const createIntensityField = (
  width: number,
  height: number,
  data: Float32Array,
  scale = INTENSITY_SCALE,
): IntensityField => {
  const field: IntensityField = Object.freeze({
    kind: 'intensity' as const,
    resolution: makeResolution(width, height),
    scale,
    data,
  });
  assertIntensityField(field, 'createIntensityField');
  return field;
};

export const sampleField = (field: IntensityField, x: number, y: number): number | null => {
  const { width, height } = field.resolution;
  if (x < 0 || y < 0 || x >= width || y >= height) {
    return null;
  }
  return field.data[y * width + x];
};
