import {
  assertRawImage,
  createIntensityField,
  INTENSITY_SCALE,
  type IntensityField,
  type RawImage,
} from '../fields/contracts.js';
import { DEFAULT_CLAHE_OPTIONS, equalizeAdaptive, reflect101, type ClaheOptions } from './clahe.js';
import { toLuminance } from './colorSpaces.js';

/** Binomial approximation of a sigma≈1.1 Gaussian, normalized to 1. */
const GAUSSIAN_5 = [1 / 16, 4 / 16, 6 / 16, 4 / 16, 1 / 16] as const;
const GAUSSIAN_RADIUS = 2;

export type EnhanceOptions = {
  clahe?: ClaheOptions;
};

const clampLevel = (value: number) => {
  const level = Math.round(value);
  return level < 0 ? 0 : level > INTENSITY_SCALE ? INTENSITY_SCALE : level;
};

export const gaussianBlur5 = (levels: Float32Array, width: number, height: number): Float32Array => {
  const temp = new Float32Array(width * height);
  const out = new Float32Array(width * height);

  for (let y = 0; y < height; y++) {
    const row = y * width;
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let k = -GAUSSIAN_RADIUS; k <= GAUSSIAN_RADIUS; k++) {
        sum += levels[row + reflect101(x + k, width)] * GAUSSIAN_5[k + GAUSSIAN_RADIUS];
      }
      temp[row + x] = sum;
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let k = -GAUSSIAN_RADIUS; k <= GAUSSIAN_RADIUS; k++) {
        sum += temp[reflect101(y + k, height) * width + x] * GAUSSIAN_5[k + GAUSSIAN_RADIUS];
      }
      out[y * width + x] = clampLevel(sum);
    }
  }
  return out;
};

/**
 * Turns a raw 1/3/4-channel frame into the detector's intensity field:
 * luminance, 5x5 Gaussian smoothing, then tiled contrast-limited equalization.
 *
 * @throws InvalidImageError for empty buffers, bad dimensions or channel counts.
 */
export const enhance = (
  image: RawImage | null | undefined,
  options: EnhanceOptions = {},
): IntensityField => {
  const { width, height, channels, data } = assertRawImage(image);
  const texels = width * height;
  const luminance = toLuminance(data, texels, channels);
  const smoothed = gaussianBlur5(luminance, width, height);
  const equalized = equalizeAdaptive(smoothed, width, height, options.clahe ?? DEFAULT_CLAHE_OPTIONS);
  return createIntensityField(width, height, equalized, INTENSITY_SCALE);
};
