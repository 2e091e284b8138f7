import { createIntensityField, type IntensityField, type RawImage } from '../../src/fields/contracts.js';

export type RingShape = {
  width: number;
  height: number;
  cx: number;
  cy: number;
  radius: number;
  /** Half-thickness of the bright band, in pixels. */
  halfThickness?: number;
  level?: number;
};

const ringLevel = (ring: RingShape, x: number, y: number) => {
  const d = Math.hypot(x - ring.cx, y - ring.cy);
  return Math.abs(d - ring.radius) <= (ring.halfThickness ?? 1) ? (ring.level ?? 255) : 0;
};

export const makeRingField = (ring: RingShape): IntensityField => {
  const data = new Float32Array(ring.width * ring.height);
  for (let y = 0; y < ring.height; y++) {
    for (let x = 0; x < ring.width; x++) {
      data[y * ring.width + x] = ringLevel(ring, x, y);
    }
  }
  return createIntensityField(ring.width, ring.height, data);
};

export const makeRingImage = (ring: RingShape): RawImage => {
  const data = new Uint8Array(ring.width * ring.height * 4);
  for (let y = 0; y < ring.height; y++) {
    for (let x = 0; x < ring.width; x++) {
      const level = ringLevel(ring, x, y);
      const offset = (y * ring.width + x) * 4;
      data[offset] = level;
      data[offset + 1] = level;
      data[offset + 2] = level;
      data[offset + 3] = 255;
    }
  }
  return { width: ring.width, height: ring.height, channels: 4, data };
};

export const makeConstantField = (width: number, height: number, level: number): IntensityField =>
  createIntensityField(width, height, new Float32Array(width * height).fill(level));
