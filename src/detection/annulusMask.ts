import { createIntensityField, type IntensityField } from '../fields/contracts.js';

/** Inclusive pixel bounds. */
export type PixelRegion = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type MaskedField = {
  field: IntensityField;
  region: PixelRegion;
};

/**
 * Copies the annulus `rLow ≤ d ≤ rHigh` around (cx, cy) into an otherwise
 * zeroed field. Returns null when the annulus misses the field entirely.
 */
export const maskAnnulus = (
  field: IntensityField,
  cx: number,
  cy: number,
  rLow: number,
  rHigh: number,
): MaskedField | null => {
  const { width, height } = field.resolution;
  const left = Math.max(0, Math.floor(cx - rHigh));
  const right = Math.min(width - 1, Math.ceil(cx + rHigh));
  const top = Math.max(0, Math.floor(cy - rHigh));
  const bottom = Math.min(height - 1, Math.ceil(cy + rHigh));
  if (left > right || top > bottom) {
    return null;
  }

  const inner2 = rLow * rLow;
  const outer2 = rHigh * rHigh;
  const data = new Float32Array(width * height);
  for (let y = top; y <= bottom; y++) {
    const dy = y - cy;
    const row = y * width;
    for (let x = left; x <= right; x++) {
      const dx = x - cx;
      const d2 = dx * dx + dy * dy;
      if (d2 >= inner2 && d2 <= outer2) {
        data[row + x] = field.data[row + x];
      }
    }
  }
  return {
    field: createIntensityField(width, height, data, field.scale),
    region: { left, top, right, bottom },
  };
};
