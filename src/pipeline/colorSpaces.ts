const clamp255 = (value: number): number => (value < 0 ? 0 : value > 255 ? 255 : value);

/** BT.601 luma on 8-bit levels, rounded back to an integer level. */
export const bt601Luma = (r: number, g: number, b: number): number =>
  clamp255(Math.round(0.299 * r + 0.587 * g + 0.114 * b));

/**
 * Collapses an interleaved 1/3/4-channel buffer into one luminance level per
 * pixel. Alpha is ignored.
 */
export const toLuminance = (
  data: ArrayLike<number>,
  texels: number,
  channels: 1 | 3 | 4,
): Float32Array => {
  const out = new Float32Array(texels);
  if (channels === 1) {
    for (let i = 0; i < texels; i++) {
      out[i] = data[i];
    }
    return out;
  }
  for (let i = 0, offset = 0; i < texels; i++, offset += channels) {
    out[i] = bt601Luma(data[offset], data[offset + 1], data[offset + 2]);
  }
  return out;
};
