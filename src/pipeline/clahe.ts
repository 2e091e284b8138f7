export type ClaheOptions = {
  tilesX: number;
  tilesY: number;
  clipLimit: number;
};

export const DEFAULT_CLAHE_OPTIONS: ClaheOptions = {
  tilesX: 8,
  tilesY: 8,
  clipLimit: 2,
};

const BINS = 256;

/** Border mode "reflect 101": ...cb|abcd|cb... */
export const reflect101 = (index: number, size: number): number => {
  if (size <= 1) return 0;
  const period = 2 * size - 2;
  let i = index % period;
  if (i < 0) i += period;
  return i >= size ? period - i : i;
};

const toBin = (value: number): number => {
  const level = Math.round(value);
  return level < 0 ? 0 : level >= BINS ? BINS - 1 : level;
};

const buildTileLuts = (
  levels: Float32Array,
  width: number,
  height: number,
  tileW: number,
  tileH: number,
  options: ClaheOptions,
): Uint8Array => {
  const { tilesX, tilesY, clipLimit } = options;
  const tileArea = tileW * tileH;
  const clip = clipLimit > 0 ? Math.max(1, Math.floor((clipLimit * tileArea) / BINS)) : tileArea;
  const lutScale = (BINS - 1) / tileArea;
  const luts = new Uint8Array(tilesX * tilesY * BINS);
  const hist = new Int32Array(BINS);

  for (let ty = 0; ty < tilesY; ty++) {
    for (let tx = 0; tx < tilesX; tx++) {
      hist.fill(0);
      for (let y = 0; y < tileH; y++) {
        const row = reflect101(ty * tileH + y, height) * width;
        for (let x = 0; x < tileW; x++) {
          hist[toBin(levels[row + reflect101(tx * tileW + x, width)])]++;
        }
      }

      if (clip < tileArea) {
        let clipped = 0;
        for (let i = 0; i < BINS; i++) {
          if (hist[i] > clip) {
            clipped += hist[i] - clip;
            hist[i] = clip;
          }
        }
        const batch = Math.floor(clipped / BINS);
        let residual = clipped - batch * BINS;
        for (let i = 0; i < BINS; i++) {
          hist[i] += batch;
        }
        if (residual > 0) {
          const step = Math.max(Math.floor(BINS / residual), 1);
          for (let i = 0; i < BINS && residual > 0; i += step, residual--) {
            hist[i]++;
          }
        }
      }

      const base = (ty * tilesX + tx) * BINS;
      let sum = 0;
      for (let i = 0; i < BINS; i++) {
        sum += hist[i];
        luts[base + i] = Math.min(BINS - 1, Math.round(sum * lutScale));
      }
    }
  }
  return luts;
};

/**
 * Contrast-limited adaptive histogram equalization over integer levels 0..255.
 * Each pixel is mapped through the four nearest tile lookup tables and
 * blended bilinearly.
 */
export const equalizeAdaptive = (
  levels: Float32Array,
  width: number,
  height: number,
  options: ClaheOptions = DEFAULT_CLAHE_OPTIONS,
): Float32Array => {
  const tilesX = Math.max(1, Math.floor(options.tilesX));
  const tilesY = Math.max(1, Math.floor(options.tilesY));
  const tileW = Math.ceil(width / tilesX);
  const tileH = Math.ceil(height / tilesY);
  const luts = buildTileLuts(levels, width, height, tileW, tileH, {
    tilesX,
    tilesY,
    clipLimit: options.clipLimit,
  });
  const lut = (ty: number, tx: number, bin: number) => luts[(ty * tilesX + tx) * BINS + bin];

  const out = new Float32Array(width * height);
  for (let y = 0; y < height; y++) {
    const tyf = y / tileH - 0.5;
    let ty1 = Math.floor(tyf);
    let ty2 = ty1 + 1;
    const ya = tyf - ty1;
    ty1 = Math.max(ty1, 0);
    ty2 = Math.min(ty2, tilesY - 1);
    for (let x = 0; x < width; x++) {
      const txf = x / tileW - 0.5;
      let tx1 = Math.floor(txf);
      let tx2 = tx1 + 1;
      const xa = txf - tx1;
      tx1 = Math.max(tx1, 0);
      tx2 = Math.min(tx2, tilesX - 1);

      const bin = toBin(levels[y * width + x]);
      const top = lut(ty1, tx1, bin) * (1 - xa) + lut(ty1, tx2, bin) * xa;
      const bottom = lut(ty2, tx1, bin) * (1 - xa) + lut(ty2, tx2, bin) * xa;
      const value = Math.round(top * (1 - ya) + bottom * ya);
      out[y * width + x] = value < 0 ? 0 : value > BINS - 1 ? BINS - 1 : value;
    }
  }
  return out;
};
