export type SeriesStats = {
  count: number;
  mean: number;
  /** Population standard deviation. */
  std: number;
};

export type NormalizedSeries = {
  values: number[];
  offset: number;
  scale: number;
};

export type LinearFit = {
  slope: number;
  intercept: number;
};

export const describeSeries = (values: readonly number[]): SeriesStats => {
  const count = values.length;
  if (count === 0) {
    return { count, mean: 0, std: 0 };
  }
  let sum = 0;
  for (const value of values) sum += value;
  const mean = sum / count;
  let squares = 0;
  for (const value of values) {
    const delta = value - mean;
    squares += delta * delta;
  }
  return { count, mean, std: Math.sqrt(squares / count) };
};

/**
 * Z-scores a series for conditioning. Short or flat series are passed through
 * untouched with an identity offset/scale so callers can undo the transform
 * the same way in both cases.
 */
export const normalizeSeries = (values: readonly number[]): NormalizedSeries => {
  const { count, mean, std } = describeSeries(values);
  if (count < 2 || std === 0) {
    return { values: [...values], offset: 0, scale: 1 };
  }
  return { values: values.map((value) => (value - mean) / std), offset: mean, scale: std };
};

/** Ordinary least squares, degree 1. A series without x spread has slope 0. */
export const fitLine = (xs: readonly number[], ys: readonly number[]): LinearFit => {
  if (xs.length !== ys.length) {
    throw new Error(`[regression] series length mismatch ${xs.length} != ${ys.length}`);
  }
  const x = describeSeries(xs);
  const y = describeSeries(ys);
  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = xs[i] - x.mean;
    sxx += dx * dx;
    sxy += dx * (ys[i] - y.mean);
  }
  if (sxx === 0) {
    return { slope: 0, intercept: y.mean };
  }
  const slope = sxy / sxx;
  return { slope, intercept: y.mean - slope * x.mean };
};

/** Fits y against x on normalized data and maps the slope back to physical units. */
export const fitConditionedSlope = (xs: readonly number[], ys: readonly number[]): number => {
  const x = normalizeSeries(xs);
  const y = normalizeSeries(ys);
  const { slope } = fitLine(x.values, y.values);
  return slope * (y.scale / x.scale);
};
