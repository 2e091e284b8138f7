import { INTENSITY_SCALE, type IntensityField } from '../fields/contracts.js';
import type { PixelRegion } from './annulusMask.js';

export type HoughParameters = {
  /** Sobel magnitude (on the 0..255 scale) an edge pixel must reach. */
  gradientThreshold: number;
  /** Minimum 3×3-pooled votes for a center and minimum edge support for a radius. */
  accumulatorThreshold: number;
  /** Strongest centers examined per pass. */
  maxCenters: number;
  /** Half-width, in pixels, of the window a ring's two edges are pooled over. */
  radiusWindow: number;
};

export const DEFAULT_HOUGH_PARAMETERS: HoughParameters = {
  gradientThreshold: 100,
  accumulatorThreshold: 15,
  maxCenters: 32,
  radiusWindow: 2,
};

export type CircleDetectionRequest = {
  field: IntensityField;
  region: PixelRegion;
  rLow: number;
  rHigh: number;
  minCenterDistance: number;
  params: HoughParameters;
};

export type DetectedCircle = {
  x: number;
  y: number;
  r: number;
  votes: number;
};

/**
 * Any detector that turns a masked field and a radius band into zero or more
 * circles. Returned radii must lie inside `[rLow, rHigh]`.
 */
export type CircleDetector = (request: CircleDetectionRequest) => DetectedCircle[];

type EdgeSample = {
  x: number;
  y: number;
  ux: number;
  uy: number;
};

const collectEdges = (
  field: IntensityField,
  region: PixelRegion,
  threshold: number,
): EdgeSample[] => {
  const { width, height } = field.resolution;
  const data = field.data;
  const edges: EdgeSample[] = [];
  // one pixel of slack: the mask boundary itself produces gradients just outside it
  const xStart = Math.max(1, region.left - 1);
  const xEnd = Math.min(width - 2, region.right + 1);
  const yStart = Math.max(1, region.top - 1);
  const yEnd = Math.min(height - 2, region.bottom + 1);
  for (let y = yStart; y <= yEnd; y++) {
    for (let x = xStart; x <= xEnd; x++) {
      const i = y * width + x;
      const gx =
        data[i - width + 1] +
        2 * data[i + 1] +
        data[i + width + 1] -
        data[i - width - 1] -
        2 * data[i - 1] -
        data[i + width - 1];
      const gy =
        data[i + width - 1] +
        2 * data[i + width] +
        data[i + width + 1] -
        data[i - width - 1] -
        2 * data[i - width] -
        data[i - width + 1];
      const mag = Math.sqrt(gx * gx + gy * gy);
      if (mag > 0 && mag >= threshold) {
        edges.push({ x, y, ux: gx / mag, uy: gy / mag });
      }
    }
  }
  return edges;
};

type RadiusEstimate = {
  radius: number;
  support: number;
};

/**
 * Histograms edge distances from a center and reports every local maximum of
 * the window-pooled support. The pooled mean leans toward the outer edge of a
 * ring line, which has more pixels; callers refine it against the intensity
 * profile.
 */
const estimateRadii = (
  edges: readonly EdgeSample[],
  cx: number,
  cy: number,
  rLow: number,
  rHigh: number,
  params: HoughParameters,
): RadiusEstimate[] => {
  const rStart = Math.ceil(rLow);
  const rEnd = Math.floor(rHigh);
  const binCount = rEnd - rStart + 1;
  if (binCount <= 0) {
    return [];
  }
  const counts = new Int32Array(binCount);
  const sums = new Float64Array(binCount);
  for (const edge of edges) {
    const dx = edge.x - cx;
    const dy = edge.y - cy;
    const d = Math.sqrt(dx * dx + dy * dy);
    if (d < rLow || d > rHigh) continue;
    const bin = Math.min(binCount - 1, Math.max(0, Math.round(d) - rStart));
    counts[bin]++;
    sums[bin] += d;
  }

  const window = Math.max(0, Math.floor(params.radiusWindow));
  const support = new Int32Array(binCount);
  const pooled = new Float64Array(binCount);
  for (let k = 0; k < binCount; k++) {
    for (let j = Math.max(0, k - window); j <= Math.min(binCount - 1, k + window); j++) {
      support[k] += counts[j];
      pooled[k] += sums[j];
    }
  }

  const estimates: RadiusEstimate[] = [];
  for (let k = 0; k < binCount; k++) {
    const value = support[k];
    if (value < params.accumulatorThreshold || value === 0) continue;
    const left = k === 0 ? -1 : support[k - 1];
    const right = k === binCount - 1 ? -1 : support[k + 1];
    if (value > left && value >= right) {
      estimates.push({ radius: pooled[k] / value, support: value });
    }
  }
  return estimates;
};

/**
 * Gradient Hough transform: every edge pixel votes for centers along its
 * gradient line (both directions, every integer radius of the band). Votes are
 * split bilinearly over the four pixels around their landing point and the
 * accumulator is box-filtered over 3×3 before peak picking, so the lines of a
 * coarse Sobel direction still meet in one maximum. Each center's radius comes
 * from the edge-distance histogram.
 */
export const houghGradientCircles: CircleDetector = ({
  field,
  region,
  rLow,
  rHigh,
  minCenterDistance,
  params,
}) => {
  const { width, height } = field.resolution;
  const threshold = (params.gradientThreshold * field.scale) / INTENSITY_SCALE;
  const edges = collectEdges(field, region, threshold);
  if (edges.length === 0) {
    return [];
  }

  const rStart = Math.ceil(rLow);
  const rEnd = Math.floor(rHigh);
  const accumulator = new Float32Array(width * height);
  let minX = width;
  let maxX = -1;
  let minY = height;
  let maxY = -1;
  for (const edge of edges) {
    for (let r = rStart; r <= rEnd; r++) {
      for (let sign = -1; sign <= 1; sign += 2) {
        const fx = edge.x + sign * edge.ux * r;
        const fy = edge.y + sign * edge.uy * r;
        const ax = Math.floor(fx);
        const ay = Math.floor(fy);
        if (ax < 0 || ay < 0 || ax + 1 >= width || ay + 1 >= height) continue;
        const tx = fx - ax;
        const ty = fy - ay;
        const i = ay * width + ax;
        accumulator[i] += (1 - tx) * (1 - ty);
        accumulator[i + 1] += tx * (1 - ty);
        accumulator[i + width] += (1 - tx) * ty;
        accumulator[i + width + 1] += tx * ty;
        if (ax < minX) minX = ax;
        if (ax + 1 > maxX) maxX = ax + 1;
        if (ay < minY) minY = ay;
        if (ay + 1 > maxY) maxY = ay + 1;
      }
    }
  }
  if (maxX < 0) {
    return [];
  }

  // box sums reach one pixel past the voted area; everything beyond stays 0
  const xFrom = Math.max(1, minX - 1);
  const xTo = Math.min(width - 2, maxX + 1);
  const yFrom = Math.max(1, minY - 1);
  const yTo = Math.min(height - 2, maxY + 1);
  const smoothed = new Float32Array(width * height);
  for (let y = yFrom; y <= yTo; y++) {
    for (let x = xFrom; x <= xTo; x++) {
      const i = y * width + x;
      let total = 0;
      for (let dy = -width; dy <= width; dy += width) {
        total += accumulator[i + dy - 1] + accumulator[i + dy] + accumulator[i + dy + 1];
      }
      smoothed[i] = total;
    }
  }

  const peaks: number[] = [];
  for (let y = yFrom; y <= yTo; y++) {
    for (let x = xFrom; x <= xTo; x++) {
      const i = y * width + x;
      const votes = smoothed[i];
      if (
        votes > params.accumulatorThreshold &&
        votes > smoothed[i - 1] &&
        votes >= smoothed[i + 1] &&
        votes > smoothed[i - width] &&
        votes >= smoothed[i + width]
      ) {
        peaks.push(i);
      }
    }
  }
  peaks.sort((a, b) => smoothed[b] - smoothed[a] || a - b);

  const minDist2 = minCenterDistance * minCenterDistance;
  const centers: { x: number; y: number }[] = [];
  const circles: DetectedCircle[] = [];
  for (const index of peaks) {
    if (centers.length >= params.maxCenters) break;
    const cx = index % width;
    const cy = Math.floor(index / width);
    const crowded = centers.some(
      (center) => (center.x - cx) * (center.x - cx) + (center.y - cy) * (center.y - cy) < minDist2,
    );
    if (crowded) continue;
    centers.push({ x: cx, y: cy });
    for (const estimate of estimateRadii(edges, cx, cy, rLow, rHigh, params)) {
      circles.push({ x: cx, y: cy, r: estimate.radius, votes: estimate.support });
    }
  }
  return circles;
};
