export type CandidateCenter = {
  readonly x: number;
  readonly y: number;
};

/** Offsets advance in steps of two pixels, trading resolution for search cost. */
export const CANDIDATE_STRIDE = 2;

/**
 * Enumerates candidate centers row by row (dy outer, dx inner) on the grid
 * `{-2h, -2h+2, …, 2h}²` around the rounded guess. The guess itself is always
 * part of the set.
 */
export const generateCandidateCenters = (
  x0: number,
  y0: number,
  halfWindow: number,
): CandidateCenter[] => {
  const cx = Math.round(x0);
  const cy = Math.round(y0);
  const span = CANDIDATE_STRIDE * halfWindow;
  const candidates: CandidateCenter[] = [];
  let includesGuess = false;
  for (let dy = -span; dy <= span; dy += CANDIDATE_STRIDE) {
    for (let dx = -span; dx <= span; dx += CANDIDATE_STRIDE) {
      if (dx === 0 && dy === 0) {
        includesGuess = true;
      }
      candidates.push({ x: cx + dx, y: cy + dy });
    }
  }
  if (!includesGuess) {
    candidates.unshift({ x: cx, y: cy });
  }
  return candidates;
};
