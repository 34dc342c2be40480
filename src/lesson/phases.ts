export interface PhaseBudget {
  phase1: number;
  phase2: number;
  phase3: number;
}

export const PHASE_EDGE_SHARE = 0.15;
export const PHASE_EDGE_MAX_MINUTES = 10;

/**
 * Splits a lesson into starter, main and reflection minutes. Starter and
 * reflection each take 15% of the lesson, capped at 10 minutes; the main phase
 * takes the remainder so the three always sum to `duration`.
 */
export function computePhaseBudget(duration: number): PhaseBudget {
  if (!Number.isInteger(duration) || duration <= 0) {
    throw new RangeError(`duration must be a positive integer, got ${duration}`);
  }
  const edge = Math.min(PHASE_EDGE_MAX_MINUTES, Math.floor(duration * PHASE_EDGE_SHARE));
  return { phase1: edge, phase2: duration - edge * 2, phase3: edge };
}
