/**
 * Tolerance model
 *
 * Every near-equality decision in the renderer goes through these constants.
 * Unlike a modelling kernel, which carries a per-model numeric context, the
 * renderer works in normalized device coordinates only, so a single
 * process-wide set of tolerances is used and never changed at run time.
 */

/**
 * Tolerance values
 */
export interface Tolerances {
  /** Slack for comparisons of interpolation parameters and barycentric weights */
  readonly comparison: number;
  /** Edges shorter than this make a triangle degenerate */
  readonly minEdgeLength: number;
}

export const TOLERANCES: Tolerances = Object.freeze({
  comparison: 1e-5,
  minEdgeLength: 1e-5,
});

/** Shorthand for TOLERANCES.comparison */
export const EPS = TOLERANCES.comparison;

/** Shorthand for TOLERANCES.minEdgeLength */
export const LINE_LENGTH_EPS = TOLERANCES.minEdgeLength;

/**
 * True iff t lies in the open interval (0, 1), shrunk by EPS on both ends
 */
export function insideUnitRange(t: number): boolean {
  return t >= EPS && t <= 1 - EPS;
}

/**
 * True iff t is within EPS of either end of [0, 1]
 */
export function onUnitBoundary(t: number): boolean {
  return Math.abs(t) < EPS || Math.abs(1 - t) < EPS;
}
