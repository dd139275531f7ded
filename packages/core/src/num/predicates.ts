/**
 * Geometric predicates
 *
 * Orientation and degeneracy tests on 2D points. The sign of the signed
 * area comes from Shewchuk-style adaptive precision predicates via
 * mourner/robust-predicates; the degeneracy decision on top of it is
 * scale-relative, comparing the area against the product of the two edge
 * lengths, because projected coordinates vary widely in magnitude from one
 * scene to the next.
 */

import type { Vec2 } from './vec2.js';
import { length2, sub2 } from './vec2.js';
import { EPS, LINE_LENGTH_EPS } from './tolerance.js';
import { orient2d as robustOrient2d } from 'robust-predicates';

/**
 * 2D orientation test using ROBUST predicates (Shewchuk)
 *
 * Returns twice the signed area of (a, b, c), i.e. (b - a) × (c - a):
 * - positive (>0): c is to the left (counter-clockwise)
 * - negative (<0): c is to the right (clockwise)
 * - zero (0): a, b and c are exactly collinear
 *
 * Note: robust-predicates uses the opposite sign convention, so we negate the result.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

/**
 * Rotational order of a triangle in screen space
 */
export type Winding = 'ccw' | 'cw' | 'degenerate';

/**
 * Return true iff (p0, p1, p2) form a degenerate triangle: either of the
 * edges p0-p1 and p1-p2 is shorter than LINE_LENGTH_EPS, or the unscaled
 * signed area is at most EPS * |p0p1| * |p1p2|.
 */
export function isDegenerateTriangle(p0: Vec2, p1: Vec2, p2: Vec2): boolean {
  const l01 = length2(sub2(p1, p0));
  const l12 = length2(sub2(p2, p1));

  if (l01 <= LINE_LENGTH_EPS || l12 <= LINE_LENGTH_EPS) {
    return true;
  }

  return Math.abs(orient2DRobust(p0, p1, p2)) <= EPS * l01 * l12;
}

/**
 * Winding of (p0, p1, p2), with the same degeneracy threshold as
 * isDegenerateTriangle.
 */
export function winding2D(p0: Vec2, p1: Vec2, p2: Vec2): Winding {
  if (isDegenerateTriangle(p0, p1, p2)) {
    return 'degenerate';
  }
  return orient2DRobust(p0, p1, p2) > 0 ? 'ccw' : 'cw';
}
