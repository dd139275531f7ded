/**
 * 2D intersection and containment predicates
 *
 * Everything here works on the screen-space (x, y) part of its inputs; z and
 * w of triangle vertices are ignored. Results are tagged unions so callers
 * can switch over them exhaustively.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import { sub2, cross2, vec2 } from '../num/vec2.js';
import { xy } from '../num/vec4.js';
import { EPS, insideUnitRange, onUnitBoundary } from '../num/tolerance.js';
import { isDegenerateTriangle, orient2DRobust } from '../num/predicates.js';
import type { EdgeIndex, Tri } from './primitive.js';

/**
 * Relationship between two infinite lines, each given by two points
 *
 * For `intersection`, the crossing is at a0 + t1 (a1 - a0) = b0 + t2 (b1 - b0).
 */
export type RayIntersection =
  | { kind: 'colinear' }
  | { kind: 'parallel' }
  | { kind: 'intersection'; t1: number; t2: number };

/**
 * Position of a point relative to a triangle
 */
export type PointTriangleClass =
  | { kind: 'inside'; barycentric: Vec3 }
  | { kind: 'on'; edge: EdgeIndex }
  | { kind: 'outside' };

const COLINEAR: RayIntersection = { kind: 'colinear' };
const PARALLEL: RayIntersection = { kind: 'parallel' };
const ORIGIN: Vec2 = vec2(0, 0);

/**
 * Barycentric weights (a, b, c) of `p` with respect to the triangle's screen
 * projection, so that p = a v0 + b v1 + c v2 and a + b + c = 1.
 *
 * Returns null when the triangle is exactly collinear in 2D.
 */
export function barycentricCoords(p: Vec2, tri: Tri): Vec3 | null {
  const v0 = xy(tri.p[0]);
  const v1 = xy(tri.p[1]);
  const v2 = xy(tri.p[2]);

  const det = orient2DRobust(v0, v1, v2);
  if (det === 0) {
    return null;
  }

  const a = orient2DRobust(p, v1, v2) / det;
  const b = orient2DRobust(v0, p, v2) / det;
  return [a, b, 1 - a - b];
}

/**
 * Classify a point against a triangle.
 *
 * - `inside` when every weight lies within [EPS, 1 - EPS]
 * - `outside` when any weight is below -EPS, or the triangle is collinear
 * - `on` when a weight is within EPS of 0 or 1. The weights are checked in
 *   order v0, v1, v2 and map to edges 1, 2, 0 respectively, which the
 *   splitter relies on.
 */
export function pointTriangleClass(p: Vec2, tri: Tri): PointTriangleClass {
  const w = barycentricCoords(p, tri);
  if (!w) {
    return { kind: 'outside' };
  }

  const [a, b, c] = w;
  if (insideUnitRange(a) && insideUnitRange(b) && insideUnitRange(c)) {
    return { kind: 'inside', barycentric: w };
  }
  if (a < -EPS || b < -EPS || c < -EPS) {
    return { kind: 'outside' };
  }
  if (onUnitBoundary(a)) {
    return { kind: 'on', edge: 1 };
  }
  if (onUnitBoundary(b)) {
    return { kind: 'on', edge: 2 };
  }
  if (onUnitBoundary(c)) {
    return { kind: 'on', edge: 0 };
  }
  return { kind: 'outside' };
}

/**
 * Intersect the infinite lines a0-a1 and b0-b1. Any finite parameters are
 * accepted.
 *
 * Degeneracy is checked before solving, since the 2x2 system can still be
 * solvable for configurations that should count as collinear or parallel.
 */
export function implicitRayIntersect(a0: Vec2, a1: Vec2, b0: Vec2, b1: Vec2): RayIntersection {
  if (isDegenerateTriangle(a0, a1, b0) && isDegenerateTriangle(a0, a1, b1)) {
    return COLINEAR;
  }

  const da = sub2(a1, a0);
  const db = sub2(b1, b0);
  if (isDegenerateTriangle(ORIGIN, da, db)) {
    return PARALLEL;
  }

  const denom = cross2(da, db);
  if (denom === 0) {
    return PARALLEL;
  }

  const r = sub2(b0, a0);
  return {
    kind: 'intersection',
    t1: cross2(r, db) / denom,
    t2: cross2(r, da) / denom,
  };
}

/**
 * True iff the intersection is a genuine crossing of the two finite
 * segments: both parameters strictly inside (EPS, 1 - EPS).
 */
export function isLineLineIntersection(r: RayIntersection): boolean {
  return r.kind === 'intersection' && insideUnitRange(r.t1) && insideUnitRange(r.t2);
}

/**
 * Segment-segment version of implicitRayIntersect: an intersection outside
 * either segment is reported as `parallel`.
 */
export function lineIntersect2D(a0: Vec2, a1: Vec2, b0: Vec2, b1: Vec2): RayIntersection {
  const isect = implicitRayIntersect(a0, a1, b0, b1);
  if (isect.kind === 'intersection' && !isLineLineIntersection(isect)) {
    return PARALLEL;
  }
  return isect;
}

/**
 * True iff every vertex of `inner` is inside or on the boundary of `outer`
 */
export function triangleInTriangle2D(inner: Tri, outer: Tri): boolean {
  return inner.p.every((p) => pointTriangleClass(xy(p), outer).kind !== 'outside');
}
