/**
 * Triangle splitting
 *
 * Cuts a projected triangle along the line of an occluding segment so that
 * every piece lies entirely on one side of it. The renderer applies this
 * repeatedly until each remaining piece is either fully covered by a nearer
 * triangle or not covered at all.
 *
 * Precondition (not checked): the segment lies in front of the triangle in
 * screen space. Violating it gives unspecified, though finite, results.
 */

import type { Vec2 } from '../num/vec2.js';
import { perspectiveLerp, xy } from '../num/vec4.js';
import { insideUnitRange } from '../num/tolerance.js';
import { isDegenerateTriangle } from '../num/predicates.js';
import { GeometryInvariantError } from '../errors.js';
import type { EdgeIndex, Tri } from './primitive.js';
import { EDGE_INDICES, nextIndex, triEdge } from './primitive.js';
import type { RayIntersection } from './intersect2d.js';
import { implicitRayIntersect, isLineLineIntersection, pointTriangleClass } from './intersect2d.js';

/**
 * Outcome of cutting a triangle by a segment
 *
 * - `unchanged`: no cut needed, keep the triangle as it is
 * - `split`: two or three pieces that exactly cover the triangle
 * - `degenerate`: the triangle is too thin to cut; drop it
 */
export type SplitResult =
  | { kind: 'unchanged' }
  | { kind: 'split'; tris: Tri[] }
  | { kind: 'degenerate' };

/** Segment line against edges 0, 1, 2 */
type EdgeIntersections = readonly [RayIntersection, RayIntersection, RayIntersection];

const UNCHANGED: SplitResult = { kind: 'unchanged' };
const DEGENERATE: SplitResult = { kind: 'degenerate' };

function intersectEdge(tri: Tri, i: EdgeIndex, p0: Vec2, p1: Vec2): RayIntersection {
  const [a, b] = triEdge(tri, i);
  return implicitRayIntersect(p0, p1, xy(a), xy(b));
}

/**
 * Split `tri` by the segment p0-p1.
 *
 * @throws GeometryInvariantError if the endpoint classification is
 *   inconsistent with the edge intersections on a non-degenerate triangle
 */
export function splitTriangleBySegment(tri: Tri, p0: Vec2, p1: Vec2): SplitResult {
  const isects: EdgeIntersections = [
    intersectEdge(tri, 0, p0, p1),
    intersectEdge(tri, 1, p0, p1),
    intersectEdge(tri, 2, p0, p1),
  ];

  // A genuine crossing of an edge; lowest edge index wins
  for (const i of EDGE_INDICES) {
    if (isLineLineIntersection(isects[i])) {
      return splitAlong(tri, i, isects);
    }
  }

  // Segment runs along the boundary
  if (isects.some((isect) => isect.kind === 'colinear')) {
    return UNCHANGED;
  }

  const first = pointTriangleClass(p0, tri);
  const second = pointTriangleClass(p1, tri);

  // Crossings were handled above, so two outside endpoints cannot cut
  if (first.kind === 'outside' && second.kind === 'outside') {
    return UNCHANGED;
  }

  if (first.kind === 'inside' && second.kind === 'inside') {
    return splitAlong(tri, nearestForwardCrossing(isects), isects);
  }

  if (first.kind === 'on' && second.kind === 'inside') {
    return splitAlong(tri, first.edge, isects);
  }

  if (first.kind === 'inside' && second.kind === 'on') {
    return splitAlong(tri, second.edge, isects);
  }

  if (first.kind === 'on' && second.kind === 'on') {
    if (first.edge === second.edge) {
      return UNCHANGED;
    }
    const edge = isects[first.edge].kind === 'intersection' ? first.edge : second.edge;
    return splitAlong(tri, edge, isects);
  }

  if (
    (first.kind === 'outside' && second.kind === 'on') ||
    (first.kind === 'on' && second.kind === 'outside')
  ) {
    return UNCHANGED;
  }

  // Only inside/outside pairs are left, and those always cross an edge
  if (isDegenerateTriangle(xy(tri.p[0]), xy(tri.p[1]), xy(tri.p[2]))) {
    return DEGENERATE;
  }
  throw new GeometryInvariantError(
    `unclassifiedSplit`,
    `Segment endpoints classified ${first.kind}/${second.kind} without an edge crossing`,
    { tri, p0, p1 }
  );
}

/**
 * Edge whose crossing is closest to p0 in the direction of p1
 */
function nearestForwardCrossing(isects: EdgeIntersections): EdgeIndex {
  let best: EdgeIndex | null = null;
  let bestT = Infinity;
  for (const i of EDGE_INDICES) {
    const isect = isects[i];
    if (isect.kind === 'intersection' && isect.t1 > 0 && isect.t1 < bestT) {
      best = i;
      bestT = isect.t1;
    }
  }
  if (best === null) {
    throw new GeometryInvariantError(
      `missingCrossing`,
      `Interior segment has no positive intersection with any triangle edge`
    );
  }
  return best;
}

/**
 * Cut `tri` along the segment's line, entering through edge `e`.
 *
 * The line leaves through the interior of edge e+1, the interior of edge
 * e+2, or the opposite vertex e+2, giving three, three or two pieces.
 * Surviving pieces of original edges keep their tags; new edges are `split`.
 */
function splitAlong(tri: Tri, e: EdgeIndex, isects: EdgeIntersections): SplitResult {
  const e1 = nextIndex(e);
  const e2 = nextIndex(e1);

  const entry = isects[e];
  if (entry.kind !== 'intersection') {
    throw new GeometryInvariantError(
      `missingEdgeIntersection`,
      `Expected the segment to intersect edge ${e}, got ${entry.kind}`,
      { tri, edge: e }
    );
  }

  const p = perspectiveLerp(entry.t2, tri.p[e], tri.p[e1]);
  const [ve, ve1, ve2] = [tri.p[e], tri.p[e1], tri.p[e2]];
  const [te, te1, te2] = [tri.e[e], tri.e[e1], tri.e[e2]];

  const exitNext = isects[e1];
  if (exitNext.kind === 'intersection' && insideUnitRange(exitNext.t2)) {
    const q = perspectiveLerp(exitNext.t2, ve1, ve2);
    return {
      kind: 'split',
      tris: [
        { p: [p, ve1, q], e: [te, te1, `split`] },
        { p: [p, q, ve2], e: [`split`, te1, `split`] },
        { p: [p, ve2, ve], e: [`split`, te2, te] },
      ],
    };
  }

  const exitPrev = isects[e2];
  if (exitPrev.kind === 'intersection' && insideUnitRange(exitPrev.t2)) {
    const q = perspectiveLerp(exitPrev.t2, ve2, ve);
    return {
      kind: 'split',
      tris: [
        { p: [p, ve1, ve2], e: [te, te1, `split`] },
        { p: [p, ve2, q], e: [`split`, te2, `split`] },
        { p: [p, q, ve], e: [`split`, te2, te] },
      ],
    };
  }

  return {
    kind: 'split',
    tris: [
      { p: [p, ve1, ve2], e: [te, te1, `split`] },
      { p: [p, ve2, ve], e: [`split`, te2, te] },
    ],
  };
}
