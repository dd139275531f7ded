/**
 * Primitive model
 *
 * Value types shared by the splitter and the renderer. Inside the renderer
 * every coordinate is a perspective-divided Vec4 (x/w, y/w, z/w, w); input
 * primitives carry ordinary homogeneous points instead.
 *
 * All values are treated as immutable: operations that change a triangle
 * (hiding, culling, reversing) return a new Tri.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Vec4 } from '../num/vec4.js';
import { xy } from '../num/vec4.js';
import type { Winding } from '../num/predicates.js';
import { winding2D } from '../num/predicates.js';

/**
 * Classification of a triangle edge or an emitted line
 *
 * - `visible`: drawn normally
 * - `invisible`: interior edge created by fan-triangulating a polygon
 * - `hidden`: behind nearer geometry; never reclassified once set
 * - `split`: created by cutting a triangle
 * - `culled`: edge of a back-facing triangle
 */
export type EdgeType = `visible` | `invisible` | `hidden` | `split` | `culled`;

/** Every edge type, in a fixed order (used for grouping output) */
export const EDGE_TYPES: readonly EdgeType[] = [`visible`, `invisible`, `hidden`, `split`, `culled`];

/**
 * Index of a triangle edge. Edge i runs from vertex i to vertex (i + 1) % 3.
 */
export type EdgeIndex = 0 | 1 | 2;

export const EDGE_INDICES: readonly EdgeIndex[] = [0, 1, 2];

const NEXT_INDEX: readonly [EdgeIndex, EdgeIndex, EdgeIndex] = [1, 2, 0];

/**
 * (i + 1) % 3
 */
export function nextIndex(i: EdgeIndex): EdgeIndex {
  return NEXT_INDEX[i];
}

/**
 * Three points plus one tag per edge, aligned by index
 */
export interface Tri {
  readonly p: readonly [Vec4, Vec4, Vec4];
  readonly e: readonly [EdgeType, EdgeType, EdgeType];
}

export function createTri(
  p0: Vec4,
  p1: Vec4,
  p2: Vec4,
  edges: readonly [EdgeType, EdgeType, EdgeType] = [`visible`, `visible`, `visible`]
): Tri {
  return { p: [p0, p1, p2], e: [edges[0], edges[1], edges[2]] };
}

/**
 * Start and end vertex of edge i
 */
export function triEdge(tri: Tri, i: EdgeIndex): [Vec4, Vec4] {
  return [tri.p[i], tri.p[nextIndex(i)]];
}

/**
 * Screen-space winding of a (projected) triangle
 */
export function triWinding(tri: Tri): Winding {
  return winding2D(xy(tri.p[0]), xy(tri.p[1]), xy(tri.p[2]));
}

/**
 * Reverse the vertex order, keeping each tag on the same geometric edge:
 * vertices 1 and 2 swap, edges 0 and 2 swap.
 */
export function reverseTri(tri: Tri): Tri {
  return {
    p: [tri.p[0], tri.p[2], tri.p[1]],
    e: [tri.e[2], tri.e[1], tri.e[0]],
  };
}

export function hideTri(tri: Tri): Tri {
  return { p: tri.p, e: [`hidden`, `hidden`, `hidden`] };
}

export function cullTri(tri: Tri): Tri {
  return { p: tri.p, e: [`culled`, `culled`, `culled`] };
}

export function isTriHidden(tri: Tri): boolean {
  return tri.e.every((e) => e === `hidden`);
}

export function isTriCulled(tri: Tri): boolean {
  return tri.e.every((e) => e === `culled`);
}

/**
 * A single drawable: point, line segment or triangle
 */
export type Primitive =
  | { kind: 'point'; point: Vec4 }
  | { kind: 'line'; points: [Vec4, Vec4] }
  | { kind: 'triangle'; tri: Tri };

/**
 * All vertices of a primitive
 */
export function primitivePoints(prim: Primitive): Vec4[] {
  switch (prim.kind) {
    case 'point':
      return [prim.point];
    case 'line':
      return [prim.points[0], prim.points[1]];
    case 'triangle':
      return [prim.tri.p[0], prim.tri.p[1], prim.tri.p[2]];
  }
}

/**
 * Apply `f` to every vertex, keeping kind and edge tags
 */
export function mapPrimitivePoints(prim: Primitive, f: (p: Vec4) => Vec4): Primitive {
  switch (prim.kind) {
    case 'point':
      return { kind: 'point', point: f(prim.point) };
    case 'line':
      return { kind: 'line', points: [f(prim.points[0]), f(prim.points[1])] };
    case 'triangle':
      return {
        kind: 'triangle',
        tri: { p: [f(prim.tri.p[0]), f(prim.tri.p[1]), f(prim.tri.p[2])], e: prim.tri.e },
      };
  }
}

/**
 * Mean of the vertices' first three components
 */
export function primitiveCentroid(prim: Primitive): Vec3 {
  const points = primitivePoints(prim);
  const sum: Vec3 = [0, 0, 0];
  for (const p of points) {
    sum[0] += p[0];
    sum[1] += p[1];
    sum[2] += p[2];
  }
  return [sum[0] / points.length, sum[1] / points.length, sum[2] / points.length];
}
