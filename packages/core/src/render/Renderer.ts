/**
 * Renderer - exact hidden-line rendering of points, lines and triangles
 *
 * Collects world-space primitives, then on render() projects them through
 * the clip transform and resolves occlusion between triangles by cutting
 * farther triangles along the edges of nearer ones until every piece is
 * either fully visible or fully covered.
 *
 * Points and lines are projected and culled but never occluded.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Mat4 } from '../num/mat4.js';
import { transformVec4 } from '../num/mat4.js';
import type { Vec4 } from '../num/vec4.js';
import { dehomogenize, point4, xy } from '../num/vec4.js';
import type { EdgeType, Primitive, Tri } from '../geom/primitive.js';
import {
  EDGE_INDICES,
  createTri,
  cullTri,
  hideTri,
  isTriHidden,
  mapPrimitivePoints,
  primitivePoints,
  reverseTri,
  triEdge,
  triWinding,
} from '../geom/primitive.js';
import { triangleInTriangle2D } from '../geom/intersect2d.js';
import { splitTriangleBySegment } from '../geom/split.js';
import { isGeometryInvariantError } from '../errors.js';
import type { DepthSortedPrimitive } from './depthQueue.js';
import { DepthQueue, alreadyTested, createDepthSorted, extendTested } from './depthQueue.js';
import type { RenderOutput } from './output.js';
import { concatRenderOutputs, flattenPrimitives } from './output.js';
import type { RendererOptions, RenderResult } from './types.js';
import { DEFAULT_RENDERER_OPTIONS } from './types.js';

/**
 * What happened to a triangle popped from the queue
 */
type Resolution =
  | { kind: 'split'; children: DepthSortedPrimitive[] }
  | { kind: 'accept'; tri: Tri; hidden: boolean };

/**
 * Counter-clockwise version of a projected triangle, or null if it is
 * degenerate on screen
 */
function orientCounterClockwise(tri: Tri): Tri | null {
  switch (triWinding(tri)) {
    case 'ccw':
      return tri;
    case 'cw':
      return reverseTri(tri);
    case 'degenerate':
      return null;
  }
}

export class Renderer {
  private readonly clip: Mat4;
  private readonly options: RendererOptions;
  private readonly inputs: Primitive[] = [];

  /**
   * @param clip combined projection * view transform
   */
  constructor(clip: Mat4, options: Partial<RendererOptions> = {}) {
    this.clip = [...clip];
    this.options = { ...DEFAULT_RENDERER_OPTIONS, ...options };
  }

  /**
   * Number of primitives added so far
   */
  get primitiveCount(): number {
    return this.inputs.length;
  }

  /**
   * Add a primitive as-is. Coordinates are homogeneous world-space points.
   */
  addPrimitive(prim: Primitive): void {
    this.inputs.push(prim);
  }

  addPoint(p: Vec3): void {
    this.addPrimitive({ kind: 'point', point: point4(p) });
  }

  addLine(p0: Vec3, p1: Vec3): void {
    this.addPrimitive({ kind: 'line', points: [point4(p0), point4(p1)] });
  }

  /**
   * Add a triangle with all three edges `visible`
   */
  addTriangle(p0: Vec3, p1: Vec3, p2: Vec3): void {
    this.addPrimitive({ kind: 'triangle', tri: createTri(point4(p0), point4(p1), point4(p2)) });
  }

  /**
   * Add a convex polygon as a triangle fan around its first vertex.
   *
   * Outline edge i (points[i] to points[i + 1]) is tagged `edges[i]`,
   * `visible` by default; the fan's internal diagonals are `invisible`.
   * Fewer than three points adds nothing.
   */
  addPolygon(points: readonly Vec3[], edges: readonly EdgeType[] = []): void {
    const n = points.length;
    if (n < 3) {
      return;
    }

    const tag = (i: number): EdgeType => edges[i] ?? `visible`;
    const v0 = point4(points[0]);
    for (let k = 1; k < n - 1; k++) {
      const first: EdgeType = k === 1 ? tag(0) : `invisible`;
      const last: EdgeType = k === n - 2 ? tag(n - 1) : `invisible`;
      this.addPrimitive({
        kind: 'triangle',
        tri: createTri(v0, point4(points[k]), point4(points[k + 1]), [first, tag(k), last]),
      });
    }
  }

  /**
   * Project, cull and resolve occlusion.
   *
   * @throws GeometryInvariantError when a numeric invariant breaks; no
   *   partial output is returned in that case
   */
  render(): RenderOutput {
    const log = this.options.verbose
      ? (message: string) => console.log(`[render] ${message}`)
      : undefined;

    const projected = this.inputs.map((prim) => mapPrimitivePoints(prim, (p) => this.project(p)));
    const inView = projected.filter((prim) => !this.isTriviallyOutside(prim));
    log?.(`projected ${projected.length} primitives, ${inView.length} survive culling`);

    const queue = new DepthQueue();
    const culled: Primitive[] = [];
    for (const prim of inView) {
      if (prim.kind !== 'triangle') {
        queue.push(createDepthSorted(prim));
        continue;
      }
      const winding = triWinding(prim.tri);
      if (winding === 'degenerate') {
        continue;
      }
      if (winding === 'cw' && this.options.cullBackFaces) {
        culled.push({ kind: 'triangle', tri: cullTri(prim.tri) });
        continue;
      }
      const tri = winding === 'cw' ? reverseTri(prim.tri) : prim.tri;
      queue.push(createDepthSorted({ kind: 'triangle', tri }));
    }
    if (culled.length > 0) {
      log?.(`culled ${culled.length} back-facing triangles`);
    }

    const accepted: Primitive[] = [];
    let splits = 0;
    let hidden = 0;

    for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
      const prim = entry.prim;
      if (prim.kind !== 'triangle') {
        accepted.push(prim);
        continue;
      }

      const tri = orientCounterClockwise(prim.tri);
      if (!tri) {
        continue;
      }

      const resolution = this.resolveTriangle(entry, tri, accepted);
      if (resolution.kind === 'split') {
        splits++;
        log?.(
          `split triangle at depth ${entry.depth.toFixed(4)} into ${resolution.children.length}`
        );
        for (const child of resolution.children) {
          queue.push(child);
        }
        continue;
      }

      if (resolution.hidden) {
        hidden++;
        log?.(`hid triangle at depth ${entry.depth.toFixed(4)}`);
      }
      accepted.push({ kind: 'triangle', tri: resolution.tri });
    }

    const output = concatRenderOutputs(flattenPrimitives(accepted), flattenPrimitives(culled));
    log?.(
      `accepted ${accepted.length} primitives (${splits} splits, ${hidden} hidden), ` +
        `${output.lines.length} lines, ${output.points.length} points`
    );
    return output;
  }

  /**
   * render(), with invariant failures returned instead of thrown.
   * Any other error is re-thrown.
   */
  tryRender(): RenderResult<RenderOutput> {
    try {
      return { ok: true, value: this.render() };
    } catch (err) {
      if (isGeometryInvariantError(err)) {
        return {
          ok: false,
          error: { category: `invariant`, kind: err.kind, message: err.message, details: err.details },
        };
      }
      throw err;
    }
  }

  /**
   * Compare a triangle against every accepted, not fully hidden triangle,
   * nearest-first order guaranteeing those are at least as near.
   *
   * The first occluder edge that cuts it yields the pieces to re-queue. If
   * no edge of an occluder cuts it and it lies within that occluder on
   * screen, it is hidden and no further occluders are examined.
   */
  private resolveTriangle(
    entry: DepthSortedPrimitive,
    tri: Tri,
    accepted: readonly Primitive[]
  ): Resolution {
    for (let index = 0; index < accepted.length; index++) {
      const other = accepted[index];
      if (other.kind !== 'triangle' || isTriHidden(other.tri)) {
        continue;
      }

      for (const edge of EDGE_INDICES) {
        if (alreadyTested(entry, index, edge)) {
          continue;
        }
        const [a, b] = triEdge(other.tri, edge);
        const result = splitTriangleBySegment(tri, xy(a), xy(b));
        switch (result.kind) {
          case 'split': {
            const tested = extendTested(entry, index, edge);
            return {
              kind: 'split',
              children: result.tris.map((child) =>
                createDepthSorted({ kind: 'triangle', tri: child }, tested)
              ),
            };
          }
          case 'unchanged':
          case 'degenerate':
            break;
        }
      }

      if (triangleInTriangle2D(tri, other.tri)) {
        return { kind: 'accept', tri: hideTri(tri), hidden: true };
      }
    }

    return { kind: 'accept', tri, hidden: false };
  }

  /**
   * Clip-space projection followed by the perspective divide
   */
  private project(p: Vec4): Vec4 {
    return dehomogenize(transformVec4(this.clip, p));
  }

  /**
   * True iff every vertex is beyond the same side of the view volume.
   * Primitives straddling a plane are kept whole.
   */
  private isTriviallyOutside(prim: Primitive): boolean {
    const points = primitivePoints(prim);
    const [near, far] = this.options.depthRange;
    return (
      points.every((p) => p[0] < -1) ||
      points.every((p) => p[0] > 1) ||
      points.every((p) => p[1] < -1) ||
      points.every((p) => p[1] > 1) ||
      points.every((p) => p[2] < near) ||
      points.every((p) => p[2] > far)
    );
  }
}
