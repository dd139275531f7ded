/**
 * Render output
 *
 * The flat 2D result of a render: points and tagged line segments in
 * normalized device coordinates. Built once from the accepted primitives
 * and never modified; filters return new values.
 */

import type { Vec2 } from '../num/vec2.js';
import { xy } from '../num/vec4.js';
import type { EdgeType, Primitive } from '../geom/primitive.js';
import { EDGE_INDICES, EDGE_TYPES, triEdge } from '../geom/primitive.js';

/**
 * One output segment
 */
export interface RenderedLine {
  readonly p0: Vec2;
  readonly p1: Vec2;
  readonly edge: EdgeType;
}

export interface RenderOutput {
  readonly points: readonly Vec2[];
  readonly lines: readonly RenderedLine[];
}

export const EMPTY_RENDER_OUTPUT: RenderOutput = { points: [], lines: [] };

/**
 * Flatten primitives: points stay points, a line becomes one `visible`
 * segment, a triangle becomes three segments tagged with its edge types.
 */
export function flattenPrimitives(prims: readonly Primitive[]): RenderOutput {
  const points: Vec2[] = [];
  const lines: RenderedLine[] = [];

  for (const prim of prims) {
    switch (prim.kind) {
      case 'point':
        points.push(xy(prim.point));
        break;
      case 'line':
        lines.push({ p0: xy(prim.points[0]), p1: xy(prim.points[1]), edge: `visible` });
        break;
      case 'triangle':
        for (const i of EDGE_INDICES) {
          const [a, b] = triEdge(prim.tri, i);
          lines.push({ p0: xy(a), p1: xy(b), edge: prim.tri.e[i] });
        }
        break;
    }
  }

  return { points, lines };
}

/**
 * Concatenate outputs, preserving order
 */
export function concatRenderOutputs(...outputs: RenderOutput[]): RenderOutput {
  return {
    points: outputs.flatMap((o) => o.points),
    lines: outputs.flatMap((o) => o.lines),
  };
}

/**
 * Copy of `output` with only lines of the given edge types. Points are kept.
 *
 * `keepOnly(output, 'visible')` is the usual "clean drawing" filter.
 */
export function keepOnly(output: RenderOutput, ...types: EdgeType[]): RenderOutput {
  const keep = new Set(types);
  return {
    points: [...output.points],
    lines: output.lines.filter((line) => keep.has(line.edge)),
  };
}

/**
 * True iff there is nothing to draw
 */
export function isRenderEmpty(output: RenderOutput): boolean {
  return output.points.length === 0 && output.lines.length === 0;
}

export function countLinesByEdgeType(output: RenderOutput): Record<EdgeType, number> {
  const counts: Record<EdgeType, number> = {
    visible: 0,
    invisible: 0,
    hidden: 0,
    split: 0,
    culled: 0,
  };
  for (const line of output.lines) {
    counts[line.edge]++;
  }
  return counts;
}

/**
 * Group lines by edge type, in EDGE_TYPES order, skipping empty groups
 */
export function groupLinesByEdgeType(
  output: RenderOutput
): Array<{ edge: EdgeType; lines: RenderedLine[] }> {
  return EDGE_TYPES.map((edge) => ({
    edge,
    lines: output.lines.filter((line) => line.edge === edge),
  })).filter((group) => group.lines.length > 0);
}
