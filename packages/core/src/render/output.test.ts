/**
 * Tests for render output helpers
 */

import { describe, it, expect } from 'vitest';
import type { Primitive } from '../geom/primitive.js';
import { createTri } from '../geom/primitive.js';
import { vec4 } from '../num/vec4.js';
import type { RenderOutput } from './output.js';
import {
  EMPTY_RENDER_OUTPUT,
  concatRenderOutputs,
  countLinesByEdgeType,
  flattenPrimitives,
  groupLinesByEdgeType,
  isRenderEmpty,
  keepOnly,
} from './output.js';

const prims: Primitive[] = [
  { kind: 'point', point: vec4(0.1, 0.2, 0.3, 1) },
  { kind: 'line', points: [vec4(0, 0, 0, 1), vec4(1, 1, 0, 1)] },
  {
    kind: 'triangle',
    tri: createTri(vec4(0, 0, 0, 1), vec4(1, 0, 0, 1), vec4(0, 1, 0, 1), [
      'visible',
      'hidden',
      'split',
    ]),
  },
];

describe('flattenPrimitives', () => {
  const output = flattenPrimitives(prims);

  it('keeps points as 2D points', () => {
    expect(output.points).toEqual([[0.1, 0.2]]);
  });

  it('emits lines as visible and triangles as three tagged edges', () => {
    expect(output.lines).toEqual([
      { p0: [0, 0], p1: [1, 1], edge: 'visible' },
      { p0: [0, 0], p1: [1, 0], edge: 'visible' },
      { p0: [1, 0], p1: [0, 1], edge: 'hidden' },
      { p0: [0, 1], p1: [0, 0], edge: 'split' },
    ]);
  });
});

describe('output helpers', () => {
  const output = flattenPrimitives(prims);

  it('keepOnly filters lines and keeps points', () => {
    const visible = keepOnly(output, 'visible');
    expect(visible.lines).toHaveLength(2);
    expect(visible.points).toHaveLength(1);
    expect(keepOnly(output, 'hidden', 'split').lines.map((l) => l.edge)).toEqual([
      'hidden',
      'split',
    ]);
    expect(output.lines).toHaveLength(4);
  });

  it('counts lines per edge type', () => {
    expect(countLinesByEdgeType(output)).toEqual({
      visible: 2,
      invisible: 0,
      hidden: 1,
      split: 1,
      culled: 0,
    });
  });

  it('groups lines in edge type order', () => {
    const groups = groupLinesByEdgeType(output);
    expect(groups.map((g) => g.edge)).toEqual(['visible', 'hidden', 'split']);
    expect(groups[0].lines).toHaveLength(2);
  });

  it('concatenates in order', () => {
    const extra: RenderOutput = { points: [[0.5, 0.5]], lines: [] };
    const joined = concatRenderOutputs(output, extra);
    expect(joined.points).toEqual([[0.1, 0.2], [0.5, 0.5]]);
    expect(joined.lines).toEqual(output.lines);
  });

  it('detects empty output', () => {
    expect(isRenderEmpty(EMPTY_RENDER_OUTPUT)).toBe(true);
    expect(isRenderEmpty(keepOnly(output, 'culled'))).toBe(false);
    expect(isRenderEmpty(keepOnly({ points: [], lines: output.lines }, 'culled'))).toBe(true);
  });
});
