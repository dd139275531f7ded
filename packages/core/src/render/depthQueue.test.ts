/**
 * Tests for the depth-ordered work queue
 */

import { describe, it, expect } from 'vitest';
import type { Primitive } from '../geom/primitive.js';
import { vec4 } from '../num/vec4.js';
import {
  DepthQueue,
  alreadyTested,
  createDepthSorted,
  extendTested,
  testedEdgeKey,
} from './depthQueue.js';
import { GeometryInvariantError } from '../errors.js';

function pointAt(z: number): Primitive {
  return { kind: 'point', point: vec4(0, 0, z, 1) };
}

describe('DepthQueue', () => {
  it('pops nearest first', () => {
    const queue = new DepthQueue();
    for (const z of [0.5, -0.25, 0.9, 0, -0.75, 0.1]) {
      queue.push(createDepthSorted(pointAt(z)));
    }
    expect(queue.size).toBe(6);

    const depths: number[] = [];
    for (let entry = queue.pop(); entry !== undefined; entry = queue.pop()) {
      depths.push(entry.depth);
    }
    expect(depths).toEqual([-0.75, -0.25, 0, 0.1, 0.5, 0.9]);
    expect(queue.isEmpty()).toBe(true);
  });

  it('returns undefined when empty', () => {
    expect(new DepthQueue().pop()).toBeUndefined();
  });

  it('interleaves pushes and pops', () => {
    const queue = new DepthQueue();
    queue.push(createDepthSorted(pointAt(0.4)));
    queue.push(createDepthSorted(pointAt(0.2)));
    expect(queue.pop()?.depth).toBe(0.2);
    queue.push(createDepthSorted(pointAt(0.3)));
    queue.push(createDepthSorted(pointAt(0.8)));
    expect(queue.pop()?.depth).toBe(0.3);
    expect(queue.pop()?.depth).toBe(0.4);
    expect(queue.pop()?.depth).toBe(0.8);
  });
});

describe('createDepthSorted', () => {
  it('uses the centroid depth', () => {
    const line: Primitive = { kind: 'line', points: [vec4(0, 0, 0.2, 1), vec4(1, 1, 0.6, 1)] };
    expect(createDepthSorted(line).depth).toBeCloseTo(0.4, 12);
  });

  it('rejects NaN depth', () => {
    expect(() => createDepthSorted(pointAt(NaN))).toThrow(GeometryInvariantError);
  });
});

describe('tested-edge memo', () => {
  it('children inherit the memo plus the splitting edge', () => {
    const parent = createDepthSorted(pointAt(0), new Set([testedEdgeKey(0, 1)]));
    const tested = extendTested(parent, 3, 2);

    expect([...tested].sort()).toEqual(['0:1', '3:2']);
    expect(alreadyTested(parent, 3, 2)).toBe(false);
    expect(alreadyTested(createDepthSorted(pointAt(0), tested), 3, 2)).toBe(true);
  });

  it('keys distinguish primitive and edge', () => {
    expect(testedEdgeKey(1, 2)).toBe('1:2');
    expect(testedEdgeKey(12, 0)).not.toBe(testedEdgeKey(1, 2));
  });
});
