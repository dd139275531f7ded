/**
 * Depth-ordered work queue
 *
 * Entries are immutable snapshots. Splitting a queued triangle never edits
 * its entry: each child gets a fresh entry carrying the parent's memo of
 * already-tested occluder edges plus the edge that caused the split.
 */

import type { EdgeIndex, Primitive } from '../geom/primitive.js';
import { primitiveCentroid } from '../geom/primitive.js';
import { GeometryInvariantError } from '../errors.js';

/**
 * Memo key for edge `edge` of the accepted primitive at `acceptedIndex`
 */
export type TestedEdgeKey = `${number}:${EdgeIndex}`;

export function testedEdgeKey(acceptedIndex: number, edge: EdgeIndex): TestedEdgeKey {
  return `${acceptedIndex}:${edge}`;
}

/**
 * A primitive waiting to be rendered
 */
export interface DepthSortedPrimitive {
  readonly prim: Primitive;
  /** Centroid z in normalized device coordinates; smaller is nearer */
  readonly depth: number;
  /** Occluder edges this primitive, or the triangle it was cut from, has been split by */
  readonly tested: ReadonlySet<TestedEdgeKey>;
}

/**
 * Wrap a projected primitive for the queue.
 *
 * @throws GeometryInvariantError if the depth key is NaN
 */
export function createDepthSorted(
  prim: Primitive,
  tested: ReadonlySet<TestedEdgeKey> = new Set()
): DepthSortedPrimitive {
  const depth = primitiveCentroid(prim)[2];
  if (Number.isNaN(depth)) {
    throw new GeometryInvariantError(`invalidDepth`, `Primitive has a NaN depth key`, { prim });
  }
  return { prim, depth, tested };
}

export function alreadyTested(
  entry: DepthSortedPrimitive,
  acceptedIndex: number,
  edge: EdgeIndex
): boolean {
  return entry.tested.has(testedEdgeKey(acceptedIndex, edge));
}

/**
 * Memo for the children of `entry` after a split on (acceptedIndex, edge)
 */
export function extendTested(
  entry: DepthSortedPrimitive,
  acceptedIndex: number,
  edge: EdgeIndex
): Set<TestedEdgeKey> {
  const tested = new Set(entry.tested);
  tested.add(testedEdgeKey(acceptedIndex, edge));
  return tested;
}

/**
 * Binary min-heap on depth. Equal depths pop in no particular order.
 */
export class DepthQueue {
  private heap: DepthSortedPrimitive[] = [];

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(entry: DepthSortedPrimitive): void {
    this.heap.push(entry);
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the nearest entry
   */
  pop(): DepthSortedPrimitive | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return top;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      if (this.heap[index].depth >= this.heap[parentIndex].depth) break;
      [this.heap[index], this.heap[parentIndex]] = [this.heap[parentIndex], this.heap[index]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    const lastIndex = this.heap.length - 1;
    while (true) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;

      if (left <= lastIndex && this.heap[left].depth < this.heap[smallest].depth) {
        smallest = left;
      }
      if (right <= lastIndex && this.heap[right].depth < this.heap[smallest].depth) {
        smallest = right;
      }
      if (smallest === index) break;

      [this.heap[index], this.heap[smallest]] = [this.heap[smallest], this.heap[index]];
      index = smallest;
    }
  }
}
