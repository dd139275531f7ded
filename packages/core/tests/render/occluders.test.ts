/**
 * Which occluder edges a queued triangle is tested against
 *
 * Splitting never changes the lines a scene produces here, only how many
 * edge tests it takes, so these scenes count calls into the splitter.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { Renderer } from "../../src/render/Renderer.js";
import { countLinesByEdgeType } from "../../src/render/output.js";
import { identity4 } from "../../src/num/mat4.js";
import { splitTriangleBySegment } from "../../src/geom/split.js";

vi.mock("../../src/geom/split.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/geom/split.js")>();
  return { ...actual, splitTriangleBySegment: vi.fn(actual.splitTriangleBySegment) };
});

const splitCalls = vi.mocked(splitTriangleBySegment);

describe("occluder edges", () => {
  beforeEach(() => {
    splitCalls.mockClear();
  });

  it("pieces skip the occluder edge they were cut along", () => {
    // far triangle cut by the hypotenuse of the near one into three pieces
    const renderer = new Renderer(identity4());
    renderer.addTriangle([-0.8, -0.8, 0.5], [0.8, -0.8, 0.5], [-0.8, 0.8, 0.5]);
    renderer.addTriangle([0, -0.9, -0.5], [0.9, -0.9, -0.5], [0.9, 0, -0.5]);
    const output = renderer.render();

    expect(countLinesByEdgeType(output)).toEqual({
      visible: 6,
      invisible: 0,
      hidden: 3,
      split: 3,
      culled: 0,
    });
    // far triangle: 3 near edges, the last one cuts
    // covered corner: 2 remaining near edges, then contained
    // first uncovered piece: 2 near edges
    // second uncovered piece: 2 near edges + 3 edges of the first piece
    expect(splitCalls).toHaveBeenCalledTimes(12);
  });

  it("hidden triangles do not occlude", () => {
    const renderer = new Renderer(identity4());
    // near: covers x <= 0 in the lower left
    renderer.addTriangle([-0.9, -0.9, -0.5], [0, -0.9, -0.5], [0, 0.9, -0.5]);
    // middle: inside the near triangle, so hidden
    renderer.addTriangle([-0.15, -0.5, 0], [-0.05, -0.5, 0], [-0.15, -0.3, 0]);
    // far: straddles x = 0 and covers the middle triangle's footprint
    renderer.addTriangle([-0.2, -0.6, 0.5], [0.6, -0.6, 0.5], [-0.2, 0.2, 0.5]);
    const output = renderer.render();

    // far triangle is cut once, along x = 0; the two pieces left of it are hidden
    expect(countLinesByEdgeType(output)).toEqual({
      visible: 5,
      invisible: 0,
      hidden: 9,
      split: 1,
      culled: 0,
    });
    const split = output.lines.filter((line) => line.edge === "split");
    expect(split[0].p0[0]).toBeCloseTo(0, 12);
    expect(split[0].p1[0]).toBeCloseTo(0, 12);

    // middle: 3 near edges, then contained
    // far: 2 near edges, the second cuts
    // each of the three pieces: 2 remaining near edges, and never the middle triangle
    expect(splitCalls).toHaveBeenCalledTimes(11);
  });
});
