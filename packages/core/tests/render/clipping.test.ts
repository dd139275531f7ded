/**
 * View-volume culling
 */

import { describe, it, expect } from "vitest";
import { Renderer } from "../../src/render/Renderer.js";
import { isRenderEmpty } from "../../src/render/output.js";
import { frontCamera } from "../fixtures/scenes.js";

describe("clipping", () => {
  describe("points", () => {
    it("culls points beyond each side of the view volume", () => {
      const outside: Array<[number, number, number]> = [
        [-10, 0, 0],
        [10, 0, 0],
        [0, -10, 0],
        [0, 10, 0],
        [0, 0, 6], // behind the camera
        [0, 0, -6], // beyond the far plane
      ];
      for (const p of outside) {
        const renderer = new Renderer(frontCamera());
        renderer.addPoint(p);
        expect(isRenderEmpty(renderer.render())).toBe(true);
      }
    });

    it("keeps points in view and projects them", () => {
      const renderer = new Renderer(frontCamera());
      renderer.addPoint([-1, 0, 0]);
      const output = renderer.render();

      expect(output.lines).toHaveLength(0);
      expect(output.points).toHaveLength(1);
      expect(output.points[0][0]).toBeCloseTo(-0.2, 10);
      expect(output.points[0][1]).toBeCloseTo(0, 10);
    });
  });

  describe("lines", () => {
    it("culls lines entirely beyond one side", () => {
      const outside: Array<[[number, number, number], [number, number, number]]> = [
        [[-10, 0, 0], [-9, 0, 0]],
        [[9, 0, 0], [10, 0, 0]],
        [[0, -10, 0], [0, -9, 0]],
        [[0, 9, 0], [0, 10, 0]],
        [[0, 0, -10], [0, 0, -9]],
        [[0, 0, 10], [0, 0, 9]],
      ];
      for (const [a, b] of outside) {
        const renderer = new Renderer(frontCamera());
        renderer.addLine(a, b);
        expect(isRenderEmpty(renderer.render())).toBe(true);
      }
    });

    it("keeps lines that straddle a plane whole", () => {
      const renderer = new Renderer(frontCamera());
      renderer.addLine([-10, 0, 0], [0, 0, 0]);
      const output = renderer.render();

      expect(output.lines).toHaveLength(1);
      expect(output.lines[0].edge).toBe("visible");
      expect(output.lines[0].p0[0]).toBeCloseTo(-2, 10);
      expect(output.lines[0].p1[0]).toBeCloseTo(0, 10);
    });
  });

  describe("triangles", () => {
    it("culls triangles entirely beyond one side", () => {
      const renderer = new Renderer(frontCamera());
      renderer.addTriangle([-10, 0, 0], [-9, 0, 0], [-9, 1, 0]);
      renderer.addTriangle([0, 0, 7], [1, 0, 7], [0, 1, 7]);
      expect(renderer.primitiveCount).toBe(2);
      expect(isRenderEmpty(renderer.render())).toBe(true);
    });

    it("keeps triangles partially in view", () => {
      const renderer = new Renderer(frontCamera());
      renderer.addTriangle([-10, 0, 0], [0, 0, 0], [0, 1, 0]);
      expect(renderer.render().lines).toHaveLength(3);
    });

    it("honours a custom depth range", () => {
      const renderer = new Renderer(frontCamera(), { depthRange: [-1, 0.9] });
      // NDC depth of the z = 0 plane is 48.5 / 49.5, beyond 0.9
      renderer.addTriangle([0, 0, 0], [1, 0, 0], [0, 1, 0]);
      expect(isRenderEmpty(renderer.render())).toBe(true);
    });
  });
});
