import { describe, it, expect } from "vitest";
import {
  TOLERANCES,
  EPS,
  LINE_LENGTH_EPS,
  insideUnitRange,
  onUnitBoundary,
} from "../../src/num/tolerance.js";

describe("tolerance", () => {
  it("should expose the shared constants", () => {
    expect(EPS).toBe(TOLERANCES.comparison);
    expect(LINE_LENGTH_EPS).toBe(TOLERANCES.minEdgeLength);
    expect(Object.isFrozen(TOLERANCES)).toBe(true);
  });

  describe("insideUnitRange", () => {
    it("should accept interior parameters", () => {
      expect(insideUnitRange(0.5)).toBe(true);
      expect(insideUnitRange(EPS)).toBe(true);
    });

    it("should reject parameters at or beyond the ends", () => {
      expect(insideUnitRange(0)).toBe(false);
      expect(insideUnitRange(1)).toBe(false);
      expect(insideUnitRange(EPS / 2)).toBe(false);
      expect(insideUnitRange(-0.5)).toBe(false);
      expect(insideUnitRange(1.5)).toBe(false);
    });
  });

  describe("onUnitBoundary", () => {
    it("should accept values near 0 and 1", () => {
      expect(onUnitBoundary(0)).toBe(true);
      expect(onUnitBoundary(1)).toBe(true);
      expect(onUnitBoundary(-EPS / 2)).toBe(true);
      expect(onUnitBoundary(1 + EPS / 2)).toBe(true);
    });

    it("should reject everything else", () => {
      expect(onUnitBoundary(0.5)).toBe(false);
      expect(onUnitBoundary(2 * EPS)).toBe(false);
      expect(onUnitBoundary(-0.1)).toBe(false);
    });
  });
});
