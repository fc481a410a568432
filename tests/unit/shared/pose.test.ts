import { describe, it, expect } from "vitest";
import {
  ORIGIN_POSE,
  clamp,
  createPose,
  formatPose,
  planarDistance,
  progressFraction,
} from "@shared/geometry/pose.js";

describe("pose helpers", () => {
  describe("planarDistance", () => {
    it("should ignore the z axis", () => {
      expect(planarDistance(createPose(0, 0, 5), createPose(3, 4, -2))).toBe(5);
    });

    it("should be symmetric and zero only for the same planar position", () => {
      const a = createPose(1, -2, 3);
      const b = createPose(-4, 0.5, 0);

      expect(planarDistance(a, b)).toBe(planarDistance(b, a));
      expect(planarDistance(a, createPose(1, -2, 9))).toBe(0);
      expect(planarDistance(a, createPose(1, -2.001))).toBeGreaterThan(0);
    });

    it("should measure from the origin pose", () => {
      expect(planarDistance(ORIGIN_POSE, createPose(6, 8))).toBe(10);
    });
  });

  describe("progressFraction", () => {
    it("should report covered share of the route", () => {
      expect(progressFraction(2.5, 10)).toBe(0.75);
    });

    it("should clamp overshoot into [0, 1]", () => {
      expect(progressFraction(12, 10)).toBe(0);
      expect(progressFraction(-1, 10)).toBe(1);
    });

    it("should treat a zero initial distance as done", () => {
      expect(progressFraction(0, 0)).toBe(1);
    });

    it("should return 0 for a NaN remaining distance", () => {
      expect(progressFraction(Number.NaN, 4)).toBe(0);
    });
  });

  it("should clamp values", () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.4, 0, 1)).toBe(0.4);
  });

  it("should format positions with two decimals", () => {
    expect(formatPose(createPose(6, -2.5))).toBe("(6.00, -2.50, 0.00)");
  });

  it("should copy the orientation into new poses", () => {
    const pose = createPose(1, 2);
    expect(pose.orientation).toEqual({ x: 0, y: 0, z: 0, w: 1 });
    expect(Object.isFrozen(pose.orientation)).toBe(false);
  });
});
