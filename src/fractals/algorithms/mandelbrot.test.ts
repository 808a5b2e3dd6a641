import { describe, expect, it } from "vitest";

import { isKnownInterior, MandelbrotAlgorithm, mandelbrotAlgorithm } from "./mandelbrot";

describe("isKnownInterior", () => {
  it("should detect points of the main cardioid", () => {
    expect(isKnownInterior(0, 0)).toBe(true);
    expect(isKnownInterior(-0.5, 0)).toBe(true);
    expect(isKnownInterior(0.25, 0)).toBe(true); // cusp
  });

  it("should detect points of the period-2 bulb", () => {
    expect(isKnownInterior(-1, 0)).toBe(true);
    expect(isKnownInterior(-0.765, 0)).toBe(true);
  });

  it("should not claim points outside both regions", () => {
    expect(isKnownInterior(0.5, 0)).toBe(false);
    expect(isKnownInterior(-2, 0)).toBe(false);
    expect(isKnownInterior(0, 1)).toBe(false);
    expect(isKnownInterior(2, 2)).toBe(false);
  });
});

describe("MandelbrotAlgorithm", () => {
  const algorithm = new MandelbrotAlgorithm();
  const maxIterations = 1000;

  describe("metadata", () => {
    it("should have correct name", () => {
      expect(algorithm.name).toBe("Mandelbrot Set");
    });

    it("should have a description", () => {
      expect(typeof algorithm.description).toBe("string");
    });
  });

  describe("computePoint", () => {
    it("should return maxIterations without iterating inside the cardioid", () => {
      expect(algorithm.computePoint(0, 0, maxIterations)).toEqual({ value: maxIterations, iter: 0 });
      expect(algorithm.computePoint(-0.5, 0.2, maxIterations)).toEqual({ value: maxIterations, iter: 0 });
    });

    it("should return maxIterations without iterating inside the period-2 bulb", () => {
      expect(algorithm.computePoint(-1, 0, maxIterations)).toEqual({ value: maxIterations, iter: 0 });
    });

    it("should stop early on an orbit that lands on a fixed point", () => {
      // -2 → 2 → 2 → ... ; the snapshot taken at iteration 20 repeats at 21
      expect(algorithm.computePoint(-2, 0, maxIterations)).toEqual({ value: maxIterations, iter: 21 });
    });

    it("should stop early on a pre-periodic orbit", () => {
      // i → -1+i → -i → -1+i → ... ; snapshot at 20 is -1+i, seen again at 22
      expect(algorithm.computePoint(0, 1, maxIterations)).toEqual({ value: maxIterations, iter: 22 });
    });

    it("should cap at maxIterations when the period is not detected in time", () => {
      expect(algorithm.computePoint(-2, 0, 10)).toEqual({ value: 10, iter: 10 });
    });

    it("should return a smoothed count for escaping points", () => {
      // z1 = 2+2i, |z1|² = 8: value = 1 + 1 - log2(log2(8))
      const result = algorithm.computePoint(2, 2, maxIterations);
      expect(result.iter).toBe(1);
      expect(result.value).toBeCloseTo(2 - Math.log2(3), 12);
    });

    it("should clamp the smoothed count at zero for points far outside", () => {
      expect(algorithm.computePoint(10, 0, maxIterations)).toEqual({ value: 0, iter: 1 });
    });

    it("should keep escaped values strictly below maxIterations", () => {
      let escaped = 0;
      for (let x = -2.5; x <= 1; x += 0.05) {
        for (let y = -1.25; y <= 1.25; y += 0.05) {
          const { value, iter } = algorithm.computePoint(x, y, 200);
          if (iter >= 200 || value === 200) continue;
          escaped++;
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThan(200);
        }
      }
      expect(escaped).toBeGreaterThan(0);
    });

    it("should report non-escaping points as exactly maxIterations", () => {
      for (const [x, y] of [
        [0, 0],
        [-1, 0],
        [-1.3, 0],
      ]) {
        expect(algorithm.computePoint(x, y, 200).value).toBe(200);
      }
    });

    it("should escape for point at (0.5, 0)", () => {
      const result = algorithm.computePoint(0.5, 0, maxIterations);
      expect(result.value).toBeGreaterThan(0);
      expect(result.value).toBeLessThan(maxIterations);
    });

    it("should grow the smoothed count towards the boundary", () => {
      const far = algorithm.computePoint(0.5, 0, maxIterations).value;
      const near = algorithm.computePoint(0.3, 0, maxIterations).value;
      expect(near).toBeGreaterThan(far);
    });

    it("should be consistent with repeated calls", () => {
      expect(algorithm.computePoint(0.4, 0.4, maxIterations)).toEqual(algorithm.computePoint(0.4, 0.4, maxIterations));
    });
  });

  describe("default instance", () => {
    it("should export a default instance", () => {
      expect(mandelbrotAlgorithm).toBeInstanceOf(MandelbrotAlgorithm);
    });
  });
});
