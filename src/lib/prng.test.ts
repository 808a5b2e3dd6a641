import { describe, expect, it } from "vitest";

import { createRandom } from "./prng";

describe("createRandom", () => {
  it("should produce the same sequence for the same seed", () => {
    const a = createRandom("test-seed");
    const b = createRandom("test-seed");
    const first = Array.from({ length: 5 }, () => a());
    const second = Array.from({ length: 5 }, () => b());
    expect(first).toEqual(second);
  });

  it("should treat numeric and string seeds alike", () => {
    expect(createRandom(42)()).toBe(createRandom("42")());
  });

  it("should produce different sequences for different seeds", () => {
    const a = Array.from({ length: 5 }, createRandom("alpha"));
    const b = Array.from({ length: 5 }, createRandom("beta"));
    expect(a).not.toEqual(b);
  });

  it("should stay within [0, 1)", () => {
    const random = createRandom("range");
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
