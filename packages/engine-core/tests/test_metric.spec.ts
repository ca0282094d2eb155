import { describe, it, expect } from "vitest";
import { TriplePoint } from "../src/metric";
import { InvalidRangeError } from "../src/errors";

describe("triple point metric", () => {
  const m = TriplePoint.create(0.2, 0.5, 0.8);

  it("maps the breakpoints to 0, 0.5 and 1", () => {
    expect(m.value(0.2)).toBe(0);
    expect(m.value(0.5)).toBe(0.5);
    expect(m.value(0.8)).toBe(1);
  });

  it("interpolates linearly between breakpoints and clamps outside", () => {
    expect(m.value(0)).toBe(0);
    expect(m.value(0.35)).toBeCloseTo(0.25);
    expect(m.value(0.65)).toBeCloseTo(0.75);
    expect(m.value(1)).toBe(1);
  });

  it("is monotonically non-decreasing over [0, 1]", () => {
    let prev = -Infinity;
    for (let i = 0; i <= 100; i++) {
      const v = m.value(i / 100);
      expect(v).toBeGreaterThanOrEqual(prev);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(1);
      prev = v;
    }
  });

  it("rejects descending breakpoints", () => {
    expect(() => TriplePoint.create(0.9, 0.5, 0.2)).toThrow(InvalidRangeError);
  });

  it("rejects breakpoints outside [0, 1] and NaN", () => {
    expect(() => TriplePoint.create(-0.1, 0.5, 0.9)).toThrow(InvalidRangeError);
    expect(() => TriplePoint.create(0.1, 0.5, 1.1)).toThrow(InvalidRangeError);
    expect(() => TriplePoint.create(Number.NaN, 0.5, 0.9)).toThrow(InvalidRangeError);
  });

  it("substitutes the default for invalid breakpoints", () => {
    const d = TriplePoint.orDefault(0.9, 0.5, 0.2);
    expect([d.lo, d.mid, d.hi]).toEqual([0.25, 0.5, 0.75]);
    const kept = TriplePoint.orDefault(0.5, 0.9, 0.975);
    expect([kept.lo, kept.mid, kept.hi]).toEqual([0.5, 0.9, 0.975]);
  });
});
