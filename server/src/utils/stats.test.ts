import { describe, expect, it } from "vitest";
import { quantile, round3, roundHalfEven, spread, weightedLinearFit, weightedMedian } from "./stats.js";

describe("weightedMedian", () => {
  it("equals the ordinary median for an odd count with equal weights", () => {
    expect(weightedMedian([3, 1, 2], [1, 1, 1])).toBe(2);
    expect(weightedMedian([5, 1, 9, 3, 7], [2, 2, 2, 2, 2])).toBe(5);
  });

  it("returns the lower middle value for an even count with equal weights", () => {
    expect(weightedMedian([4, 1, 3, 2], [1, 1, 1, 1])).toBe(2);
  });

  it("leans toward heavily weighted values", () => {
    expect(weightedMedian([10, 20, 30], [1, 1, 5])).toBe(30);
  });

  it("is NaN for empty input", () => {
    expect(weightedMedian([], [])).toBeNaN();
  });

  it("rejects mismatched weights", () => {
    expect(() => weightedMedian([1, 2], [1])).toThrow(/2 values but 1 weights/);
  });
});

describe("quantile", () => {
  it("interpolates between ranks", () => {
    expect(quantile([1, 2, 3, 4, 5], 0.75)).toBe(4);
    expect(quantile([0, 10], 0.9)).toBe(9);
    expect(quantile([30, 10, 20], 0.5)).toBe(20);
  });

  it("is NaN for empty input", () => {
    expect(quantile([], 0.5)).toBeNaN();
  });
});

describe("spread", () => {
  it("is max minus min", () => {
    expect(spread([4, 9, 2])).toBe(7);
    expect(spread([])).toBe(0);
  });
});

describe("weightedLinearFit", () => {
  it("recovers an exact line regardless of weights", () => {
    const fit = weightedLinearFit([0, 1, 2, 3], [1, 3, 5, 7], [1, 3, 2, 1]);
    expect(fit?.slope).toBeCloseTo(2, 10);
    expect(fit?.intercept).toBeCloseTo(1, 10);
  });

  it("pulls the line toward heavier rows", () => {
    // Rows (0,0) and (1,1) agree on slope 1; (2,0) disagrees
    const light = weightedLinearFit([0, 1, 2], [0, 1, 0], [1, 1, 1]);
    const heavy = weightedLinearFit([0, 1, 2], [0, 1, 0], [3, 3, 1]);
    expect(light?.slope).toBeCloseTo(0, 10);
    expect(heavy?.slope ?? 0).toBeGreaterThan(0);
  });

  it("returns null when x has no spread", () => {
    expect(weightedLinearFit([2, 2, 2], [1, 2, 3], [1, 1, 1])).toBeNull();
  });

  it("returns null for empty or mismatched input", () => {
    expect(weightedLinearFit([], [], [])).toBeNull();
    expect(weightedLinearFit([1, 2], [1], [1, 1])).toBeNull();
  });
});

describe("round3", () => {
  it("rounds to milliseconds", () => {
    expect(round3(1.23456)).toBe(1.235);
    expect(round3(14.883)).toBe(14.883);
  });
});

describe("roundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it("rounds everything else to the nearest integer", () => {
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(1.4)).toBe(1);
    expect(roundHalfEven(7)).toBe(7);
  });
});
