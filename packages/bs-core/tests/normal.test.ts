import { describe, it, expect } from "vitest";
import { normCdf, normPdf } from "../src/normal";

describe("normCdf", () => {
  const known: Array<[number, number]> = [
    [0, 0.5],
    [1, 0.8413447460685429],
    [-1, 0.15865525393145707],
    [1.96, 0.9750021048517795],
    [-3, 0.0013498980316300957],
    [5, 0.9999997133484281],
  ];

  it.each(known)("Φ(%d) to double precision", (x, expected) => {
    expect(Math.abs(normCdf(x) - expected)).toBeLessThan(1e-14);
  });

  it("is symmetric: Φ(x) + Φ(-x) = 1", () => {
    for (const x of [0.1, 0.35, 2.5, 6.9, 7.5, 12]) {
      expect(normCdf(x) + normCdf(-x)).toBeCloseTo(1, 15);
    }
  });

  it("keeps relative accuracy in the far tail", () => {
    const ref = 9.479534822203355e-18; // Φ(-8.5)
    expect(Math.abs(normCdf(-8.5) / ref - 1)).toBeLessThan(1e-7);
  });

  it("saturates beyond the representable tail", () => {
    expect(normCdf(-40)).toBe(0);
    expect(normCdf(40)).toBe(1);
  });

  it("propagates NaN", () => {
    expect(normCdf(NaN)).toBeNaN();
  });
});

describe("normPdf", () => {
  it("matches the closed form", () => {
    expect(normPdf(0)).toBeCloseTo(0.3989422804014327, 15);
    expect(normPdf(1)).toBeCloseTo(0.24197072451914337, 15);
    expect(normPdf(-1)).toBe(normPdf(1));
  });
});
