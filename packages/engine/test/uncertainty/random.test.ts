import { describe, it, expect } from "vitest";
import {
  inverseNormalCdf,
  latinHypercubeNormals,
  mulberry32,
  standardNormal,
} from "../../src/uncertainty/random";

describe("mulberry32", () => {
  it("replays the same stream for the same seed", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it("produces values in [0, 1)", () => {
    const rng = mulberry32(1);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("differs between seeds", () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });
});

describe("standardNormal", () => {
  it("has roughly zero mean and unit variance", () => {
    const rng = mulberry32(99);
    const draws = Array.from({ length: 20000 }, () => standardNormal(rng));
    const mean = draws.reduce((s, v) => s + v, 0) / draws.length;
    const variance = draws.reduce((s, v) => s + (v - mean) ** 2, 0) / draws.length;

    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.05);
  });
});

describe("inverseNormalCdf", () => {
  it("is zero at the median", () => {
    expect(inverseNormalCdf(0.5)).toBe(0);
  });

  it("matches tabulated quantiles", () => {
    expect(inverseNormalCdf(0.975)).toBeCloseTo(1.959963985, 6);
    expect(inverseNormalCdf(0.01)).toBeCloseTo(-2.326347874, 6);
    expect(inverseNormalCdf(0.8413447461)).toBeCloseTo(1, 6);
  });

  it("is antisymmetric around the median", () => {
    expect(inverseNormalCdf(0.2)).toBeCloseTo(-inverseNormalCdf(0.8), 9);
    expect(inverseNormalCdf(0.001)).toBeCloseTo(-inverseNormalCdf(0.999), 9);
  });

  it("saturates at the ends", () => {
    expect(inverseNormalCdf(0)).toBe(-Infinity);
    expect(inverseNormalCdf(1)).toBe(Infinity);
  });
});

describe("latinHypercubeNormals", () => {
  it("draws exactly one value from each stratum", () => {
    const count = 100;
    const draws = latinHypercubeNormals(count, mulberry32(5));
    const sorted = [...draws].sort((a, b) => a - b);

    expect(draws).toHaveLength(count);
    sorted.forEach((v, k) => {
      expect(v).toBeGreaterThanOrEqual(inverseNormalCdf(k / count));
      expect(v).toBeLessThanOrEqual(inverseNormalCdf((k + 1) / count));
    });
  });

  it("shuffles the strata", () => {
    const draws = latinHypercubeNormals(50, mulberry32(11));
    const sorted = [...draws].sort((a, b) => a - b);
    expect(draws).not.toEqual(sorted);
  });
});
