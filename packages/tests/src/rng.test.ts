import { describe, it, expect } from "vitest";
import { SeededRng } from "@piecewise/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("nextInt stays within bounds", () => {
    const rng = new SeededRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.nextInt(26);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(26);
    }
  });

  it("spreads nextInt evenly over its range", () => {
    const rng = new SeededRng(42);
    const counts = new Array<number>(26).fill(0);
    for (let i = 0; i < 26000; i++) counts[rng.nextInt(26)]++;
    for (const c of counts) {
      expect(c).toBeGreaterThan(800);
      expect(c).toBeLessThan(1200);
    }
  });

  it("reseeding restarts the sequence", () => {
    const rng = new SeededRng(5);
    const first = rng.next();
    rng.next();
    rng.seed(5);
    expect(rng.next()).toBe(first);
    expect(rng.state()).toBe(5);
  });
});
