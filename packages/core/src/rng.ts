/**
 * Seeded PRNG (mulberry32) for reproducible synthetic corpora.
 */
import type { Rng } from "./interfaces.js";

export class SeededRng implements Rng {
  private _a: number;
  private _seed: number;

  constructor(seed = 42) {
    this._seed = seed;
    this._a = seed | 0;
  }

  seed(s: number): void {
    this._seed = s;
    this._a = s | 0;
  }

  state(): number {
    return this._seed;
  }

  /** Returns a number in [0, 1). */
  next(): number {
    this._a = (this._a + 0x6d2b79f5) | 0;
    let t = this._a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }
}
