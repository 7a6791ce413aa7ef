/**
 * Deterministic synthetic text for benchmarks.
 */
import type { Rng } from "@piecewise/core";

const LETTERS = "abcdefghijklmnopqrstuvwxyz";

/** `count` random lowercase words of 3-10 letters joined by single spaces. */
export function syntheticText(rng: Rng, count: number): string {
  const words: string[] = [];
  for (let w = 0; w < count; w++) {
    const len = 3 + rng.nextInt(8);
    let word = "";
    for (let i = 0; i < len; i++) word += LETTERS[rng.nextInt(LETTERS.length)];
    words.push(word);
  }
  return words.join(" ");
}
