/**
 * Pair scoring strategies for the trainer.
 *
 * - `"frequency"`  -- raw aggregate pair frequency (default)
 * - `"likelihood"` -- pair frequency over the product of the two symbol
 *   frequencies, which favours pairs whose parts rarely appear apart
 */
import { Registry, type PairScorer } from "@piecewise/core";

export const frequencyScorer: PairScorer = {
  name: "frequency",
  rankByPairFreq: true,
  score: ({ pairFreq }) => pairFreq,
};

export const likelihoodScorer: PairScorer = {
  name: "likelihood",
  rankByPairFreq: false,
  score: ({ pairFreq, leftFreq, rightFreq }) => pairFreq / (leftFreq * rightFreq),
};

export const pairScorerRegistry = new Registry<PairScorer>("scorer");

pairScorerRegistry.register("frequency", () => frequencyScorer);
pairScorerRegistry.register("likelihood", () => likelihoodScorer);
