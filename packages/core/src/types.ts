/**
 * Core config types for the piecewise system.
 */

// ── Tokenizer config ───────────────────────────────────────────────────────
export interface TokenizerConfig {
  readonly lowercase: boolean;
  readonly unkToken: string;
  readonly continuationPrefix: string;
  /** Words longer than this (in code points) go straight to the unknown token. */
  readonly maxInputCharsPerWord: number;
  /**
   * Tokens passed through verbatim and kept out of segmentation.
   * When omitted, bracketed entries such as `[CLS]` or `<s>` are special.
   */
  readonly specialTokens?: readonly string[];
}

export const defaultTokenizerConfig: TokenizerConfig = {
  lowercase: true,
  unkToken: "[UNK]",
  continuationPrefix: "##",
  maxInputCharsPerWord: 200,
};

// ── Trainer config ─────────────────────────────────────────────────────────
export interface TrainerConfig {
  readonly vocabSize: number;
  readonly minFrequency: number;
  readonly specialTokens: readonly string[];
  readonly lowercase: boolean;
  readonly continuationPrefix: string;
  /** Name of a registered pair scorer. */
  readonly scorer: string;
}

export const defaultSpecialTokens: readonly string[] = ["[UNK]", "[CLS]", "[SEP]", "[PAD]", "[MASK]"];

export const defaultTrainerConfig: TrainerConfig = {
  vocabSize: 30000,
  minFrequency: 2,
  specialTokens: defaultSpecialTokens,
  lowercase: true,
  continuationPrefix: "##",
  scorer: "frequency",
};

// ── Bench config ───────────────────────────────────────────────────────────
export interface BenchConfig {
  readonly sizes: readonly number[];
  readonly iters: number;
  readonly seed: number;
}

export const defaultBenchConfig: BenchConfig = {
  sizes: [10, 100, 1000, 10000],
  iters: 5,
  seed: 42,
};
