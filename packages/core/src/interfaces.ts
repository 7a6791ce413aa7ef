/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context } from "effect";

// ── Vocabulary ─────────────────────────────────────────────────────────────

/** Plain token -> id exchange format. */
export type VocabMapping = ReadonlyMap<string, number>;

/** Literal vocabularies may also be supplied as plain objects. */
export type VocabInput = VocabMapping | Readonly<Record<string, number>>;

// ── Tokenizer ──────────────────────────────────────────────────────────────
export interface Tokenizer {
  readonly name: string;
  readonly vocabSize: number;
  tokenize(text: string): string[];
  encode(text: string): Int32Array;
  decode(ids: ArrayLike<number>): string;
}

export class TokenizerService extends Context.Tag("TokenizerService")<
  TokenizerService,
  Tokenizer
>() {}

// ── Pair scoring (training) ────────────────────────────────────────────────

/** Statistics for one candidate merge. */
export interface PairStats {
  /** Aggregate corpus frequency of the adjacent pair. */
  readonly pairFreq: number;
  /** Corpus frequency of the left symbol. */
  readonly leftFreq: number;
  /** Corpus frequency of the right symbol. */
  readonly rightFreq: number;
}

export interface PairScorer {
  readonly name: string;
  /**
   * True when the score is `pairFreq` itself, so candidates can be ranked by
   * count alone and kept in a heap instead of rescored every round.
   */
  readonly rankByPairFreq: boolean;
  /** Higher is better. Must be deterministic. */
  score(stats: PairStats): number;
}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextInt(maxExclusive: number): number;
  state(): number;
  seed(s: number): void;
}
