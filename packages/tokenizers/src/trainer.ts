/**
 * WordPiece vocabulary trainer.
 *
 * Every distinct corpus word starts as a sequence of single characters (the
 * first bare, the rest continuation-prefixed). The best adjacent pair is
 * merged everywhere it occurs, repeatedly, until the vocabulary budget is
 * spent or no pair reaches `minFrequency`.
 *
 * Symbols are interned into an arena and words hold symbol indices, so a
 * merge never re-concatenates strings. Each pair remembers the words it
 * occurs in, so a merge only revisits those words. Under a count-only scorer
 * the candidates sit in a max-heap; entries whose count no longer matches
 * the live count are skipped when popped.
 */
import { Effect } from "effect";
import {
  InvalidParameters,
  defaultTrainerConfig,
  type PairScorer,
  type TrainerConfig,
  type VocabMapping,
} from "@piecewise/core";
import { normalizeWord, splitWords } from "./pretokenize.js";
import { pairScorerRegistry } from "./scorers.js";
import { MaxHeap } from "./heap.js";

/** Pair keys pack (left, right) into one number: left * STRIDE + right. */
const PAIR_STRIDE = 2 ** 26;
const pairKey = (left: number, right: number) => left * PAIR_STRIDE + right;

const PROGRESS_EVERY = 1000;

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

interface PairEntry {
  readonly key: number;
  readonly count: number;
}

interface WordEntry {
  symbols: number[];
  readonly freq: number;
}

/** A symbol that made it into the vocabulary, with its corpus frequency. */
export interface LearnedSymbol {
  readonly symbol: string;
  readonly freq: number;
}

/** Mutable working state of one training run. */
class MergeState {
  private readonly _prefix: string;
  private readonly _scorer: PairScorer;

  /** symbol id -> string */
  private readonly _symbols: string[] = [];
  private readonly _symbolIds = new Map<string, number>();
  /** symbol id -> current corpus frequency */
  private readonly _symbolFreq: number[] = [];

  private readonly _words: WordEntry[] = [];
  private readonly _pairCounts = new Map<number, number>();
  /** pair key -> indices of words that (may) contain it */
  private readonly _pairWhere = new Map<number, Set<number>>();

  /** Only set for scorers that rank by pair count alone. */
  private readonly _heap: MaxHeap<PairEntry> | undefined;

  /** Symbols interned before any merge: the character alphabet. */
  private readonly _alphabet: LearnedSymbol[];

  constructor(wordCounts: ReadonlyMap<string, number>, prefix: string, scorer: PairScorer) {
    this._prefix = prefix;
    this._scorer = scorer;

    for (const [word, freq] of wordCounts) {
      const chars = Array.from(word);
      const symbols = chars.map((ch, i) => this._intern(i === 0 ? ch : prefix + ch));
      for (const id of symbols) this._symbolFreq[id] += freq;
      this._words.push({ symbols, freq });
    }
    for (let w = 0; w < this._words.length; w++) {
      this._addPairs(w);
    }

    this._alphabet = this._symbols.map((symbol, id) => ({ symbol, freq: this._symbolFreq[id] }));

    if (scorer.rankByPairFreq) {
      const entries = [...this._pairCounts].map(([key, count]) => ({ key, count }));
      this._heap = new MaxHeap<PairEntry>(
        (a, b) => a.count > b.count || (a.count === b.count && this._tieBreak(a.key, b.key) < 0),
        entries,
      );
    }
  }

  get wordCount(): number {
    return this._words.length;
  }

  /** Character symbols seen in the corpus, with their frequency before merging. */
  get alphabet(): readonly LearnedSymbol[] {
    return this._alphabet;
  }

  /**
   * Best pair among those at or above `minFrequency`: highest score, then
   * smallest concatenated spelling, then smallest left symbol.
   */
  bestPair(minFrequency: number): number | undefined {
    if (this._heap) return this._popBest(this._heap, minFrequency);

    const scorer = this._scorer;
    let bestKey: number | undefined;
    let bestScore = -Infinity;
    for (const [key, count] of this._pairCounts) {
      if (count < minFrequency) continue;
      const left = Math.floor(key / PAIR_STRIDE);
      const right = key % PAIR_STRIDE;
      const score = scorer.score({
        pairFreq: count,
        leftFreq: this._symbolFreq[left],
        rightFreq: this._symbolFreq[right],
      });
      if (bestKey === undefined || score > bestScore) {
        bestKey = key;
        bestScore = score;
      } else if (score === bestScore && this._tieBreak(key, bestKey) < 0) {
        bestKey = key;
      }
    }
    return bestKey;
  }

  /** Merge `key` in every word containing it; returns the product. */
  merge(key: number): LearnedSymbol {
    const left = Math.floor(key / PAIR_STRIDE);
    const right = key % PAIR_STRIDE;
    const freq = this._pairCounts.get(key) ?? 0;
    const product = this._symbols[left] + this._symbols[right].slice(this._prefix.length);
    const productId = this._intern(product);

    const where = [...(this._pairWhere.get(key) ?? [])];
    for (const w of where) {
      const word = this._words[w];
      if (!this._contains(word.symbols, left, right)) continue;

      this._removePairs(w);
      const next: number[] = [];
      const src = word.symbols;
      let i = 0;
      while (i < src.length) {
        if (i < src.length - 1 && src[i] === left && src[i + 1] === right) {
          next.push(productId);
          this._symbolFreq[left] -= word.freq;
          this._symbolFreq[right] -= word.freq;
          this._symbolFreq[productId] += word.freq;
          i += 2;
        } else {
          next.push(src[i]);
          i += 1;
        }
      }
      word.symbols = next;
      this._addPairs(w);
    }

    this._pairCounts.delete(key);
    this._pairWhere.delete(key);
    return { symbol: product, freq };
  }

  // ── Internal helpers ─────────────────────────────────────────────────────

  private _popBest(heap: MaxHeap<PairEntry>, minFrequency: number): number | undefined {
    for (let entry = heap.pop(); entry !== undefined; entry = heap.pop()) {
      if (this._pairCounts.get(entry.key) !== entry.count) continue;
      return entry.count >= minFrequency ? entry.key : undefined;
    }
    return undefined;
  }

  private _intern(symbol: string): number {
    let id = this._symbolIds.get(symbol);
    if (id === undefined) {
      id = this._symbols.length;
      if (id >= PAIR_STRIDE) {
        throw new RangeError(`Symbol arena exceeded ${PAIR_STRIDE} entries`);
      }
      this._symbols.push(symbol);
      this._symbolIds.set(symbol, id);
      this._symbolFreq.push(0);
    }
    return id;
  }

  private _tieBreak(a: number, b: number): number {
    const al = this._symbols[Math.floor(a / PAIR_STRIDE)];
    const ar = this._symbols[a % PAIR_STRIDE];
    const bl = this._symbols[Math.floor(b / PAIR_STRIDE)];
    const br = this._symbols[b % PAIR_STRIDE];
    return compareStrings(al + ar, bl + br) || compareStrings(al, bl);
  }

  private _contains(symbols: readonly number[], left: number, right: number): boolean {
    for (let i = 0; i < symbols.length - 1; i++) {
      if (symbols[i] === left && symbols[i + 1] === right) return true;
    }
    return false;
  }

  private _addPairs(w: number): void {
    const { symbols, freq } = this._words[w];
    for (let i = 0; i < symbols.length - 1; i++) {
      const key = pairKey(symbols[i], symbols[i + 1]);
      const count = (this._pairCounts.get(key) ?? 0) + freq;
      this._pairCounts.set(key, count);
      this._heap?.push({ key, count });
      let where = this._pairWhere.get(key);
      if (!where) {
        where = new Set();
        this._pairWhere.set(key, where);
      }
      where.add(w);
    }
  }

  private _removePairs(w: number): void {
    const { symbols, freq } = this._words[w];
    for (let i = 0; i < symbols.length - 1; i++) {
      const key = pairKey(symbols[i], symbols[i + 1]);
      const c = this._pairCounts.get(key);
      if (c === undefined) continue;
      if (c <= freq) {
        this._pairCounts.delete(key);
        this._pairWhere.delete(key);
      } else {
        this._pairCounts.set(key, c - freq);
        this._heap?.push({ key, count: c - freq });
      }
    }
  }
}

/** Count each distinct (normalised) word; special tokens are not counted. */
export function countWords(
  texts: readonly string[],
  lowercase: boolean,
  special: ReadonlySet<string>,
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const text of texts) {
    for (const raw of splitWords(text)) {
      if (special.has(raw)) continue;
      const word = normalizeWord(raw, lowercase);
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }
  }
  return counts;
}

function invalid(message: string): Effect.Effect<never, InvalidParameters> {
  return Effect.fail(new InvalidParameters({ message }));
}

function validate(config: TrainerConfig, texts: readonly string[]): Effect.Effect<void, InvalidParameters> {
  const { vocabSize, minFrequency, specialTokens, continuationPrefix } = config;
  if (!Number.isInteger(vocabSize) || vocabSize < 1) {
    return invalid(`vocabSize must be a positive integer, got ${vocabSize}`);
  }
  if (vocabSize < specialTokens.length) {
    return invalid(`vocabSize ${vocabSize} is smaller than the ${specialTokens.length} special tokens`);
  }
  if (!Number.isInteger(minFrequency) || minFrequency < 1) {
    return invalid(`minFrequency must be an integer >= 1, got ${minFrequency}`);
  }
  if (new Set(specialTokens).size !== specialTokens.length) {
    return invalid(`specialTokens contains duplicates: ${specialTokens.join(", ")}`);
  }
  if (continuationPrefix.length === 0) {
    return invalid("continuationPrefix must not be empty");
  }
  if (texts.length === 0) {
    return invalid("Cannot train on an empty corpus");
  }
  return Effect.void;
}

/**
 * Keep at most `budget` alphabet symbols: the most frequent ones, listed in
 * code-unit order.
 */
function selectAlphabet(alphabet: readonly LearnedSymbol[], minFrequency: number, budget: number): LearnedSymbol[] {
  let kept = alphabet.filter((s) => s.freq >= minFrequency);
  if (kept.length > budget) {
    kept = [...kept]
      .sort((a, b) => b.freq - a.freq || compareStrings(a.symbol, b.symbol))
      .slice(0, budget);
  }
  return kept.sort((a, b) => compareStrings(a.symbol, b.symbol));
}

export class WordPieceTrainer {
  readonly config: TrainerConfig;

  constructor(config: Partial<TrainerConfig> = {}) {
    this.config = { ...defaultTrainerConfig, ...config };
  }

  /**
   * Learn a vocabulary from `texts`.
   *
   * Special tokens take ids `0..k-1` in the order given, then the character
   * alphabet, then merge products in the order they were learned.
   */
  train(texts: readonly string[]): Effect.Effect<VocabMapping, InvalidParameters> {
    const config = this.config;
    return Effect.gen(function* () {
      yield* validate(config, texts);
      const scorer = yield* pairScorerRegistry
        .get(config.scorer)
        .pipe(Effect.mapError((cause) => new InvalidParameters({ message: cause.message, cause })));

      const special = new Set(config.specialTokens);
      const wordCounts = countWords(texts, config.lowercase, special);
      if (wordCounts.size === 0) {
        return yield* invalid("Cannot train on an empty corpus: no words after pre-tokenization");
      }

      const state = new MergeState(wordCounts, config.continuationPrefix, scorer);

      const vocab = new Map<string, number>();
      for (const token of config.specialTokens) vocab.set(token, vocab.size);

      const alphabet = selectAlphabet(state.alphabet, config.minFrequency, config.vocabSize - vocab.size);
      for (const { symbol } of alphabet) {
        if (!vocab.has(symbol)) vocab.set(symbol, vocab.size);
      }

      let merges = 0;
      while (vocab.size < config.vocabSize) {
        const best = state.bestPair(config.minFrequency);
        if (best === undefined) break;
        const product = state.merge(best);
        merges++;
        if (!vocab.has(product.symbol)) vocab.set(product.symbol, vocab.size);
        if (merges % PROGRESS_EVERY === 0) {
          yield* Effect.logDebug(
            `merge ${merges}: "${product.symbol}" freq=${product.freq} vocab=${vocab.size}/${config.vocabSize}`,
          );
        }
      }

      yield* Effect.logInfo(
        `Trained WordPiece vocabulary: size=${vocab.size} special=${config.specialTokens.length} ` +
          `alphabet=${alphabet.length} merges=${merges} words=${state.wordCount} scorer=${scorer.name}`,
      );
      return vocab;
    });
  }
}
