/**
 * WordPiece tokenizer.
 *
 * Splits text on whitespace, optionally lowercases each word and segments it
 * greedily against the vocabulary. Words equal to a declared special token
 * (`[CLS]`, `[SEP]`, ...) pass through untouched. Every call is synchronous
 * and reads only immutable state.
 */
import { Effect } from "effect";
import {
  ConfigError,
  InvalidVocabulary,
  UnknownTokenId,
  VocabularyMismatch,
  defaultTokenizerConfig,
  type Tokenizer,
  type TokenizerConfig,
  type VocabInput,
} from "@piecewise/core";
import { Vocabulary } from "./vocab.js";
import { Segmenter } from "./segmenter.js";
import { normalizeWord, splitWords } from "./pretokenize.js";

/** `[CLS]`, `[PAD]`, `<s>`, `</s>` ... */
const BRACKETED = /^(\[[^\]\s]+\]|<[^>\s]+>)$/;

export class WordPieceTokenizer implements Tokenizer {
  readonly name = "wordpiece";

  readonly config: TokenizerConfig;
  readonly vocabulary: Vocabulary;

  private readonly _special: ReadonlySet<string>;
  private readonly _segmenter: Segmenter;

  private constructor(vocabulary: Vocabulary, config: TokenizerConfig, special: ReadonlySet<string>) {
    this.vocabulary = vocabulary;
    this.config = config;
    this._special = special;

    const segmentable: string[] = [];
    for (const [token] of vocabulary.entries()) {
      if (!special.has(token)) segmentable.push(token);
    }
    this._segmenter = new Segmenter(segmentable, {
      unkToken: config.unkToken,
      continuationPrefix: config.continuationPrefix,
      maxInputCharsPerWord: config.maxInputCharsPerWord,
    });
  }

  /**
   * Build a tokenizer over a literal or trained vocabulary.
   *
   * Fails with `InvalidVocabulary` when the mapping is not a bijection, lacks
   * the unknown token, or omits a configured special token.
   */
  static make(
    vocab: VocabInput,
    config: Partial<TokenizerConfig> = {},
  ): Effect.Effect<WordPieceTokenizer, InvalidVocabulary | ConfigError> {
    return Effect.gen(function* () {
      const resolved: TokenizerConfig = { ...defaultTokenizerConfig, ...config };
      if (resolved.continuationPrefix.length === 0) {
        return yield* Effect.fail(new ConfigError({ message: "continuationPrefix must not be empty" }));
      }
      if (!Number.isInteger(resolved.maxInputCharsPerWord) || resolved.maxInputCharsPerWord < 1) {
        return yield* Effect.fail(
          new ConfigError({
            message: `maxInputCharsPerWord must be a positive integer, got ${resolved.maxInputCharsPerWord}`,
          }),
        );
      }

      const vocabulary = yield* Vocabulary.make(vocab, { unkToken: resolved.unkToken });

      const special = new Set<string>([resolved.unkToken]);
      if (resolved.specialTokens) {
        for (const token of resolved.specialTokens) {
          if (!vocabulary.contains(token)) {
            return yield* Effect.fail(
              new InvalidVocabulary({ message: `Special token "${token}" is missing from the vocabulary` }),
            );
          }
          special.add(token);
        }
      } else {
        for (const [token] of vocabulary.entries()) {
          if (BRACKETED.test(token)) special.add(token);
        }
      }

      return new WordPieceTokenizer(vocabulary, resolved, special);
    });
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get vocabSize(): number {
    return this.vocabulary.size;
  }

  get specialTokens(): readonly string[] {
    return [...this._special];
  }

  /** Split `text` into vocabulary tokens. Never fails. */
  tokenize(text: string): string[] {
    const out: string[] = [];
    for (const word of splitWords(text)) {
      if (this._special.has(word)) {
        out.push(word);
        continue;
      }
      for (const piece of this._segmenter.segment(normalizeWord(word, this.config.lowercase))) {
        out.push(piece);
      }
    }
    return out;
  }

  /**
   * Tokenize and map every token to its id.
   *
   * @throws VocabularyMismatch if a token has no id, which means the
   * tokenizer and its vocabulary disagree.
   */
  encode(text: string): Int32Array {
    const tokens = this.tokenize(text);
    const ids = new Int32Array(tokens.length);
    for (let i = 0; i < tokens.length; i++) {
      const id = this.vocabulary.lookup(tokens[i]);
      if (id === undefined) {
        throw new VocabularyMismatch({
          message: `Token "${tokens[i]}" was emitted but has no id in the vocabulary`,
          token: tokens[i],
        });
      }
      ids[i] = id;
    }
    return ids;
  }

  /**
   * Rebuild text from ids. Continuation pieces are glued to the previous
   * piece, everything else is separated by a single space, so the result
   * loses original casing and whitespace.
   *
   * @throws UnknownTokenId for an id outside the vocabulary.
   */
  decode(ids: ArrayLike<number>): string {
    const prefix = this.config.continuationPrefix;
    let out = "";
    for (let i = 0; i < ids.length; i++) {
      const token = this.vocabulary.reverse(ids[i]);
      if (token === undefined) {
        throw new UnknownTokenId({ message: `Id ${ids[i]} is not in the vocabulary`, id: ids[i] });
      }
      const continued = token.startsWith(prefix);
      const text = continued ? token.slice(prefix.length) : token;
      if (i > 0 && !continued) out += " ";
      out += text;
    }
    return out;
  }
}
