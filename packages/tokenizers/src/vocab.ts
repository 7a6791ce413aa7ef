/**
 * Immutable bidirectional token <-> id mapping.
 *
 * The forward and inverse tables are filled together in `make()` and never
 * touched again, so a Vocabulary is safe to share between any number of
 * tokenizers.
 */
import { Effect } from "effect";
import { InvalidVocabulary, type VocabInput, type VocabMapping } from "@piecewise/core";

export interface VocabularyOptions {
  /** Token that must be present; used as the fallback for unmatchable words. */
  readonly unkToken: string;
}

/** Ids are encoded into an Int32Array, so they must fit in 31 bits. */
export const MAX_TOKEN_ID = 0x7fffffff;

function isMapping(input: VocabInput): input is VocabMapping {
  return input instanceof Map;
}

/** Normalise either accepted input shape into an entry list. */
export function vocabEntries(input: VocabInput): Array<[string, number]> {
  if (isMapping(input)) {
    return [...input];
  }
  return Object.entries(input);
}

export class Vocabulary {
  /** token -> id */
  private readonly _stoi: Map<string, number>;

  /** id -> token */
  private readonly _itos: Map<number, string>;

  readonly unkToken: string;
  readonly unkId: number;

  private constructor(
    stoi: Map<string, number>,
    itos: Map<number, string>,
    unkToken: string,
    unkId: number,
  ) {
    this._stoi = stoi;
    this._itos = itos;
    this.unkToken = unkToken;
    this.unkId = unkId;
  }

  /** Validate a literal mapping and build the lookup tables. */
  static make(input: VocabInput, options: VocabularyOptions): Effect.Effect<Vocabulary, InvalidVocabulary> {
    return Vocabulary.fromEntries(vocabEntries(input), options);
  }

  /**
   * Build from an entry list. Unlike a map, an entry list can repeat a
   * token, which is rejected along with repeated ids.
   */
  static fromEntries(
    entries: Iterable<readonly [string, number]>,
    options: VocabularyOptions,
  ): Effect.Effect<Vocabulary, InvalidVocabulary> {
    return Effect.suspend(() => {
      const stoi = new Map<string, number>();
      const itos = new Map<number, string>();

      for (const [token, id] of entries) {
        if (!Number.isInteger(id) || id < 0 || id > MAX_TOKEN_ID) {
          return Effect.fail(
            new InvalidVocabulary({
              message: `Token "${token}" has invalid id ${id}; ids must be integers in [0, ${MAX_TOKEN_ID}]`,
            }),
          );
        }
        if (stoi.has(token)) {
          return Effect.fail(new InvalidVocabulary({ message: `Duplicate token "${token}"` }));
        }
        const holder = itos.get(id);
        if (holder !== undefined) {
          return Effect.fail(
            new InvalidVocabulary({ message: `Duplicate id ${id} shared by "${holder}" and "${token}"` }),
          );
        }
        stoi.set(token, id);
        itos.set(id, token);
      }

      if (stoi.size === 0) {
        return Effect.fail(new InvalidVocabulary({ message: "Vocabulary is empty" }));
      }
      const unkId = stoi.get(options.unkToken);
      if (unkId === undefined) {
        return Effect.fail(
          new InvalidVocabulary({ message: `Unknown token "${options.unkToken}" is missing from the vocabulary` }),
        );
      }
      return Effect.succeed(new Vocabulary(stoi, itos, options.unkToken, unkId));
    });
  }

  // ── Lookups ──────────────────────────────────────────────────────────────

  get size(): number {
    return this._stoi.size;
  }

  lookup(token: string): number | undefined {
    return this._stoi.get(token);
  }

  reverse(id: number): string | undefined {
    return this._itos.get(id);
  }

  contains(token: string): boolean {
    return this._stoi.has(token);
  }

  /** Entries in ascending id order. */
  entries(): Array<[string, number]> {
    return [...this._stoi].sort((a, b) => a[1] - b[1]);
  }
}
