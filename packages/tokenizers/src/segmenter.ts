/**
 * Greedy longest-match-first WordPiece segmentation of a single word.
 *
 * At each cursor position the longest vocabulary entry is consumed: the
 * token as written at the start of the word, the continuation-prefixed form
 * anywhere after it. If some position has no match at all the whole word
 * becomes one unknown token, discarding the pieces already found.
 */
import { PrefixTrie } from "./trie.js";

export interface SegmenterOptions {
  readonly unkToken: string;
  readonly continuationPrefix: string;
  readonly maxInputCharsPerWord: number;
}

export class Segmenter {
  /** Every segmentable token, keyed as written. */
  private readonly _initial = new PrefixTrie();

  /** Continuation tokens, keyed with the prefix stripped. */
  private readonly _continuation = new PrefixTrie();

  private readonly _options: SegmenterOptions;

  constructor(tokens: Iterable<string>, options: SegmenterOptions) {
    this._options = options;
    const prefix = options.continuationPrefix;
    for (const token of tokens) {
      this._initial.insert(token, token);
      if (token.startsWith(prefix)) {
        this._continuation.insert(token.slice(prefix.length), token);
      }
    }
  }

  segment(word: string): string[] {
    if (word.length === 0) return [];

    const chars = Array.from(word);
    if (chars.length > this._options.maxInputCharsPerWord) {
      return [this._options.unkToken];
    }

    const pieces: string[] = [];
    let start = 0;
    while (start < chars.length) {
      const trie = start === 0 ? this._initial : this._continuation;
      const match = trie.longestMatch(chars, start);
      if (!match) {
        return [this._options.unkToken];
      }
      pieces.push(match.token);
      start = match.end;
    }
    return pieces;
  }
}
