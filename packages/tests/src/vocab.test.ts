import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { MAX_TOKEN_ID, Vocabulary, WordPieceTokenizer } from "@piecewise/tokenizers";

const opts = { unkToken: "[UNK]" };
const literal = { "[UNK]": 0, want: 3, "##ed": 4, to: 5, go: 6, home: 7 };

describe("Vocabulary", () => {
  it("maps tokens to ids and back", () => {
    const vocab = Effect.runSync(Vocabulary.make(literal, opts));
    expect(vocab.size).toBe(6);
    expect(vocab.lookup("want")).toBe(3);
    expect(vocab.reverse(4)).toBe("##ed");
    expect(vocab.contains("home")).toBe(true);
    expect(vocab.contains("away")).toBe(false);
    expect(vocab.lookup("away")).toBeUndefined();
    expect(vocab.reverse(1)).toBeUndefined();
    expect(vocab.unkId).toBe(0);
  });

  it("accepts a Map", () => {
    const vocab = Effect.runSync(Vocabulary.make(new Map([["[UNK]", 0], ["a", 1]]), opts));
    expect(vocab.lookup("a")).toBe(1);
  });

  it("lists entries in id order", () => {
    const vocab = Effect.runSync(Vocabulary.make({ b: 2, "[UNK]": 0, a: 1 }, opts));
    expect(vocab.entries()).toEqual([["[UNK]", 0], ["a", 1], ["b", 2]]);
  });

  it("rejects an empty vocabulary", () => {
    const err = Effect.runSync(Effect.flip(Vocabulary.make({}, opts)));
    expect(err._tag).toBe("InvalidVocabulary");
    expect(err.message).toBe("Vocabulary is empty");
  });

  it("rejects a vocabulary without the unknown token", () => {
    const err = Effect.runSync(Effect.flip(Vocabulary.make({ a: 0 }, opts)));
    expect(err.message).toBe('Unknown token "[UNK]" is missing from the vocabulary');
  });

  it("rejects duplicate ids", () => {
    const err = Effect.runSync(Effect.flip(Vocabulary.make({ "[UNK]": 0, a: 1, b: 1 }, opts)));
    expect(err.message).toBe('Duplicate id 1 shared by "a" and "b"');
  });

  it("rejects duplicate tokens in an entry list", () => {
    const entries: Array<[string, number]> = [["[UNK]", 0], ["a", 1], ["a", 2]];
    const err = Effect.runSync(Effect.flip(Vocabulary.fromEntries(entries, opts)));
    expect(err.message).toBe('Duplicate token "a"');
  });

  it("rejects negative and fractional ids", () => {
    const neg = Effect.runSync(Effect.flip(Vocabulary.make({ "[UNK]": 0, a: -1 }, opts)));
    expect(neg.message).toBe('Token "a" has invalid id -1; ids must be integers in [0, 2147483647]');
    const frac = Effect.runSync(Effect.flip(Vocabulary.make({ "[UNK]": 0.5 }, opts)));
    expect(frac._tag).toBe("InvalidVocabulary");
  });

  it("rejects ids that do not fit in an Int32Array", () => {
    const err = Effect.runSync(Effect.flip(Vocabulary.make({ "[UNK]": 0, go: 3000000000 }, opts)));
    expect(err._tag).toBe("InvalidVocabulary");
    expect(err.message).toBe('Token "go" has invalid id 3000000000; ids must be integers in [0, 2147483647]');
    expect(Effect.runSync(Effect.flip(WordPieceTokenizer.make({ "[UNK]": 0, go: MAX_TOKEN_ID + 1 })))._tag).toBe(
      "InvalidVocabulary",
    );
  });

  it("round-trips the largest accepted id through encode", () => {
    const tok = Effect.runSync(WordPieceTokenizer.make({ "[UNK]": 0, go: MAX_TOKEN_ID }));
    expect(Array.from(tok.encode("go"))).toEqual([2147483647]);
    expect(tok.decode(tok.encode("go"))).toBe("go");
  });
});
