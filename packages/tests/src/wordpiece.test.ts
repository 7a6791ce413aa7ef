import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { UnknownTokenId } from "@piecewise/core";
import { WordPieceTokenizer } from "@piecewise/tokenizers";

const vocab = { "[UNK]": 0, want: 3, "##ed": 4, to: 5, go: 6, home: 7 };
const withSpecials = { "[UNK]": 0, "[CLS]": 1, "[SEP]": 2, want: 3, "##ed": 4, to: 5, go: 6, home: 7 };

function make(...args: Parameters<typeof WordPieceTokenizer.make>): WordPieceTokenizer {
  return Effect.runSync(WordPieceTokenizer.make(...args));
}

describe("WordPieceTokenizer", () => {
  it("tokenizes, encodes and decodes a sentence", () => {
    const tok = make(vocab);
    expect(tok.tokenize("wanted to go home")).toEqual(["want", "##ed", "to", "go", "home"]);
    expect(Array.from(tok.encode("wanted to go home"))).toEqual([3, 4, 5, 6, 7]);
    expect(tok.decode([3, 4, 5, 6, 7])).toBe("wanted to go home");
  });

  it("emits a single unknown token for an unsegmentable word", () => {
    const tok = make(vocab);
    expect(tok.tokenize("wantedx to go home")).toEqual(["[UNK]", "to", "go", "home"]);
    expect(Array.from(tok.encode("wantedx to go home"))).toEqual([0, 5, 6, 7]);
  });

  it("yields nothing for empty or whitespace-only text", () => {
    const tok = make(vocab);
    expect(tok.tokenize("")).toEqual([]);
    expect(tok.tokenize("   ")).toEqual([]);
    expect(tok.tokenize("\t\n ")).toEqual([]);
    expect(tok.encode("   ").length).toBe(0);
    expect(tok.decode([])).toBe("");
  });

  it("lowercases by default and round-trips to the lowercased text", () => {
    const tok = make(vocab);
    const text = "Wanted To Go HOME";
    expect(tok.tokenize(text)).toEqual(["want", "##ed", "to", "go", "home"]);
    expect(tok.decode(tok.encode(text))).toBe(text.toLowerCase());
  });

  it("keeps case when lowercase is off", () => {
    const tok = make(vocab, { lowercase: false });
    expect(tok.tokenize("Wanted to go home")).toEqual(["[UNK]", "to", "go", "home"]);
    expect(tok.decode(tok.encode("wanted to go home"))).toBe("wanted to go home");
  });

  it("collapses whitespace runs to single spaces on decode", () => {
    const tok = make(vocab);
    expect(tok.decode(tok.encode("  wanted  to\tgo\nhome "))).toBe("wanted to go home");
  });

  it("round-trips every sentence built from vocabulary words", () => {
    const tok = make(vocab, { lowercase: false });
    for (const text of ["go", "go home", "want wanted", "home to go to home", "wanted wanted wanted"]) {
      expect(tok.decode(tok.encode(text))).toBe(text);
    }
  });

  it("strips the marker from a leading continuation token", () => {
    const tok = make(vocab);
    expect(tok.decode([4, 3])).toBe("ed want");
  });

  it("throws UnknownTokenId for ids outside the vocabulary", () => {
    const tok = make(vocab);
    expect(() => tok.decode([3, 99])).toThrowError(UnknownTokenId);
    try {
      tok.decode([1]);
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownTokenId);
      if (err instanceof UnknownTokenId) expect(err.id).toBe(1);
    }
  });

  it("passes bracketed special tokens through unchanged", () => {
    const tok = make(withSpecials);
    expect(tok.tokenize("[CLS] wanted [SEP]")).toEqual(["[CLS]", "want", "##ed", "[SEP]"]);
    expect(Array.from(tok.encode("[CLS] wanted [SEP]"))).toEqual([1, 3, 4, 2]);
    expect(tok.decode([1, 3, 4, 2])).toBe("[CLS] wanted [SEP]");
    expect(tok.specialTokens).toEqual(["[UNK]", "[CLS]", "[SEP]"]);
  });

  it("does not match special tokens after lowercasing", () => {
    const tok = make(withSpecials);
    expect(tok.tokenize("[cls]")).toEqual(["[UNK]"]);
  });

  it("uses the configured special tokens instead of the bracket rule", () => {
    const tok = make(withSpecials, { specialTokens: ["[CLS]"] });
    expect(tok.specialTokens).toEqual(["[UNK]", "[CLS]"]);
  });

  it("rejects configured special tokens missing from the vocabulary", () => {
    const err = Effect.runSync(Effect.flip(WordPieceTokenizer.make(vocab, { specialTokens: ["[MASK]"] })));
    expect(err._tag).toBe("InvalidVocabulary");
    expect(err.message).toBe('Special token "[MASK]" is missing from the vocabulary');
  });

  it("supports a custom unknown token", () => {
    const tok = make({ "<unk>": 0, hi: 1 }, { unkToken: "<unk>" });
    expect(tok.tokenize("hi there")).toEqual(["hi", "<unk>"]);
    expect(Array.from(tok.encode("hi there"))).toEqual([1, 0]);
  });

  it("supports a custom continuation prefix", () => {
    const tok = make({ "[UNK]": 0, play: 1, "@@ing": 2 }, { continuationPrefix: "@@" });
    expect(tok.tokenize("playing")).toEqual(["play", "@@ing"]);
    expect(tok.decode([1, 2])).toBe("playing");
  });

  it("rejects an empty continuation prefix", () => {
    const err = Effect.runSync(Effect.flip(WordPieceTokenizer.make(vocab, { continuationPrefix: "" })));
    expect(err._tag).toBe("ConfigError");
  });

  it("fails construction on an invalid vocabulary", () => {
    const err = Effect.runSync(Effect.flip(WordPieceTokenizer.make({ want: 1 })));
    expect(err._tag).toBe("InvalidVocabulary");
  });

  it("treats words longer than maxInputCharsPerWord as unknown", () => {
    const tok = make(vocab, { maxInputCharsPerWord: 3 });
    expect(tok.tokenize("home go")).toEqual(["[UNK]", "go"]);
  });

  it("reports its vocabulary size", () => {
    expect(make(vocab).vocabSize).toBe(6);
  });
});
