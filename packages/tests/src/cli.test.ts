import { describe, it, expect } from "vitest";
import { ConfigError, defaultTrainerConfig } from "@piecewise/core";
import { intArg, intListArg, listArg, parseKV, requireArg } from "../../../apps/cli/src/parse.js";
import { resolveTokenizerConfig, resolveTrainerConfig } from "../../../apps/cli/src/resolve.js";

describe("parseKV", () => {
  it("reads --key=value and bare flags, ignoring positionals", () => {
    expect(parseKV(["--vocab=v.json", "--lowercase", "extra", "--text=a=b"])).toEqual({
      vocab: "v.json",
      lowercase: "true",
      text: "a=b",
    });
  });
});

describe("arg helpers", () => {
  it("requires arguments", () => {
    expect(() => requireArg({}, "vocab", "path")).toThrowError(ConfigError);
    expect(requireArg({ vocab: "v.json" }, "vocab")).toBe("v.json");
  });

  it("parses integers strictly", () => {
    expect(intArg({ n: "12" }, "n", 1)).toBe(12);
    expect(intArg({}, "n", 1)).toBe(1);
    expect(() => intArg({ n: "1.5" }, "n", 1)).toThrowError(ConfigError);
  });

  it("splits lists", () => {
    expect(listArg({ s: "[UNK], [PAD] ,," }, "s", [])).toEqual(["[UNK]", "[PAD]"]);
    expect(intListArg({ ids: "3,4,5" }, "ids", [])).toEqual([3, 4, 5]);
    expect(() => intListArg({ ids: "3,x" }, "ids", [])).toThrowError(ConfigError);
  });
});

describe("config resolution", () => {
  it("fills trainer defaults and applies overrides", () => {
    const config = resolveTrainerConfig({ vocabSize: "500", specialTokens: "[UNK],[PAD]" });
    expect(config).toEqual({
      ...defaultTrainerConfig,
      vocabSize: 500,
      specialTokens: ["[UNK]", "[PAD]"],
    });
  });

  it("only sets tokenizer special tokens when given", () => {
    expect(resolveTokenizerConfig({}).specialTokens).toBeUndefined();
    expect(resolveTokenizerConfig({ specialTokens: "[CLS]", lowercase: "false" })).toMatchObject({
      specialTokens: ["[CLS]"],
      lowercase: false,
    });
  });
});
