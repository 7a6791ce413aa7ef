/**
 * Commands: piecewise tokenize / piecewise encode
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError, TokenizerService, VocabularyMismatch } from "@piecewise/core";
import { TokenizerFromFile } from "@piecewise/runtime";
import { loadConfig, parseKV, requireArg, type KV } from "../parse.js";
import { resolveTokenizerConfig } from "../resolve.js";
import { runCommand } from "../run.js";

/** `--text` inline, or the contents of `--input`. */
function readInput(kv: KV): Effect.Effect<string, ConfigError> {
  const text = kv["text"];
  if (text !== undefined) return Effect.succeed(text);
  const inputPath = requireArg(kv, "input", "file to tokenize, or pass --text");
  return Effect.tryPromise({
    try: () => readFile(inputPath, "utf-8"),
    catch: (cause) => new ConfigError({ message: `Cannot read input "${inputPath}"`, cause }),
  });
}

export async function tokenizeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const vocabPath = requireArg(kv, "vocab", "path to vocabulary JSON");
  const config = resolveTokenizerConfig(kv);
  const input = readInput(kv);

  const program = Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const text = yield* input;
    console.log(JSON.stringify(tokenizer.tokenize(text)));
  });

  await runCommand(kv, program.pipe(Effect.provide(TokenizerFromFile(vocabPath, config))));
}

export async function encodeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const vocabPath = requireArg(kv, "vocab", "path to vocabulary JSON");
  const config = resolveTokenizerConfig(kv);
  const input = readInput(kv);

  const program = Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const text = yield* input;
    const ids = yield* Effect.try({
      try: () => tokenizer.encode(text),
      catch: (cause) =>
        cause instanceof VocabularyMismatch ? cause : new ConfigError({ message: "Encoding failed", cause }),
    });
    console.log(JSON.stringify(Array.from(ids)));
  });

  await runCommand(kv, program.pipe(Effect.provide(TokenizerFromFile(vocabPath, config))));
}
