/**
 * Command: piecewise train
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError, fingerprintVocab } from "@piecewise/core";
import { WordPieceTrainer, saveVocab } from "@piecewise/tokenizers";
import { withSpan } from "@piecewise/runtime";
import { loadConfig, parseKV, requireArg } from "../parse.js";
import { resolveTrainerConfig } from "../resolve.js";
import { runCommand } from "../run.js";

export async function trainCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const inputPath = requireArg(kv, "input", "path to training text");
  const outPath = requireArg(kv, "out", "output path for the vocabulary");
  const config = resolveTrainerConfig(kv);

  const program = Effect.gen(function* () {
    yield* Effect.logInfo(
      `Training WordPiece vocabulary from ${inputPath} ` +
        `(vocabSize=${config.vocabSize}, minFrequency=${config.minFrequency}, scorer=${config.scorer})`,
    );
    const text = yield* Effect.tryPromise({
      try: () => readFile(inputPath, "utf-8"),
      catch: (cause) => new ConfigError({ message: `Cannot read corpus "${inputPath}"`, cause }),
    });

    // One text per line.
    const vocab = yield* withSpan("train", new WordPieceTrainer(config).train(text.split("\n")));
    yield* saveVocab(outPath, vocab);
    yield* Effect.logInfo(`Vocabulary saved to ${outPath} (size=${vocab.size}, fingerprint=${fingerprintVocab(vocab)})`);
  });

  await runCommand(kv, program);
}
