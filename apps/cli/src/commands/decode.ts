/**
 * Command: piecewise decode
 */
import { Effect } from "effect";
import { ConfigError, TokenizerService, UnknownTokenId } from "@piecewise/core";
import { TokenizerFromFile } from "@piecewise/runtime";
import { intListArg, loadConfig, parseKV, requireArg } from "../parse.js";
import { resolveTokenizerConfig } from "../resolve.js";
import { runCommand } from "../run.js";

export async function decodeCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const vocabPath = requireArg(kv, "vocab", "path to vocabulary JSON");
  requireArg(kv, "ids", "comma-separated token ids");
  const ids = intListArg(kv, "ids", []);
  const config = resolveTokenizerConfig(kv);

  const program = Effect.gen(function* () {
    const tokenizer = yield* TokenizerService;
    const text = yield* Effect.try({
      try: () => tokenizer.decode(ids),
      catch: (cause) =>
        cause instanceof UnknownTokenId ? cause : new ConfigError({ message: "Decoding failed", cause }),
    });
    console.log(text);
  });

  await runCommand(kv, program.pipe(Effect.provide(TokenizerFromFile(vocabPath, config))));
}
