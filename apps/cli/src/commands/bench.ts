/**
 * Command: piecewise bench
 *
 * Times tokenize, encode and train over synthetic text at each of --sizes
 * (words per input).
 */
import { Effect } from "effect";
import { formatResults, runAllBenches } from "@piecewise/bench";
import { loadConfig, parseKV } from "../parse.js";
import { resolveBenchConfig } from "../resolve.js";
import { runCommand } from "../run.js";

export async function benchCmd(args: string[]): Promise<void> {
  // Trainer summaries would drown the table; opt back in with --logLevel.
  const kv = { logLevel: "warn", ...(await loadConfig(parseKV(args))) };
  const config = resolveBenchConfig(kv);

  const program = Effect.gen(function* () {
    console.log(`Benchmarking: sizes=${config.sizes.join(",")} iters=${config.iters} seed=${config.seed}\n`);
    const results = yield* runAllBenches(config);
    console.log(formatResults(results));
  });

  await runCommand(kv, program);
}
