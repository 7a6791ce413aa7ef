/**
 * Tokenizer and trainer throughput benchmarks over synthetic text.
 */
import { readFileSync } from "node:fs";
import { Effect } from "effect";
import {
  SeededRng,
  defaultBenchConfig,
  type BenchConfig,
  type ConfigError,
  type InvalidParameters,
  type InvalidVocabulary,
  type VocabMapping,
} from "@piecewise/core";
import { WordPieceTokenizer, WordPieceTrainer, parseVocab } from "@piecewise/tokenizers";
import { syntheticText } from "./text.js";

export interface BenchResult {
  name: string;
  /** Input size in words. */
  words: number;
  avgMs: number;
  iters: number;
  extra?: string;
}

function run(fn: () => void, iters: number): number {
  for (let i = 0; i < 3; i++) fn(); // warmup
  const start = performance.now();
  for (let i = 0; i < iters; i++) fn();
  return (performance.now() - start) / iters;
}

/** Fixed vocabulary: special tokens, a few common pieces and every letter. */
export function loadBenchVocab(): VocabMapping {
  const raw = readFileSync(new URL("./bench-vocab.json", import.meta.url), "utf-8");
  return parseVocab(JSON.parse(raw));
}

export function benchTokenize(tokenizer: WordPieceTokenizer, text: string, words: number, iters = 5): BenchResult {
  let tokens = 0;
  const avgMs = run(() => {
    tokens = tokenizer.tokenize(text).length;
  }, iters);
  return { name: "tokenize", words, avgMs, iters, extra: `${tokens} tokens` };
}

export function benchEncode(tokenizer: WordPieceTokenizer, text: string, words: number, iters = 5): BenchResult {
  const avgMs = run(() => tokenizer.encode(text), iters);
  const wordsPerSec = avgMs > 0 ? (words / avgMs) * 1000 : Infinity;
  return { name: "encode", words, avgMs, iters, extra: `${Math.round(wordsPerSec).toLocaleString()} words/s` };
}

export function benchTrain(text: string, words: number, iters = 5): Effect.Effect<BenchResult, InvalidParameters> {
  const trainer = new WordPieceTrainer({ vocabSize: 1000, minFrequency: 1 });
  return Effect.gen(function* () {
    let size = 0;
    const start = performance.now();
    for (let i = 0; i < iters; i++) {
      size = (yield* trainer.train([text])).size;
    }
    const avgMs = (performance.now() - start) / iters;
    return { name: "train", words, avgMs, iters, extra: `vocab=${size}` };
  });
}

export function runAllBenches(
  config: BenchConfig = defaultBenchConfig,
): Effect.Effect<BenchResult[], InvalidVocabulary | ConfigError | InvalidParameters> {
  return Effect.gen(function* () {
    const tokenizer = yield* WordPieceTokenizer.make(loadBenchVocab());
    const results: BenchResult[] = [];
    for (const words of config.sizes) {
      const text = syntheticText(new SeededRng(config.seed), words);
      results.push(benchTokenize(tokenizer, text, words, config.iters));
      results.push(benchEncode(tokenizer, text, words, config.iters));
      results.push(yield* benchTrain(text, words, config.iters));
    }
    return results;
  });
}

export function formatResults(results: readonly BenchResult[]): string {
  const header = `${"op".padEnd(10)}${"words".padStart(8)}${"avg ms".padStart(12)}  extra`;
  const rows = results.map(
    (r) => `${r.name.padEnd(10)}${String(r.words).padStart(8)}${r.avgMs.toFixed(3).padStart(12)}  ${r.extra ?? ""}`,
  );
  return [header, ...rows].join("\n");
}
