/**
 * Resolve typed configuration from CLI args.
 */
import type { LogLevel } from "effect";
import {
  defaultBenchConfig,
  defaultTokenizerConfig,
  defaultTrainerConfig,
  type BenchConfig,
  type TokenizerConfig,
  type TrainerConfig,
} from "@piecewise/core";
import { pairScorerRegistry } from "@piecewise/tokenizers";
import { parseLogLevel } from "@piecewise/runtime";
import { boolArg, intArg, intListArg, listArg, strArg, type KV } from "./parse.js";

export function resolveTokenizerConfig(kv: KV): TokenizerConfig {
  return {
    lowercase: boolArg(kv, "lowercase", defaultTokenizerConfig.lowercase),
    unkToken: strArg(kv, "unkToken", defaultTokenizerConfig.unkToken),
    continuationPrefix: strArg(kv, "continuationPrefix", defaultTokenizerConfig.continuationPrefix),
    maxInputCharsPerWord: intArg(kv, "maxInputCharsPerWord", defaultTokenizerConfig.maxInputCharsPerWord),
    ...(kv["specialTokens"] !== undefined ? { specialTokens: listArg(kv, "specialTokens", []) } : {}),
  };
}

export function resolveTrainerConfig(kv: KV): TrainerConfig {
  return {
    vocabSize: intArg(kv, "vocabSize", defaultTrainerConfig.vocabSize),
    minFrequency: intArg(kv, "minFrequency", defaultTrainerConfig.minFrequency),
    specialTokens: listArg(kv, "specialTokens", defaultTrainerConfig.specialTokens),
    lowercase: boolArg(kv, "lowercase", defaultTrainerConfig.lowercase),
    continuationPrefix: strArg(kv, "continuationPrefix", defaultTrainerConfig.continuationPrefix),
    scorer: strArg(kv, "scorer", defaultTrainerConfig.scorer),
  };
}

export function resolveBenchConfig(kv: KV): BenchConfig {
  return {
    sizes: intListArg(kv, "sizes", defaultBenchConfig.sizes),
    iters: intArg(kv, "iters", defaultBenchConfig.iters),
    seed: intArg(kv, "seed", defaultBenchConfig.seed),
  };
}

export function resolveLogLevel(kv: KV): LogLevel.LogLevel {
  return parseLogLevel(strArg(kv, "logLevel", "info"));
}

export function listImplementations(): string {
  return `Scorers: ${pairScorerRegistry.list().join(", ")}`;
}
