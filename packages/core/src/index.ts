export {
  InvalidVocabulary,
  InvalidParameters,
  UnknownTokenId,
  VocabularyMismatch,
  VocabularyIOError,
  ConfigError,
} from "./errors.js";
export {
  TokenizerService,
  type Tokenizer,
  type VocabMapping,
  type VocabInput,
  type PairStats,
  type PairScorer,
  type Rng,
} from "./interfaces.js";
export {
  defaultTokenizerConfig,
  defaultTrainerConfig,
  defaultSpecialTokens,
  defaultBenchConfig,
  type TokenizerConfig,
  type TrainerConfig,
  type BenchConfig,
} from "./types.js";
export { Registry } from "./registry.js";
export { fingerprintVocab } from "./hash.js";
export { SeededRng } from "./rng.js";
