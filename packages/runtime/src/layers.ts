/**
 * Effect layers for dependency injection.
 */
import { Layer, Effect } from "effect";
import {
  TokenizerService,
  type ConfigError,
  type InvalidVocabulary,
  type TokenizerConfig,
  type VocabularyIOError,
} from "@piecewise/core";
import { WordPieceTokenizer, loadVocab } from "@piecewise/tokenizers";

// ── Tokenizer Layer ────────────────────────────────────────────────────────

export const TokenizerFrom = (tokenizer: WordPieceTokenizer) =>
  Layer.succeed(TokenizerService, tokenizer);

/** Build the tokenizer service from a vocabulary JSON file. */
export const TokenizerFromFile = (
  path: string,
  config: Partial<TokenizerConfig> = {},
): Layer.Layer<TokenizerService, VocabularyIOError | InvalidVocabulary | ConfigError> =>
  Layer.effect(
    TokenizerService,
    Effect.flatMap(loadVocab(path), (vocab) => WordPieceTokenizer.make(vocab, config)),
  );
