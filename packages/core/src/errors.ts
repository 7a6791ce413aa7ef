/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** Vocabulary failed validation at construction time. */
export class InvalidVocabulary extends Data.TaggedError("InvalidVocabulary")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Trainer was called with parameters it cannot honour. */
export class InvalidParameters extends Data.TaggedError("InvalidParameters")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Decode was handed an id the vocabulary does not know. */
export class UnknownTokenId extends Data.TaggedError("UnknownTokenId")<{
  readonly message: string;
  readonly id: number;
  readonly cause?: unknown;
}> {}

/** Tokenizer emitted a token that its own vocabulary cannot map. */
export class VocabularyMismatch extends Data.TaggedError("VocabularyMismatch")<{
  readonly message: string;
  readonly token: string;
  readonly cause?: unknown;
}> {}

export class VocabularyIOError extends Data.TaggedError("VocabularyIOError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
