/**
 * Persistence helpers for vocabularies.
 *
 * Saves and loads a token -> id mapping as a JSON object using
 * node:fs/promises, with every I/O operation wrapped in `Effect.tryPromise`
 * so callers get typed `VocabularyIOError` failures instead of raw exceptions.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { VocabularyIOError, type VocabMapping } from "@piecewise/core";

/**
 * Serialise a vocabulary to a JSON object of token -> id.
 *
 * Entries are inserted in id order, but a JavaScript object always lists
 * integer-like keys such as `"7"` first, so the file order is not
 * guaranteed to follow the ids. Creates parent directories if they don't
 * already exist.
 */
export function saveVocab(path: string, vocab: VocabMapping): Effect.Effect<void, VocabularyIOError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });
      const ordered = [...vocab].sort((a, b) => a[1] - b[1]);
      const json = JSON.stringify(Object.fromEntries(ordered), null, 2);
      await writeFile(path, json + "\n", "utf-8");
    },
    catch: (cause) =>
      new VocabularyIOError({
        message: `Failed to save vocabulary to "${path}"`,
        cause,
      }),
  });
}

/** Check that a parsed JSON value is a `{ token: id }` object. */
export function parseVocab(data: unknown): Map<string, number> {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error("Vocabulary file must contain a JSON object of token -> id");
  }
  const vocab = new Map<string, number>();
  for (const [token, id] of Object.entries(data)) {
    if (typeof id !== "number" || !Number.isInteger(id)) {
      throw new Error(`Token "${token}" has non-integer id ${JSON.stringify(id)}`);
    }
    vocab.set(token, id);
  }
  return vocab;
}

/** Load a vocabulary previously written by `saveVocab` (or any `{token: id}` JSON). */
export function loadVocab(path: string): Effect.Effect<VocabMapping, VocabularyIOError> {
  return Effect.tryPromise({
    try: async () => {
      const raw = await readFile(path, "utf-8");
      const data: unknown = JSON.parse(raw);
      return parseVocab(data);
    },
    catch: (cause) =>
      new VocabularyIOError({
        message: `Failed to load vocabulary from "${path}"`,
        cause,
      }),
  });
}
