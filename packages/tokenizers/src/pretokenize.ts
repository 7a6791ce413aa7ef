/**
 * Whitespace pre-tokenization shared by the tokenizer and the trainer, so a
 * trained vocabulary sees exactly the words the tokenizer will later segment.
 */

const WHITESPACE = /\s+/;

/** Split on runs of whitespace, dropping the separators. */
export function splitWords(text: string): string[] {
  return text.split(WHITESPACE).filter((w) => w.length > 0);
}

export function normalizeWord(word: string, lowercase: boolean): string {
  return lowercase ? word.toLowerCase() : word;
}
