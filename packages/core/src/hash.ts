/**
 * Vocabulary fingerprinting for reproducibility checks.
 * Uses a basic FNV-1a hash — no crypto needed.
 */

/** Hash of the entries in id order; equal vocabularies give equal fingerprints. */
export function fingerprintVocab(vocab: ReadonlyMap<string, number>): string {
  const entries = [...vocab].sort((a, b) => a[1] - b[1]);
  let hash = 0x811c9dc5;
  for (const [token, id] of entries) {
    const line = `${id}\t${token}\n`;
    for (let i = 0; i < line.length; i++) {
      hash ^= line.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193);
    }
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
