/**
 * Code-point keyed prefix trie.
 *
 * Answers "longest vocabulary entry starting at position i" in time
 * proportional to the length walked, instead of hashing every candidate
 * substring from longest to shortest.
 */

interface TrieNode {
  children: Map<string, TrieNode>;
  /** Full token string if a vocabulary entry ends at this node. */
  token: string | undefined;
}

function makeNode(): TrieNode {
  return { children: new Map(), token: undefined };
}

export interface TrieMatch {
  /** Exclusive end position of the match within the searched characters. */
  readonly end: number;
  /** Vocabulary token the match corresponds to. */
  readonly token: string;
}

export class PrefixTrie {
  private readonly _root = makeNode();

  /**
   * Insert `key` (a string walked code point by code point) and remember
   * `token` as what a match on it emits. Empty keys are ignored.
   */
  insert(key: string, token: string): void {
    if (key.length === 0) return;
    let node = this._root;
    for (const ch of key) {
      let next = node.children.get(ch);
      if (!next) {
        next = makeNode();
        node.children.set(ch, next);
      }
      node = next;
    }
    node.token = token;
  }

  /** Longest entry that is a prefix of `chars.slice(start)`. */
  longestMatch(chars: readonly string[], start: number): TrieMatch | undefined {
    let node = this._root;
    let best: TrieMatch | undefined;
    for (let pos = start; pos < chars.length; pos++) {
      const next = node.children.get(chars[pos]);
      if (!next) break;
      node = next;
      if (node.token !== undefined) {
        best = { end: pos + 1, token: node.token };
      }
    }
    return best;
  }
}
