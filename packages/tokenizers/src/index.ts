/**
 * @piecewise/tokenizers -- WordPiece tokenization and vocabulary training.
 *
 * Provides the immutable Vocabulary, the greedy longest-match Segmenter,
 * the WordPieceTokenizer built on them, the merge-based WordPieceTrainer,
 * the pair scorer registry, and JSON persistence helpers.
 */

export { MAX_TOKEN_ID, Vocabulary, vocabEntries, type VocabularyOptions } from "./vocab.js";
export { PrefixTrie, type TrieMatch } from "./trie.js";
export { Segmenter, type SegmenterOptions } from "./segmenter.js";
export { splitWords, normalizeWord } from "./pretokenize.js";
export { WordPieceTokenizer } from "./wordpiece.js";
export { WordPieceTrainer, countWords, type LearnedSymbol } from "./trainer.js";
export { pairScorerRegistry, frequencyScorer, likelihoodScorer } from "./scorers.js";
export { saveVocab, loadVocab, parseVocab } from "./persist.js";
