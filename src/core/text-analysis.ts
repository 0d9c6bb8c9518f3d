/**
 * Text features used by the convergence engine
 *
 * All functions are pure. Feature extractors take a list of messages from one
 * agent and average over it, so a window of several turns compares the two
 * agents' typical output rather than a single pair.
 */

// Letters, marks and digits of any script; inner apostrophes join contractions
const WORD_PATTERN = /[\p{L}\p{M}\p{N}_]+(?:'[\p{L}\p{M}\p{N}_]+)*/gu;
const SENTENCE_END_PATTERN = /[.!?]+(?=\s|$)/g;
const LIST_ITEM_PATTERN = /^\s*(?:[-*•]|\d+[.)])\s/gm;
const CLAUSE_MARK_PATTERN = /[,;:]/g;

export interface StructureFeatures {
  paragraphs: number;
  listItems: number;
  questions: number;
  codeFences: number;
  clausesPerSentence: number;
}

export interface PunctuationDensities {
  exclamations: number;
  commas: number;
  semicolons: number;
  colons: number;
  dashes: number;
}

export const STRUCTURE_FEATURE_KEYS: readonly (keyof StructureFeatures)[] = [
  'paragraphs',
  'listItems',
  'questions',
  'codeFences',
  'clausesPerSentence',
];

export const PUNCTUATION_KEYS: readonly (keyof PunctuationDensities)[] = [
  'exclamations',
  'commas',
  'semicolons',
  'colons',
  'dashes',
];

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Similarity of two non-negative feature values:
 * both zero → 1, one zero → 0, otherwise min/max.
 */
export function featureSimilarity(a: number, b: number): number {
  if (a === 0 && b === 0) {
    return 1;
  }
  if (a === 0 || b === 0) {
    return 0;
  }
  return Math.min(a, b) / Math.max(a, b);
}

/**
 * Mean featureSimilarity over the given keys of two feature records
 */
export function profileSimilarity<K extends string>(
  a: Readonly<Record<K, number>>,
  b: Readonly<Record<K, number>>,
  keys: readonly K[]
): number {
  if (keys.length === 0) {
    return 1;
  }
  return average(keys.map((key) => featureSimilarity(a[key], b[key])));
}

/**
 * Lowercased word tokens, contractions kept whole
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

export function vocabulary(texts: readonly string[]): Set<string> {
  const words = new Set<string>();
  for (const text of texts) {
    for (const word of tokenize(text)) {
      words.add(word);
    }
  }
  return words;
}

/**
 * Jaccard similarity of two vocabularies; 0 when either side has no words
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of a) {
    if (b.has(word)) {
      shared++;
    }
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Sentence count of one message.
 * Terminal punctuation followed by whitespace or end of text closes a
 * sentence; trailing text without it counts as one more.
 */
export function countSentences(text: string): number {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return 0;
  }
  const closed = countMatches(trimmed, SENTENCE_END_PATTERN);
  return /[.!?]$/.test(trimmed) ? closed : closed + 1;
}

export function averageLength(texts: readonly string[]): number {
  return average(texts.map((text) => text.length));
}

export function averageSentences(texts: readonly string[]): number {
  return average(texts.map(countSentences));
}

function structureOf(text: string): StructureFeatures {
  const sentences = countSentences(text);
  const clauses = sentences + countMatches(text, CLAUSE_MARK_PATTERN);
  return {
    paragraphs: text.trim().length === 0 ? 0 : countOccurrences(text.trim(), '\n\n') + 1,
    listItems: countMatches(text, LIST_ITEM_PATTERN),
    questions: countOccurrences(text, '?'),
    codeFences: countOccurrences(text, '```'),
    clausesPerSentence: sentences === 0 ? 0 : clauses / sentences,
  };
}

export function structureFeatures(texts: readonly string[]): StructureFeatures {
  const each = texts.map(structureOf);
  return {
    paragraphs: average(each.map((f) => f.paragraphs)),
    listItems: average(each.map((f) => f.listItems)),
    questions: average(each.map((f) => f.questions)),
    codeFences: average(each.map((f) => f.codeFences)),
    clausesPerSentence: average(each.map((f) => f.clausesPerSentence)),
  };
}

/**
 * Per-character densities of `! , ; : -` over all texts combined.
 * Em and en dashes count as dashes.
 */
export function punctuationDensities(texts: readonly string[]): PunctuationDensities {
  const combined = texts.join('');
  const total = combined.length;
  const density = (count: number): number => (total === 0 ? 0 : count / total);

  return {
    exclamations: density(countOccurrences(combined, '!')),
    commas: density(countOccurrences(combined, ',')),
    semicolons: density(countOccurrences(combined, ';')),
    colons: density(countOccurrences(combined, ':')),
    dashes: density(countMatches(combined, /[-–—]/g)),
  };
}

export interface MessageMetrics {
  wordCount: number;
  charCount: number;
  sentenceCount: number;
  vocabularySize: number;
  /** Distinct words over words, 0 for a message without words */
  typeTokenRatio: number;
  /** Shannon entropy of the word distribution, in bits */
  entropy: number;
  /** Share of words that repeat the word right before them */
  selfRepetition: number;
  questionCount: number;
  averageWordLength: number;
}

export function wordEntropy(words: readonly string[]): number {
  if (words.length === 0) {
    return 0;
  }
  const frequencies = new Map<string, number>();
  for (const word of words) {
    frequencies.set(word, (frequencies.get(word) ?? 0) + 1);
  }
  let entropy = 0;
  for (const count of frequencies.values()) {
    const p = count / words.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export function selfRepetition(words: readonly string[]): number {
  if (words.length < 2) {
    return 0;
  }
  let repeats = 0;
  for (let i = 1; i < words.length; i++) {
    if (words[i] === words[i - 1]) {
      repeats++;
    }
  }
  return repeats / (words.length - 1);
}

/**
 * Linguistic metrics of a single message. Lengths count code points.
 */
export function messageMetrics(text: string): MessageMetrics {
  const words = tokenize(text);
  const vocabularySize = new Set(words).size;
  const letters = words.reduce((sum, word) => sum + [...word].length, 0);

  return {
    wordCount: words.length,
    charCount: [...text].length,
    sentenceCount: countSentences(text),
    vocabularySize,
    typeTokenRatio: words.length === 0 ? 0 : vocabularySize / words.length,
    entropy: wordEntropy(words),
    selfRepetition: selfRepetition(words),
    questionCount: countOccurrences(text, '?'),
    averageWordLength: words.length === 0 ? 0 : letters / words.length,
  };
}
