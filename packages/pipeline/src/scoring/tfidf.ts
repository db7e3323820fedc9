/**
 * Lexical similarity between two summaries.
 *
 * TF-IDF vectors are fitted on a corpus of exactly the two input documents,
 * then compared by cosine. Pure and deterministic: the vocabulary is sorted,
 * so every reduction runs in the same order for the same inputs.
 */

const TOKEN_REGEX = /[\p{L}\p{N}_]+/gu;
const MIN_TOKEN_LENGTH = 2;

export interface TfidfVectors {
  vocabulary: string[];
  a: number[];
  b: number[];
}

/**
 * Lowercase, then keep maximal runs of letters, digits and underscore that are
 * at least two characters long. No stop words, no stemming.
 */
export function tokenize(text: string): string[] {
  const runs = text.toLowerCase().match(TOKEN_REGEX) ?? [];
  return runs.filter((run) => Array.from(run).length >= MIN_TOKEN_LENGTH);
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Smoothed inverse document frequency: ln((1 + n) / (1 + df)) + 1.
 * The +1 keeps terms shared by both documents at a non-zero weight.
 */
export function smoothedIdf(documentCount: number, documentFrequency: number): number {
  return Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;
}

export function buildTfidfVectors(textA: string, textB: string): TfidfVectors {
  const countsA = countTerms(tokenize(textA));
  const countsB = countTerms(tokenize(textB));
  const vocabulary = Array.from(new Set([...countsA.keys(), ...countsB.keys()])).sort();

  const a: number[] = [];
  const b: number[] = [];
  for (const term of vocabulary) {
    const tfA = countsA.get(term) ?? 0;
    const tfB = countsB.get(term) ?? 0;
    const df = (tfA > 0 ? 1 : 0) + (tfB > 0 ? 1 : 0);
    const idf = smoothedIdf(2, df);
    a.push(tfA * idf);
    b.push(tfB * idf);
  }

  return { vocabulary, a, b };
}

export function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Similarity in [0, 1]. 0 when either side has no tokens; ~1 for identical text.
 */
export function tfidfCosineSimilarity(textA: string, textB: string): number {
  const { a, b } = buildTfidfVectors(textA, textB);
  const value = cosine(a, b);
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}
