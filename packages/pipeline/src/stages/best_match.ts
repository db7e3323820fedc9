import type { Candidate, SimilarityResult } from "@pitchcheck/shared";

/**
 * Keep the result with the strictly highest similarity, starting from 0.
 * The first of equal scores wins, and a zero-similarity result is never a match.
 */
export function pickBestMatch<C extends Candidate>(results: SimilarityResult<C>[]): SimilarityResult<C> | null {
  let best: SimilarityResult<C> | null = null;
  let bestSimilarity = 0;
  for (const result of results) {
    if (result.similarity > bestSimilarity) {
      best = result;
      bestSimilarity = result.similarity;
    }
  }
  return best;
}
