/**
 * Novelty score math.
 *
 * A pool's novelty is the inverse of its best match: similarity 0 scores 100,
 * similarity 1 scores 0.
 */

/**
 * Pools scoring below this (best-match similarity above 40%) get a generated
 * explanation of the resemblance instead of the fixed "not similar" sentence.
 */
export const NOVELTY_EXPLAIN_THRESHOLD = 60;

export function clamp01(x: number): number {
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

export function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export function noveltyScoreFromSimilarity(similarity: number): number {
  return roundToOneDecimal((1 - clamp01(similarity)) * 100);
}

/** Unweighted mean of the two pool scores. */
export function overallNoveltyScore(githubScore: number, webScore: number): number {
  return roundToOneDecimal((githubScore + webScore) / 2);
}

export function formatScore(score: number): string {
  return score.toFixed(1);
}

export function shouldExplainSimilarity(score: number): boolean {
  return score < NOVELTY_EXPLAIN_THRESHOLD;
}

export const GITHUB_SIMILAR_LEAD = "This project is similar to a project found on GitHub. ";
export const WEB_SIMILAR_LEAD = "This project is similar to an article found on Google. ";

export function githubNotSimilarSummary(score: number): string {
  return (
    "This project is not similar to any other projects found on GitHub. " +
    `This helped you score a ${formatScore(score)} out of 100 for your GitHub novelty score.`
  );
}

export function webNotSimilarSummary(score: number): string {
  return (
    "This project is not similar to any other articles found on Google. " +
    `This helped you score a ${formatScore(score)} out of 100 for your Google novelty score.`
  );
}
