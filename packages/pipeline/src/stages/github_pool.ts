import { GITHUB_SEARCH_PAGE_SIZE, type GithubClient } from "@pitchcheck/connectors";
import { summarizeCandidateReadme, type TextGenerator, withTimeout } from "@pitchcheck/llm";
import {
  errorMessage,
  type GithubRepoCandidate,
  type Logger,
  type PoolResult,
  type SimilarityResult,
} from "@pitchcheck/shared";

import { noveltyScoreFromSimilarity } from "../scoring/novelty.js";
import { tfidfCosineSimilarity } from "../scoring/tfidf.js";
import { pickBestMatch } from "./best_match.js";

export interface GithubPoolParams {
  generator: TextGenerator;
  github: GithubClient;
  /** Summary of the submitting project's own README */
  homeSummary: string;
  /** Five-word query from the keyword extractor */
  keywords: string;
  timeoutMs: number;
  log: Logger;
}

async function findRepositories(params: GithubPoolParams): Promise<GithubRepoCandidate[]> {
  try {
    return await withTimeout(
      params.github.searchRepositories(params.keywords, GITHUB_SEARCH_PAGE_SIZE),
      params.timeoutMs,
      "github repository search",
    );
  } catch (err) {
    params.log.warn({ pool: "github", err: errorMessage(err) }, "Repository search failed; treating as empty");
    return [];
  }
}

/**
 * Compare the home project against every repository the keyword search finds.
 *
 * A candidate without a README, or whose fetch/summary fails or times out, is
 * skipped; nothing in this loop aborts the evaluation.
 */
export async function scoreGithubPool(params: GithubPoolParams): Promise<PoolResult<GithubRepoCandidate>> {
  const { generator, github, homeSummary, timeoutMs, log } = params;
  const candidates = await findRepositories(params);

  const results: SimilarityResult<GithubRepoCandidate>[] = [];
  let skipped = 0;

  for (const candidate of candidates) {
    try {
      const readme = await withTimeout(
        github.fetchReadme(candidate.owner, candidate.repo),
        timeoutMs,
        `readme ${candidate.fullName}`,
      );
      if (readme === null) {
        skipped += 1;
        log.debug({ pool: "github", candidate: candidate.fullName }, "Candidate has no README");
        continue;
      }

      const summary = await withTimeout(
        summarizeCandidateReadme({ generator, readme }),
        timeoutMs,
        `summary ${candidate.fullName}`,
      );
      results.push({ candidate, summary, similarity: tfidfCosineSimilarity(homeSummary, summary) });
    } catch (err) {
      skipped += 1;
      log.warn(
        { pool: "github", candidate: candidate.fullName, err: errorMessage(err) },
        "Skipping repository candidate",
      );
    }
  }

  const bestMatch = pickBestMatch(results);
  const similarity = bestMatch?.similarity ?? 0;

  return {
    pool: "github",
    bestMatch,
    similarity,
    score: noveltyScoreFromSimilarity(similarity),
    evaluated: results.length,
    skipped,
  };
}
