import type { WebSearcher } from "@pitchcheck/connectors";
import { summarizeArticle, type TextGenerator, withTimeout } from "@pitchcheck/llm";
import {
  errorMessage,
  type Logger,
  type PoolResult,
  type SimilarityResult,
  type WebArticleCandidate,
} from "@pitchcheck/shared";

import { noveltyScoreFromSimilarity } from "../scoring/novelty.js";
import { tfidfCosineSimilarity } from "../scoring/tfidf.js";
import { pickBestMatch } from "./best_match.js";

export interface WebPoolParams {
  generator: TextGenerator;
  web: WebSearcher;
  /** Used both as the search query and as the comparison document */
  presentationSummary: string;
  timeoutMs: number;
  log: Logger;
}

async function findArticles(params: WebPoolParams): Promise<WebArticleCandidate[]> {
  try {
    return await withTimeout(params.web.search(params.presentationSummary), params.timeoutMs, "web search");
  } catch (err) {
    params.log.warn({ pool: "web", err: errorMessage(err) }, "Web search failed; treating as empty");
    return [];
  }
}

export async function scoreWebPool(params: WebPoolParams): Promise<PoolResult<WebArticleCandidate>> {
  const { generator, presentationSummary, timeoutMs, log } = params;
  const articles = await findArticles(params);

  const results: SimilarityResult<WebArticleCandidate>[] = [];
  let skipped = 0;

  for (const article of articles) {
    try {
      const summary = await withTimeout(summarizeArticle({ generator, article }), timeoutMs, `summary ${article.link}`);
      results.push({ candidate: article, summary, similarity: tfidfCosineSimilarity(presentationSummary, summary) });
    } catch (err) {
      skipped += 1;
      log.warn({ pool: "web", candidate: article.link, err: errorMessage(err) }, "Skipping article candidate");
    }
  }

  const bestMatch = pickBestMatch(results);
  const similarity = bestMatch?.similarity ?? 0;

  return {
    pool: "web",
    bestMatch,
    similarity,
    score: noveltyScoreFromSimilarity(similarity),
    evaluated: results.length,
    skipped,
  };
}
