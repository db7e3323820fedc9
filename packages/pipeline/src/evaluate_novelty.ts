import { randomUUID } from "node:crypto";

import type { GithubClient, WebSearcher } from "@pitchcheck/connectors";
import {
  explainGithubSimilarity,
  explainWebSimilarity,
  extractKeywords,
  summarizeProjectReadme,
  type TextGenerator,
  withTimeout,
} from "@pitchcheck/llm";
import {
  createEvaluationLogger,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  type GithubRepoCandidate,
  type Logger,
  type NoveltyReport,
  parseGithubRepoUrl,
  type PoolResult,
  TransientProviderError,
  ValidationError,
  type WebArticleCandidate,
} from "@pitchcheck/shared";

import {
  GITHUB_SIMILAR_LEAD,
  githubNotSimilarSummary,
  overallNoveltyScore,
  shouldExplainSimilarity,
  WEB_SIMILAR_LEAD,
  webNotSimilarSummary,
} from "./scoring/novelty.js";
import { scoreGithubPool } from "./stages/github_pool.js";
import { scoreWebPool } from "./stages/web_pool.js";

export interface NoveltyDeps {
  generator: TextGenerator;
  github: GithubClient;
  web: WebSearcher;
  /** Bound on each external call (default DEFAULT_PROVIDER_TIMEOUT_MS) */
  timeoutMs?: number;
  log?: Logger;
}

export interface NoveltyRequest {
  presentationSummary: string;
  repoUrl: string;
}

async function summarizeHomeProject(
  deps: NoveltyDeps,
  owner: string,
  repo: string,
  timeoutMs: number,
): Promise<string> {
  const readme = await withTimeout(deps.github.fetchReadme(owner, repo), timeoutMs, `readme ${owner}/${repo}`);
  if (readme === null) {
    throw new TransientProviderError({
      provider: "github",
      message: `No README found for ${owner}/${repo}`,
      status: 404,
    });
  }
  return withTimeout(summarizeProjectReadme({ generator: deps.generator, readme }), timeoutMs, "home summary");
}

async function describeGithubPool(
  deps: NoveltyDeps,
  pool: PoolResult<GithubRepoCandidate>,
  homeSummary: string,
  timeoutMs: number,
): Promise<string> {
  const match = pool.bestMatch;
  if (!match || !shouldExplainSimilarity(pool.score)) {
    return githubNotSimilarSummary(pool.score);
  }
  const explanation = await withTimeout(
    explainGithubSimilarity({
      generator: deps.generator,
      projectSummary: homeSummary,
      matchSummary: match.summary,
    }),
    timeoutMs,
    "github explanation",
  );
  return `${GITHUB_SIMILAR_LEAD}${explanation}`;
}

async function describeWebPool(
  deps: NoveltyDeps,
  pool: PoolResult<WebArticleCandidate>,
  presentationSummary: string,
  timeoutMs: number,
): Promise<string> {
  const match = pool.bestMatch;
  if (!match || !shouldExplainSimilarity(pool.score)) {
    return webNotSimilarSummary(pool.score);
  }
  const explanation = await withTimeout(
    explainWebSimilarity({
      generator: deps.generator,
      articleSummary: match.summary,
      presentationSummary,
    }),
    timeoutMs,
    "web explanation",
  );
  return `${WEB_SIMILAR_LEAD}${explanation}`;
}

/**
 * Score how novel a submission is against GitHub repositories and web articles.
 *
 * Fatal: invalid input, the home README/summary, keyword extraction and the
 * explanation paragraphs. Per-candidate failures are skipped inside each pool.
 * Either a complete report is returned or the call rejects.
 */
export async function evaluateNovelty(deps: NoveltyDeps, request: NoveltyRequest): Promise<NoveltyReport> {
  const presentationSummary = request.presentationSummary.trim();
  if (presentationSummary.length === 0) {
    throw new ValidationError("presentationSummary must be a non-empty string");
  }
  const { owner, repo } = parseGithubRepoUrl(request.repoUrl);

  const timeoutMs = deps.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  const log = deps.log ?? createEvaluationLogger(randomUUID());
  const startedAt = Date.now();
  log.info({ owner, repo }, "Novelty evaluation started");

  const homeSummary = await summarizeHomeProject(deps, owner, repo, timeoutMs);
  const keywords = await extractKeywords({
    generator: deps.generator,
    summary: presentationSummary,
    timeoutMs,
    log,
  });
  log.debug({ keywords }, "Search keywords generated");

  const githubPool = await scoreGithubPool({
    generator: deps.generator,
    github: deps.github,
    homeSummary,
    keywords,
    timeoutMs,
    log,
  });
  const webPool = await scoreWebPool({
    generator: deps.generator,
    web: deps.web,
    presentationSummary,
    timeoutMs,
    log,
  });

  const githubSummary = await describeGithubPool(deps, githubPool, homeSummary, timeoutMs);
  const googleSummary = await describeWebPool(deps, webPool, presentationSummary, timeoutMs);

  const report: NoveltyReport = Object.freeze({
    githubScore: githubPool.score,
    githubRepo: githubPool.bestMatch?.candidate.name ?? null,
    githubRepoLink: githubPool.bestMatch?.candidate.url ?? null,
    githubSummary,
    googleScore: webPool.score,
    googleArticle: webPool.bestMatch?.candidate.title ?? null,
    googleArticleLink: webPool.bestMatch?.candidate.link ?? null,
    googleSummary,
    overallScore: overallNoveltyScore(githubPool.score, webPool.score),
    presentationSummary,
  });

  log.info(
    {
      durationMs: Date.now() - startedAt,
      githubScore: report.githubScore,
      googleScore: report.googleScore,
      overallScore: report.overallScore,
      github: { evaluated: githubPool.evaluated, skipped: githubPool.skipped },
      web: { evaluated: webPool.evaluated, skipped: webPool.skipped },
    },
    "Novelty evaluation finished",
  );

  return report;
}
