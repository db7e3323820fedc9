import {
  clampText,
  createLogger,
  errorMessage,
  type GithubConfig,
  type GithubRepoCandidate,
  TransientProviderError,
} from "@pitchcheck/shared";

import { normalizeGithubSearchResponse } from "./normalize.js";

const log = createLogger({ component: "github" });

/** Fixed page size for repository search */
export const GITHUB_SEARCH_PAGE_SIZE = 10;

export const README_MAX_CHARS = 50_000;

function githubHeaders(config: GithubConfig, accept: string): Record<string, string> {
  return {
    Accept: accept,
    "User-Agent": config.userAgent,
    "X-GitHub-Api-Version": "2022-11-28",
    ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
  };
}

/**
 * GET /repos/{owner}/{repo}/readme as raw text.
 *
 * 404 (no README) resolves to null; any other failure is a TransientProviderError.
 */
export async function fetchReadme(config: GithubConfig, owner: string, repo: string): Promise<string | null> {
  const url = `${config.apiBaseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/readme`;

  let res: Response;
  try {
    res = await fetch(url, {
      method: "GET",
      headers: githubHeaders(config, "application/vnd.github.raw+json"),
      signal: AbortSignal.timeout(config.timeoutMs),
    });
  } catch (err) {
    throw new TransientProviderError({
      provider: "github",
      message: `GitHub README fetch failed for ${owner}/${repo}: ${errorMessage(err)}`,
      cause: err,
    });
  }

  if (res.status === 404) return null;

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new TransientProviderError({
      provider: "github",
      message: `GitHub README fetch failed for ${owner}/${repo} (${res.status} ${res.statusText}): ${body.slice(0, 300)}`,
      status: res.status,
    });
  }

  const text = (await res.text()).trim();
  if (text.length === 0) return null;
  return clampText(text, README_MAX_CHARS);
}

/**
 * GET /search/repositories. Never throws: any failure is logged and yields [].
 * Collaborator ordering is preserved.
 */
export async function searchRepositories(
  config: GithubConfig,
  query: string,
  limit: number = GITHUB_SEARCH_PAGE_SIZE,
): Promise<GithubRepoCandidate[]> {
  const params = new URLSearchParams({ q: query, per_page: String(limit) });
  const url = `${config.apiBaseUrl}/search/repositories?${params.toString()}`;

  try {
    const res = await fetch(url, {
      method: "GET",
      headers: githubHeaders(config, "application/vnd.github+json"),
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!res.ok) {
      log.warn({ status: res.status, query }, "GitHub repository search failed");
      return [];
    }

    const decoded = normalizeGithubSearchResponse(await res.json());
    if (!decoded) {
      log.warn({ query }, "GitHub repository search returned no items array");
      return [];
    }
    if (decoded.dropped > 0) {
      log.debug({ dropped: decoded.dropped }, "Dropped undecodable repository items");
    }
    return decoded.candidates.slice(0, limit);
  } catch (err) {
    log.warn({ query, err: errorMessage(err) }, "GitHub repository search errored");
    return [];
  }
}
