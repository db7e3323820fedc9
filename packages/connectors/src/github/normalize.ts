import { type GithubRepoCandidate, type GithubRepoRef, parseGithubRepoUrl } from "@pitchcheck/shared";

import { asRecord, asString } from "../lib/decode.js";

function splitFullName(fullName: string | null): GithubRepoRef | null {
  if (!fullName) return null;
  const [owner, repo, ...rest] = fullName.split("/");
  if (!owner || !repo || rest.length > 0) return null;
  return { owner, repo };
}

function refFromHtmlUrl(htmlUrl: string): GithubRepoRef | null {
  try {
    return parseGithubRepoUrl(htmlUrl);
  } catch {
    return null;
  }
}

/**
 * Decode one `items[]` entry of the repository search response.
 * Returns null when the entry lacks a name or an html_url we can resolve to owner/repo.
 */
export function normalizeGithubRepo(raw: unknown): GithubRepoCandidate | null {
  const rec = asRecord(raw);
  const name = asString(rec.name);
  const url = asString(rec.html_url);
  if (!name || !url) return null;

  const ownerLogin = asString(asRecord(rec.owner).login);
  const ref =
    splitFullName(asString(rec.full_name)) ??
    (ownerLogin ? { owner: ownerLogin, repo: name } : null) ??
    refFromHtmlUrl(url);
  if (!ref) return null;

  return {
    kind: "github_repo",
    name,
    fullName: `${ref.owner}/${ref.repo}`,
    owner: ref.owner,
    repo: ref.repo,
    url,
    description: asString(rec.description),
  };
}

export interface GithubSearchDecodeResult {
  candidates: GithubRepoCandidate[];
  dropped: number;
}

export function normalizeGithubSearchResponse(payload: unknown): GithubSearchDecodeResult | null {
  const items = asRecord(payload).items;
  if (!Array.isArray(items)) return null;

  const candidates: GithubRepoCandidate[] = [];
  let dropped = 0;
  for (const item of items) {
    const candidate = normalizeGithubRepo(item);
    if (candidate) candidates.push(candidate);
    else dropped += 1;
  }
  return { candidates, dropped };
}
