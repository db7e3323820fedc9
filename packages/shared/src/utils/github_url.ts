import { ValidationError } from "../errors.js";

export interface GithubRepoRef {
  owner: string;
  repo: string;
}

const GITHUB_HOSTS = new Set(["github.com", "www.github.com"]);

/**
 * Extract owner/repo from a GitHub repository URL.
 *
 * Accepts extra path segments (`/tree/main/src`), query strings and a trailing `.git`.
 */
export function parseGithubRepoUrl(input: string): GithubRepoRef {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw new ValidationError(`Invalid repository URL: ${input}`);
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new ValidationError(`Repository URL must use http(s): ${input}`);
  }
  if (!GITHUB_HOSTS.has(url.hostname.toLowerCase())) {
    throw new ValidationError(`Not a GitHub repository URL: ${input}`);
  }

  const [owner, rawRepo] = url.pathname.split("/").filter((part) => part.length > 0);
  const repo = rawRepo?.replace(/\.git$/i, "");
  if (!owner || !repo) {
    throw new ValidationError(`Repository URL does not contain an owner/repo path: ${input}`);
  }

  return { owner, repo };
}
