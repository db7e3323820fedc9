import type { GithubConfig } from "@pitchcheck/shared";

import type { GithubClient } from "../types.js";
import { fetchReadme, searchRepositories } from "./fetch.js";

export { GITHUB_SEARCH_PAGE_SIZE, README_MAX_CHARS } from "./fetch.js";
export { normalizeGithubRepo, normalizeGithubSearchResponse } from "./normalize.js";

export function createGithubClient(config: GithubConfig): GithubClient {
  return {
    fetchReadme: (owner, repo) => fetchReadme(config, owner, repo),
    searchRepositories: (query, limit) => searchRepositories(config, query, limit),
  };
}
