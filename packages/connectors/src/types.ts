import type { GithubRepoCandidate, WebArticleCandidate } from "@pitchcheck/shared";

/** Repository-README collaborator. `null` means the repository has no readable README. */
export interface ReadmeFetcher {
  fetchReadme(owner: string, repo: string): Promise<string | null>;
}

/** Source-hosting search collaborator. Fails soft: errors yield an empty list. */
export interface RepoSearcher {
  searchRepositories(query: string, limit?: number): Promise<GithubRepoCandidate[]>;
}

export type GithubClient = ReadmeFetcher & RepoSearcher;

/** Web-search collaborator. Fails soft: errors yield an empty list. */
export interface WebSearcher {
  search(query: string): Promise<WebArticleCandidate[]>;
}
