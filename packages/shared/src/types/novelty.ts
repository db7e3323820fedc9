export type NoveltyPool = "github" | "web";

export interface GithubRepoCandidate {
  kind: "github_repo";
  name: string;
  fullName: string;
  owner: string;
  repo: string;
  url: string;
  description: string | null;
}

export interface WebArticleCandidate {
  kind: "web_article";
  title: string;
  link: string;
  snippet: string | null;
  description: string | null;
}

export type Candidate = GithubRepoCandidate | WebArticleCandidate;

export interface SimilarityResult<C extends Candidate = Candidate> {
  candidate: C;
  /** Cosine similarity in [0, 1] */
  similarity: number;
  /** Generated summary of the candidate that was compared */
  summary: string;
}

export interface PoolResult<C extends Candidate = Candidate> {
  pool: NoveltyPool;
  /** null when no participating candidate scored above zero */
  bestMatch: SimilarityResult<C> | null;
  similarity: number;
  /** (1 - similarity) * 100, one decimal */
  score: number;
  evaluated: number;
  skipped: number;
}

export interface NoveltyReport {
  readonly githubScore: number;
  readonly githubRepo: string | null;
  readonly githubRepoLink: string | null;
  readonly githubSummary: string;
  readonly googleScore: number;
  readonly googleArticle: string | null;
  readonly googleArticleLink: string | null;
  readonly googleSummary: string;
  readonly overallScore: number;
  readonly presentationSummary: string;
}

/** Externally visible JSON shape of a novelty report. */
export interface NoveltyReportJson {
  github_score: number;
  github_repo: string | null;
  github_repo_link: string | null;
  github_summary: string;
  google_score: number;
  google_article: string | null;
  google_article_link: string | null;
  google_summary: string;
  overall_score: number;
  presentation_summary: string;
}

export function toNoveltyReportJson(report: NoveltyReport): NoveltyReportJson {
  return {
    github_score: report.githubScore,
    github_repo: report.githubRepo,
    github_repo_link: report.githubRepoLink,
    github_summary: report.githubSummary,
    google_score: report.googleScore,
    google_article: report.googleArticle,
    google_article_link: report.googleArticleLink,
    google_summary: report.googleSummary,
    overall_score: report.overallScore,
    presentation_summary: report.presentationSummary,
  };
}
