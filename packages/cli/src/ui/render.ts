import type { NoveltyReport } from "@pitchcheck/shared";

function formatScore(score: number): string {
  return `${score.toFixed(1)} / 100`;
}

function matchLine(label: string, name: string | null, link: string | null): string {
  if (!name) return `  ${label}: (none)`;
  return link ? `  ${label}: ${name} <${link}>` : `  ${label}: ${name}`;
}

export function renderNoveltyReport(report: NoveltyReport): string {
  return [
    "",
    "=== Novelty report ===",
    "",
    `Overall novelty: ${formatScore(report.overallScore)}`,
    "",
    `GitHub novelty: ${formatScore(report.githubScore)}`,
    matchLine("Closest repository", report.githubRepo, report.githubRepoLink),
    `  ${report.githubSummary}`,
    "",
    `Web novelty: ${formatScore(report.googleScore)}`,
    matchLine("Closest article", report.googleArticle, report.googleArticleLink),
    `  ${report.googleSummary}`,
    "",
    "Presentation summary:",
    `  ${report.presentationSummary}`,
    "",
  ].join("\n");
}
