import type { TextGenerator } from "./types.js";

export function buildGithubExplanationPrompt(projectSummary: string, matchSummary: string): string {
  return (
    `Here is a summary of a user's GitHub README file for a project they worked on: ${projectSummary}. ` +
    `Here is a summary of a GitHub repository project that was found online: ${matchSummary}. ` +
    "These summaries are similar. In a few sentences, explain why these projects are similar."
  );
}

export function buildWebExplanationPrompt(articleSummary: string, presentationSummary: string): string {
  return (
    `Here is a summary of a Google article about a topic: ${articleSummary}. ` +
    `Here is a summary of a presentation about a project: ${presentationSummary}. ` +
    "In a few sentences, explain why the Google article is similar to the project."
  );
}

export async function explainGithubSimilarity(params: {
  generator: TextGenerator;
  projectSummary: string;
  matchSummary: string;
}): Promise<string> {
  return params.generator.complete(
    buildGithubExplanationPrompt(params.projectSummary, params.matchSummary),
    { task: "explain" },
  );
}

export async function explainWebSimilarity(params: {
  generator: TextGenerator;
  articleSummary: string;
  presentationSummary: string;
}): Promise<string> {
  return params.generator.complete(
    buildWebExplanationPrompt(params.articleSummary, params.presentationSummary),
    { task: "explain" },
  );
}
