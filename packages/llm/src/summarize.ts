import { clampText, type WebArticleCandidate } from "@pitchcheck/shared";

import type { TextGenerator } from "./types.js";

/** README bodies are clamped before prompting; very long READMEs add cost, not signal */
export const SUMMARY_MAX_INPUT_CHARS = 20_000;

export function buildProjectReadmePrompt(readme: string): string {
  return (
    `Here is a project GitHub repo README file: ${clampText(readme.trim(), SUMMARY_MAX_INPUT_CHARS)}. ` +
    "Please provide a summary of the project in a couple sentences."
  );
}

export function buildCandidateReadmePrompt(readme: string): string {
  return (
    `Here is a project README file of a GitHub repo: ${clampText(readme.trim(), SUMMARY_MAX_INPUT_CHARS)}. ` +
    "Please provide a summary of the project in a couple sentences."
  );
}

export function buildArticlePrompt(article: WebArticleCandidate): string {
  return (
    `Here is an article about a topic: Title: ${article.title}. ` +
    `Snippet: ${article.snippet ?? ""}. ` +
    `Description: ${article.description ?? ""}. ` +
    "Please provide a summary of the topic in a couple sentences."
  );
}

export function buildPresentationPrompt(transcript: string): string {
  return (
    `Here is a transcription of a project presentation, ${clampText(transcript.trim(), SUMMARY_MAX_INPUT_CHARS)}. ` +
    "Please provide a summary of the project in a couple sentences."
  );
}

/** Summary of the submitting team's own README (the "home" document). */
export async function summarizeProjectReadme(params: {
  generator: TextGenerator;
  readme: string;
}): Promise<string> {
  return params.generator.complete(buildProjectReadmePrompt(params.readme), { task: "summarize" });
}

export async function summarizeCandidateReadme(params: {
  generator: TextGenerator;
  readme: string;
}): Promise<string> {
  return params.generator.complete(buildCandidateReadmePrompt(params.readme), { task: "summarize" });
}

export async function summarizeArticle(params: {
  generator: TextGenerator;
  article: WebArticleCandidate;
}): Promise<string> {
  return params.generator.complete(buildArticlePrompt(params.article), { task: "summarize" });
}

/** Turn a pitch transcript into the presentation summary the novelty pipeline starts from. */
export async function summarizePresentation(params: {
  generator: TextGenerator;
  transcript: string;
}): Promise<string> {
  return params.generator.complete(buildPresentationPrompt(params.transcript), { task: "summarize" });
}
