import { createLogger, KeywordGenerationExhaustedError, type Logger } from "@pitchcheck/shared";

import { withTimeout } from "./timeout.js";
import type { TextGenerator } from "./types.js";

/** Length of the search query derived from a presentation summary */
export const KEYWORD_COUNT = 5;

/** Hard cap on generation attempts; not configurable per call */
export const MAX_KEYWORD_ATTEMPTS = 10;

const defaultLog = createLogger({ component: "keywords" });

export function buildKeywordPrompt(summary: string): string {
  return (
    "Here is a summary of a presentation about a project, please provide a 5 word title or 5 key words " +
    "of this presentation separated by spaces. Do not include anything else in your response. " +
    `It should only be 5 words separated by spaces. ${summary}`
  );
}

export function splitKeywords(text: string): string[] {
  return text.trim().split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Derive a five-word search query from a presentation summary.
 *
 * The same request is re-issued until the answer has exactly KEYWORD_COUNT
 * whitespace-separated words. Provider errors and timeouts are not retried here.
 * Each attempt is bounded by `timeoutMs` when given.
 *
 * @throws KeywordGenerationExhaustedError after MAX_KEYWORD_ATTEMPTS invalid answers
 */
export async function extractKeywords(params: {
  generator: TextGenerator;
  summary: string;
  timeoutMs?: number;
  log?: Logger;
}): Promise<string> {
  const log = params.log ?? defaultLog;
  const prompt = buildKeywordPrompt(params.summary);
  let lastResponse: string | null = null;

  for (let attempt = 1; attempt <= MAX_KEYWORD_ATTEMPTS; attempt += 1) {
    const response = await withTimeout(
      params.generator.complete(prompt, { task: "keywords" }),
      params.timeoutMs ?? 0,
      `keywords attempt ${attempt}`,
    );
    const words = splitKeywords(response);
    if (words.length === KEYWORD_COUNT) {
      return words.join(" ");
    }
    lastResponse = response;
    log.warn({ attempt, wordCount: words.length }, "Keyword response had the wrong word count");
  }

  throw new KeywordGenerationExhaustedError(MAX_KEYWORD_ATTEMPTS, lastResponse);
}
