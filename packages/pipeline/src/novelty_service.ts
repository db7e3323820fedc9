import { randomUUID } from "node:crypto";

import { createGithubClient, createWebSearchClient } from "@pitchcheck/connectors";
import { createLlmTextGenerator, summarizePresentation, withTimeout } from "@pitchcheck/llm";
import {
  createEvaluationLogger,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  type Logger,
  type NoveltyReport,
  parseGithubRepoUrl,
  type RuntimeEnv,
  ValidationError,
} from "@pitchcheck/shared";

import { evaluateNovelty, type NoveltyDeps } from "./evaluate_novelty.js";

/** A pitch is submitted either already summarized or as a raw transcript. */
export type NoveltySubmission =
  | { repoUrl: string; presentationSummary: string }
  | { repoUrl: string; transcript: string };

export interface NoveltyService {
  evaluate(submission: NoveltySubmission, options?: { log?: Logger }): Promise<NoveltyReport>;
}

/** Wire the production collaborators from runtime config. */
export function createNoveltyDeps(env: RuntimeEnv): NoveltyDeps {
  return {
    generator: createLlmTextGenerator(env.llm),
    github: createGithubClient(env.github),
    web: createWebSearchClient(env.webSearch),
    timeoutMs: env.providerTimeoutMs,
  };
}

export function createNoveltyService(deps: NoveltyDeps): NoveltyService {
  return {
    async evaluate(submission, options) {
      const log = options?.log ?? deps.log ?? createEvaluationLogger(randomUUID());
      parseGithubRepoUrl(submission.repoUrl);
      let presentationSummary: string;

      if ("transcript" in submission) {
        const transcript = submission.transcript.trim();
        if (transcript.length === 0) {
          throw new ValidationError("transcript must be a non-empty string");
        }
        presentationSummary = await withTimeout(
          summarizePresentation({ generator: deps.generator, transcript }),
          deps.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
          "presentation summary",
        );
        log.debug({ chars: transcript.length }, "Transcript summarized");
      } else {
        presentationSummary = submission.presentationSummary;
      }

      return evaluateNovelty({ ...deps, log }, { presentationSummary, repoUrl: submission.repoUrl });
    },
  };
}
