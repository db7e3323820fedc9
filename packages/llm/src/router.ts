import type { LlmConfig } from "@pitchcheck/shared";

import { callOpenAiCompat } from "./openai_compat.js";
import type { LlmRouter, LlmTask, ModelRef, TextGenerator } from "./types.js";

function looksLikeChatCompletionsEndpoint(endpoint: string): boolean {
  return endpoint.includes("/chat/completions");
}

/**
 * The client speaks the Responses API; rewrite a chat-completions URL to its
 * `/v1/responses` sibling.
 */
export function normalizeResponsesEndpoint(endpoint: string): string {
  if (!looksLikeChatCompletionsEndpoint(endpoint)) return endpoint;
  return endpoint.replace(/\/chat\/completions\/?$/, "/responses");
}

export function createLlmRouter(config: LlmConfig): LlmRouter {
  const endpoint = normalizeResponsesEndpoint(config.endpoint);

  return {
    chooseModel(task: LlmTask): ModelRef {
      return {
        provider: config.provider,
        model: config.taskModels[task] ?? config.model,
        endpoint,
      };
    },
    async call(_task, ref, request) {
      return callOpenAiCompat({
        apiKey: config.apiKey,
        endpoint: ref.endpoint,
        model: ref.model,
        request: {
          ...request,
          maxOutputTokens: request.maxOutputTokens ?? config.maxOutputTokens,
        },
        timeoutMs: config.timeoutMs,
      });
    },
  };
}

/**
 * Adapt a router to the single-prompt TextGenerator collaborator.
 * Prompts go out as one user message, matching how every novelty prompt is phrased.
 */
export function createTextGenerator(router: LlmRouter): TextGenerator {
  return {
    async complete(prompt, options) {
      const task = options?.task ?? "summarize";
      const ref = router.chooseModel(task);
      const result = await router.call(task, ref, { user: prompt });
      return result.outputText;
    },
  };
}

export function createLlmTextGenerator(config: LlmConfig): TextGenerator {
  return createTextGenerator(createLlmRouter(config));
}
