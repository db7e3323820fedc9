import type { LlmConfig } from "@pitchcheck/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLlmRouter, createTextGenerator, normalizeResponsesEndpoint } from "./router.js";
import type { LlmRouter } from "./types.js";

const config: LlmConfig = {
  provider: "openai_compat",
  apiKey: "test-key",
  endpoint: "https://llm.example/v1/responses",
  model: "default-model",
  taskModels: { keywords: "small-model" },
  timeoutMs: 1000,
};

describe("normalizeResponsesEndpoint", () => {
  it("rewrites chat-completions URLs", () => {
    expect(normalizeResponsesEndpoint("https://api.example/v1/chat/completions")).toBe(
      "https://api.example/v1/responses",
    );
    expect(normalizeResponsesEndpoint("https://api.example/v1/responses")).toBe(
      "https://api.example/v1/responses",
    );
  });
});

describe("createLlmRouter", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("resolves per-task models with a shared fallback", () => {
    const router = createLlmRouter(config);
    expect(router.chooseModel("keywords").model).toBe("small-model");
    expect(router.chooseModel("summarize").model).toBe("default-model");
    expect(router.chooseModel("explain")).toEqual({
      provider: "openai_compat",
      model: "default-model",
      endpoint: "https://llm.example/v1/responses",
    });
  });

  it("sends the configured max output tokens", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(
      new Response(JSON.stringify({ output_text: "ok" }), {
        status: 200,
        headers: { "content-type": "application/json" },
      }),
    );
    const router = createLlmRouter({ ...config, maxOutputTokens: 300 });

    await router.call("summarize", router.chooseModel("summarize"), { user: "hi" });

    const init = vi.mocked(fetch).mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: "default-model", max_output_tokens: 300 });
  });
});

describe("createTextGenerator", () => {
  it("routes prompts through the task's model", async () => {
    const call = vi.fn<LlmRouter["call"]>().mockResolvedValue({
      outputText: "five words go right here",
      rawResponse: {},
      inputTokens: 1,
      outputTokens: 1,
      endpoint: "https://llm.example/v1/responses",
    });
    const router: LlmRouter = {
      chooseModel: (task) => ({ provider: "p", model: `${task}-model`, endpoint: "e" }),
      call,
    };

    const text = await createTextGenerator(router).complete("prompt", { task: "keywords" });

    expect(text).toBe("five words go right here");
    expect(call).toHaveBeenCalledWith(
      "keywords",
      { provider: "p", model: "keywords-model", endpoint: "e" },
      { user: "prompt" },
    );
  });
});
