import { describe, expect, it } from "vitest";
import {
  DEFAULT_GITHUB_API_BASE_URL,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_WEB_SEARCH_ENDPOINT,
  loadRuntimeEnv,
} from "./runtime_env.js";

function baseEnv(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    LLM_API_KEY: "test-llm-key",
    LLM_BASE_URL: "https://llm.example",
    LLM_MODEL: "test-model",
    WEB_SEARCH_API_KEY: "test-search-key",
    ...overrides,
  };
}

describe("loadRuntimeEnv", () => {
  it("applies defaults around the required keys", () => {
    const env = loadRuntimeEnv(baseEnv());

    expect(env.appEnv).toBe("local");
    expect(env.apiPort).toBe(3001);
    expect(env.providerTimeoutMs).toBe(DEFAULT_PROVIDER_TIMEOUT_MS);
    expect(env.llm).toEqual({
      provider: "openai_compat",
      apiKey: "test-llm-key",
      endpoint: "https://llm.example/v1/responses",
      model: "test-model",
      taskModels: {},
      timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    });
    expect(env.github).toEqual({
      apiBaseUrl: DEFAULT_GITHUB_API_BASE_URL,
      userAgent: "pitchcheck/0.x",
      timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    });
    expect(env.webSearch).toEqual({
      endpoint: DEFAULT_WEB_SEARCH_ENDPOINT,
      apiKey: "test-search-key",
      engine: "google",
      timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    });
  });

  it("does not append /v1 twice", () => {
    const env = loadRuntimeEnv(baseEnv({ LLM_BASE_URL: "https://llm.example/v1/" }));
    expect(env.llm.endpoint).toBe("https://llm.example/v1/responses");
  });

  it("prefers an explicit LLM_ENDPOINT", () => {
    const env = loadRuntimeEnv(baseEnv({ LLM_ENDPOINT: "https://proxy.example/chat" }));
    expect(env.llm.endpoint).toBe("https://proxy.example/chat");
  });

  it("reads per-task model overrides and the shared timeout", () => {
    const env = loadRuntimeEnv(
      baseEnv({
        LLM_KEYWORDS_MODEL: "small-model",
        LLM_MAX_OUTPUT_TOKENS: "800",
        PROVIDER_TIMEOUT_MS: "5000",
        GITHUB_TOKEN: "test-gh-token",
        GITHUB_API_BASE_URL: "https://ghe.example/api/v3/",
      }),
    );

    expect(env.llm.taskModels).toEqual({ keywords: "small-model" });
    expect(env.llm.maxOutputTokens).toBe(800);
    expect(env.llm.timeoutMs).toBe(5000);
    expect(env.github.token).toBe("test-gh-token");
    expect(env.github.apiBaseUrl).toBe("https://ghe.example/api/v3");
    expect(env.webSearch.timeoutMs).toBe(5000);
  });

  it("throws on a missing required key", () => {
    const env = baseEnv();
    delete env.WEB_SEARCH_API_KEY;
    expect(() => loadRuntimeEnv(env)).toThrow("Missing required env var: WEB_SEARCH_API_KEY");
  });

  it("throws when no LLM endpoint can be resolved", () => {
    const env = baseEnv();
    delete env.LLM_BASE_URL;
    expect(() => loadRuntimeEnv(env)).toThrow(
      "Missing required env var: LLM_ENDPOINT (or LLM_BASE_URL)",
    );
  });

  it("rejects malformed integers", () => {
    expect(() => loadRuntimeEnv(baseEnv({ PROVIDER_TIMEOUT_MS: "soon" }))).toThrow(
      "Invalid integer env var: PROVIDER_TIMEOUT_MS=soon",
    );
  });

  it("falls back to local for unknown APP_ENV", () => {
    expect(loadRuntimeEnv(baseEnv({ APP_ENV: "staging" })).appEnv).toBe("local");
    expect(loadRuntimeEnv(baseEnv({ APP_ENV: "prod" })).appEnv).toBe("prod");
  });
});
