export type AppEnv = "local" | "dev" | "prod";

export type LlmTask = "summarize" | "keywords" | "explain";

export interface LlmConfig {
  provider: string;
  apiKey: string;
  endpoint: string;
  /** Fallback model for every task */
  model: string;
  /** Per-task overrides (LLM_<TASK>_MODEL) */
  taskModels: Partial<Record<LlmTask, string>>;
  maxOutputTokens?: number;
  timeoutMs: number;
}

export interface GithubConfig {
  apiBaseUrl: string;
  token?: string;
  userAgent: string;
  timeoutMs: number;
}

export interface WebSearchConfig {
  endpoint: string;
  apiKey: string;
  engine: string;
  timeoutMs: number;
}

export interface RuntimeEnv {
  appEnv: AppEnv;
  apiPort: number;
  /** Upper bound applied to every external call made by the novelty pipeline */
  providerTimeoutMs: number;
  llm: LlmConfig;
  github: GithubConfig;
  webSearch: WebSearchConfig;
}

export const DEFAULT_PROVIDER_TIMEOUT_MS = 60_000;
export const DEFAULT_GITHUB_API_BASE_URL = "https://api.github.com";
export const DEFAULT_WEB_SEARCH_ENDPOINT = "https://www.searchapi.io/api/v1/search";
const DEFAULT_API_PORT = 3001;

const LLM_TASKS: LlmTask[] = ["summarize", "keywords", "explain"];

function firstEnv(env: NodeJS.ProcessEnv, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return undefined;
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = firstEnv(env, [name]);
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}

function parseIntEnv(env: NodeJS.ProcessEnv, names: string[], defaultValue: number): number {
  for (const name of names) {
    const raw = firstEnv(env, [name]);
    if (raw === undefined) continue;
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
      throw new Error(`Invalid integer env var: ${name}=${raw}`);
    }
    return parsed;
  }
  return defaultValue;
}

function withV1(baseUrl: string, pathAfterV1: string): string {
  const trimmed = baseUrl.replace(/\/+$/, "");
  if (trimmed.endsWith("/v1")) return `${trimmed}${pathAfterV1}`;
  return `${trimmed}/v1${pathAfterV1}`;
}

function resolveLlmEndpoint(env: NodeJS.ProcessEnv): string {
  const explicit = firstEnv(env, ["LLM_ENDPOINT"]);
  if (explicit) return explicit;
  const baseUrl = firstEnv(env, ["LLM_BASE_URL"]);
  if (baseUrl) return withV1(baseUrl, "/responses");
  throw new Error("Missing required env var: LLM_ENDPOINT (or LLM_BASE_URL)");
}

function loadLlmConfig(env: NodeJS.ProcessEnv, timeoutMs: number): LlmConfig {
  const taskModels: Partial<Record<LlmTask, string>> = {};
  for (const task of LLM_TASKS) {
    const model = firstEnv(env, [`LLM_${task.toUpperCase()}_MODEL`]);
    if (model) taskModels[task] = model;
  }

  const maxOutputTokensRaw = firstEnv(env, ["LLM_MAX_OUTPUT_TOKENS"]);

  return {
    provider: firstEnv(env, ["LLM_PROVIDER"]) ?? "openai_compat",
    apiKey: requireEnv(env, "LLM_API_KEY"),
    endpoint: resolveLlmEndpoint(env),
    model: requireEnv(env, "LLM_MODEL"),
    taskModels,
    ...(maxOutputTokensRaw
      ? { maxOutputTokens: parseIntEnv(env, ["LLM_MAX_OUTPUT_TOKENS"], 0) }
      : {}),
    timeoutMs,
  };
}

/**
 * Build the process-wide configuration. Read once at startup and passed
 * explicitly into each collaborator; nothing reads credentials from the
 * environment after this.
 */
export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const appEnvRaw = env.APP_ENV ?? "local";
  const appEnv: AppEnv =
    appEnvRaw === "prod" || appEnvRaw === "dev" || appEnvRaw === "local" ? appEnvRaw : "local";

  const providerTimeoutMs = parseIntEnv(env, ["PROVIDER_TIMEOUT_MS"], DEFAULT_PROVIDER_TIMEOUT_MS);
  const githubToken = firstEnv(env, ["GITHUB_TOKEN"]);

  return {
    appEnv,
    apiPort: parseIntEnv(env, ["API_PORT", "PORT"], DEFAULT_API_PORT),
    providerTimeoutMs,
    llm: loadLlmConfig(env, providerTimeoutMs),
    github: {
      apiBaseUrl: (firstEnv(env, ["GITHUB_API_BASE_URL"]) ?? DEFAULT_GITHUB_API_BASE_URL).replace(
        /\/+$/,
        "",
      ),
      ...(githubToken ? { token: githubToken } : {}),
      userAgent: firstEnv(env, ["GITHUB_USER_AGENT"]) ?? "pitchcheck/0.x",
      timeoutMs: providerTimeoutMs,
    },
    webSearch: {
      endpoint: firstEnv(env, ["WEB_SEARCH_ENDPOINT"]) ?? DEFAULT_WEB_SEARCH_ENDPOINT,
      apiKey: requireEnv(env, "WEB_SEARCH_API_KEY"),
      engine: firstEnv(env, ["WEB_SEARCH_ENGINE"]) ?? "google",
      timeoutMs: providerTimeoutMs,
    },
  };
}
