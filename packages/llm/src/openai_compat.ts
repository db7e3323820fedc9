import { errorMessage, TransientProviderError } from "@pitchcheck/shared";

import { isLlmAuthFailure, LLM_AUTH_ERROR_CODE } from "./error_classification.js";
import type { LlmCallResult, LlmRequest } from "./types.js";

const PROVIDER = "openai_compat";

function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return {};
}

function truncateString(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}…`;
}

function extractErrorDetail(response: unknown): string | null {
  if (typeof response === "string") return response.length > 0 ? response : null;
  const obj = asRecord(response);
  const nested = asRecord(obj.error).message;
  if (typeof nested === "string") return nested;
  if (typeof obj.message === "string") return obj.message;
  if (typeof obj.detail === "string") return obj.detail;
  if (typeof obj.error === "string") return obj.error;
  return null;
}

/**
 * Pull assistant text out of either a Responses API payload (`output_text` /
 * `output[].content[]`) or a chat-completions payload (`choices[0].message.content`).
 */
export function extractAssistantContent(response: unknown): string | null {
  const rec = asRecord(response);

  const outputText = rec.output_text;
  if (typeof outputText === "string" && outputText.length > 0) return outputText;

  const output = rec.output;
  if (Array.isArray(output)) {
    for (const item of output) {
      const it = asRecord(item);
      const content = it.content;
      if (it.type !== "message" || it.role !== "assistant" || !Array.isArray(content)) continue;
      for (const part of content) {
        const p = asRecord(part);
        const text = p.text;
        if ((p.type === "output_text" || p.type === "text") && typeof text === "string" && text.length > 0) {
          return text;
        }
      }
    }
  }

  const choices = rec.choices;
  if (Array.isArray(choices) && choices.length > 0) {
    const content = asRecord(asRecord(choices[0]).message).content;
    if (typeof content === "string" && content.length > 0) return content;
  }

  return null;
}

function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function extractUsageTokens(response: unknown): { inputTokens: number; outputTokens: number } | null {
  const usage = asRecord(asRecord(response).usage);
  const prompt = asNumber(usage.prompt_tokens) ?? asNumber(usage.input_tokens);
  const completion = asNumber(usage.completion_tokens) ?? asNumber(usage.output_tokens);
  if (prompt === null || completion === null) return null;
  return { inputTokens: prompt, outputTokens: completion };
}

export async function callOpenAiCompat(params: {
  apiKey: string;
  endpoint: string;
  model: string;
  request: LlmRequest;
  timeoutMs: number;
}): Promise<LlmCallResult> {
  const input = [
    ...(params.request.system ? [{ role: "system", content: params.request.system }] : []),
    { role: "user", content: params.request.user },
  ];
  const body = {
    model: params.model,
    input,
    temperature: params.request.temperature ?? 0,
    stream: false,
    ...(params.request.maxOutputTokens ? { max_output_tokens: params.request.maxOutputTokens } : {}),
  };

  let res: Response;
  try {
    res = await fetch(params.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${params.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(params.timeoutMs),
    });
  } catch (err) {
    throw new TransientProviderError({
      provider: PROVIDER,
      message: `LLM request failed: ${errorMessage(err)}`,
      cause: err,
    });
  }

  const contentType = res.headers.get("content-type") ?? "";
  let response: unknown;
  try {
    response = contentType.includes("application/json") ? await res.json() : await res.text();
  } catch (err) {
    throw new TransientProviderError({
      provider: PROVIDER,
      message: `LLM response body unreadable (${res.status})`,
      status: res.status,
      cause: err,
    });
  }

  if (!res.ok) {
    const detail = extractErrorDetail(response);
    if (isLlmAuthFailure(res.status, detail)) {
      throw new TransientProviderError({
        provider: PROVIDER,
        message: "LLM authentication failed. Check LLM_API_KEY for the configured endpoint.",
        status: res.status,
        reason: LLM_AUTH_ERROR_CODE,
      });
    }
    const suffix = detail ? `: ${truncateString(detail, 300)}` : "";
    throw new TransientProviderError({
      provider: PROVIDER,
      message: `LLM provider error (${res.status}) model=${params.model}${suffix}`,
      status: res.status,
    });
  }

  const outputText = extractAssistantContent(response);
  if (!outputText) {
    throw new TransientProviderError({
      provider: PROVIDER,
      message: "LLM response missing output text",
      status: res.status,
    });
  }

  const usage = extractUsageTokens(response);
  return {
    outputText: outputText.trim(),
    rawResponse: response,
    inputTokens: usage?.inputTokens ?? 0,
    outputTokens: usage?.outputTokens ?? 0,
    endpoint: params.endpoint,
  };
}
