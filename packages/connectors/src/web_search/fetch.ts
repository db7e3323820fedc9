import { createLogger, errorMessage, type WebArticleCandidate, type WebSearchConfig } from "@pitchcheck/shared";

import { normalizeWebSearchResponse } from "./normalize.js";

const log = createLogger({ component: "web_search" });

export const WEB_SEARCH_RESULT_COUNT = 10;

export function buildWebSearchUrl(config: WebSearchConfig, query: string): string {
  const params = new URLSearchParams({
    engine: config.engine,
    q: query,
    hl: "en",
    gl: "us",
    num: String(WEB_SEARCH_RESULT_COUNT),
    api_key: config.apiKey,
  });
  return `${config.endpoint}?${params.toString()}`;
}

/**
 * Organic web results for `query`. Never throws: failures are logged and yield [].
 */
export async function searchWeb(config: WebSearchConfig, query: string): Promise<WebArticleCandidate[]> {
  try {
    const res = await fetch(buildWebSearchUrl(config, query), {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      log.warn({ status: res.status, body: body.slice(0, 300) }, "Web search failed");
      return [];
    }

    return normalizeWebSearchResponse(await res.json());
  } catch (err) {
    log.warn({ err: errorMessage(err) }, "Web search errored");
    return [];
  }
}
