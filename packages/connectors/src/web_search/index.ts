import type { WebSearchConfig } from "@pitchcheck/shared";

import type { WebSearcher } from "../types.js";
import { searchWeb } from "./fetch.js";

export { buildWebSearchUrl, WEB_SEARCH_RESULT_COUNT } from "./fetch.js";
export { normalizeWebArticle, normalizeWebSearchResponse } from "./normalize.js";

export function createWebSearchClient(config: WebSearchConfig): WebSearcher {
  return {
    search: (query) => searchWeb(config, query),
  };
}
