import type { WebArticleCandidate } from "@pitchcheck/shared";

import { asRecord, asString } from "../lib/decode.js";

/** Decode one `organic_results[]` entry; null without a title or link. */
export function normalizeWebArticle(raw: unknown): WebArticleCandidate | null {
  const rec = asRecord(raw);
  const title = asString(rec.title);
  const link = asString(rec.link);
  if (!title || !link) return null;

  return {
    kind: "web_article",
    title,
    link,
    snippet: asString(rec.snippet),
    description: asString(rec.description),
  };
}

/**
 * A payload without an `organic_results` array is an empty result set, not an error.
 */
export function normalizeWebSearchResponse(payload: unknown): WebArticleCandidate[] {
  const results = asRecord(payload).organic_results;
  if (!Array.isArray(results)) return [];

  const articles: WebArticleCandidate[] = [];
  for (const result of results) {
    const article = normalizeWebArticle(result);
    if (article) articles.push(article);
  }
  return articles;
}
