export * from "./evaluate_novelty.js";
export * from "./novelty_service.js";
export * from "./scoring/novelty.js";
export * from "./scoring/tfidf.js";
export * from "./stages/best_match.js";
export * from "./stages/github_pool.js";
export * from "./stages/web_pool.js";
