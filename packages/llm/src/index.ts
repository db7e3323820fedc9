export * from "./error_classification.js";
export * from "./explain.js";
export * from "./keywords.js";
export * from "./openai_compat.js";
export * from "./router.js";
export * from "./summarize.js";
export * from "./timeout.js";
export type * from "./types.js";
