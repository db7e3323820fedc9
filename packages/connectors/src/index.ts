export * from "./github/index.js";
export type * from "./types.js";
export * from "./web_search/index.js";
