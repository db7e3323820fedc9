export * from "./config/load_dotenv.js";
export * from "./config/runtime_env.js";
export * from "./errors.js";
export * from "./logging.js";
export * from "./metrics.js";
export * from "./types/novelty.js";
export * from "./utils/github_url.js";
export * from "./utils/text.js";
