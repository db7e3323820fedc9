import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createLogger } from "../logging.js";

const log = createLogger({ component: "config" });

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const parsed: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
  } catch (err) {
    log.debug({ pkgPath, err: err instanceof Error ? err.message : String(err) }, "Unreadable package.json");
    return false;
  }
}

/**
 * Walk up from `startDir` to the first directory holding a `.env` file or the
 * workspaces root `package.json`.
 */
export function findProjectRoot(startDir: string): string {
  let dir = resolve(startDir);

  for (;;) {
    if (existsSync(resolve(dir, ".env"))) return dir;
    const pkgPath = resolve(dir, "package.json");
    if (existsSync(pkgPath) && hasWorkspaces(pkgPath)) return dir;

    const parent = dirname(dir);
    if (parent === dir) return resolve(startDir);
    dir = parent;
  }
}

function stripInlineComment(value: string): string {
  // " # ..." starts a comment for unquoted values; a `#` glued to the value is kept.
  const match = /[ \t]#/.exec(value);
  return match ? value.slice(0, match.index).trimEnd() : value;
}

export function parseEnvValue(raw: string): string {
  const trimmed = raw.trim();
  const quote = trimmed[0];
  if (quote !== '"' && quote !== "'") return stripInlineComment(trimmed);

  let out = "";
  let escaped = false;
  for (const ch of trimmed.slice(1)) {
    if (escaped) {
      out += ch;
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else if (ch === quote) {
      return out;
    } else {
      out += ch;
    }
  }
  // Unclosed quote
  return stripInlineComment(trimmed);
}

/**
 * Load `.env` then `.env.local` from the project root into `process.env`.
 * Existing variables win. Call before loadRuntimeEnv().
 */
export function loadDotEnvIfPresent(cwd: string = process.cwd()): void {
  const projectRoot = findProjectRoot(cwd);
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    let raw: string;
    try {
      raw = readFileSync(fullPath, "utf8");
    } catch (err) {
      log.warn({ filename, err: err instanceof Error ? err.message : String(err) }, "Failed to read env file");
      continue;
    }
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;
      const idx = trimmed.indexOf("=");
      if (idx <= 0) continue;
      const key = trimmed.slice(0, idx).trim();
      if (process.env[key] === undefined) process.env[key] = parseEnvValue(trimmed.slice(idx + 1));
    }
  }
}
