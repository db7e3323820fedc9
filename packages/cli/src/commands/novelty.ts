import { readFileSync } from "node:fs";

import { createNoveltyDeps, createNoveltyService, type NoveltySubmission } from "@pitchcheck/pipeline";
import { loadRuntimeEnv, toNoveltyReportJson } from "@pitchcheck/shared";

import { renderNoveltyReport } from "../ui/render.js";

export type NoveltyInput = { kind: "summary"; text: string } | { kind: "transcript"; path: string };

export interface NoveltyArgs {
  repoUrl: string;
  input: NoveltyInput;
  json: boolean;
}

export function parseNoveltyArgs(args: string[]): NoveltyArgs {
  let repoUrl: string | null = null;
  let summary: string | null = null;
  let transcriptPath: string | null = null;
  let json = false;

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (a === "--summary") {
      const next = args[i + 1];
      if (!next || next.trim().length === 0) {
        throw new Error("Missing --summary value (expected the presentation summary text)");
      }
      summary = next;
      i += 1;
      continue;
    }
    if (a === "--transcript") {
      const next = args[i + 1];
      if (!next) {
        throw new Error("Missing --transcript value (expected a path to a transcript file)");
      }
      transcriptPath = next;
      i += 1;
      continue;
    }
    if (a === "--json") {
      json = true;
      continue;
    }
    if (a?.startsWith("--")) {
      throw new Error(`Unknown option: ${a}`);
    }
    if (a && repoUrl === null) {
      repoUrl = a;
      continue;
    }
    throw new Error(`Unexpected argument: ${a ?? ""}`);
  }

  if (!repoUrl) {
    throw new Error("Missing <repoUrl>");
  }
  if (summary !== null && transcriptPath === null) {
    return { repoUrl, input: { kind: "summary", text: summary }, json };
  }
  if (transcriptPath !== null && summary === null) {
    return { repoUrl, input: { kind: "transcript", path: transcriptPath }, json };
  }
  throw new Error("Provide exactly one of --summary or --transcript");
}

export function printNoveltyUsage(): void {
  console.log("Usage:");
  console.log("  novelty <repoUrl> (--summary <text> | --transcript <file>) [--json]");
  console.log("");
  console.log("Example:");
  console.log('  npm run cli -- novelty https://github.com/team/project --summary "An app that..."');
}

function toSubmission(args: NoveltyArgs): NoveltySubmission {
  if (args.input.kind === "transcript") {
    return { repoUrl: args.repoUrl, transcript: readFileSync(args.input.path, "utf8") };
  }
  return { repoUrl: args.repoUrl, presentationSummary: args.input.text };
}

export async function noveltyCommand(args: string[] = []): Promise<void> {
  if (args.includes("--help") || args.includes("-h")) {
    printNoveltyUsage();
    return;
  }

  let parsed: NoveltyArgs;
  try {
    parsed = parseNoveltyArgs(args);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.log("");
    printNoveltyUsage();
    process.exitCode = 1;
    return;
  }

  const env = loadRuntimeEnv();
  const service = createNoveltyService(createNoveltyDeps(env));
  const report = await service.evaluate(toSubmission(parsed));

  if (parsed.json) {
    console.log(JSON.stringify(toNoveltyReportJson(report), null, 2));
    return;
  }
  console.log(renderNoveltyReport(report));
}
