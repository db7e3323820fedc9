import { describe, expect, it } from "vitest";
import { parseNoveltyArgs } from "./novelty.js";

const REPO = "https://github.com/green/plant-pal";

describe("parseNoveltyArgs", () => {
  it("parses a summary submission", () => {
    expect(parseNoveltyArgs([REPO, "--summary", "A plant app"])).toEqual({
      repoUrl: REPO,
      input: { kind: "summary", text: "A plant app" },
      json: false,
    });
  });

  it("parses a transcript path and --json in any order", () => {
    expect(parseNoveltyArgs(["--json", "--transcript", "pitch.txt", REPO])).toEqual({
      repoUrl: REPO,
      input: { kind: "transcript", path: "pitch.txt" },
      json: true,
    });
  });

  it("requires a repository URL", () => {
    expect(() => parseNoveltyArgs(["--summary", "A plant app"])).toThrow("Missing <repoUrl>");
  });

  it("requires exactly one input", () => {
    expect(() => parseNoveltyArgs([REPO])).toThrow("Provide exactly one of --summary or --transcript");
    expect(() => parseNoveltyArgs([REPO, "--summary", "A", "--transcript", "pitch.txt"])).toThrow(
      "Provide exactly one of --summary or --transcript",
    );
  });

  it("rejects missing option values and unknown options", () => {
    expect(() => parseNoveltyArgs([REPO, "--summary"])).toThrow(
      "Missing --summary value (expected the presentation summary text)",
    );
    expect(() => parseNoveltyArgs([REPO, "--transcript"])).toThrow(
      "Missing --transcript value (expected a path to a transcript file)",
    );
    expect(() => parseNoveltyArgs([REPO, "--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseNoveltyArgs([REPO, "extra", "--summary", "A"])).toThrow("Unexpected argument: extra");
  });
});
