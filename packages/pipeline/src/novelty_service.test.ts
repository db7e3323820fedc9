import type { GithubClient, WebSearcher } from "@pitchcheck/connectors";
import type { CompleteOptions, TextGenerator } from "@pitchcheck/llm";
import { createLogger, ValidationError } from "@pitchcheck/shared";
import { describe, expect, it, vi } from "vitest";
import { createNoveltyService } from "./novelty_service.js";

const log = createLogger({ component: "novelty-service-test" });
log.level = "silent";

const PITCH_SUMMARY = "A tool that tracks houseplant watering schedules";

function makeDeps() {
  const complete = vi.fn(async (prompt: string, options?: CompleteOptions): Promise<string> => {
    if (options?.task === "keywords") return "houseplant watering reminder tracker app";
    if (prompt.startsWith("Here is a transcription of a project presentation,")) return PITCH_SUMMARY;
    return "A plant care assistant.";
  });
  const generator: TextGenerator = { complete };
  const github: GithubClient = {
    fetchReadme: vi.fn(async () => "# plants"),
    searchRepositories: vi.fn(async () => []),
  };
  const web: WebSearcher = { search: vi.fn(async () => []) };
  return { deps: { generator, github, web, timeoutMs: 1000, log }, complete, web };
}

describe("createNoveltyService", () => {
  it("summarizes a transcript and evaluates the summary", async () => {
    const { deps, complete, web } = makeDeps();
    const service = createNoveltyService(deps);

    const report = await service.evaluate({
      repoUrl: "https://github.com/green/plant-pal",
      transcript: "  Hi, we built a tool that reminds you to water your plants.  ",
    });

    expect(complete.mock.calls[0]?.[0]).toBe(
      "Here is a transcription of a project presentation, Hi, we built a tool that reminds you to water your plants.. " +
        "Please provide a summary of the project in a couple sentences.",
    );
    expect(web.search).toHaveBeenCalledWith(PITCH_SUMMARY);
    expect(report.presentationSummary).toBe(PITCH_SUMMARY);
    expect(report.overallScore).toBe(100);
  });

  it("passes a ready summary straight through", async () => {
    const { deps, complete } = makeDeps();
    const service = createNoveltyService(deps);

    const report = await service.evaluate({
      repoUrl: "https://github.com/green/plant-pal",
      presentationSummary: PITCH_SUMMARY,
    });

    expect(report.presentationSummary).toBe(PITCH_SUMMARY);
    const presentationCalls = complete.mock.calls.filter(([prompt]) =>
      prompt.startsWith("Here is a transcription"),
    );
    expect(presentationCalls).toHaveLength(0);
  });

  it("rejects a bad repository URL before summarizing the transcript", async () => {
    const { deps, complete } = makeDeps();
    const service = createNoveltyService(deps);

    await expect(
      service.evaluate({ repoUrl: "not a url", transcript: "We built a plant app." }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(complete).not.toHaveBeenCalled();
  });

  it("rejects a blank transcript", async () => {
    const { deps } = makeDeps();
    const service = createNoveltyService(deps);

    await expect(
      service.evaluate({ repoUrl: "https://github.com/green/plant-pal", transcript: " \n " }),
    ).rejects.toThrow("transcript must be a non-empty string");
  });
});
