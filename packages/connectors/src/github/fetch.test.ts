import { type GithubConfig, TransientProviderError } from "@pitchcheck/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fetchReadme, searchRepositories } from "./fetch.js";

const config: GithubConfig = {
  apiBaseUrl: "https://gh.example",
  token: "test-token",
  userAgent: "pitchcheck-test",
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("github connector", () => {
  beforeEach(() => {
    vi.stubGlobal("fetch", vi.fn());
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("fetchReadme", () => {
    it("requests the raw README with auth headers", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response("# Breathe Easy\n", { status: 200 }));

      await expect(fetchReadme(config, "lung-lab", "breathe-easy")).resolves.toBe("# Breathe Easy");

      const [url, init] = vi.mocked(fetch).mock.calls[0] ?? [];
      expect(url).toBe("https://gh.example/repos/lung-lab/breathe-easy/readme");
      expect(init?.headers).toMatchObject({
        Accept: "application/vnd.github.raw+json",
        Authorization: "Bearer test-token",
      });
    });

    it("resolves null for a missing or empty README", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response("Not Found", { status: 404 }));
      await expect(fetchReadme(config, "a", "b")).resolves.toBeNull();

      vi.mocked(fetch).mockResolvedValueOnce(new Response("   ", { status: 200 }));
      await expect(fetchReadme(config, "a", "b")).resolves.toBeNull();
    });

    it("throws TransientProviderError on other failures", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(new Response("slow down", { status: 429 }));
      await expect(fetchReadme(config, "a", "b")).rejects.toBeInstanceOf(TransientProviderError);

      vi.mocked(fetch).mockRejectedValueOnce(new TypeError("fetch failed"));
      await expect(fetchReadme(config, "a", "b")).rejects.toMatchObject({
        provider: "github",
        message: "GitHub README fetch failed for a/b: fetch failed",
      });
    });
  });

  describe("searchRepositories", () => {
    it("sends query and page size, returning decoded candidates in order", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(
        jsonResponse({
          items: [
            { name: "one", full_name: "a/one", html_url: "https://github.com/a/one" },
            { name: "two", full_name: "b/two", html_url: "https://github.com/b/two" },
          ],
        }),
      );

      const repos = await searchRepositories(config, "asthma air quality sensor app");

      expect(repos.map((r) => r.name)).toEqual(["one", "two"]);
      const [url] = vi.mocked(fetch).mock.calls[0] ?? [];
      expect(url).toBe(
        "https://gh.example/search/repositories?q=asthma+air+quality+sensor+app&per_page=10",
      );
    });

    it("fails soft on non-2xx, malformed payloads and network errors", async () => {
      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ message: "rate limited" }, 403));
      await expect(searchRepositories(config, "q")).resolves.toEqual([]);

      vi.mocked(fetch).mockResolvedValueOnce(jsonResponse({ total_count: 0 }));
      await expect(searchRepositories(config, "q")).resolves.toEqual([]);

      vi.mocked(fetch).mockRejectedValueOnce(new TypeError("fetch failed"));
      await expect(searchRepositories(config, "q")).resolves.toEqual([]);
    });
  });
});
