import { describe, expect, it } from "vitest";
import { buildTfidfVectors, cosine, smoothedIdf, tfidfCosineSimilarity, tokenize } from "./tfidf.js";

describe("tokenize", () => {
  it("lowercases and keeps word runs of two or more characters", () => {
    expect(tokenize("Air-Quality sensors, v2 & a_b I")).toEqual(["air", "quality", "sensors", "v2", "a_b"]);
  });

  it("handles non-ASCII letters", () => {
    expect(tokenize("Café naïve 東京")).toEqual(["café", "naïve", "東京"]);
  });

  it("returns nothing for empty or single-character input", () => {
    expect(tokenize("")).toEqual([]);
    expect(tokenize("a b c !")).toEqual([]);
  });
});

describe("buildTfidfVectors", () => {
  it("uses a sorted shared vocabulary with smoothed idf", () => {
    const shared = smoothedIdf(2, 2);
    const unique = smoothedIdf(2, 1);
    expect(shared).toBe(1);
    expect(unique).toBeCloseTo(1 + Math.log(1.5), 12);

    const vectors = buildTfidfVectors("beta alpha alpha", "gamma alpha");
    expect(vectors.vocabulary).toEqual(["alpha", "beta", "gamma"]);
    expect(vectors.a).toEqual([2, unique, 0]);
    expect(vectors.b).toEqual([1, 0, unique]);
  });
});

describe("cosine", () => {
  it("is zero when either vector has no magnitude", () => {
    expect(cosine([0, 0], [1, 2])).toBe(0);
    expect(cosine([], [])).toBe(0);
  });
});

describe("tfidfCosineSimilarity", () => {
  const samples = [
    "A mobile app that predicts asthma attacks using air-quality sensors",
    "An open source dashboard that visualizes air quality sensor data",
    "Recipe sharing site for home cooks",
    "",
  ];

  it("is symmetric", () => {
    for (const a of samples) {
      for (const b of samples) {
        expect(tfidfCosineSimilarity(a, b)).toBe(tfidfCosineSimilarity(b, a));
      }
    }
  });

  it("scores identical text at 1", () => {
    for (const text of samples.slice(0, 3)) {
      expect(tfidfCosineSimilarity(text, text)).toBeCloseTo(1, 12);
    }
  });

  it("ignores case", () => {
    expect(tfidfCosineSimilarity("Asthma Forecast App", "asthma forecast app")).toBeCloseTo(1, 12);
  });

  it("scores an empty side at 0", () => {
    expect(tfidfCosineSimilarity("", "air quality")).toBe(0);
    expect(tfidfCosineSimilarity("air quality", "")).toBe(0);
    expect(tfidfCosineSimilarity("", "")).toBe(0);
    expect(tfidfCosineSimilarity("a", "a")).toBe(0);
  });

  it("scores disjoint vocabularies at 0", () => {
    expect(tfidfCosineSimilarity("asthma sensor app", "recipe sharing site")).toBe(0);
  });

  it("matches the closed form for one shared term", () => {
    // vectors [1, 0, w] and [1, w, 0] with w = 1 + ln(1.5): cos = 1 / (1 + w^2)
    const w = 1 + Math.log(1.5);
    expect(tfidfCosineSimilarity("air quality", "air pollution")).toBeCloseTo(1 / (1 + w * w), 12);
    expect(tfidfCosineSimilarity("air quality", "air pollution")).toBeCloseTo(0.336096927, 8);
  });

  it("stays within [0, 1]", () => {
    for (const a of samples) {
      for (const b of samples) {
        const value = tfidfCosineSimilarity(a, b);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });
});
