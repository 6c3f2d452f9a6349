import { describe, it, expect } from "vitest";
import path from "node:path";
import { loadConfig } from "@/lib/config";
import { DEFAULT_REVIEWER_MODELS } from "@/lib/review/types";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.uploadFolder).toBe(path.resolve("uploads"));
    expect(config.resultsFolder).toBe(path.resolve("results"));
    expect(config.reviewTimeoutMs).toBe(600_000);
    expect(config.backendTimeoutMs).toBe(120_000);
    expect(config.backendMaxRetries).toBe(3);
    expect(config.reviewers.map((r) => r.name)).toEqual([
      "Reviewer 1",
      "Reviewer 2",
      "Reviewer 3",
    ]);
    expect(config.reviewers[0].models).toEqual(DEFAULT_REVIEWER_MODELS);
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      UPLOAD_FOLDER: "/data/in",
      REVIEWER_COUNT: "2",
      REVIEWER_MODELS: " model-a , model-b,, ",
      REVIEW_TIMEOUT_MS: "1000",
      BACKEND_MAX_RETRIES: "0",
    });

    expect(config.uploadFolder).toBe("/data/in");
    expect(config.reviewers).toEqual([
      { name: "Reviewer 1", models: ["model-a", "model-b"] },
      { name: "Reviewer 2", models: ["model-a", "model-b"] },
    ]);
    expect(config.reviewTimeoutMs).toBe(1000);
    expect(config.backendMaxRetries).toBe(0);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ REVIEWER_COUNT: "", REVIEWER_MODELS: " " }).reviewers).toHaveLength(3);
  });

  it("rejects invalid numbers", () => {
    expect(() => loadConfig({ REVIEWER_COUNT: "0" })).toThrow(/REVIEWER_COUNT/);
    expect(() => loadConfig({ REVIEW_TIMEOUT_MS: "soon" })).toThrow(/REVIEW_TIMEOUT_MS/);
  });

  it("rejects a model list with no models", () => {
    expect(() => loadConfig({ REVIEWER_MODELS: ",," })).toThrow(/REVIEWER_MODELS/);
  });
});
