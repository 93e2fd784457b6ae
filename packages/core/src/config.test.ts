import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

describe("loadConfig", () => {
  it("falls back to the documented defaults", () => {
    const config = loadConfig({});

    expect(config.chunking).toEqual({ minSize: 50, targetSize: 200, maxSize: 350, overlapSentences: 2 });
    expect(config.relevanceThreshold).toBe(0.35);
    expect(config.topKDefault).toBe(3);
    expect(config.embedding).toEqual({
      model: "all-minilm",
      dimension: 384,
      baseUrl: "http://localhost:11434",
      timeoutMs: 30_000,
      batchSize: 32,
    });
    expect(config.similarityMetric).toBe("cosine");
    expect(config.vectorDbPath).toBe(".data/vectorstore.sqlite");
    expect(config.collection).toBe("textbook");
    expect("supportingMinScore" in config).toBe(false);
  });

  it("exposes the defaults as DEFAULT_CONFIG", () => {
    expect(DEFAULT_CONFIG).toEqual(loadConfig({}));
  });

  it("parses numeric overrides and treats blank values as unset", () => {
    const config = loadConfig({
      RELEVANCE_THRESHOLD: "0.5",
      SUPPORTING_MIN_SCORE: "0.2",
      CHUNK_TARGET_SIZE: "120",
      MIN_SIZE: "",
      TOP_K_DEFAULT: "5",
    });

    expect(config.relevanceThreshold).toBe(0.5);
    expect(config.supportingMinScore).toBe(0.2);
    expect(config.chunking.targetSize).toBe(120);
    expect(config.chunking.minSize).toBe(50);
    expect(config.topKDefault).toBe(5);
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadConfig({ MAX_SIZE: "lots" })).toThrow(ConfigurationError);
  });

  it("rejects chunk sizes out of order", () => {
    expect(() => loadConfig({ MIN_SIZE: "300" })).toThrow(
      "Invalid configuration: MIN_SIZE: must not exceed CHUNK_TARGET_SIZE"
    );
  });

  it("only supports cosine similarity", () => {
    expect(() => loadConfig({ SIMILARITY_METRIC: "dot" })).toThrow(ConfigurationError);
  });

  it("rejects a threshold outside [-1, 1]", () => {
    expect(() => loadConfig({ RELEVANCE_THRESHOLD: "1.5" })).toThrow(ConfigurationError);
  });
});
