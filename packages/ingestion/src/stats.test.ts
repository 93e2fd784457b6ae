import { describe, expect, it } from "vitest";
import type { Chunk } from "@medrag/core";
import { summarizeChunks, wordCountStats } from "./stats.js";

function chunk(id: string, wordCount: number, forcedSplit = false): Chunk {
  return {
    id,
    text: "x",
    metadata: {
      collection: "textbook",
      sourcePath: "physiology.txt",
      documentId: "doc-1",
      chunkIndex: 0,
      wordCount,
      overlapSentences: 0,
      forcedSplit,
      contentHash: "h",
    },
  };
}

describe("wordCountStats", () => {
  it("returns zeros for no chunks", () => {
    expect(wordCountStats([])).toEqual({ total: 0, min: 0, max: 0, mean: 0, median: 0 });
  });

  it("computes distribution figures", () => {
    expect(wordCountStats([200, 50, 120])).toEqual({ total: 370, min: 50, max: 200, mean: 123.3, median: 120 });
  });

  it("averages the middle pair for an even count", () => {
    expect(wordCountStats([10, 40, 20, 30]).median).toBe(25);
  });
});

describe("summarizeChunks", () => {
  it("counts forced splits and undersized chunks", () => {
    const summary = summarizeChunks({
      collection: "textbook",
      documentCount: 2,
      chunks: [chunk("a", 210), chunk("b", 40, true), chunk("c", 35)],
      minSize: 50,
    });

    expect(summary).toEqual({
      collection: "textbook",
      documentCount: 2,
      chunkCount: 3,
      forcedSplitCount: 1,
      undersizedCount: 2,
      wordCount: { total: 285, min: 35, max: 210, mean: 95, median: 40 },
    });
  });
});
