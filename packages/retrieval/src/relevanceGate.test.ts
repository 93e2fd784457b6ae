import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@medrag/core";
import type { Match } from "@medrag/core";
import { NO_MATCH_SCORE, assertTopK, evaluateRelevance, selectSupporting } from "./relevanceGate.js";
import { REJECTION_MESSAGE, buildDetailedAnswer, formatSimpleAnswer } from "./formatter.js";

function match(chunkId: string, score: number): Match {
  return {
    chunkId,
    text: `text of ${chunkId}`,
    metadata: {
      collection: "textbook",
      sourcePath: "physiology.txt",
      documentId: "doc-1",
      chunkIndex: 0,
      wordCount: 3,
      overlapSentences: 0,
      forcedSplit: false,
      contentHash: chunkId,
    },
    score,
  };
}

describe("evaluateRelevance", () => {
  it("accepts a best score equal to the threshold", () => {
    const decision = evaluateRelevance([match("a", 0.35)], 0.35);
    expect(decision.accepted).toBe(true);
    expect(decision.bestScore).toBe(0.35);
  });

  it("rejects when the best score is below the threshold", () => {
    const decision = evaluateRelevance([match("a", 0.2), match("b", 0.3)], 0.35);
    expect(decision).toMatchObject({ accepted: false, bestScore: 0.3, threshold: 0.35 });
  });

  it("rejects an empty result with the no-match score", () => {
    expect(evaluateRelevance([], -1)).toEqual({
      accepted: false,
      bestScore: NO_MATCH_SCORE,
      threshold: -1,
      matches: [],
    });
  });

  it("re-sorts matches by score, keeping ties in input order", () => {
    const decision = evaluateRelevance([match("a", 0.4), match("b", 0.9), match("c", 0.4)]);
    expect(decision.matches.map((m) => m.chunkId)).toEqual(["b", "a", "c"]);
  });

  it("rejects a non-finite threshold", () => {
    expect(() => evaluateRelevance([], Number.NaN)).toThrow(InvalidArgumentError);
  });
});

describe("selectSupporting", () => {
  const decision = evaluateRelevance([match("a", 0.9), match("b", 0.6), match("c", 0.3), match("d", 0.2)]);

  it("returns the matches after the primary, up to topK - 1", () => {
    expect(selectSupporting(decision, 3).map((m) => m.chunkId)).toEqual(["b", "c"]);
    expect(selectSupporting(decision, 1)).toEqual([]);
    expect(selectSupporting(decision, 10).map((m) => m.chunkId)).toEqual(["b", "c", "d"]);
  });

  it("applies the optional score floor", () => {
    expect(selectSupporting(decision, 4, 0.35).map((m) => m.chunkId)).toEqual(["b"]);
  });
});

describe("assertTopK", () => {
  it("accepts positive integers only", () => {
    expect(() => assertTopK(1)).not.toThrow();
    expect(() => assertTopK(0)).toThrow("topK must be a positive integer, got 0");
    expect(() => assertTopK(2.5)).toThrow(InvalidArgumentError);
  });
});

describe("gate behaviour", () => {
  it("is monotonic in the threshold", () => {
    const sets = [[], [match("a", 0.12)], [match("a", 0.35), match("b", 0.1)], [match("a", 0.7)], [match("a", -0.4)]];
    const thresholds = [-1, -0.2, 0, 0.12, 0.35, 0.5, 0.7, 1];

    for (const matches of sets) {
      for (const t1 of thresholds) {
        for (const t2 of thresholds.filter((t) => t > t1)) {
          if (evaluateRelevance(matches, t2).accepted) {
            expect(evaluateRelevance(matches, t1).accepted).toBe(true);
          }
        }
      }
    }
  });

  it("answers with the passage above the threshold and the rejection text below it", () => {
    const plasma = { ...match("a", 0.7), text: "Plasma is..." };

    const accepted = evaluateRelevance([plasma], 0.35);
    expect(accepted.accepted).toBe(true);
    expect(formatSimpleAnswer(accepted, 8)).toBe("Plasma is...\n\nSimilarity: 0.7000 | Time: 8ms");

    const rejected = evaluateRelevance([{ ...plasma, score: 0.12 }], 0.35);
    expect(rejected.accepted).toBe(false);
    expect(formatSimpleAnswer(rejected, 8)).toBe(REJECTION_MESSAGE);
  });

  it("lists detailed matches in descending score order", () => {
    const decision = evaluateRelevance([match("c", 0.57), match("a", 0.65), match("b", 0.63)], 0.35);
    const answer = buildDetailedAnswer({
      question: "q",
      decision,
      supporting: selectSupporting(decision, 3),
      elapsedMs: 1,
    });

    expect(answer.kind === "answer" && [answer.primary, ...answer.supporting].map((m) => [m.chunkId, m.score])).toEqual([
      ["a", 0.65],
      ["b", 0.63],
      ["c", 0.57],
    ]);
  });
});
