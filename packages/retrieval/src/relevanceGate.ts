import { InvalidArgumentError } from "@medrag/core";
import type { Match, RelevanceDecision, RetrievedChunk } from "@medrag/core";

export const DEFAULT_RELEVANCE_THRESHOLD = 0.35;

// score reported when nothing came back
export const NO_MATCH_SCORE = -1;

export function toMatch(r: RetrievedChunk): Match {
  return {
    chunkId: r.chunk.id,
    text: r.chunk.text,
    metadata: r.chunk.metadata,
    score: r.similarity,
  };
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidArgumentError(`topK must be a positive integer, got ${topK}`);
  }
}

/**
 * Accepts when the best score reaches `threshold`. Matches are re-sorted by score
 * (stable) so callers need not trust the search order. Low scores are a normal
 * rejection, never an error.
 */
export function evaluateRelevance(
  matches: readonly Match[],
  threshold: number = DEFAULT_RELEVANCE_THRESHOLD
): RelevanceDecision {
  if (!Number.isFinite(threshold)) {
    throw new InvalidArgumentError(`threshold must be a finite number, got ${threshold}`);
  }

  const sorted = [...matches].sort((a, b) => b.score - a.score);
  const bestScore = sorted[0]?.score ?? NO_MATCH_SCORE;

  return {
    accepted: sorted.length > 0 && bestScore >= threshold,
    bestScore,
    threshold,
    matches: sorted,
  };
}

/**
 * Matches after the primary one, up to `topK - 1`, optionally dropping those
 * scoring below `minScore`.
 */
export function selectSupporting(decision: RelevanceDecision, topK: number, minScore?: number): Match[] {
  assertTopK(topK);

  const rest = decision.matches.slice(1, topK);
  if (minScore === undefined) return rest;
  return rest.filter((m) => m.score >= minScore);
}
