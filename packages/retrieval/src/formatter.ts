import { errorMessage, isRagError } from "@medrag/core";
import type { Answer, Match, RelevanceDecision } from "@medrag/core";

export const REJECTION_MESSAGE =
  "This question appears to be outside the scope of the indexed medical textbook, so no answer is returned. Please ask a question about the textbook's medical content.";

export function formatSource(m: Match): string {
  return `${m.metadata.sourcePath}#${m.metadata.chunkIndex}`;
}

export function formatElapsed(elapsedMs: number): string {
  return `${Math.round(elapsedMs)}ms`;
}

export function describeFailure(err: unknown): { code: string; message: string } {
  return { code: isRagError(err) ? err.code : "UNKNOWN", message: errorMessage(err) };
}

export function formatFailure(err: unknown): string {
  const { code, message } = describeFailure(err);
  return `The answer could not be retrieved right now (${code}: ${message}). Please try again later.`;
}

/**
 * Top passage followed by its score and the query time, or the rejection notice.
 */
export function formatSimpleAnswer(decision: RelevanceDecision, elapsedMs: number): string {
  const top = decision.matches[0];
  if (!decision.accepted || !top) return REJECTION_MESSAGE;

  return `${top.text}\n\nSimilarity: ${decision.bestScore.toFixed(4)} | Time: ${formatElapsed(elapsedMs)}`;
}

export function buildDetailedAnswer(params: {
  question: string;
  decision: RelevanceDecision;
  supporting: Match[];
  elapsedMs: number;
}): Answer {
  const { question, decision, elapsedMs } = params;
  const primary = decision.matches[0];

  if (!decision.accepted || !primary) {
    return { kind: "refuse", question, message: REJECTION_MESSAGE, bestScore: decision.bestScore, elapsedMs };
  }

  return {
    kind: "answer",
    question,
    answer: primary.text,
    bestScore: decision.bestScore,
    primary,
    supporting: params.supporting,
    elapsedMs,
  };
}

function formatMatch(m: Match, i: number): string {
  return `### [S${i + 1}] ${formatSource(m)}\nSimilarity: ${m.score.toFixed(4)}\n\n${m.text}\n`;
}

export function formatDetailedAnswer(answer: Answer): string {
  if (answer.kind === "refuse") return answer.message;
  if (answer.kind === "error") return answer.message;

  const parts = ["=== ANSWER ===", "", formatMatch(answer.primary, 0)];

  if (answer.supporting.length > 0) {
    parts.push("=== SUPPORTING CONTEXT ===", "");
    answer.supporting.forEach((m, i) => parts.push(formatMatch(m, i + 1)));
  }

  parts.push(
    `Best similarity: ${answer.bestScore.toFixed(4)} | Matches: ${answer.supporting.length + 1} | Time: ${formatElapsed(answer.elapsedMs)}`
  );
  return parts.join("\n");
}
