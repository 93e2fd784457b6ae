import {
  EmbeddingError,
  InvalidArgumentError,
  SearchError,
  createLogger,
  errorMessage,
  isRagError,
} from "@medrag/core";
import type { Answer, Match } from "@medrag/core";
import type { RetrievalContext } from "./context.js";
import { assertTopK, evaluateRelevance, selectSupporting, toMatch } from "./relevanceGate.js";
import { buildDetailedAnswer, describeFailure, formatFailure, formatSimpleAnswer } from "./formatter.js";
import { withRetry } from "./retry.js";

const log = createLogger("ask");

// Transient collaborator failures become a degraded answer instead of a throw
function isTransient(err: unknown): err is EmbeddingError | SearchError {
  return err instanceof EmbeddingError || err instanceof SearchError;
}

function cleanQuestion(question: string): string {
  const q = typeof question === "string" ? question.trim() : "";
  if (!q) throw new InvalidArgumentError("question must be a non-empty string");
  return q;
}

/**
 * Runs `task` over `items` in groups of `concurrency`, keeping input order.
 * A rejected item is turned into a result by `onError`; its siblings are unaffected.
 */
async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  onError: (item: T, err: unknown) => R
): Promise<R[]> {
  const out: R[] = [];

  for (let start = 0; start < items.length; start += concurrency) {
    const group = items.slice(start, start + concurrency);
    const results = await Promise.all(
      group.map((item, i) =>
        task(item).catch((err: unknown) => {
          log.error(`batch item ${start + i + 1}/${items.length} failed:`, errorMessage(err));
          return onError(item, err);
        })
      )
    );
    out.push(...results);
  }

  return out;
}

/**
 * Question answering over the indexed textbook: embeds the question, searches the
 * index and gates the result on the relevance threshold.
 */
export class MedicalAssistant {
  constructor(private readonly ctx: RetrievalContext) {}

  private async retrieve(question: string, topK: number): Promise<Match[]> {
    const { config } = this.ctx;
    const retry = { retries: 1, backoffMs: config.retryBackoffMs };

    const queryVector = await withRetry(async () => {
      const embedder = await this.ctx.embedder();
      try {
        return await embedder.embed(question);
      } catch (err) {
        throw isRagError(err) ? err : new EmbeddingError(errorMessage(err), { cause: err });
      }
    }, { ...retry, label: "embed" });

    const results = await withRetry(async () => {
      try {
        const store = await this.ctx.store();
        return store.search({ collections: [config.collection], queryVector, topK });
      } catch (err) {
        throw isRagError(err) ? err : new SearchError(errorMessage(err), { cause: err });
      }
    }, { ...retry, label: "search" });

    return results.map(toMatch);
  }

  /**
   * Simple mode: the best passage with its score and timing, or the rejection notice.
   */
  async ask(question: string): Promise<string> {
    const q = cleanQuestion(question);
    const started = this.ctx.now();

    try {
      const matches = await this.retrieve(q, 1);
      const decision = evaluateRelevance(matches, this.ctx.config.relevanceThreshold);
      const elapsedMs = this.ctx.now() - started;

      log.info("answered", { accepted: decision.accepted, bestScore: decision.bestScore, elapsedMs });
      return formatSimpleAnswer(decision, elapsedMs);
    } catch (err) {
      if (!isTransient(err)) throw err;
      log.error("degraded answer:", errorMessage(err));
      return formatFailure(err);
    }
  }

  /**
   * Detailed mode: the best passage plus up to `topK - 1` supporting matches.
   */
  async query(question: string, topK: number = this.ctx.config.topKDefault): Promise<Answer> {
    assertTopK(topK);
    const q = cleanQuestion(question);
    const started = this.ctx.now();

    try {
      const matches = await this.retrieve(q, topK);
      const decision = evaluateRelevance(matches, this.ctx.config.relevanceThreshold);
      const supporting = decision.accepted
        ? selectSupporting(decision, topK, this.ctx.config.supportingMinScore)
        : [];
      const elapsedMs = this.ctx.now() - started;

      log.info("answered", {
        accepted: decision.accepted,
        bestScore: decision.bestScore,
        supporting: supporting.length,
        elapsedMs,
      });
      return buildDetailedAnswer({ question: q, decision, supporting, elapsedMs });
    } catch (err) {
      if (!isTransient(err)) throw err;
      log.error("degraded answer:", errorMessage(err));
      return {
        kind: "error",
        question: q,
        message: formatFailure(err),
        error: describeFailure(err),
        elapsedMs: this.ctx.now() - started,
      };
    }
  }

  async batchAsk(questions: readonly string[]): Promise<string[]> {
    return mapSettled(
      questions,
      this.ctx.config.batchConcurrency,
      (q) => this.ask(q),
      (_q, err) => formatFailure(err)
    );
  }

  async batchQuery(questions: readonly string[], topK: number = this.ctx.config.topKDefault): Promise<Answer[]> {
    assertTopK(topK);
    return mapSettled(
      questions,
      this.ctx.config.batchConcurrency,
      (q) => this.query(q, topK),
      (q, err): Answer => ({
        kind: "error",
        question: q,
        message: formatFailure(err),
        error: describeFailure(err),
        elapsedMs: 0,
      })
    );
  }
}
