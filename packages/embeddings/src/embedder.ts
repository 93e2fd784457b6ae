import { EmbeddingError, createLogger } from "@medrag/core";
import { ollamaEmbedMany, ollamaEmbedOne } from "./ollama.js";

const log = createLogger("embeddings");

export const DEFAULT_MODEL = "all-minilm";
export const DEFAULT_DIMENSION = 384;

export interface Embedder {
  readonly model: string;
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export function assertDimension(vectors: number[][], dimension: number): void {
  for (const v of vectors) {
    if (v.length !== dimension) {
      throw new EmbeddingError(`Inconsistent embedding dimension: expected ${dimension}, got ${v.length}`, {
        retryable: false,
      });
    }
  }
}

export interface OllamaEmbedderOptions {
  baseUrl?: string;
  model?: string;
  dimension?: number;
  timeoutMs?: number;
}

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  readonly dimension: number;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts: OllamaEmbedderOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.model = opts.model ?? DEFAULT_MODEL;
    this.dimension = opts.dimension ?? DEFAULT_DIMENSION;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
  }

  /**
   * Embeds a probe string so a missing model or a dimension mismatch shows up
   * before the first real query.
   */
  async warmUp(): Promise<void> {
    const started = Date.now();
    await this.embed("warm-up");
    log.info("model ready", { model: this.model, dimension: this.dimension, ms: Date.now() - started });
  }

  async embed(text: string): Promise<number[]> {
    if (typeof text !== "string") throw new EmbeddingError("embed() expects a string", { retryable: false });

    const vector = await ollamaEmbedOne({
      baseUrl: this.baseUrl,
      model: this.model,
      timeoutMs: this.timeoutMs,
      text,
    });
    assertDimension([vector], this.dimension);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!Array.isArray(texts) || texts.length === 0) return [];

    for (const t of texts) {
      if (typeof t !== "string") throw new EmbeddingError("embedBatch() expects string[]", { retryable: false });
    }

    const vectors = await ollamaEmbedMany({
      baseUrl: this.baseUrl,
      model: this.model,
      timeoutMs: this.timeoutMs,
      texts,
    });
    assertDimension(vectors, this.dimension);
    return vectors;
  }
}
