import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { ChunkingParams } from "./types.js";

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const scoreFromEnv = () => z.coerce.number().finite().min(-1).max(1);

const envSchema = z
  .object({
    CHUNK_TARGET_SIZE: intFromEnv(200, 1),
    MIN_SIZE: intFromEnv(50, 1),
    MAX_SIZE: intFromEnv(350, 1),
    OVERLAP_SENTENCES: intFromEnv(2),

    RELEVANCE_THRESHOLD: scoreFromEnv().default(0.35),
    SUPPORTING_MIN_SCORE: scoreFromEnv().optional(),
    TOP_K_DEFAULT: intFromEnv(3, 1),

    EMBEDDING_DIMENSION: intFromEnv(384, 1),
    SIMILARITY_METRIC: z.literal("cosine").default("cosine"),
    EMBEDDING_MODEL: z.string().trim().min(1).default("all-minilm"),
    OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
    EMBEDDING_TIMEOUT_MS: intFromEnv(30_000, 1),
    EMBED_BATCH_SIZE: intFromEnv(32, 1),

    VECTOR_DB_PATH: z.string().trim().min(1).default(".data/vectorstore.sqlite"),
    COLLECTION: z.string().trim().min(1).default("textbook"),

    RETRY_BACKOFF_MS: intFromEnv(250),
    BATCH_CONCURRENCY: intFromEnv(4, 1),
  })
  .superRefine((env, ctx) => {
    if (env.MIN_SIZE > env.CHUNK_TARGET_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MIN_SIZE"],
        message: "must not exceed CHUNK_TARGET_SIZE",
      });
    }
    if (env.CHUNK_TARGET_SIZE > env.MAX_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_TARGET_SIZE"],
        message: "must not exceed MAX_SIZE",
      });
    }
  });

export type SimilarityMetric = "cosine";

export interface RagConfig {
  chunking: ChunkingParams;
  relevanceThreshold: number;
  supportingMinScore?: number;
  topKDefault: number;

  embedding: {
    model: string;
    dimension: number;
    baseUrl: string;
    timeoutMs: number;
    batchSize: number;
  };
  similarityMetric: SimilarityMetric;

  vectorDbPath: string;
  collection: string;

  retryBackoffMs: number;
  batchConcurrency: number;
}

type Env = Record<string, string | undefined>;

// Empty strings count as unset so `FOO=` in a .env file falls back to the default
function dropBlank(env: Env): Env {
  const out: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(env: Env = process.env): RagConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join("; ")}`, problems);
  }

  const e = parsed.data;
  const config: RagConfig = {
    chunking: {
      minSize: e.MIN_SIZE,
      targetSize: e.CHUNK_TARGET_SIZE,
      maxSize: e.MAX_SIZE,
      overlapSentences: e.OVERLAP_SENTENCES,
    },
    relevanceThreshold: e.RELEVANCE_THRESHOLD,
    topKDefault: e.TOP_K_DEFAULT,
    embedding: {
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      baseUrl: e.OLLAMA_BASE_URL,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
      batchSize: e.EMBED_BATCH_SIZE,
    },
    similarityMetric: e.SIMILARITY_METRIC,
    vectorDbPath: e.VECTOR_DB_PATH,
    collection: e.COLLECTION,
    retryBackoffMs: e.RETRY_BACKOFF_MS,
    batchConcurrency: e.BATCH_CONCURRENCY,
  };
  if (e.SUPPORTING_MIN_SCORE !== undefined) config.supportingMinScore = e.SUPPORTING_MIN_SCORE;

  return config;
}

export const DEFAULT_CONFIG: RagConfig = loadConfig({});
