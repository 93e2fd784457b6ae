import { EmbeddingError } from "@medrag/core";

type OllamaEmbeddingResponse = {
  embedding?: unknown;
};

type OllamaEmbedResponse = {
  embeddings?: unknown;
};

export interface OllamaRequestOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

function normalizeModelName(model: string): string {
  return model.trim();
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isFinite(v));
}

async function postJson(url: string, body: unknown, timeoutMs: number): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    const timedOut = err instanceof Error && err.name === "TimeoutError";
    throw new EmbeddingError(
      timedOut
        ? `Ollama embeddings request timed out after ${timeoutMs}ms`
        : `Ollama embeddings request failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    // 4xx (unknown model, bad input) will not get better on retry
    throw new EmbeddingError(`Ollama embeddings request failed: ${res.status} ${res.statusText}\n${text}`, {
      retryable: res.status >= 500 || res.status === 429,
    });
  }

  return res.json();
}

export async function ollamaEmbedOne(args: OllamaRequestOptions & { text: string }): Promise<number[]> {
  const data = (await postJson(
    `${args.baseUrl}/api/embeddings`,
    { model: normalizeModelName(args.model), prompt: args.text },
    args.timeoutMs
  )) as OllamaEmbeddingResponse;

  if (!isVector(data?.embedding)) {
    throw new EmbeddingError("Ollama embeddings response missing `embedding` array.", { retryable: false });
  }

  return data.embedding;
}

/**
 * Batch endpoint (`/api/embed`), one vector per input in input order.
 */
export async function ollamaEmbedMany(args: OllamaRequestOptions & { texts: string[] }): Promise<number[][]> {
  if (args.texts.length === 0) return [];

  const data = (await postJson(
    `${args.baseUrl}/api/embed`,
    { model: normalizeModelName(args.model), input: args.texts },
    args.timeoutMs
  )) as OllamaEmbedResponse;

  const embeddings = data?.embeddings;
  if (!Array.isArray(embeddings) || !embeddings.every(isVector)) {
    throw new EmbeddingError("Ollama embed response missing `embeddings` array.", { retryable: false });
  }
  if (embeddings.length !== args.texts.length) {
    throw new EmbeddingError(
      `Embedding count mismatch: got ${embeddings.length}, expected ${args.texts.length}`,
      { retryable: false }
    );
  }

  return embeddings;
}
