import { afterEach, describe, expect, it, vi } from "vitest";
import { EmbeddingError } from "@medrag/core";
import { OllamaEmbedder, assertDimension } from "./embedder.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function stubFetch(impl: (url: string, init: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function embeddingFailure(run: () => Promise<unknown>): Promise<EmbeddingError> {
  try {
    await run();
  } catch (err) {
    if (err instanceof EmbeddingError) return err;
    throw err;
  }
  throw new Error("expected an EmbeddingError");
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("assertDimension", () => {
  it("accepts matching vectors and rejects others", () => {
    expect(() => assertDimension([[1, 2, 3]], 3)).not.toThrow();
    expect(() => assertDimension([[1, 2]], 3)).toThrow("Inconsistent embedding dimension: expected 3, got 2");
  });
});

describe("OllamaEmbedder", () => {
  it("posts one prompt to /api/embeddings", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ embedding: [0.1, 0.2, 0.3] }));
    const embedder = new OllamaEmbedder({ baseUrl: "http://ollama.test/", model: "mini", dimension: 3 });

    await expect(embedder.embed("What is plasma?")).resolves.toEqual([0.1, 0.2, 0.3]);

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://ollama.test/api/embeddings");
    expect(call?.[1].method).toBe("POST");
    expect(JSON.parse(String(call?.[1].body))).toEqual({ model: "mini", prompt: "What is plasma?" });
  });

  it("embeds a batch through /api/embed in input order", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ embeddings: [[1, 0], [0, 1]] }));
    const embedder = new OllamaEmbedder({ baseUrl: "http://ollama.test", dimension: 2 });

    await expect(embedder.embedBatch(["a", "b"])).resolves.toEqual([[1, 0], [0, 1]]);

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("http://ollama.test/api/embed");
    expect(JSON.parse(String(call?.[1].body))).toEqual({ model: "all-minilm", input: ["a", "b"] });
  });

  it("skips the request for an empty batch", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ embeddings: [] }));

    await expect(new OllamaEmbedder().embedBatch([])).resolves.toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects a vector of the wrong dimension as permanent", async () => {
    stubFetch(async () => jsonResponse({ embedding: [0.1, 0.2] }));

    const err = await embeddingFailure(() => new OllamaEmbedder({ dimension: 3 }).embed("q"));
    expect(err.message).toBe("Inconsistent embedding dimension: expected 3, got 2");
    expect(err.retryable).toBe(false);
  });

  it("rejects a response without an embedding", async () => {
    stubFetch(async () => jsonResponse({ error: "model not loaded" }));

    const err = await embeddingFailure(() => new OllamaEmbedder().embed("q"));
    expect(err.message).toBe("Ollama embeddings response missing `embedding` array.");
    expect(err.retryable).toBe(false);
  });

  it("rejects a batch response with the wrong count", async () => {
    stubFetch(async () => jsonResponse({ embeddings: [[1, 0]] }));

    const err = await embeddingFailure(() => new OllamaEmbedder({ dimension: 2 }).embedBatch(["a", "b"]));
    expect(err.message).toBe("Embedding count mismatch: got 1, expected 2");
  });

  it("marks server errors retryable and client errors permanent", async () => {
    stubFetch(async () => jsonResponse({ error: "busy" }, 503));
    const server = await embeddingFailure(() => new OllamaEmbedder().embed("q"));
    expect(server.retryable).toBe(true);

    stubFetch(async () => jsonResponse({ error: "model not found" }, 404));
    const client = await embeddingFailure(() => new OllamaEmbedder().embed("q"));
    expect(client.retryable).toBe(false);
  });

  it("wraps network failures", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const err = await embeddingFailure(() => new OllamaEmbedder().embed("q"));
    expect(err.message).toBe("Ollama embeddings request failed: fetch failed");
    expect(err.retryable).toBe(true);
  });

  it("reports timeouts", async () => {
    stubFetch(async () => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });

    const err = await embeddingFailure(() => new OllamaEmbedder({ timeoutMs: 250 }).embed("q"));
    expect(err.message).toBe("Ollama embeddings request timed out after 250ms");
  });

  it("warms up with a probe request", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({ embedding: [0, 0, 1] }));

    await new OllamaEmbedder({ dimension: 3 }).warmUp();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
