import { EmbeddingError, createLogger } from "@medrag/core";
import type { Chunk, ChunkingParams, CollectionId, EmbeddedChunk, IndexSummary, RawDocument } from "@medrag/core";
import type { Embedder } from "@medrag/embeddings";
import type { VectorStore } from "@medrag/vectorstore";
import { normalizeText } from "./normalizer.js";
import { chunkDocument } from "./textChunker.js";
import type { SentenceSplitter } from "./sentenceSplitter.js";
import { summarizeChunks } from "./stats.js";

const log = createLogger("ingest");

/**
 * Normalise + chunk stage only; no embedding, no store.
 */
export function prepareChunks(
  documents: readonly RawDocument[],
  params: ChunkingParams,
  splitter?: SentenceSplitter
): Chunk[] {
  const chunks: Chunk[] = [];
  for (const doc of documents) {
    const text = normalizeText(doc.pages);
    const docChunks = chunkDocument(doc, text, params, splitter);
    log.debug(`${doc.path} → ${doc.pages.length} pages, ${docChunks.length} chunks`);
    chunks.push(...docChunks);
  }
  return chunks;
}

async function embedChunks(embedder: Embedder, chunks: Chunk[], batchSize: number): Promise<EmbeddedChunk[]> {
  const out: EmbeddedChunk[] = [];

  for (let start = 0; start < chunks.length; start += batchSize) {
    const batch = chunks.slice(start, start + batchSize);
    const vectors = await embedder.embedBatch(batch.map((c) => c.text));

    if (vectors.length !== batch.length) {
      throw new EmbeddingError(`Embedding count mismatch: got ${vectors.length}, expected ${batch.length}`, {
        retryable: false,
      });
    }

    batch.forEach((chunk, i) => {
      const vector = vectors[i];
      if (!vector || vector.length !== embedder.dimension) {
        throw new EmbeddingError(
          `Bad embedding for chunk index ${start + i} (chunkId=${chunk.id}): expected ${embedder.dimension} dimensions`,
          { retryable: false }
        );
      }
      out.push({ chunk, vector });
    });

    log.debug(`embedded ${Math.min(start + batchSize, chunks.length)}/${chunks.length}`);
  }

  return out;
}

/**
 * Offline build: normalise, chunk, embed and upsert every document, then report
 * chunk statistics.
 */
export async function buildIndex(params: {
  documents: readonly RawDocument[];
  collection: CollectionId;
  chunking: ChunkingParams;
  embedder: Embedder;
  store: VectorStore;
  batchSize?: number;
  splitter?: SentenceSplitter;
}): Promise<IndexSummary> {
  const batchSize = params.batchSize ?? 32;

  log.info("start", { collection: params.collection, documents: params.documents.length });

  const chunks = prepareChunks(params.documents, params.chunking, params.splitter);
  log.info("chunked", { chunks: chunks.length });

  const items = await embedChunks(params.embedder, chunks, batchSize);
  log.info("embeddings ready", { count: items.length, dim: params.embedder.dimension });

  params.store.upsertEmbeddedChunks({ collection: params.collection, items });

  const summary = summarizeChunks({
    collection: params.collection,
    documentCount: params.documents.length,
    chunks,
    minSize: params.chunking.minSize,
  });
  log.info("stored", summary);
  return summary;
}
