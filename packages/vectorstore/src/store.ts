import type { CollectionId, EmbeddedChunk, RetrievedChunk } from "@medrag/core";

export interface VectorSearchParams {
  collections: CollectionId[];
  queryVector: number[];
  topK: number;
}

export interface VectorStore {
  init(): void;

  upsertEmbeddedChunks(params: {
    collection: CollectionId;
    items: EmbeddedChunk[];
  }): void;

  /**
   * Best matches first, at most `topK` of them.
   */
  search(params: VectorSearchParams): RetrievedChunk[];

  countChunks(collection: CollectionId): number;

  close(): void;
}
