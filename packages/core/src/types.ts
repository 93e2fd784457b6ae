export type ChunkId = string;
export type DocumentId = string;
export type CollectionId = string;

/**
 * Ordered page texts of one source document, as produced by the page loader.
 */
export interface RawDocument {
  id: DocumentId;
  collection: CollectionId;
  path: string;
  pages: string[];
}

export interface ChunkMetadata {
  collection: CollectionId;

  sourcePath: string;
  documentId: DocumentId;

  chunkIndex: number;
  wordCount: number;

  // leading sentences repeated from the previous chunk
  overlapSentences: number;
  forcedSplit: boolean;

  contentHash: string;
}

export interface Chunk {
  id: ChunkId;
  text: string;
  metadata: ChunkMetadata;
}

export interface ChunkingParams {
  minSize: number;
  targetSize: number;
  maxSize: number;
  overlapSentences: number;
}

export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

export interface RetrievedChunk {
  chunk: Chunk;
  similarity: number;
}

export interface Match {
  chunkId: ChunkId;
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

export interface RelevanceDecision {
  accepted: boolean;
  bestScore: number;
  threshold: number;
  matches: Match[];
}

export interface WordCountStats {
  total: number;
  min: number;
  max: number;
  mean: number;
  median: number;
}

export interface IndexSummary {
  collection: CollectionId;
  documentCount: number;
  chunkCount: number;
  forcedSplitCount: number;
  undersizedCount: number;
  wordCount: WordCountStats;
}

export type Answer =
  | {
      kind: "answer";
      question: string;
      answer: string;
      bestScore: number;
      primary: Match;
      supporting: Match[];
      elapsedMs: number;
    }
  | {
      kind: "refuse";
      question: string;
      message: string;
      bestScore: number;
      elapsedMs: number;
    }
  | {
      kind: "error";
      question: string;
      message: string;
      error: { code: string; message: string };
      elapsedMs: number;
    };
