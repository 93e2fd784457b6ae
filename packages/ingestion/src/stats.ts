import type { Chunk, IndexSummary, WordCountStats } from "@medrag/core";

export function wordCountStats(counts: readonly number[]): WordCountStats {
  if (counts.length === 0) return { total: 0, min: 0, max: 0, mean: 0, median: 0 };

  const sorted = [...counts].sort((a, b) => a - b);
  const total = sorted.reduce((n, c) => n + c, 0);
  const mid = Math.floor(sorted.length / 2);
  const median =
    sorted.length % 2 === 0 ? ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2 : (sorted[mid] ?? 0);

  return {
    total,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    mean: Math.round((total / sorted.length) * 10) / 10,
    median,
  };
}

export function summarizeChunks(params: {
  collection: string;
  documentCount: number;
  chunks: readonly Chunk[];
  minSize: number;
}): IndexSummary {
  const counts = params.chunks.map((c) => c.metadata.wordCount);
  return {
    collection: params.collection,
    documentCount: params.documentCount,
    chunkCount: params.chunks.length,
    forcedSplitCount: params.chunks.filter((c) => c.metadata.forcedSplit).length,
    undersizedCount: counts.filter((n) => n < params.minSize).length,
    wordCount: wordCountStats(counts),
  };
}
