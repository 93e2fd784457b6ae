import crypto from "node:crypto";
import { InvalidArgumentError } from "@medrag/core";
import type { Chunk, ChunkMetadata, ChunkingParams, RawDocument } from "@medrag/core";
import { defaultSentenceSplitter, type SentenceSplitter } from "./sentenceSplitter.js";

function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export interface ChunkDraft {
  text: string;
  wordCount: number;
  overlapSentences: number;
  forcedSplit: boolean;
}

type Sentence = { text: string; words: number };

export function validateChunkingParams(params: ChunkingParams): void {
  const { minSize, targetSize, maxSize, overlapSentences } = params;
  for (const [name, value] of Object.entries({ minSize, targetSize, maxSize })) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
    }
  }
  if (!Number.isInteger(overlapSentences) || overlapSentences < 0) {
    throw new InvalidArgumentError(`overlapSentences must be a non-negative integer, got ${overlapSentences}`);
  }
  if (minSize > targetSize || targetSize > maxSize) {
    throw new InvalidArgumentError(
      `expected minSize <= targetSize <= maxSize, got ${minSize} / ${targetSize} / ${maxSize}`
    );
  }
}

/**
 * Splits one over-long sentence into near-equal pieces of at most `targetSize` words.
 */
function forceSplit(sentence: string, targetSize: number): string[] {
  const words = sentence.split(/\s+/).filter(Boolean);
  const pieces = Math.ceil(words.length / targetSize);
  const base = Math.floor(words.length / pieces);
  const extra = words.length % pieces;

  const out: string[] = [];
  let start = 0;
  for (let i = 0; i < pieces; i++) {
    const size = base + (i < extra ? 1 : 0);
    out.push(words.slice(start, start + size).join(" "));
    start += size;
  }
  return out;
}

/**
 * Greedy sentence packing. A chunk closes as soon as it reaches `targetSize` words, or
 * earlier when the next sentence would push it past `maxSize`. Each new chunk starts
 * with the last `overlapSentences` sentences of the previous one. Sentences longer
 * than `maxSize` are cut on word boundaries and never overlap with their neighbours.
 */
export function chunkText(
  text: string,
  params: ChunkingParams,
  splitter: SentenceSplitter = defaultSentenceSplitter
): ChunkDraft[] {
  validateChunkingParams(params);
  const { minSize, targetSize, maxSize, overlapSentences } = params;

  const sentences: Sentence[] = splitter
    .split(text)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => ({ text: s, words: countWords(s) }));

  const out: ChunkDraft[] = [];
  let buffer: Sentence[] = [];
  let seeded = 0;
  let words = 0;

  const reset = (next: Sentence[]) => {
    buffer = next;
    seeded = next.length;
    words = next.reduce((n, s) => n + s.words, 0);
  };

  const flush = (reseed: boolean) => {
    if (buffer.length > seeded) {
      out.push({
        text: buffer.map((s) => s.text).join(" "),
        wordCount: words,
        overlapSentences: seeded,
        forcedSplit: false,
      });
    }
    reset(reseed && overlapSentences > 0 ? buffer.slice(-overlapSentences) : []);
  };

  for (const sentence of sentences) {
    if (sentence.words > maxSize) {
      flush(false);
      for (const piece of forceSplit(sentence.text, targetSize)) {
        out.push({ text: piece, wordCount: countWords(piece), overlapSentences: 0, forcedSplit: true });
      }
      continue;
    }

    while (buffer.length > 0 && words + sentence.words > maxSize) {
      if (buffer.length > seeded && (seeded === 0 || words >= minSize)) {
        flush(true);
        continue;
      }
      // the seed leaves no room, or closing now would emit an undersized chunk:
      // give up the oldest seed sentence
      const dropped = buffer.shift();
      words -= dropped?.words ?? 0;
      seeded -= 1;
    }

    buffer.push(sentence);
    words += sentence.words;

    if (words >= targetSize) flush(true);
  }

  flush(false);
  return out;
}

/**
 * Chunks one normalised document and assigns ids and metadata.
 * Ids are stable for identical input: sha256(collection:path:index:contentHash).
 */
export function chunkDocument(
  doc: RawDocument,
  normalizedText: string,
  params: ChunkingParams,
  splitter?: SentenceSplitter
): Chunk[] {
  const drafts = chunkText(normalizedText, params, splitter);

  return drafts.map((draft, i) => {
    const contentHash = sha256(draft.text);
    const metadata: ChunkMetadata = {
      collection: doc.collection,
      sourcePath: doc.path,
      documentId: doc.id,
      chunkIndex: i,
      wordCount: draft.wordCount,
      overlapSentences: draft.overlapSentences,
      forcedSplit: draft.forcedSplit,
      contentHash,
    };
    const id = sha256(`${doc.collection}:${doc.path}:${i}:${contentHash}`);
    return { id, text: draft.text, metadata };
  });
}
