import "dotenv/config";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createLogger, errorMessage, loadConfig } from "@medrag/core";
import { buildIndex, loadTextDocuments, prepareChunks, summarizeChunks } from "@medrag/ingestion";
import { OllamaEmbedder } from "@medrag/embeddings";
import { SqliteStore } from "@medrag/vectorstore";
import { getArg, hasFlag } from "./args.js";

const log = createLogger("ingest");

function ensureDir(path: string) {
  mkdirSync(dirname(path), { recursive: true });
}

const sourcePath = getArg("source");
const dryRun = hasFlag("dry-run");

if (!sourcePath) {
  console.error("Usage: npm run ingest -- --source <file.txt|dir> [--collection <id>] [--db <sqlitePath>] [--dry-run]");
  process.exit(1);
}

try {
  const config = loadConfig();
  const collection = getArg("collection") ?? config.collection;
  const dbPath = getArg("db") ?? config.vectorDbPath;

  log.info("start", { sourcePath, collection, dbPath, chunking: config.chunking, dryRun });

  const documents = await loadTextDocuments({ sourcePath, collection });
  log.info("extracted", {
    documents: documents.length,
    pages: documents.reduce((n, d) => n + d.pages.length, 0),
  });

  if (dryRun) {
    const chunks = prepareChunks(documents, config.chunking);
    const summary = summarizeChunks({
      collection,
      documentCount: documents.length,
      chunks,
      minSize: config.chunking.minSize,
    });
    console.log(JSON.stringify(summary, null, 2));
  } else {
    const embedder = new OllamaEmbedder({
      baseUrl: config.embedding.baseUrl,
      model: config.embedding.model,
      dimension: config.embedding.dimension,
      timeoutMs: config.embedding.timeoutMs,
    });

    ensureDir(dbPath);
    const store = new SqliteStore(dbPath);
    store.init();

    try {
      const summary = await buildIndex({
        documents,
        collection,
        chunking: config.chunking,
        embedder,
        store,
        batchSize: config.embedding.batchSize,
      });
      console.log(JSON.stringify(summary, null, 2));
    } finally {
      store.close();
    }
  }
} catch (err) {
  log.error("failed:", errorMessage(err));
  process.exitCode = 1;
}
