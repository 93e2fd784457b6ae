import { existsSync } from "node:fs";
import Database from "better-sqlite3";
import { IndexNotFoundError, SearchError, createLogger, errorMessage } from "@medrag/core";
import type { ChunkMetadata, CollectionId, EmbeddedChunk, RetrievedChunk } from "@medrag/core";
import type { VectorSearchParams, VectorStore } from "./store.js";
import { cosineSimilarity } from "./similarity.js";

const log = createLogger("vectorstore");

type SqlRow = {
  chunk_id: string;
  text: string;
  metadata_json: string;
  vector_json: string;
};

type CountRow = { n: number };

const MEMORY = ":memory:";

export class SqliteStore implements VectorStore {
  private db: Database.Database;

  constructor(private readonly dbPath: string) {
    this.db = new Database(dbPath);
  }

  /**
   * Opens an index for querying. A missing database file or an empty collection
   * means the build step never ran.
   */
  static openExisting(dbPath: string, collection: CollectionId): SqliteStore {
    if (dbPath !== MEMORY && !existsSync(dbPath)) {
      throw new IndexNotFoundError(collection, dbPath);
    }

    // corrupt file, not a database, locked
    const openFailure = (err: unknown) =>
      new SearchError(`Cannot open index at ${dbPath}: ${errorMessage(err)}`, { cause: err });

    let store: SqliteStore;
    try {
      store = new SqliteStore(dbPath);
    } catch (err) {
      throw openFailure(err);
    }

    let count: number;
    try {
      store.init();
      count = store.countChunks(collection);
    } catch (err) {
      store.close();
      throw openFailure(err);
    }

    if (count === 0) {
      store.close();
      throw new IndexNotFoundError(collection, dbPath);
    }
    return store;
  }

  init(): void {
    this.db.exec(`PRAGMA journal_mode = WAL;`);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS chunks (
        chunk_id TEXT PRIMARY KEY,
        collection TEXT NOT NULL,
        text TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        vector_json TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_chunks_collection
      ON chunks(collection);
    `);
  }

  upsertEmbeddedChunks(params: {
    collection: CollectionId;
    items: EmbeddedChunk[];
  }): void {
    const stmt = this.db.prepare(`
      INSERT INTO chunks (chunk_id, collection, text, metadata_json, vector_json)
      VALUES (@chunk_id, @collection, @text, @metadata_json, @vector_json)
      ON CONFLICT(chunk_id) DO UPDATE SET
        collection = excluded.collection,
        text = excluded.text,
        metadata_json = excluded.metadata_json,
        vector_json = excluded.vector_json;
    `);

    const tx = this.db.transaction((items: EmbeddedChunk[]) => {
      for (const it of items) {
        stmt.run({
          chunk_id: it.chunk.id,
          collection: params.collection,
          text: it.chunk.text,
          metadata_json: JSON.stringify(it.chunk.metadata),
          vector_json: JSON.stringify(it.vector),
        });
      }
    });

    tx(params.items);
    log.debug("upserted", { collection: params.collection, count: params.items.length });
  }

  countChunks(collection: CollectionId): number {
    const row = this.db
      .prepare(`SELECT COUNT(*) AS n FROM chunks WHERE collection = ?`)
      .get(collection) as CountRow | undefined;
    return row?.n ?? 0;
  }

  search(params: VectorSearchParams): RetrievedChunk[] {
    if (params.collections.length === 0) return [];
    if (params.topK <= 0) return [];

    const placeholders = params.collections.map(() => "?").join(",");

    let rows: SqlRow[];
    try {
      rows = this.db
        .prepare(
          `
          SELECT chunk_id, text, metadata_json, vector_json
          FROM chunks
          WHERE collection IN (${placeholders})
        `
        )
        .all(...params.collections) as SqlRow[];
    } catch (err) {
      throw new SearchError(`SQLite search failed on ${this.dbPath}: ${errorMessage(err)}`, { cause: err });
    }

    const scored: RetrievedChunk[] = [];
    for (const row of rows) {
      const vector = JSON.parse(row.vector_json) as number[];
      if (vector.length !== params.queryVector.length) {
        throw new SearchError(
          `Query vector has ${params.queryVector.length} dimensions but the index stores ${vector.length}; rebuild the index with the same embedding model.`,
          { retryable: false }
        );
      }

      scored.push({
        chunk: {
          id: row.chunk_id,
          text: row.text,
          metadata: JSON.parse(row.metadata_json) as ChunkMetadata,
        },
        similarity: cosineSimilarity(params.queryVector, vector),
      });
    }

    // ties broken by id so equal scores come back in a stable order
    scored.sort((a, b) => b.similarity - a.similarity || (a.chunk.id < b.chunk.id ? -1 : 1));
    return scored.slice(0, params.topK);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
