import { SearchError, createLogger, loadConfig } from "@medrag/core";
import type { RagConfig } from "@medrag/core";
import { OllamaEmbedder, type Embedder } from "@medrag/embeddings";
import { SqliteStore, type VectorStore } from "@medrag/vectorstore";

const log = createLogger("context");

export type EmbedderFactory = (config: RagConfig) => Embedder | Promise<Embedder>;
export type StoreFactory = (config: RagConfig) => VectorStore | Promise<VectorStore>;

export const defaultEmbedderFactory: EmbedderFactory = async (config) => {
  const embedder = new OllamaEmbedder({
    baseUrl: config.embedding.baseUrl,
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    timeoutMs: config.embedding.timeoutMs,
  });
  await embedder.warmUp();
  return embedder;
};

export const defaultStoreFactory: StoreFactory = (config) =>
  SqliteStore.openExisting(config.vectorDbPath, config.collection);

export interface RetrievalContextOptions {
  config?: RagConfig;
  createEmbedder?: EmbedderFactory;
  openStore?: StoreFactory;
  now?: () => number;
}

interface Lazy<T> {
  get(): Promise<T>;
  reset(): void;
}

/**
 * Memoises an async initialiser: concurrent callers share one in-flight promise.
 * A failed attempt is forgotten so the next call starts over.
 */
function lazy<T>(label: string, init: () => T | Promise<T>): Lazy<T> {
  let pending: Promise<T> | null = null;

  return {
    get: () => {
      if (!pending) {
        log.debug(`initialising ${label}`);
        const attempt = (async () => init())();
        pending = attempt;
        attempt.catch(() => {
          if (pending === attempt) pending = null;
        });
      }
      return pending;
    },
    reset: () => {
      pending = null;
    },
  };
}

/**
 * Process-wide query resources, built once by the host and shared by every
 * query: the configuration, the embedding model and the vector-store connection.
 */
export class RetrievalContext {
  readonly config: RagConfig;
  readonly now: () => number;

  private openedStore: VectorStore | null = null;
  private storeGeneration = 0;
  private readonly loadEmbedder: Lazy<Embedder>;
  private readonly loadStore: Lazy<VectorStore>;

  constructor(opts: RetrievalContextOptions = {}) {
    this.config = opts.config ?? loadConfig();
    this.now = opts.now ?? (() => performance.now());

    const createEmbedder = opts.createEmbedder ?? defaultEmbedderFactory;
    const openStore = opts.openStore ?? defaultStoreFactory;

    this.loadEmbedder = lazy("embedder", () => createEmbedder(this.config));
    this.loadStore = lazy("vector store", async () => {
      const generation = this.storeGeneration;
      const store = await openStore(this.config);
      if (generation !== this.storeGeneration) {
        // close() ran while this open was in flight
        store.close();
        throw new SearchError("Vector store was closed while it was being opened");
      }
      this.openedStore = store;
      return store;
    });
  }

  embedder(): Promise<Embedder> {
    return this.loadEmbedder.get();
  }

  store(): Promise<VectorStore> {
    return this.loadStore.get();
  }

  /**
   * Closes the store connection; the next query reopens it.
   */
  close(): void {
    this.storeGeneration++;
    this.openedStore?.close();
    this.openedStore = null;
    this.loadStore.reset();
  }
}
