/**
 * chroma-backend.ts - Chroma implementation of the VectorStore interface
 *
 * What this file does:
 * Implements the VectorStore interface using Chroma as the backend. This file
 * and client-manager.ts are the only places that import from "chromadb";
 * everything else codes against the VectorStore interface in types.ts.
 *
 * How it works:
 * 1. initialize() creates a Chroma collection with cosine distance
 * 2. store() embeds document text via our EmbeddingFunction, then upserts
 *    the vectors + metadata in Chroma
 * 3. search() embeds the query, runs vector similarity search in Chroma,
 *    and returns results with their distances
 * 4. get(), updateMetadata(), delete() and count() are maintenance helpers
 *    used by stale-chunk cleanup, enrichment and the retriever's source lookup
 *
 * We pass pre-computed embeddings to Chroma (not a Chroma embedding function).
 * This keeps our EmbeddingFunction interface clean and backend-agnostic.
 *
 * Errors:
 * Anything that looks like an unreachable server is rethrown as
 * ConnectionError. Other Chroma errors (bad filter, missing collection)
 * propagate unchanged.
 */

import type { Collection, Where } from "chromadb";
import { ConnectionError, errorMessage, isConnectionFailure } from "../errors";
import type { StoreClientManager } from "./client-manager";
import type {
  VectorStore,
  VectorDocument,
  SearchResult,
  CollectionOptions,
  CollectionSummary,
  SearchOptions,
  GetOptions,
  EmbeddingFunction,
  MetadataUpdate,
  MetadataMap,
} from "./types";

/**
 * Keeps the scalar entries of a metadata object returned by Chroma.
 *
 * Chroma types metadata loosely (values may be null); we only ever write
 * scalars, so anything else is dropped rather than passed on.
 */
export function toMetadataMap(value: unknown): MetadataMap {
  const metadata: MetadataMap = {};
  if (typeof value !== "object" || value === null) return metadata;

  for (const [key, entry] of Object.entries(value)) {
    if (
      typeof entry === "string" ||
      typeof entry === "boolean" ||
      (typeof entry === "number" && Number.isFinite(entry))
    ) {
      metadata[key] = entry;
    }
  }
  return metadata;
}

/**
 * Chroma implementation of the VectorStore interface.
 *
 * Usage:
 *   const manager = new StoreClientManager(config.store);
 *   const store = new ChromaBackend(manager, new VoyageEmbedding({ apiKey }));
 *
 *   await store.initialize("code_context");
 *   await store.store("code_context", [{ id: "...", text: "...", metadata: {} }]);
 *   const results = await store.search("code_context", "jwt refresh");
 */
export class ChromaBackend implements VectorStore {
  private readonly clients: StoreClientManager;
  private readonly embedder: EmbeddingFunction;

  /**
   * Collections already opened, by name. Saves a round-trip per operation.
   * Cleared when the manager's client is reset.
   */
  private readonly collections: Map<string, Collection> = new Map();
  private collectionsGeneration: number;

  /**
   * @param clients - Shared client manager (one Chroma client per process)
   * @param embedder - Converts text to vectors; injected so the embedding
   *                   model can be swapped independently of the database
   */
  constructor(clients: StoreClientManager, embedder: EmbeddingFunction) {
    this.clients = clients;
    this.embedder = embedder;
    this.collectionsGeneration = clients.generation;
  }

  /**
   * Creates a collection if it doesn't exist, or gets the existing one.
   *
   * We pass embeddingFunction: null to tell Chroma we'll provide pre-computed
   * embeddings. Without this, Chroma tries to use a default embedding function
   * which requires the @chroma-core/default-embed package.
   */
  async initialize(
    collection: string,
    options: CollectionOptions = { distanceMetric: "cosine" }
  ): Promise<void> {
    const chromaCollection = await this.guard(`initialize "${collection}"`, async () => {
      const client = await this.clients.getClient();
      return client.getOrCreateCollection({
        name: collection,
        configuration: {
          hnsw: { space: options.distanceMetric },
        },
        embeddingFunction: null,
      });
    });

    this.openCollections().set(collection, chromaCollection);
  }

  /**
   * Upserts documents into a Chroma collection.
   *
   * All texts are embedded in one request, then ids, vectors, texts and
   * metadata are sent together. Same id means overwrite, which is what makes
   * re-ingesting a file idempotent.
   */
  async store(collection: string, documents: VectorDocument[]): Promise<void> {
    if (documents.length === 0) return;

    const chromaCollection = await this.openCollection(collection);
    const texts = documents.map((doc) => doc.text);
    const embeddings = await this.embedder.embed(texts, "document");

    await this.guard(`upsert into "${collection}"`, () =>
      chromaCollection.upsert({
        ids: documents.map((doc) => doc.id),
        embeddings,
        documents: texts,
        metadatas: documents.map((doc) => doc.metadata),
      })
    );
  }

  /**
   * Searches a collection using natural language.
   *
   * Chroma returns results sorted by distance (closest first).
   * With cosine distance: 0.0 = identical, 2.0 = completely opposite.
   */
  async search(
    collection: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult[]> {
    const chromaCollection = await this.openCollection(collection);
    const queryEmbeddings = await this.embedder.embed([query], "query");

    const results = await this.guard(`query "${collection}"`, () =>
      chromaCollection.query({
        queryEmbeddings,
        nResults: options?.nResults ?? 10,
        include: ["documents", "metadatas", "distances"],
        // Our WhereFilter has the same shape as Chroma's Where; it is built
        // and validated by retrieval/query.ts
        ...(options?.where ? { where: options.where as Where } : {}),
      })
    );

    // Chroma returns nested arrays because query() supports multiple
    // queries at once. We always send one query, so we use index [0].
    const ids = results.ids[0] ?? [];
    const texts = results.documents[0] ?? [];
    const metadatas = results.metadatas[0] ?? [];
    const distances = results.distances[0] ?? [];

    // An entry without a distance cannot be ranked, so it is left out
    return ids.flatMap((id, i) => {
      const distance = distances[i];
      if (typeof distance !== "number") return [];
      return [{ id, text: texts[i] ?? "", metadata: toMetadataMap(metadatas[i]), distance }];
    });
  }

  /**
   * Fetches documents by metadata filter without ranking.
   */
  async get(collection: string, options: GetOptions = {}): Promise<VectorDocument[]> {
    const chromaCollection = await this.openCollection(collection);

    const results = await this.guard(`get from "${collection}"`, () =>
      chromaCollection.get({
        ...(options.where ? { where: options.where as Where } : {}),
        ...(options.limit !== undefined ? { limit: options.limit } : {}),
        ...(options.offset !== undefined ? { offset: options.offset } : {}),
        include: ["documents", "metadatas"],
      })
    );

    return results.ids.map((id, i) => ({
      id,
      text: results.documents[i] ?? "",
      metadata: toMetadataMap(results.metadatas[i]),
    }));
  }

  /**
   * Rewrites metadata in place. Nothing is re-embedded.
   */
  async updateMetadata(collection: string, updates: MetadataUpdate[]): Promise<void> {
    if (updates.length === 0) return;
    const chromaCollection = await this.openCollection(collection);
    await this.guard(`update "${collection}"`, () =>
      chromaCollection.update({
        ids: updates.map((update) => update.id),
        metadatas: updates.map((update) => update.metadata),
      })
    );
  }

  /**
   * Deletes documents from a collection by ID.
   */
  async delete(collection: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    const chromaCollection = await this.openCollection(collection);
    await this.guard(`delete from "${collection}"`, () =>
      chromaCollection.delete({ ids })
    );
  }

  async count(collection: string): Promise<number> {
    const chromaCollection = await this.openCollection(collection);
    return this.guard(`count "${collection}"`, () => chromaCollection.count());
  }

  async listCollections(
    options: { limit?: number; offset?: number } = {}
  ): Promise<CollectionSummary[]> {
    const collections = await this.guard("list collections", async () => {
      const client = await this.clients.getClient();
      return client.listCollections(options);
    });

    const summaries: CollectionSummary[] = [];
    for (const collection of collections) {
      const count = await this.guard(`count "${collection.name}"`, () =>
        collection.count()
      );
      summaries.push({ name: collection.name, count });
    }
    return summaries;
  }

  /**
   * Returns a cached collection, or opens an existing one.
   *
   * Opening never creates: a search against a collection that was never
   * ingested fails instead of leaving an empty collection behind. Creation
   * (and the distance metric) belongs to initialize().
   */
  private async openCollection(name: string): Promise<Collection> {
    const cached = this.openCollections().get(name);
    if (cached) return cached;

    const collection = await this.guard(`open "${name}"`, async () => {
      const client = await this.clients.getClient();
      return client.getCollection({ name });
    });
    this.openCollections().set(name, collection);
    return collection;
  }

  /**
   * The collection cache, emptied first if the client was reset since it
   * was filled.
   */
  private openCollections(): Map<string, Collection> {
    if (this.collectionsGeneration !== this.clients.generation) {
      this.collections.clear();
      this.collectionsGeneration = this.clients.generation;
    }
    return this.collections;
  }

  /**
   * Runs a Chroma call, converting transport failures into ConnectionError.
   */
  private async guard<T>(action: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ConnectionError) throw error;
      if (isConnectionFailure(error)) {
        throw new ConnectionError(
          `Lost connection to Chroma at ${this.clients.address} during ${action}: ${errorMessage(error)}`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
