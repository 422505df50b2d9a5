/**
 * types.ts - Vector database interfaces and types
 *
 * What this file does:
 * Defines the interfaces that the rest of the system uses to interact with
 * the vector database. The ingestion pipeline and the retriever import from
 * here and never touch Chroma directly.
 *
 * Key concepts:
 * - VectorStore: collection-scoped upsert, query, get, delete and count
 * - EmbeddingFunction: Turns text into numbers (vectors) for similarity search
 * - VectorDocument: A document to store (id + text + flat metadata)
 * - SearchResult: A stored document found by similarity search, with its distance
 */

/**
 * A metadata value. Chroma metadata is flat: no nested objects and no lists.
 * Multi-valued fields are stored as comma-separated strings.
 */
export type MetadataScalar = string | number | boolean;

/**
 * Flat metadata as stored in (and returned from) the vector database.
 */
export type MetadataMap = Record<string, MetadataScalar>;

/**
 * A Chroma-style "where" clause. Simple key-value pairs do exact matching;
 * operators ($and, $in, $gte, ...) are nested objects per the Chroma docs.
 * Built by retrieval/query.ts and pipeline/ingest.ts, never by hand upstream.
 */
export type WhereFilter = Record<string, unknown>;

/**
 * What the embedding is for. Retrieval-tuned models embed queries and
 * documents slightly differently.
 */
export type EmbeddingPurpose = "document" | "query";

/**
 * A function that converts text into embedding vectors.
 *
 * The embedding model is an external collaborator: text in, numbers out.
 * The interface lets us swap models without changing any store or pipeline code.
 */
export interface EmbeddingFunction {
  /**
   * Converts an array of text strings into embedding vectors.
   *
   * @param texts - The strings to embed (chunk texts or a single query)
   * @param purpose - Whether the texts are stored documents or a search query
   * @returns One vector per input text, in input order
   */
  embed(texts: string[], purpose?: EmbeddingPurpose): Promise<number[][]>;
}

/**
 * A document to store in the vector database.
 *
 * - id: deterministic identifier (for chunks: "<path>:<chunkIndex>")
 * - text: The content to embed and search against
 * - metadata: Structured fields for filtering (source, chunkIndex, category, ...)
 */
export interface VectorDocument {
  /** Unique identifier within the collection (used for upserts and deletes) */
  id: string;
  /** The text content to embed: this is what semantic search matches against */
  text: string;
  /** Structured metadata for filtering, not embedded, used for exact queries */
  metadata: MetadataMap;
}

/**
 * A search result returned from a similarity query.
 */
export interface SearchResult {
  /** Unique identifier of the matched document */
  id: string;
  /** The original text content */
  text: string;
  /** Structured metadata from the original document */
  metadata: MetadataMap;
  /**
   * How far this result is from the query.
   *
   * With cosine distance: 0.0 = identical, 2.0 = opposite.
   * Lower means more similar. Chroma returns distances, not similarity scores.
   */
  distance: number;
}

/**
 * Options for creating a collection.
 */
export interface CollectionOptions {
  /**
   * The distance metric for comparing vectors.
   *
   * - "cosine": Standard for text embeddings. This is what we use.
   * - "l2": Euclidean distance. Sensitive to vector magnitude.
   * - "ip": Inner product. Used with normalized vectors.
   *
   * Must be set at collection creation time and cannot be changed later.
   */
  distanceMetric: "cosine" | "l2" | "ip";
}

/**
 * Options for searching a collection.
 */
export interface SearchOptions {
  /** Maximum number of results to return (default: 10) */
  nResults?: number;
  /** Metadata filter applied by the backend before ranking */
  where?: WhereFilter;
}

/**
 * Options for fetching documents without a query.
 */
export interface GetOptions {
  /** Metadata filter */
  where?: WhereFilter;
  /** Maximum number of documents to return */
  limit?: number;
  /** Number of matching documents to skip */
  offset?: number;
}

/**
 * New metadata for a stored document.
 */
export interface MetadataUpdate {
  id: string;
  /** The full replacement map, not a patch */
  metadata: MetadataMap;
}

/**
 * A collection and its current size.
 */
export interface CollectionSummary {
  name: string;
  count: number;
}

/**
 * The main interface for vector database operations.
 *
 * Usage pattern:
 *   1. initialize(): create the collection (idempotent, safe to call twice)
 *   2. store(): upsert documents (embeddings computed automatically)
 *   3. search(): find similar documents by natural language query
 *   4. get() / updateMetadata() / delete(): maintenance by metadata filter and id
 */
export interface VectorStore {
  /**
   * Creates a collection if it doesn't exist, or opens the existing one.
   *
   * @param collection - Name of the collection (e.g., "code_context")
   * @param options - Configuration like distance metric (default: cosine)
   */
  initialize(collection: string, options?: CollectionOptions): Promise<void>;

  /**
   * Upserts documents into a collection.
   *
   * Each document's text is embedded and stored alongside its metadata. A
   * document with an existing ID is overwritten, so re-running ingestion
   * converges instead of duplicating.
   */
  store(collection: string, documents: VectorDocument[]): Promise<void>;

  /**
   * Searches a collection using natural language.
   *
   * @returns Matching documents in backend order (closest first)
   */
  search(
    collection: string,
    query: string,
    options?: SearchOptions
  ): Promise<SearchResult[]>;

  /**
   * Fetches documents by metadata filter, unranked.
   */
  get(collection: string, options?: GetOptions): Promise<VectorDocument[]>;

  /**
   * Replaces the metadata of existing documents. Text and embeddings stay
   * as they are.
   */
  updateMetadata(collection: string, updates: MetadataUpdate[]): Promise<void>;

  /**
   * Deletes documents from a collection by ID.
   */
  delete(collection: string, ids: string[]): Promise<void>;

  /**
   * Number of documents (chunks) in a collection.
   */
  count(collection: string): Promise<number>;

  /**
   * Lists collections with their sizes.
   */
  listCollections(options?: {
    limit?: number;
    offset?: number;
  }): Promise<CollectionSummary[]>;
}
