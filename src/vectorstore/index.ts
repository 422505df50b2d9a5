/**
 * vectorstore/index.ts - Public API for the vector store module
 *
 * Import from here rather than from types.ts, embeddings.ts,
 * client-manager.ts or chroma-backend.ts directly.
 *
 * Usage:
 *   import {
 *     ChromaBackend,
 *     StoreClientManager,
 *     VoyageEmbedding,
 *     type VectorStore,
 *   } from "./vectorstore";
 */

export type {
  VectorStore,
  VectorDocument,
  SearchResult,
  SearchOptions,
  GetOptions,
  MetadataUpdate,
  CollectionOptions,
  CollectionSummary,
  EmbeddingFunction,
  EmbeddingPurpose,
  MetadataMap,
  MetadataScalar,
  WhereFilter,
} from "./types";

export { ChromaBackend, toMetadataMap } from "./chroma-backend";
export { StoreClientManager, type ChromaClientFactory } from "./client-manager";
export { VoyageEmbedding, DEFAULT_EMBEDDING_MODEL } from "./embeddings";

/**
 * Collection used when a command is not given one.
 */
export const DEFAULT_COLLECTION = "code_context";

/**
 * Collection for agent-definition documents (ingested with agent mode on).
 */
export const AGENTS_COLLECTION = "agents";
