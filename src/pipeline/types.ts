/**
 * types.ts - Shared data types for the ingestion pipeline
 *
 * These types flow through the pipeline stages:
 * - Discovery produces file paths
 * - Reading produces SourceDocument
 * - The frontmatter extractor produces AgentAttributes (agent documents only)
 * - The chunker produces Chunk[]
 * - The metadata builder produces ChunkMetadata per chunk
 * - The coordinator folds BatchOutcome values into an IngestResult
 */

import type { MetadataScalar, VectorStore } from "../vectorstore";

/**
 * Chunking parameters. Units are characters (JavaScript string length).
 */
export interface ChunkOptions {
  /** Maximum characters per chunk (positive integer) */
  chunkSize: number;
  /** Characters shared by consecutive chunks, 0 ≤ overlap < chunkSize */
  chunkOverlap: number;
}

/**
 * A slice of a text, with its position in the source.
 */
export interface TextSpan {
  text: string;
  /** Offset of the first character in the source text */
  start: number;
  /** Offset one past the last character */
  end: number;
}

/**
 * A chunk of a document, ready for metadata and storage.
 */
export interface Chunk extends TextSpan {
  /** 0-based position within its document */
  index: number;
  /** Absolute path of the owning document */
  source: string;
}

/**
 * A file read for ingestion. Read once per run, never mutated.
 */
export interface SourceDocument {
  /** Normalized absolute path */
  path: string;
  text: string;
  /** Final extension, lower-cased, with the dot (".md" for "x.agent.md") */
  fileType: string;
  /** True for .agent.md / .prompt.md files, or any .md file in agent mode */
  isAgent: boolean;
}

/**
 * Classification of an agent document. Closed set.
 */
export type Complexity = "low" | "medium" | "high";

/**
 * Structured fields extracted from an agent document.
 *
 * Empty strings and empty lists mean "unknown", which is what a document
 * with a malformed header gets.
 */
export interface AgentAttributes {
  agentName: string;
  description: string;
  model: string;
  category: string;
  complexity: Complexity | "";
  /** Lower-cased, deduplicated, first occurrence order */
  techStack: string[];
  languages: string[];
  tools: string[];
}

/**
 * Fields every stored chunk carries.
 */
export interface BaseChunkMetadata {
  /** Absolute path of the owning document */
  source: string;
  filename: string;
  /** Name of the directory that contains the document */
  folder: string;
  /** Final extension including the dot, e.g. ".md" */
  fileType: string;
  chunkIndex: number;
  totalChunks: number;
}

/**
 * Per-chunk metadata: the closed base record plus an open, typed extension
 * map (agent attributes, caller-supplied tags).
 */
export interface ChunkMetadata extends BaseChunkMetadata {
  extensions: Record<string, MetadataScalar>;
}

/**
 * Why a batch (or a document read) failed. Recorded, not thrown.
 */
export interface BatchFailure {
  /**
   * "read" when a file could not be read, "write" when an upsert failed,
   * "cleanup" when stale chunks of a document could not be removed
   */
  kind: "read" | "write" | "cleanup";
  /** 1-based batch number; 0 for read and cleanup failures */
  batch: number;
  /** Chunk ids in the failed batch (empty for read failures) */
  chunkIds: string[];
  /** Documents that contributed chunks to the failed batch */
  sources: string[];
  message: string;
}

/**
 * Result of writing one batch.
 */
export type BatchOutcome =
  | { ok: true; batch: number; chunks: number }
  | { ok: false; failure: BatchFailure };

/**
 * Summary of an ingestion run.
 */
export interface IngestResult {
  documentsProcessed: number;
  chunksWritten: number;
  batchesWritten: number;
  staleChunksRemoved: number;
  failures: BatchFailure[];
}

/**
 * Options for the ingest function. Accepts injectable dependencies for testing.
 */
export interface IngestOptions extends ChunkOptions {
  /** A directory to walk, or a single file */
  sourcePath: string;
  collection: string;
  /** The vector store to write chunks into */
  vectorStore: VectorStore;
  /** Chunks per upsert (default 100, allowed 1–5000) */
  batchSize?: number;
  /** Glob patterns relative to sourcePath */
  include?: string[];
  exclude?: string[];
  /** Treat every Markdown file as an agent document */
  agentMode?: boolean;
  /**
   * Progress callback for long-running operations.
   * Called with messages like "Batch 3 complete (100 chunks)".
   * Defaults to stdout.
   */
  onProgress?: (message: string) => void;
  /** Warnings (malformed frontmatter). Defaults to console.warn */
  onWarning?: (message: string) => void;
  /** Injectable file reader. Defaults to fs/promises readFile (utf-8) */
  readFile?: (path: string) => Promise<string>;
  /** Injectable file discovery. Defaults to discoverFiles */
  listFiles?: (
    sourcePath: string,
    patterns: { include: string[]; exclude: string[] }
  ) => Promise<string[]>;
}
