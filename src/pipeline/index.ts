/**
 * pipeline/index.ts - Public API for the ingestion pipeline
 *
 * Re-exports everything other modules need from the pipeline.
 * Import from here rather than from the individual stage files.
 *
 * Usage:
 *   import { ingest, type IngestResult } from "./pipeline";
 */

// Types shared across pipeline stages
export type {
  ChunkOptions,
  TextSpan,
  Chunk,
  SourceDocument,
  Complexity,
  AgentAttributes,
  BaseChunkMetadata,
  ChunkMetadata,
  BatchFailure,
  BatchOutcome,
  IngestResult,
  IngestOptions,
} from "./types";

// Chunking
export {
  chunkText,
  chunkDocument,
  chunkId,
  validateChunkOptions,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from "./chunker";

// Metadata
export {
  buildChunkMetadata,
  flattenMetadata,
  agentExtensions,
  fileTypeOf,
  ChunkMetadataSchema,
  MAX_DESCRIPTION_LENGTH,
} from "./metadata";

// Frontmatter
export {
  parseFrontmatter,
  extractAgentAttributes,
  classifyCategory,
  matchCategory,
  detectTechStack,
  normalizeList,
  inferComplexity,
  type FrontmatterResult,
  type AgentExtraction,
} from "./frontmatter";

// File discovery
export { discoverFiles, isAgentDocument, DEFAULT_INCLUDE, DEFAULT_EXCLUDE } from "./discovery";

// Coordinator
export { ingest, validateIngestOptions, DEFAULT_BATCH_SIZE, MAX_BATCH_SIZE } from "./ingest";

// Metadata enrichment for chunks stored without agent attributes
export {
  enrichCollection,
  inferAttributes,
  inferDescription,
  type EnrichOptions,
  type EnrichResult,
  type EnrichFailure,
  type InferredAttributes,
} from "./enrich";
