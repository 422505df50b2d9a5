/**
 * ingest.ts - Ingestion coordinator
 *
 * Turns a directory (or a single file) into chunks in a vector store
 * collection:
 *
 *   discover → read → frontmatter (agent documents) → chunk → metadata → upsert
 *
 * Chunks are written in batches, one batch at a time. Chunk ids are
 * "<path>:<index>", so re-ingesting unchanged files overwrites the same
 * entries and the collection size stays put.
 *
 * Failure handling:
 * - A file that cannot be read is recorded and skipped
 * - A batch the store rejects is recorded and the run continues
 * - So is a stale-chunk lookup or delete the store rejects
 * - ConnectionError aborts the run; nothing later could succeed
 *
 * After writing, each document whose chunks all landed gets its stale chunks
 * removed: entries from an earlier, longer version of the file with a
 * chunkIndex at or beyond the new chunk count.
 */

import { readFile as fsReadFile } from "node:fs/promises";
import { ConnectionError, errorMessage } from "../errors";
import { traceOperation } from "../tracing/spans";
import type { MetadataScalar, VectorDocument, VectorStore } from "../vectorstore";
import { chunkDocument, chunkId, validateChunkOptions } from "./chunker";
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE, discoverFiles, isAgentDocument } from "./discovery";
import { extractAgentAttributes } from "./frontmatter";
import { agentExtensions, buildChunkMetadata, fileTypeOf, flattenMetadata } from "./metadata";
import type {
  BatchFailure,
  BatchOutcome,
  IngestOptions,
  IngestResult,
  SourceDocument,
} from "./types";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_BATCH_SIZE = 100;
export const MAX_BATCH_SIZE = 5000;

/** Upper bound on stale chunks looked up per document */
const MAX_STALE_LOOKUP = 10_000;

// ---------------------------------------------------------------------------
// Internal types
// ---------------------------------------------------------------------------

/** A chunk waiting for its batch to be written */
interface PendingChunk {
  document: VectorDocument;
  source: string;
}

/** Per-document bookkeeping for stale cleanup */
interface DocumentState {
  chunkCount: number;
  failed: boolean;
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/**
 * Checks ingestion options before anything touches the store.
 *
 * @returns The effective batch size
 * @throws RangeError for invalid chunk or batch sizes
 */
export function validateIngestOptions(options: IngestOptions): number {
  validateChunkOptions(options);
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_BATCH_SIZE) {
    throw new RangeError(
      `batchSize must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${batchSize}`
    );
  }
  return batchSize;
}

/**
 * Ingests every matching file under options.sourcePath into a collection.
 *
 * Option errors are thrown synchronously, before the returned promise
 * exists; everything after that is reported through the promise.
 *
 * @returns Counts for the run, plus every read and batch failure
 * @throws RangeError for invalid options, synchronously
 * @throws ConnectionError (as a rejection) when the store is unreachable
 */
export function ingest(options: IngestOptions): Promise<IngestResult> {
  const batchSize = validateIngestOptions(options);
  const { collection, vectorStore } = options;
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const onWarning = options.onWarning ?? console.warn;
  const readFile = options.readFile ?? ((path: string) => fsReadFile(path, "utf-8"));
  const listFiles = options.listFiles ?? discoverFiles;

  return traceOperation(
    `ingest ${collection}`,
    {
      "ingest.collection": collection,
      "ingest.source_path": options.sourcePath,
      "ingest.chunk_size": options.chunkSize,
      "ingest.chunk_overlap": options.chunkOverlap,
      "ingest.batch_size": batchSize,
    },
    async (span) => {
      // Idempotent; creates the collection with cosine distance on first run
      await vectorStore.initialize(collection, { distanceMetric: "cosine" });

      const files = await listFiles(options.sourcePath, {
        include: options.include ?? DEFAULT_INCLUDE,
        exclude: options.exclude ?? DEFAULT_EXCLUDE,
      });
      onProgress(`Found ${files.length} files in ${options.sourcePath}`);

      const result: IngestResult = {
        documentsProcessed: 0,
        chunksWritten: 0,
        batchesWritten: 0,
        staleChunksRemoved: 0,
        failures: [],
      };
      const documents = new Map<string, DocumentState>();
      let pending: PendingChunk[] = [];
      let batchNumber = 0;

      const flush = async (): Promise<void> => {
        if (pending.length === 0) return;
        batchNumber += 1;
        const outcome = await writeBatch(vectorStore, collection, batchNumber, pending);
        applyOutcome(result, outcome, documents, onProgress);
        pending = [];
      };

      for (const file of files) {
        let text: string;
        try {
          text = await readFile(file);
        } catch (error) {
          const message = `Could not read ${file}: ${errorMessage(error)}`;
          onWarning(message);
          result.failures.push({ kind: "read", batch: 0, chunkIds: [], sources: [file], message });
          continue;
        }

        const source: SourceDocument = {
          path: file,
          text,
          fileType: fileTypeOf(file),
          isAgent: isAgentDocument(file, options.agentMode),
        };

        const chunks = toVectorDocuments(source, options, onWarning);
        documents.set(source.path, { chunkCount: chunks.length, failed: false });
        result.documentsProcessed += 1;

        for (const document of chunks) {
          pending.push({ document, source: source.path });
          if (pending.length >= batchSize) await flush();
        }
      }
      await flush();

      for (const [path, state] of documents) {
        if (state.failed) continue;
        try {
          result.staleChunksRemoved += await removeStaleChunks(
            vectorStore,
            collection,
            path,
            state.chunkCount
          );
        } catch (error) {
          if (error instanceof ConnectionError) throw error;
          const message = `Could not remove stale chunks of ${path}: ${errorMessage(error)}`;
          onWarning(message);
          result.failures.push({ kind: "cleanup", batch: 0, chunkIds: [], sources: [path], message });
        }
      }
      if (result.staleChunksRemoved > 0) {
        onProgress(`Removed ${result.staleChunksRemoved} stale chunks`);
      }

      span.setAttributes({
        "ingest.documents": result.documentsProcessed,
        "ingest.chunks_written": result.chunksWritten,
        "ingest.batches_written": result.batchesWritten,
        "ingest.failures": result.failures.length,
        "ingest.stale_removed": result.staleChunksRemoved,
      });

      onProgress(
        `Ingestion complete: ${result.documentsProcessed} documents, ` +
          `${result.chunksWritten} chunks in ${result.batchesWritten} batches, ` +
          `${result.failures.length} failures.`
      );
      return result;
    }
  );
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Chunks a document and attaches metadata to every chunk.
 */
function toVectorDocuments(
  source: SourceDocument,
  options: IngestOptions,
  onWarning: (message: string) => void
): VectorDocument[] {
  let body = source.text;
  let extensions: Record<string, MetadataScalar> = {};

  if (source.isAgent) {
    const extraction = extractAgentAttributes(source.path, source.text, { onWarning });
    body = extraction.body;
    extensions = agentExtensions(extraction.attributes);
  }

  const chunks = chunkDocument({ path: source.path, text: body }, options);
  return chunks.map((chunk) => ({
    id: chunkId(source.path, chunk.index),
    text: chunk.text,
    metadata: flattenMetadata(
      buildChunkMetadata(source.path, chunk.index, chunks.length, extensions)
    ),
  }));
}

/**
 * Writes one batch. Store rejections become a failed outcome; connection
 * loss is rethrown.
 */
async function writeBatch(
  vectorStore: VectorStore,
  collection: string,
  batch: number,
  pending: PendingChunk[]
): Promise<BatchOutcome> {
  try {
    await traceOperation(
      `upsert batch ${batch}`,
      { "ingest.collection": collection, "ingest.batch": batch, "ingest.chunks": pending.length },
      () => vectorStore.store(collection, pending.map((entry) => entry.document))
    );
    return { ok: true, batch, chunks: pending.length };
  } catch (error) {
    if (error instanceof ConnectionError) throw error;
    const failure: BatchFailure = {
      kind: "write",
      batch,
      chunkIds: pending.map((entry) => entry.document.id),
      sources: [...new Set(pending.map((entry) => entry.source))],
      message: errorMessage(error),
    };
    return { ok: false, failure };
  }
}

/**
 * Folds a batch outcome into the running result.
 */
function applyOutcome(
  result: IngestResult,
  outcome: BatchOutcome,
  documents: Map<string, DocumentState>,
  onProgress: (message: string) => void
): void {
  if (outcome.ok) {
    result.batchesWritten += 1;
    result.chunksWritten += outcome.chunks;
    onProgress(`Batch ${outcome.batch} complete (${outcome.chunks} chunks)`);
    return;
  }

  const { failure } = outcome;
  result.failures.push(failure);
  for (const source of failure.sources) {
    const state = documents.get(source);
    if (state) state.failed = true;
  }
  onProgress(
    `Batch ${failure.batch} failed (${failure.chunkIds.length} chunks): ${failure.message}`
  );
}

/**
 * Deletes chunks of `source` with chunkIndex ≥ chunkCount.
 *
 * @returns How many were removed
 */
async function removeStaleChunks(
  vectorStore: VectorStore,
  collection: string,
  source: string,
  chunkCount: number
): Promise<number> {
  const stale = await vectorStore.get(collection, {
    where: {
      $and: [{ source: { $eq: source } }, { chunkIndex: { $gte: chunkCount } }],
    },
    limit: MAX_STALE_LOOKUP,
  });
  if (stale.length === 0) return 0;

  await vectorStore.delete(collection, stale.map((doc) => doc.id));
  return stale.length;
}
