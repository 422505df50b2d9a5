/**
 * enrich.ts - Back-fills agent metadata on chunks stored without it
 *
 * Chunks ingested without agent mode, or from a document whose header could
 * not be parsed, carry no category, tech stack or description. Category
 * filters and the agent audit cannot see them.
 *
 * enrichCollection() pages through a collection, infers those fields from
 * each chunk's own text with the keyword tables ingestion uses, and rewrites
 * the metadata in place. Nothing is re-embedded, so enrichment needs no
 * embedding key.
 *
 * Enriched chunks are marked with enriched: true and an enrichmentConfidence
 * between 0 and 1.
 */

import { ConnectionError, errorMessage } from "../errors";
import { traceOperation } from "../tracing/spans";
import type { MetadataMap, MetadataUpdate, VectorStore } from "../vectorstore";
import {
  detectTechStack,
  loadKeywordTables,
  matchCategory,
  type KeywordTables,
} from "./frontmatter";
import { DEFAULT_BATCH_SIZE, MAX_BATCH_SIZE } from "./ingest";

/** Longest inferred description */
export const DESCRIPTION_LENGTH = 200;

/** Most tech keywords kept per chunk */
const MAX_INFERRED_TECH = 10;

/**
 * Fields inferred from a chunk, each with a 0–1 confidence.
 */
export interface InferredAttributes {
  category: string;
  techStack: string[];
  description: string;
  confidence: {
    category: number;
    techStack: number;
    description: number;
    /** Mean of the three */
    overall: number;
  };
}

export interface EnrichFailure {
  /** 1-based batch number */
  batch: number;
  ids: string[];
  message: string;
}

export interface EnrichResult {
  collection: string;
  /** Collection size when the run started */
  totalDocuments: number;
  processed: number;
  /** Chunks updated, or that would be updated in a dry run */
  enriched: number;
  skipped: number;
  failures: EnrichFailure[];
  dryRun: boolean;
}

export interface EnrichOptions {
  collection: string;
  vectorStore: VectorStore;
  /** Chunks fetched and updated per round-trip (default 100, allowed 1–5000) */
  batchSize?: number;
  /** Infer and count, but write nothing */
  dryRun?: boolean;
  /** Leave chunks that already have a category alone (default true) */
  skipExisting?: boolean;
  /** Defaults to stdout */
  onProgress?: (message: string) => void;
  tables?: KeywordTables;
}

/**
 * Summary text from the lines after a document's first line, skipping
 * headings and blank lines.
 */
export function inferDescription(text: string, maxLength = DESCRIPTION_LENGTH): string {
  const lines: string[] = [];
  for (const raw of text.split("\n").slice(1)) {
    const line = raw.trim();
    if (line && !line.startsWith("#")) lines.push(line);
    if (lines.join("\n").length > maxLength) break;
  }
  return lines.join(" ").slice(0, maxLength).trim();
}

/**
 * Infers category, tech stack and description for one chunk.
 *
 * Category confidence is the share of the winning category's keywords that
 * matched, capped at 0.99; tech stack confidence grows with the number of
 * keywords found; description confidence with its length.
 */
export function inferAttributes(
  filename: string,
  text: string,
  tables: KeywordTables = loadKeywordTables()
): InferredAttributes {
  const match = matchCategory(filename, text, tables);
  const techStack = detectTechStack(text, tables).slice(0, MAX_INFERRED_TECH);
  const description = inferDescription(text);

  const category = match.keywords > 0 ? Math.min(match.matched / match.keywords, 0.99) : 0;
  const tech = Math.min(techStack.length / MAX_INFERRED_TECH, 1);
  const desc = Math.min(description.length / DESCRIPTION_LENGTH, 1);

  return {
    category: match.category,
    techStack,
    description,
    confidence: {
      category,
      techStack: tech,
      description: desc,
      overall: (category + tech + desc) / 3,
    },
  };
}

function hasCategory(metadata: MetadataMap): boolean {
  const category = metadata.category;
  return typeof category === "string" && category.trim() !== "";
}

/**
 * Infers missing agent metadata for every chunk in a collection.
 *
 * @throws RangeError for an invalid batch size, synchronously
 * @throws ConnectionError (as a rejection) when the store is unreachable;
 *   other update failures are recorded per batch
 */
export function enrichCollection(options: EnrichOptions): Promise<EnrichResult> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_BATCH_SIZE) {
    throw new RangeError(
      `batchSize must be an integer between 1 and ${MAX_BATCH_SIZE}, got ${batchSize}`
    );
  }
  const { collection, vectorStore } = options;
  const dryRun = options.dryRun ?? false;
  const skipExisting = options.skipExisting ?? true;
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const tables = options.tables ?? loadKeywordTables();

  return traceOperation(
    `enrich ${collection}`,
    { "enrich.collection": collection, "enrich.batch_size": batchSize, "enrich.dry_run": dryRun },
    async (span) => {
      const totalDocuments = await vectorStore.count(collection);
      onProgress(`Enriching "${collection}" (${totalDocuments} chunks)`);

      const result: EnrichResult = {
        collection,
        totalDocuments,
        processed: 0,
        enriched: 0,
        skipped: 0,
        failures: [],
        dryRun,
      };

      for (let offset = 0, batch = 1; offset < totalDocuments; offset += batchSize, batch++) {
        const documents = await vectorStore.get(collection, { limit: batchSize, offset });
        if (documents.length === 0) break;

        const updates: MetadataUpdate[] = [];
        for (const document of documents) {
          result.processed += 1;
          if (skipExisting && hasCategory(document.metadata)) {
            result.skipped += 1;
            continue;
          }
          const filename = document.metadata.filename;
          const inferred = inferAttributes(
            typeof filename === "string" ? filename : "",
            document.text,
            tables
          );
          updates.push({
            id: document.id,
            metadata: {
              ...document.metadata,
              category: inferred.category,
              techStack: inferred.techStack.join(","),
              description: inferred.description,
              enrichmentConfidence: Math.round(inferred.confidence.overall * 100) / 100,
              enriched: true,
            },
          });
        }

        if (updates.length === 0) continue;
        if (dryRun) {
          result.enriched += updates.length;
          continue;
        }

        try {
          await vectorStore.updateMetadata(collection, updates);
          result.enriched += updates.length;
          onProgress(`Batch ${batch} enriched (${updates.length} chunks)`);
        } catch (error) {
          if (error instanceof ConnectionError) throw error;
          const message = errorMessage(error);
          result.failures.push({ batch, ids: updates.map((update) => update.id), message });
          onProgress(`Batch ${batch} failed (${updates.length} chunks): ${message}`);
        }
      }

      span.setAttributes({
        "enrich.processed": result.processed,
        "enrich.enriched": result.enriched,
        "enrich.skipped": result.skipped,
        "enrich.failures": result.failures.length,
      });
      onProgress(
        `${dryRun ? "Dry run complete" : "Enrichment complete"}: ` +
          `${result.enriched} enriched, ${result.skipped} skipped, ` +
          `${result.failures.length} failed batches.`
      );
      return result;
    }
  );
}
