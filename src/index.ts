#!/usr/bin/env node
/**
 * index.ts - CLI entry point for semantic-ingest
 *
 * Commands:
 *
 *   semantic-ingest ingest ./docs --collection code_context
 *     Chunks every matching file under ./docs and upserts the chunks.
 *
 *   semantic-ingest search "how are tokens refreshed" --threshold 1.0
 *     Semantic search over one or more collections.
 *
 *   semantic-ingest rag-query "review my pull request"
 *     Finds the agents best suited to a request.
 *
 *   semantic-ingest audit-agents [--collection agents]
 *   semantic-ingest enrich-collection code_context --dry-run
 *   semantic-ingest info [--collection name]
 *   semantic-ingest list-collections
 *
 * Exit status: 0 on success, 1 on a fatal error (bad configuration, Chroma
 * unreachable, rejected query), 2 when ingestion or enrichment finished but
 * some files or batches failed.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { Command, InvalidArgumentError } from "commander";
import { loadConfig, type AppConfig } from "./config";
import { ConfigError, InvalidQueryError, SemanticIngestError, errorMessage } from "./errors";
import { auditAgents, formatAuditReport } from "./audit";
import {
  enrichCollection,
  ingest,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
} from "./pipeline";
import {
  DEFAULT_AGENT_THRESHOLD,
  Retriever,
  formatAgentMatches,
  formatSearchResults,
  queryAgents,
  type MetadataFilter,
} from "./retrieval";
import {
  AGENTS_COLLECTION,
  ChromaBackend,
  DEFAULT_COLLECTION,
  DEFAULT_EMBEDDING_MODEL,
  StoreClientManager,
  VoyageEmbedding,
  type EmbeddingFunction,
} from "./vectorstore";

/** Exit status when ingestion completed with recorded failures */
const EXIT_PARTIAL_FAILURE = 2;

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

/**
 * Stands in for the embedder in commands that never embed text (info, audit,
 * enrichment, list-collections), so they run without VOYAGE_API_KEY.
 */
const noEmbeddings: EmbeddingFunction = {
  embed: () =>
    Promise.reject(new ConfigError("This command does not configure an embedding model")),
};

/**
 * Builds the store stack from configuration: one client manager, one
 * backend, one retriever.
 */
function connect(config: AppConfig, options: { embeddings: boolean }) {
  const manager = new StoreClientManager(config.store);
  const embedder = options.embeddings
    ? new VoyageEmbedding({ apiKey: config.voyageApiKey, model: config.voyageModel })
    : noEmbeddings;
  const vectorStore = new ChromaBackend(manager, embedder);
  const retriever = new Retriever(vectorStore, { bands: config.bands });
  return { manager, vectorStore, retriever };
}

// ---------------------------------------------------------------------------
// Option parsers
// ---------------------------------------------------------------------------

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number(value);
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Parses --where '{"fileType": ".md"}'. Value checks happen in the
 * retriever, so only the JSON shape is checked here.
 */
function parseWhere(value: string): MetadataFilter {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new InvalidArgumentError(`Not valid JSON: ${errorMessage(error)}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidArgumentError("Expected a JSON object of field → value.");
  }

  const filter: MetadataFilter = {};
  for (const [field, entry] of Object.entries(parsed)) {
    if (Array.isArray(entry)) {
      filter[field] = entry.filter(
        (item): item is string | number | boolean =>
          typeof item === "string" || typeof item === "number" || typeof item === "boolean"
      );
      if (filter[field].length !== entry.length) {
        throw new InvalidArgumentError(`"${field}" may only list strings, numbers or booleans.`);
      }
    } else if (
      typeof entry === "string" ||
      typeof entry === "number" ||
      typeof entry === "boolean"
    ) {
      filter[field] = entry;
    } else {
      throw new InvalidArgumentError(`"${field}" must be a string, number, boolean or list.`);
    }
  }
  return filter;
}

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/**
 * Prints a fatal error with a hint for the common cases and exits 1.
 */
function fail(error: unknown): never {
  if (error instanceof SemanticIngestError) {
    console.error(`\n${error.code}: ${error.message}`);
    if (error.code === "ConnectionError") {
      console.error("Is Chroma running? Check CHROMA_HOST and CHROMA_PORT.");
    }
  } else if (error instanceof RangeError) {
    console.error(`\nInvalid option: ${error.message}`);
  } else {
    console.error(`\nFailed: ${errorMessage(error)}`);
  }
  process.exit(1);
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

interface IngestCommandOptions {
  collection: string;
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  agents?: boolean;
  include?: string[];
  exclude?: string[];
}

interface SearchCommandOptions {
  collection?: string[];
  limit?: number;
  threshold?: number;
  category?: string;
  where?: MetadataFilter;
  dedupe?: boolean;
  json?: boolean;
}

interface AuditCommandOptions {
  collection: string;
  similarity?: number;
  maxCandidates?: number;
  limit?: number;
  json?: boolean;
}

interface EnrichCommandOptions {
  batchSize: number;
  dryRun?: boolean;
  skipExisting: boolean;
}

interface RagQueryCommandOptions {
  collection: string;
  limit?: number;
  threshold: number;
  json?: boolean;
}

async function main() {
  const program = new Command();

  program
    .name("semantic-ingest")
    .description(
      "Chunk and tag documents into Chroma collections, and search them by meaning"
    )
    .version("0.1.0");

  // -------------------------------------------------------------------------
  // ingest: files → chunks → collection
  // -------------------------------------------------------------------------

  program
    .command("ingest")
    .description("Chunk every matching file under <path> and upsert it into a collection")
    .argument("<path>", "Directory (or single file) to ingest")
    .option("-c, --collection <name>", "Target collection", DEFAULT_COLLECTION)
    .option("--chunk-size <chars>", "Maximum characters per chunk", parseInteger, DEFAULT_CHUNK_SIZE)
    .option(
      "--chunk-overlap <chars>",
      "Characters shared by consecutive chunks",
      parseInteger,
      DEFAULT_CHUNK_OVERLAP
    )
    .option("--batch-size <n>", "Chunks per upsert (1-5000)", parseInteger, DEFAULT_BATCH_SIZE)
    .option("--agents", "Treat every .md file as an agent definition")
    .option("--include <glob>", "Include pattern (repeatable)", collect)
    .option("--exclude <glob>", "Exclude pattern (repeatable)", collect)
    .action(async (sourcePath: string, options: IngestCommandOptions) => {
      try {
        const config = loadConfig();
        const { vectorStore } = connect(config, { embeddings: true });

        console.log(`\nIngesting ${sourcePath} into "${options.collection}"...\n`); // eslint-disable-line no-console

        const result = await ingest({
          sourcePath,
          collection: options.collection,
          chunkSize: options.chunkSize,
          chunkOverlap: options.chunkOverlap,
          batchSize: options.batchSize,
          agentMode: options.agents,
          include: options.include,
          exclude: options.exclude,
          vectorStore,
        });

        if (result.failures.length > 0) {
          console.error(`\n${result.failures.length} failures:`);
          for (const failure of result.failures) {
            const where = failure.kind === "write" ? `batch ${failure.batch}` : failure.kind;
            console.error(`  [${where}] ${failure.sources.join(", ")}: ${failure.message}`);
          }
          process.exitCode = EXIT_PARTIAL_FAILURE;
        }
      } catch (error) {
        fail(error);
      }
    });

  // -------------------------------------------------------------------------
  // search: query one or more collections
  // -------------------------------------------------------------------------

  program
    .command("search")
    .description("Search collections by meaning")
    .argument("<query>", "Natural language query")
    .option("-c, --collection <name>", "Collection to search (repeatable)", collect)
    .option("-n, --limit <n>", "Maximum results", parseInteger)
    .option("-t, --threshold <distance>", "Drop results farther than this", parseNumber)
    .option("--category <name>", "Only agent documents of this category")
    .option("--where <json>", "Metadata filter as JSON", parseWhere)
    .option("--dedupe", "One result per source document")
    .option("--json", "Print results as JSON")
    .action(async (query: string, options: SearchCommandOptions) => {
      try {
        const config = loadConfig();
        const { retriever } = connect(config, { embeddings: true });
        const collections = options.collection?.length
          ? options.collection
          : [DEFAULT_COLLECTION];

        if (options.category !== undefined && !options.category.trim()) {
          throw new InvalidQueryError("Category must not be empty");
        }
        const where: MetadataFilter | undefined = options.category
          ? { ...options.where, category: options.category.trim().toLowerCase() }
          : options.where;

        const queryOptions = {
          limit: options.limit,
          distanceThreshold: options.threshold,
          dedupe: options.dedupe,
          where,
        };
        const results =
          collections.length === 1
            ? await retriever.search(query, collections[0], queryOptions)
            : await retriever.searchMany(query, collections, queryOptions);

        if (options.json) {
          console.log(JSON.stringify(results, null, 2)); // eslint-disable-line no-console
        } else {
          console.log(formatSearchResults(results, collections.join(", "))); // eslint-disable-line no-console
        }
      } catch (error) {
        fail(error);
      }
    });

  // -------------------------------------------------------------------------
  // rag-query: which agents fit a request
  // -------------------------------------------------------------------------

  program
    .command("rag-query")
    .description("Find the agents best suited to a request")
    .argument("<query>", "What you need done")
    .option("-c, --collection <name>", "Agent collection", AGENTS_COLLECTION)
    .option("-n, --limit <n>", "Maximum agents", parseInteger)
    .option(
      "-t, --threshold <distance>",
      "Preferred maximum distance",
      parseNumber,
      DEFAULT_AGENT_THRESHOLD
    )
    .option("--json", "Print the result as JSON")
    .action(async (query: string, options: RagQueryCommandOptions) => {
      try {
        const config = loadConfig();
        const { retriever } = connect(config, { embeddings: true });
        const result = await queryAgents(retriever, query, {
          collection: options.collection,
          limit: options.limit,
          threshold: options.threshold,
        });

        if (options.json) {
          console.log(JSON.stringify(result, null, 2)); // eslint-disable-line no-console
        } else {
          console.log(formatAgentMatches(result)); // eslint-disable-line no-console
        }
      } catch (error) {
        fail(error);
      }
    });

  // -------------------------------------------------------------------------
  // audit-agents / enrich-collection: metadata only, no embedding key needed
  // -------------------------------------------------------------------------

  program
    .command("audit-agents")
    .description("Report category coverage and overlapping agents in a collection")
    .option("-c, --collection <name>", "Agent collection", AGENTS_COLLECTION)
    .option("--similarity <0-1>", "Minimum tech stack overlap for a candidate pair", parseNumber)
    .option("--max-candidates <n>", "Most consolidation candidates listed", parseInteger)
    .option("--limit <n>", "Most chunks read", parseInteger)
    .option("--json", "Print the audit as JSON")
    .action(async (options: AuditCommandOptions) => {
      try {
        const config = loadConfig();
        const { vectorStore } = connect(config, { embeddings: false });
        const summary = await auditAgents({
          collection: options.collection,
          vectorStore,
          similarityThreshold: options.similarity,
          maxCandidates: options.maxCandidates,
          limit: options.limit,
        });

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2)); // eslint-disable-line no-console
        } else {
          console.log(formatAuditReport(summary)); // eslint-disable-line no-console
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("enrich-collection")
    .description("Infer category, tech stack and description for chunks stored without them")
    .argument("<collection>", "Collection to enrich")
    .option("--batch-size <n>", "Chunks per round-trip (1-5000)", parseInteger, DEFAULT_BATCH_SIZE)
    .option("--dry-run", "Count what would change without writing")
    .option("--no-skip-existing", "Re-infer chunks that already have a category")
    .action(async (collection: string, options: EnrichCommandOptions) => {
      try {
        const config = loadConfig();
        const { vectorStore } = connect(config, { embeddings: false });
        const result = await enrichCollection({
          collection,
          vectorStore,
          batchSize: options.batchSize,
          dryRun: options.dryRun,
          skipExisting: options.skipExisting,
        });

        if (result.failures.length > 0) {
          console.error(`\n${result.failures.length} failed batches:`);
          for (const failure of result.failures) {
            console.error(`  [batch ${failure.batch}] ${failure.ids.length} chunks: ${failure.message}`);
          }
          process.exitCode = EXIT_PARTIAL_FAILURE;
        }
      } catch (error) {
        fail(error);
      }
    });

  // -------------------------------------------------------------------------
  // info / list-collections
  // -------------------------------------------------------------------------

  program
    .command("info")
    .description("Show connection settings and the size of a collection")
    .option("-c, --collection <name>", "Collection to count", DEFAULT_COLLECTION)
    .action(async (options: { collection: string }) => {
      try {
        const config = loadConfig();
        const { manager, retriever } = connect(config, { embeddings: false });
        const summary = await retriever.collectionInfo(options.collection);

        /* eslint-disable no-console */
        console.log(`Chroma:          ${manager.address}`);
        console.log(`Embedding model: ${config.voyageModel ?? DEFAULT_EMBEDDING_MODEL}`);
        console.log(`Distance bands:  ${config.bands.join(", ")}`);
        console.log(`Collection:      ${summary.name} (${summary.count} chunks)`);
        /* eslint-enable no-console */
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("list-collections")
    .description("List every collection with its chunk count")
    .action(async () => {
      try {
        const config = loadConfig();
        const { retriever } = connect(config, { embeddings: false });
        const collections = await retriever.listCollections();

        if (collections.length === 0) {
          console.log("No collections."); // eslint-disable-line no-console
          return;
        }
        for (const { name, count } of collections) {
          console.log(`${name}\t${count}`); // eslint-disable-line no-console
        }
      } catch (error) {
        fail(error);
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Error:", errorMessage(error));
  process.exit(1);
});
