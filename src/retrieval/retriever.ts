/**
 * retriever.ts - Similarity search over one or more collections
 *
 * What this file does:
 * Sits between callers (CLI, MCP tools) and the VectorStore. The store
 * returns raw nearest neighbours; the retriever turns them into an ordered,
 * filtered, labelled result list:
 *
 *   validate → fetch → sort by distance → threshold → dedupe → truncate → label
 *
 * Ordering:
 * Results are sorted ascending by distance with a stable sort, so entries at
 * the same distance keep the order the store returned them in. Across
 * collections, ties go to the collection listed first.
 *
 * Threshold vs. quality:
 * distanceThreshold removes results (distance > threshold). The quality
 * tier on each result is only a label from the calibration bands and never
 * removes anything.
 */

import { InvalidQueryError } from "../errors";
import { traceOperation } from "../tracing/spans";
import type {
  CollectionSummary,
  SearchResult,
  VectorDocument,
  VectorStore,
} from "../vectorstore";
import {
  DEFAULT_DISTANCE_BANDS,
  classifyDistance,
  type DistanceBands,
  type QualityTier,
} from "./calibration";
import { validateQuery, type QueryOptions, type ValidatedQuery } from "./query";

/**
 * A search result with its calibration tier and origin collection.
 */
export interface RetrievalResult extends SearchResult {
  quality: QualityTier;
  collection: string;
}

export interface RetrieverOptions {
  /** Calibration band edges (default 0.8 / 1.0 / 1.2) */
  bands?: DistanceBands;
}

/** Candidates fetched per requested result on the first deduplicating query */
const DEDUPE_OVERFETCH = 3;

/** Most candidates a deduplicating search asks one collection for */
export const MAX_DEDUPE_FETCH = 10_000;

/** Returned by getContext when nothing matches */
export const NO_CONTEXT = "No relevant context found.";

type Candidate = SearchResult & { collection: string };

export class Retriever {
  private readonly vectorStore: VectorStore;
  private readonly bands: DistanceBands;

  constructor(vectorStore: VectorStore, options: RetrieverOptions = {}) {
    this.vectorStore = vectorStore;
    this.bands = options.bands ?? DEFAULT_DISTANCE_BANDS;
  }

  /**
   * Searches one collection.
   *
   * @throws InvalidQueryError before any store call when the request is malformed
   */
  async search(
    text: string,
    collection: string,
    options: QueryOptions = {}
  ): Promise<RetrievalResult[]> {
    const query = validateQuery(text, options);
    requireCollection(collection);

    return traceOperation(
      `search ${collection}`,
      searchAttributes([collection], query),
      async (span) => {
        const candidates = await this.fetch(collection, query);
        const results = this.rank(candidates, query);
        span.setAttribute("search.results", results.length);
        return results;
      }
    );
  }

  /**
   * Searches several collections concurrently and merges by distance.
   */
  async searchMany(
    text: string,
    collections: string[],
    options: QueryOptions = {}
  ): Promise<RetrievalResult[]> {
    const query = validateQuery(text, options);
    if (collections.length === 0) {
      throw new InvalidQueryError("At least one collection is required");
    }
    collections.forEach(requireCollection);

    return traceOperation(
      `search ${collections.join(",")}`,
      searchAttributes(collections, query),
      async (span) => {
        const perCollection = await Promise.all(
          collections.map((collection) => this.fetch(collection, query))
        );
        const results = this.rank(perCollection.flat(), query);
        span.setAttribute("search.results", results.length);
        return results;
      }
    );
  }

  /**
   * Searches several collections and keeps each collection's results apart.
   */
  async searchEach(
    text: string,
    collections: string[],
    options: QueryOptions = {}
  ): Promise<Record<string, RetrievalResult[]>> {
    validateQuery(text, options);
    collections.forEach(requireCollection);

    const lists = await Promise.all(
      collections.map((collection) => this.search(text, collection, options))
    );
    const byCollection: Record<string, RetrievalResult[]> = {};
    collections.forEach((collection, i) => {
      byCollection[collection] = lists[i];
    });
    return byCollection;
  }

  /**
   * Searches agent documents of one category.
   */
  searchByCategory(
    text: string,
    collection: string,
    category: string,
    options: QueryOptions = {}
  ): Promise<RetrievalResult[]> {
    if (!category.trim()) {
      return Promise.reject(new InvalidQueryError("Category must not be empty"));
    }
    return this.search(text, collection, {
      ...options,
      where: { ...options.where, category: category.trim().toLowerCase() },
    });
  }

  /**
   * Search results as one text block for prompt context:
   *
   *   --- Source: /repo/docs/auth.md ---
   *   <chunk text>
   *
   * Returns NO_CONTEXT when nothing matches.
   */
  async getContext(
    text: string,
    collection: string,
    options: QueryOptions = {}
  ): Promise<string> {
    const results = await this.search(text, collection, options);
    if (results.length === 0) return NO_CONTEXT;

    return results
      .map((result) => {
        const source = result.metadata.source ?? result.metadata.filename ?? "unknown";
        return `--- Source: ${source} ---\n${result.text}`;
      })
      .join("\n\n");
  }

  /**
   * All stored chunks of one document, in chunk order.
   *
   * @param source - Absolute path as stored, or a bare filename
   */
  async getBySource(collection: string, source: string): Promise<VectorDocument[]> {
    requireCollection(collection);
    if (!source.trim()) {
      throw new InvalidQueryError("Source must not be empty");
    }

    const field = source.includes("/") || source.includes("\\") ? "source" : "filename";
    const documents = await this.vectorStore.get(collection, { where: { [field]: source } });
    return [...documents].sort(
      (a, b) => chunkIndexOf(a) - chunkIndexOf(b) || a.id.localeCompare(b.id)
    );
  }

  async collectionInfo(collection: string): Promise<CollectionSummary> {
    requireCollection(collection);
    return { name: collection, count: await this.vectorStore.count(collection) };
  }

  listCollections(options?: { limit?: number; offset?: number }): Promise<CollectionSummary[]> {
    return this.vectorStore.listCollections(options);
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  /**
   * Nearest neighbours from one collection.
   *
   * When deduplicating, a page that is full but holds fewer than `limit`
   * distinct sources is fetched again at twice the size, until enough
   * sources show up, the collection runs out, or MAX_DEDUPE_FETCH is reached.
   */
  private async fetch(collection: string, query: ValidatedQuery): Promise<Candidate[]> {
    let nResults = query.dedupe
      ? Math.min(query.limit * DEDUPE_OVERFETCH, MAX_DEDUPE_FETCH)
      : query.limit;

    for (;;) {
      const results = await this.vectorStore.search(collection, query.text, {
        nResults,
        ...(query.where ? { where: query.where } : {}),
      });
      const exhausted = results.length < nResults || nResults >= MAX_DEDUPE_FETCH;
      if (!query.dedupe || exhausted || distinctSources(results, query) >= query.limit) {
        return results.map((result) => ({ ...result, collection }));
      }
      nResults = Math.min(nResults * 2, MAX_DEDUPE_FETCH);
    }
  }

  private rank(candidates: Candidate[], query: ValidatedQuery): RetrievalResult[] {
    // Array.prototype.sort is stable
    let ranked = [...candidates].sort((a, b) => a.distance - b.distance);

    const threshold = query.distanceThreshold;
    if (threshold !== undefined) {
      ranked = ranked.filter((result) => result.distance <= threshold);
    }

    if (query.dedupe) {
      const seen = new Set<string>();
      ranked = ranked.filter((result) => {
        const key = sourceKey(result);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }

    return ranked.slice(0, query.limit).map((result) => ({
      ...result,
      quality: classifyDistance(result.distance, this.bands),
    }));
  }
}

function requireCollection(collection: string): void {
  if (!collection.trim()) {
    throw new InvalidQueryError("Collection name must not be empty");
  }
}

function sourceKey(result: SearchResult): string {
  return String(result.metadata.source ?? result.id);
}

/**
 * Distinct sources among the results that pass the distance threshold.
 */
function distinctSources(results: SearchResult[], query: ValidatedQuery): number {
  const threshold = query.distanceThreshold;
  const sources = new Set<string>();
  for (const result of results) {
    if (threshold === undefined || result.distance <= threshold) sources.add(sourceKey(result));
  }
  return sources.size;
}

function chunkIndexOf(document: VectorDocument): number {
  const index = document.metadata.chunkIndex;
  return typeof index === "number" ? index : Number.MAX_SAFE_INTEGER;
}

function searchAttributes(collections: string[], query: ValidatedQuery) {
  return {
    "search.collections": collections.join(","),
    "search.limit": query.limit,
    "search.dedupe": query.dedupe,
    "search.filtered": query.where !== undefined,
    ...(query.distanceThreshold !== undefined
      ? { "search.distance_threshold": query.distanceThreshold }
      : {}),
  };
}
