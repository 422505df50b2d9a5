/**
 * ingest.test.ts - Unit tests for the ingestion coordinator
 *
 * Runs ingest() against an in-memory VectorStore that keeps documents per
 * collection and evaluates the handful of where operators ingestion uses.
 * Files come from a plain object through the injectable readFile/listFiles.
 */

import { describe, it, expect, vi } from "vitest";
import { ConnectionError } from "../errors";
import type {
  CollectionSummary,
  GetOptions,
  MetadataMap,
  MetadataUpdate,
  SearchResult,
  VectorDocument,
  VectorStore,
  WhereFilter,
} from "../vectorstore";
import { ingest } from "./ingest";
import type { IngestOptions } from "./types";

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function matches(metadata: MetadataMap, where: WhereFilter): boolean {
  for (const [key, condition] of Object.entries(where)) {
    if (key === "$and") {
      if (!Array.isArray(condition)) return false;
      if (!condition.every((part) => isRecord(part) && matches(metadata, part))) return false;
      continue;
    }
    const value = metadata[key];
    if (!isRecord(condition)) {
      if (value !== condition) return false;
      continue;
    }
    if ("$eq" in condition && value !== condition.$eq) return false;
    if ("$gte" in condition) {
      const bound = condition.$gte;
      if (typeof value !== "number" || typeof bound !== "number" || value < bound) return false;
    }
  }
  return true;
}

class InMemoryVectorStore implements VectorStore {
  readonly collections = new Map<string, Map<string, VectorDocument>>();

  async initialize(collection: string): Promise<void> {
    if (!this.collections.has(collection)) this.collections.set(collection, new Map());
  }

  async store(collection: string, documents: VectorDocument[]): Promise<void> {
    const entries = this.entries(collection);
    for (const doc of documents) entries.set(doc.id, doc);
  }

  async search(): Promise<SearchResult[]> {
    return [];
  }

  async get(collection: string, options: GetOptions = {}): Promise<VectorDocument[]> {
    const where = options.where;
    return [...this.entries(collection).values()].filter(
      (doc) => !where || matches(doc.metadata, where)
    );
  }

  async updateMetadata(collection: string, updates: MetadataUpdate[]): Promise<void> {
    const entries = this.entries(collection);
    for (const { id, metadata } of updates) {
      const doc = entries.get(id);
      if (doc) entries.set(id, { ...doc, metadata });
    }
  }

  async delete(collection: string, ids: string[]): Promise<void> {
    const entries = this.entries(collection);
    for (const id of ids) entries.delete(id);
  }

  async count(collection: string): Promise<number> {
    return this.entries(collection).size;
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return [...this.collections].map(([name, entries]) => ({ name, count: entries.size }));
  }

  ids(collection: string): string[] {
    return [...this.entries(collection).keys()].sort();
  }

  private entries(collection: string): Map<string, VectorDocument> {
    const entries = this.collections.get(collection);
    if (!entries) throw new Error(`Collection "${collection}" does not exist`);
    return entries;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function options(
  vectorStore: VectorStore,
  files: Record<string, string>,
  overrides: Partial<IngestOptions> = {}
): IngestOptions {
  return {
    sourcePath: "/docs",
    collection: "docs",
    chunkSize: 100,
    chunkOverlap: 0,
    vectorStore,
    onProgress: () => {},
    onWarning: () => {},
    listFiles: async () => Object.keys(files).sort(),
    readFile: async (path) => {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return text;
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ingest", () => {
  it("writes every chunk with deterministic ids", async () => {
    const store = new InMemoryVectorStore();
    const files = { "/docs/a.md": "a".repeat(250), "/docs/b.txt": "hello" };

    const result = await ingest(options(store, files));

    expect(result).toEqual({
      documentsProcessed: 2,
      chunksWritten: 4,
      batchesWritten: 1,
      staleChunksRemoved: 0,
      failures: [],
    });
    expect(store.ids("docs")).toEqual([
      "/docs/a.md:0",
      "/docs/a.md:1",
      "/docs/a.md:2",
      "/docs/b.txt:0",
    ]);
  });

  it("stores chunk metadata", async () => {
    const store = new InMemoryVectorStore();
    await ingest(options(store, { "/docs/guides/b.txt": "hello" }));

    const [doc] = await store.get("docs");
    expect(doc).toEqual({
      id: "/docs/guides/b.txt:0",
      text: "hello",
      metadata: {
        source: "/docs/guides/b.txt",
        filename: "b.txt",
        folder: "guides",
        fileType: ".txt",
        chunkIndex: 0,
        totalChunks: 1,
      },
    });
  });

  it("is idempotent when re-run on unchanged files", async () => {
    const store = new InMemoryVectorStore();
    const files = { "/docs/a.md": "a".repeat(250), "/docs/b.txt": "hello" };

    await ingest(options(store, files));
    const second = await ingest(options(store, files));

    expect(await store.count("docs")).toBe(4);
    expect(second.staleChunksRemoved).toBe(0);
  });

  it("removes chunks left over from a longer version of a file", async () => {
    const store = new InMemoryVectorStore();
    await ingest(options(store, { "/docs/a.md": "a".repeat(250) }));

    const result = await ingest(options(store, { "/docs/a.md": "a".repeat(150) }));

    expect(result.staleChunksRemoved).toBe(1);
    expect(store.ids("docs")).toEqual(["/docs/a.md:0", "/docs/a.md:1"]);
  });

  it("removes every chunk of a file that became empty", async () => {
    const store = new InMemoryVectorStore();
    await ingest(options(store, { "/docs/a.md": "a".repeat(250), "/docs/b.txt": "hello" }));

    const result = await ingest(options(store, { "/docs/a.md": "", "/docs/b.txt": "hello" }));

    expect(result.staleChunksRemoved).toBe(3);
    expect(store.ids("docs")).toEqual(["/docs/b.txt:0"]);
  });

  it("records a failed batch and keeps going", async () => {
    const store = new InMemoryVectorStore();
    const storeSpy = vi.spyOn(store, "store");
    storeSpy.mockRejectedValueOnce(new Error("quota exceeded"));
    const files = { "/docs/a.md": "a".repeat(250), "/docs/b.txt": "hello" };

    const result = await ingest(options(store, files, { batchSize: 2 }));

    expect(result.failures).toEqual([
      {
        kind: "write",
        batch: 1,
        chunkIds: ["/docs/a.md:0", "/docs/a.md:1"],
        sources: ["/docs/a.md"],
        message: "quota exceeded",
      },
    ]);
    expect(result.batchesWritten).toBe(1);
    expect(result.chunksWritten).toBe(2);
    expect(store.ids("docs")).toEqual(["/docs/a.md:2", "/docs/b.txt:0"]);
  });

  it("skips stale cleanup for a document with a failed batch", async () => {
    const store = new InMemoryVectorStore();
    await ingest(options(store, { "/docs/a.md": "a".repeat(350) }));

    vi.spyOn(store, "store").mockRejectedValueOnce(new Error("quota exceeded"));
    const result = await ingest(options(store, { "/docs/a.md": "a".repeat(150) }));

    expect(result.staleChunksRemoved).toBe(0);
    expect(await store.count("docs")).toBe(4);
  });

  it("records a failed stale-chunk cleanup and still returns the result", async () => {
    const store = new InMemoryVectorStore();
    vi.spyOn(store, "get").mockRejectedValueOnce(new Error("Chroma HTTP 500"));
    const onWarning = vi.fn();

    const result = await ingest(options(store, { "/docs/a.md": "a".repeat(250) }, { onWarning }));

    expect(result).toEqual({
      documentsProcessed: 1,
      chunksWritten: 3,
      batchesWritten: 1,
      staleChunksRemoved: 0,
      failures: [
        {
          kind: "cleanup",
          batch: 0,
          chunkIds: [],
          sources: ["/docs/a.md"],
          message: "Could not remove stale chunks of /docs/a.md: Chroma HTTP 500",
        },
      ],
    });
    expect(onWarning).toHaveBeenCalledWith(
      "Could not remove stale chunks of /docs/a.md: Chroma HTTP 500"
    );
    expect(await store.count("docs")).toBe(3);
  });

  it("keeps cleaning up other documents after one cleanup fails", async () => {
    const store = new InMemoryVectorStore();
    const files = { "/docs/a.md": "a".repeat(250), "/docs/b.md": "b".repeat(250) };
    await ingest(options(store, files));
    vi.spyOn(store, "delete").mockRejectedValueOnce(new Error("Chroma HTTP 500"));

    const result = await ingest(
      options(store, { "/docs/a.md": "a".repeat(150), "/docs/b.md": "b".repeat(150) })
    );

    expect(result.failures.map((f) => [f.kind, f.sources])).toEqual([["cleanup", ["/docs/a.md"]]]);
    expect(result.staleChunksRemoved).toBe(1);
    expect(store.ids("docs")).toEqual([
      "/docs/a.md:0",
      "/docs/a.md:1",
      "/docs/a.md:2",
      "/docs/b.md:0",
      "/docs/b.md:1",
    ]);
  });

  it("aborts when stale-chunk cleanup loses the connection", async () => {
    const store = new InMemoryVectorStore();
    vi.spyOn(store, "get").mockRejectedValueOnce(new ConnectionError("Chroma is down"));

    await expect(ingest(options(store, { "/docs/b.txt": "hello" }))).rejects.toBeInstanceOf(
      ConnectionError
    );
  });

  it("aborts on a connection error", async () => {
    const store = new InMemoryVectorStore();
    vi.spyOn(store, "store").mockRejectedValueOnce(new ConnectionError("Chroma is down"));

    await expect(ingest(options(store, { "/docs/b.txt": "hello" }))).rejects.toBeInstanceOf(
      ConnectionError
    );
  });

  it("does not look for files when the collection cannot be opened", async () => {
    const store = new InMemoryVectorStore();
    vi.spyOn(store, "initialize").mockRejectedValueOnce(new ConnectionError("Chroma is down"));
    const listFiles = vi.fn().mockResolvedValue([]);

    await expect(ingest(options(store, {}, { listFiles }))).rejects.toThrow("Chroma is down");
    expect(listFiles).not.toHaveBeenCalled();
  });

  it("records unreadable files and ingests the rest", async () => {
    const store = new InMemoryVectorStore();
    const onWarning = vi.fn();
    const opts = options(store, { "/docs/b.txt": "hello" }, {
      onWarning,
      listFiles: async () => ["/docs/b.txt", "/docs/missing.md"],
    });

    const result = await ingest(opts);

    expect(result.documentsProcessed).toBe(1);
    expect(result.failures).toEqual([
      {
        kind: "read",
        batch: 0,
        chunkIds: [],
        sources: ["/docs/missing.md"],
        message: "Could not read /docs/missing.md: ENOENT: /docs/missing.md",
      },
    ]);
    expect(onWarning).toHaveBeenCalledWith(
      "Could not read /docs/missing.md: ENOENT: /docs/missing.md"
    );
  });

  it("extracts agent attributes into metadata and chunks only the body", async () => {
    const store = new InMemoryVectorStore();
    const text = "---\nname: reviewer\nmodel: sonnet\ncategory: quality\n---\nReview pull requests.";

    await ingest(options(store, { "/agents/reviewer.agent.md": text }));

    const [doc] = await store.get("docs");
    expect(doc.id).toBe("/agents/reviewer.agent.md:0");
    expect(doc.text).toBe("Review pull requests.");
    expect(doc.metadata).toMatchObject({
      agentName: "reviewer",
      model: "sonnet",
      category: "quality",
      complexity: "low",
      fileType: ".md",
    });
  });

  it("stores an agent document with a malformed header as plain chunks", async () => {
    const store = new InMemoryVectorStore();
    const onWarning = vi.fn();
    const text = "---\nname: [unclosed\n---\nReview pull requests.";

    const result = await ingest(
      options(store, { "/agents/broken.agent.md": text }, { onWarning })
    );

    expect(result.failures).toEqual([]);
    expect(await store.get("docs")).toEqual([
      {
        id: "/agents/broken.agent.md:0",
        text,
        metadata: {
          source: "/agents/broken.agent.md",
          filename: "broken.agent.md",
          folder: "agents",
          fileType: ".md",
          chunkIndex: 0,
          totalChunks: 1,
          agentName: "",
          description: "",
          model: "",
          category: "",
          complexity: "",
          techStack: "",
          languages: "",
          tools: "",
        },
      },
    ]);
    expect(onWarning).toHaveBeenCalledTimes(1);
    expect(onWarning.mock.calls[0][0]).toMatch(
      /^Malformed frontmatter in \/agents\/broken\.agent\.md: invalid YAML/
    );
  });

  it("reports progress per batch", async () => {
    const store = new InMemoryVectorStore();
    const onProgress = vi.fn();

    await ingest(options(store, { "/docs/a.md": "a".repeat(250) }, { onProgress, batchSize: 2 }));

    expect(onProgress).toHaveBeenCalledWith("Batch 1 complete (2 chunks)");
    expect(onProgress).toHaveBeenCalledWith("Batch 2 complete (1 chunks)");
  });

  it("rejects invalid options before touching the store", () => {
    const store = new InMemoryVectorStore();
    const initialize = vi.spyOn(store, "initialize");

    expect(() => ingest(options(store, {}, { chunkOverlap: 100 }))).toThrow(RangeError);
    expect(() => ingest(options(store, {}, { batchSize: 0 }))).toThrow(RangeError);
    expect(() => ingest(options(store, {}, { batchSize: 5001 }))).toThrow(RangeError);
    expect(initialize).not.toHaveBeenCalled();
  });
});
