/**
 * agent-query.test.ts - Unit tests for agent lookups
 */

import { describe, it, expect, vi } from "vitest";
import { InvalidQueryError } from "../errors";
import type { SearchOptions, SearchResult, VectorDocument, VectorStore } from "../vectorstore";
import { formatAgentMatches, queryAgents } from "./agent-query";
import { Retriever } from "./retriever";

function agentHit(name: string, distance: number, text = `${name} reviews code.`): SearchResult {
  return {
    id: `/agents/${name}.md:0`,
    text,
    metadata: { source: `/agents/${name}.md`, agentName: name, filename: `${name}.md` },
    distance,
  };
}

function fakeStore(results: SearchResult[]) {
  return {
    initialize: vi.fn().mockResolvedValue(undefined),
    store: vi.fn().mockResolvedValue(undefined),
    search: vi.fn(async (_collection: string, _text: string, _options?: SearchOptions) => results),
    get: vi.fn(async (): Promise<VectorDocument[]> => []),
    updateMetadata: vi.fn().mockResolvedValue(undefined),
    delete: vi.fn().mockResolvedValue(undefined),
    count: vi.fn().mockResolvedValue(0),
    listCollections: vi.fn().mockResolvedValue([]),
  } satisfies VectorStore;
}

describe("queryAgents", () => {
  it("keeps matches within the threshold", async () => {
    const store = fakeStore([agentHit("reviewer", 0.25), agentHit("painter", 1.4)]);

    const result = await queryAgents(new Retriever(store), "review my PR");

    expect(result).toEqual({
      query: "review my PR",
      collection: "agents",
      threshold: 1,
      resultsCount: 1,
      matches: [
        {
          agentName: "reviewer",
          source: "/agents/reviewer.md",
          confidence: 0.75,
          distance: 0.25,
          preview: "reviewer reviews code.",
        },
      ],
      withinThreshold: true,
    });
    expect(store.search).toHaveBeenCalledWith("agents", "review my PR", { nResults: 15 });
  });

  it("falls back to every hit when none is within the threshold", async () => {
    const store = fakeStore([agentHit("painter", 1.4)]);

    const result = await queryAgents(new Retriever(store), "review my PR", {
      collection: "team",
      threshold: 0.5,
    });

    expect(result.withinThreshold).toBe(false);
    expect(result.matches.map((m) => [m.agentName, m.confidence])).toEqual([["painter", 0]]);
    expect(store.search).toHaveBeenCalledWith("team", "review my PR", { nResults: 15 });
  });

  it("names unnamed agents after their file", async () => {
    const store = fakeStore([
      { id: "x:0", text: "  padded  ", metadata: { filename: "x.md" }, distance: 0.5 },
      { id: "y:0", text: "y", metadata: {}, distance: 0.6 },
    ]);

    const result = await queryAgents(new Retriever(store), "anything", { limit: 2 });

    expect(result.matches.map((m) => [m.agentName, m.source, m.preview])).toEqual([
      ["x.md", "x:0", "padded"],
      ["unknown", "y:0", "y"],
    ]);
  });

  it("rejects a negative threshold before searching", async () => {
    const store = fakeStore([]);

    await expect(
      queryAgents(new Retriever(store), "q", { threshold: -0.1 })
    ).rejects.toBeInstanceOf(InvalidQueryError);
    expect(store.search).not.toHaveBeenCalled();
  });
});

describe("formatAgentMatches", () => {
  it("lists matches with their confidence", async () => {
    const store = fakeStore([agentHit("reviewer", 0.25)]);
    const result = await queryAgents(new Retriever(store), "review my PR");

    expect(formatAgentMatches(result)).toBe(
      [
        "Found 1 matching agent(s):",
        "",
        "1. reviewer",
        "   Source: /agents/reviewer.md",
        "   Confidence: 75.0%",
        "   Preview: reviewer reviews code.",
      ].join("\n")
    );
  });

  it("notes a fallback to the closest matches", async () => {
    const store = fakeStore([agentHit("painter", 1.4)]);
    const result = await queryAgents(new Retriever(store), "q", { threshold: 0.5 });

    expect(formatAgentMatches(result).split("\n").pop()).toBe(
      "Note: no agent was within distance 0.5; showing the closest matches."
    );
  });

  it("reports when nothing matched", async () => {
    const result = await queryAgents(new Retriever(fakeStore([])), "q");

    expect(formatAgentMatches(result)).toBe("No agents found matching your query.");
  });
});
