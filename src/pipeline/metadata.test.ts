/**
 * metadata.test.ts - Unit tests for chunk metadata
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  agentExtensions,
  buildChunkMetadata,
  fileTypeOf,
  flattenMetadata,
} from "./metadata";

describe("buildChunkMetadata", () => {
  it("fills the base fields from the path", () => {
    const metadata = buildChunkMetadata("/repo/docs/auth/tokens.md", 2, 5);

    expect(metadata).toEqual({
      source: "/repo/docs/auth/tokens.md",
      filename: "tokens.md",
      folder: "auth",
      fileType: ".md",
      chunkIndex: 2,
      totalChunks: 5,
      extensions: {},
    });
  });

  it("classifies compound agent extensions by their final part", () => {
    expect(fileTypeOf("/agents/reviewer.agent.md")).toBe(".md");
    expect(fileTypeOf("/agents/setup.prompt.md")).toBe(".md");
    expect(fileTypeOf("/src/Main.TS")).toBe(".ts");
  });
});

describe("flattenMetadata", () => {
  it("merges extensions into a flat scalar map", () => {
    const metadata = buildChunkMetadata("/repo/a.py", 0, 1, {
      category: "backend",
      reviewed: true,
    });

    expect(flattenMetadata(metadata)).toEqual({
      source: "/repo/a.py",
      filename: "a.py",
      folder: "repo",
      fileType: ".py",
      chunkIndex: 0,
      totalChunks: 1,
      category: "backend",
      reviewed: true,
    });
  });

  it("rejects an extension that shadows a base field", () => {
    const metadata = buildChunkMetadata("/repo/a.py", 0, 1, { source: "/elsewhere" });
    expect(() => flattenMetadata(metadata)).toThrow(ZodError);
  });

  it("rejects a non-finite number", () => {
    const metadata = buildChunkMetadata("/repo/a.py", 0, 1, { score: Number.NaN });
    expect(() => flattenMetadata(metadata)).toThrow(ZodError);
  });

  it("rejects an empty source", () => {
    const metadata = buildChunkMetadata("", 0, 1);
    expect(() => flattenMetadata(metadata)).toThrow(ZodError);
  });
});

describe("agentExtensions", () => {
  it("joins lists and truncates the description", () => {
    const extensions = agentExtensions({
      agentName: "api-reviewer",
      description: "d".repeat(600),
      model: "sonnet",
      category: "backend",
      complexity: "medium",
      techStack: ["fastapi", "postgres"],
      languages: ["python"],
      tools: ["read", "grep"],
    });

    expect(extensions).toEqual({
      agentName: "api-reviewer",
      description: "d".repeat(500),
      model: "sonnet",
      category: "backend",
      complexity: "medium",
      techStack: "fastapi,postgres",
      languages: "python",
      tools: "read,grep",
    });
  });
});
