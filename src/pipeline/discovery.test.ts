/**
 * discovery.test.ts - Unit tests for file discovery
 *
 * Builds a small tree in a temporary directory and walks it.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { discoverFiles, isAgentDocument } from "./discovery";

let root: string;

beforeAll(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), "discovery-"));
  const files = [
    "README.md",
    "notes.txt",
    "src/app.ts",
    "src/app.js",
    "docs/guide.md",
    "node_modules/pkg/index.md",
    "dist/out.txt",
    ".hidden/secret.md",
  ];
  for (const file of files) {
    const full = path.join(root, file);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, `contents of ${file}`);
  }
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("discoverFiles", () => {
  it("finds default file types and skips excluded directories", async () => {
    const files = await discoverFiles(root);

    expect(files).toEqual(
      ["README.md", "docs/guide.md", "notes.txt", "src/app.ts"].map((file) =>
        path.join(root, file)
      )
    );
  });

  it("applies custom patterns", async () => {
    const files = await discoverFiles(root, {
      include: ["**/*.md"],
      exclude: ["docs/**", "node_modules/**"],
    });

    expect(files).toEqual([path.join(root, "README.md")]);
  });

  it("de-duplicates files matched by several patterns", async () => {
    const files = await discoverFiles(root, { include: ["*.md", "**/*.md"], exclude: [] });

    expect(files.filter((file) => file.endsWith("README.md"))).toHaveLength(1);
  });

  it("returns a single file path as-is", async () => {
    const file = path.join(root, "src", "app.js");

    expect(await discoverFiles(file)).toEqual([file]);
  });

  it("rejects a path that does not exist", async () => {
    await expect(discoverFiles(path.join(root, "missing"))).rejects.toThrow(/ENOENT/);
  });
});

describe("isAgentDocument", () => {
  it("recognizes agent and prompt suffixes", () => {
    expect(isAgentDocument("/a/reviewer.agent.md")).toBe(true);
    expect(isAgentDocument("/a/Plan.PROMPT.md")).toBe(true);
    expect(isAgentDocument("/a/README.md")).toBe(false);
  });

  it("treats every Markdown file as an agent in agent mode", () => {
    expect(isAgentDocument("/a/README.md", true)).toBe(true);
    expect(isAgentDocument("/a/notes.txt", true)).toBe(false);
  });
});
