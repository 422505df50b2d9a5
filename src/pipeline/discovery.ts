/**
 * discovery.ts - Finds the files to ingest
 *
 * Walks a source directory with fast-glob using include/exclude patterns and
 * returns absolute, normalized, sorted, de-duplicated paths. A path to a
 * single file is returned as-is (include patterns do not apply to it).
 *
 * Also classifies files: which ones are agent-definition documents, and what
 * their file type is.
 */

import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";

/** Files ingested when no include patterns are given */
export const DEFAULT_INCLUDE = ["**/*.md", "**/*.py", "**/*.ts", "**/*.txt"];

/** Directories never worth indexing */
export const DEFAULT_EXCLUDE = ["**/node_modules/**", "**/.git/**", "**/dist/**"];

const AGENT_SUFFIXES = [".agent.md", ".prompt.md"];

/**
 * Lists the files under sourcePath that match the patterns.
 *
 * @param sourcePath - A directory, or a single file
 * @param patterns - Globs relative to sourcePath
 */
export async function discoverFiles(
  sourcePath: string,
  patterns: { include: string[]; exclude: string[] } = {
    include: DEFAULT_INCLUDE,
    exclude: DEFAULT_EXCLUDE,
  }
): Promise<string[]> {
  const root = path.resolve(sourcePath);
  const info = await stat(root);
  if (info.isFile()) return [path.normalize(root)];

  const files = await fg(patterns.include, {
    cwd: root,
    ignore: patterns.exclude,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });

  const unique = new Set(files.map((file) => path.normalize(file)));
  return [...unique].sort();
}

/**
 * Whether a file is an agent-definition document.
 *
 * @param agentMode - When true, every Markdown file counts
 */
export function isAgentDocument(filePath: string, agentMode = false): boolean {
  const lower = filePath.toLowerCase();
  if (AGENT_SUFFIXES.some((suffix) => lower.endsWith(suffix))) return true;
  return agentMode && lower.endsWith(".md");
}
