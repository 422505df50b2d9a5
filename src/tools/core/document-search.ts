/**
 * document-search core - Search tools over ingested collections
 *
 * What this file does:
 * Holds the input schemas, descriptions and handlers for the two search
 * tools. The MCP layer (tools/mcp) only registers them; the logic lives here
 * so it can be tested without a server.
 *
 * Handlers never throw for a rejected request. An InvalidQueryError becomes
 * a text result with isError: true, so the calling model sees what was wrong
 * and can fix its arguments. Anything else (Chroma down, embedding failure)
 * propagates to the MCP server.
 */

import { z } from "zod";
import { InvalidQueryError } from "../../errors";
import { DEFAULT_COLLECTION, AGENTS_COLLECTION } from "../../vectorstore";
import {
  formatSearchResults,
  MAX_LIMIT,
  type QueryOptions,
  type Retriever,
} from "../../retrieval";

/**
 * Text content result, shaped the way MCP tool handlers return it.
 */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const scalar = z.union([z.string(), z.number(), z.boolean()]);

/**
 * Fields shared by both tools.
 */
const searchOptionsShape = {
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_LIMIT)
    .optional()
    .describe("Maximum number of results to return (default: 5)"),
  threshold: z
    .number()
    .min(0)
    .optional()
    .describe(
      "Drop results whose distance is above this value. Lower distance means closer; around 1.0 is a reasonable cut-off."
    ),
  dedupe: z
    .boolean()
    .optional()
    .describe("Return at most one chunk per source document"),
};

export const searchDocumentsSchema = z.object({
  query: z
    .string()
    .describe("Natural language description of what you're looking for"),
  collections: z
    .array(z.string())
    .optional()
    .describe(
      `Collections to search (default: ["${DEFAULT_COLLECTION}"]). Results from several collections are merged by distance.`
    ),
  where: z
    .record(z.union([scalar, z.array(scalar)]))
    .optional()
    .describe(
      'Metadata filter: field → value, or field → list of allowed values. Example: {"fileType": ".md", "folder": ["docs", "guides"]}'
    ),
  ...searchOptionsShape,
});

export type SearchDocumentsInput = z.infer<typeof searchDocumentsSchema>;

export const searchDocumentsDescription = `Semantic search over ingested documents (Markdown, code, text).

Finds chunks whose meaning is close to the query even when the wording differs. Each result shows its distance (lower is closer) and a quality tier: excellent, good, acceptable or poor.

Use "where" to narrow by metadata such as fileType, folder or source. Use "dedupe" when you want distinct documents rather than several chunks of the same one.`;

export const searchAgentsSchema = z.object({
  query: z.string().describe("What the agent should be able to do"),
  category: z
    .string()
    .describe(
      "Agent category, e.g. backend, frontend, devops, security, testing, data, documentation"
    ),
  collection: z
    .string()
    .optional()
    .describe(`Collection holding agent documents (default: "${AGENTS_COLLECTION}")`),
  ...searchOptionsShape,
});

export type SearchAgentsInput = z.infer<typeof searchAgentsSchema>;

export const searchAgentsDescription = `Find agent definitions of one category that match a task description.

Agent documents are ingested with their frontmatter (name, model, tools) and inferred attributes (category, complexity, tech stack, languages). This tool restricts the search to one category.`;

/**
 * Runs search_documents.
 */
export async function searchDocuments(
  retriever: Retriever,
  input: SearchDocumentsInput
): Promise<ToolResult> {
  const collections = input.collections?.length ? input.collections : [DEFAULT_COLLECTION];

  return runQuery(async () => {
    const options = toQueryOptions(input);
    if (input.where) options.where = input.where;

    const results =
      collections.length === 1
        ? await retriever.search(input.query, collections[0], options)
        : await retriever.searchMany(input.query, collections, options);
    return formatSearchResults(results, collections.join(", "));
  });
}

/**
 * Runs search_agents_by_category.
 */
export async function searchAgentsByCategory(
  retriever: Retriever,
  input: SearchAgentsInput
): Promise<ToolResult> {
  const collection = input.collection ?? AGENTS_COLLECTION;

  return runQuery(async () => {
    const results = await retriever.searchByCategory(
      input.query,
      collection,
      input.category,
      toQueryOptions(input)
    );
    return formatSearchResults(results, collection);
  });
}

function toQueryOptions(input: {
  limit?: number;
  threshold?: number;
  dedupe?: boolean;
}): QueryOptions {
  return {
    limit: input.limit,
    distanceThreshold: input.threshold,
    dedupe: input.dedupe,
  };
}

async function runQuery(run: () => Promise<string>): Promise<ToolResult> {
  try {
    return { content: [{ type: "text", text: await run() }] };
  } catch (error) {
    if (error instanceof InvalidQueryError) {
      return {
        content: [{ type: "text", text: `Invalid query: ${error.message}` }],
        isError: true,
      };
    }
    throw error;
  }
}
