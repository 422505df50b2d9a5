/**
 * MCP tool registration
 *
 * Registers the two search tools on an McpServer. Each handler is wrapped
 * with withToolTracing, so one tool call shows up as one trace:
 *
 *   execute_tool search_documents (root span)
 *   └── search code_context
 *
 * The Retriever is injected; the server entry point builds it once from
 * configuration and every call shares it (and its single Chroma client).
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  searchDocuments,
  searchDocumentsSchema,
  searchDocumentsDescription,
  searchAgentsByCategory,
  searchAgentsSchema,
  searchAgentsDescription,
  type SearchDocumentsInput,
  type SearchAgentsInput,
} from "../core";
import { withToolTracing } from "../../tracing/tool-tracing";
import type { Retriever } from "../../retrieval";

/**
 * Registers search_documents and search_agents_by_category.
 *
 * @param server - The McpServer instance to register the tools with
 * @param retriever - Shared retriever the handlers search through
 */
export function registerSearchTools(server: McpServer, retriever: Retriever): void {
  server.registerTool(
    "search_documents",
    {
      description: searchDocumentsDescription,
      inputSchema: searchDocumentsSchema.shape,
    },
    withToolTracing("search_documents", (input: SearchDocumentsInput) =>
      searchDocuments(retriever, input)
    )
  );

  server.registerTool(
    "search_agents_by_category",
    {
      description: searchAgentsDescription,
      inputSchema: searchAgentsSchema.shape,
    },
    withToolTracing("search_agents_by_category", (input: SearchAgentsInput) =>
      searchAgentsByCategory(retriever, input)
    )
  );
}
