#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point for semantic-ingest
 *
 * When an MCP client connects, it spawns this process. The server exposes
 * the search tools over stdio.
 *
 * How it works:
 * 1. Load and validate configuration (a bad CHROMA_PORT stops us here)
 * 2. Build one StoreClientManager, backend and Retriever for the process
 * 3. Register search_documents and search_agents_by_category
 * 4. Start the stdio transport (reads JSON-RPC from stdin, writes to stdout)
 *
 * The Chroma client is created on the first tool call, not at startup, so
 * the server starts even when Chroma is not up yet.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config";
import { Retriever } from "./retrieval";
import { registerSearchTools } from "./tools/mcp";
import { ChromaBackend, StoreClientManager, VoyageEmbedding } from "./vectorstore";

async function main(): Promise<void> {
  const config = loadConfig();

  const manager = new StoreClientManager(config.store);
  const embedder = new VoyageEmbedding({
    apiKey: config.voyageApiKey,
    model: config.voyageModel,
  });
  const retriever = new Retriever(new ChromaBackend(manager, embedder), {
    bands: config.bands,
  });

  // Clients see this info when they connect (name, version)
  const server = new McpServer({
    name: "semantic-ingest",
    version: "0.1.0",
  });

  registerSearchTools(server, retriever);

  // stdout belongs to the protocol; anything we print goes to stderr
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("MCP server error:", error);
  process.exit(1);
});
