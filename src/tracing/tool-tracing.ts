/**
 * tool-tracing.ts - OpenTelemetry instrumentation for MCP tool calls
 *
 * What this file does:
 * Provides a wrapper function that adds tracing to any MCP tool handler.
 * When a tool is called, it creates a span with timing, inputs, and success/failure info.
 *
 * Why a wrapper pattern?
 * Instead of duplicating tracing code in each tool handler, we wrap handlers
 * with this function. Searches the tool runs show up as child spans.
 */

import { randomUUID } from "crypto";
import { traceOperation } from "./spans";

/**
 * MCP tool result with isError flag - used to check tool success.
 * We only need the isError property for tracing; the rest passes through.
 */
interface ResultWithError {
  isError?: boolean;
}

/**
 * Wraps an MCP tool handler with OpenTelemetry tracing.
 *
 * Creates a span for each tool invocation with:
 * - Span name: "execute_tool {toolName}"
 * - Attributes:
 *
 * | Attribute          | Description                          |
 * |--------------------|--------------------------------------|
 * | mcp.tool.name      | Tool name (e.g., search_documents)   |
 * | mcp.tool.call.id   | Unique UUID per invocation           |
 * | mcp.tool.arguments | JSON stringified input args          |
 * | mcp.tool.is_error  | Whether the tool returned isError    |
 *
 * Error handling:
 * - Exceptions (thrown errors): recorded on the span, status ERROR
 * - Tool failures (isError: true): span status stays OK (the tool ran and
 *   reported a problem, such as a rejected query, to the caller)
 *
 * @param toolName - The name of the tool (e.g., "search_documents")
 * @param handler - The async function that executes the tool logic
 * @returns A wrapped handler that traces the execution
 */
export function withToolTracing<TInput, TResult extends ResultWithError>(
  toolName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return (input: TInput): Promise<TResult> =>
    traceOperation(
      `execute_tool ${toolName}`,
      {
        "mcp.tool.name": toolName,
        "mcp.tool.call.id": randomUUID(),
        "mcp.tool.arguments": JSON.stringify(input),
      },
      async (span) => {
        const result = await handler(input);
        span.setAttribute("mcp.tool.is_error", result.isError === true);
        return result;
      }
    );
}
