/**
 * format-results.ts - Formats retrieval results as readable text
 *
 * Used by the MCP tools and the CLI's text output. Plain numbered text with
 * the distance and its calibration tier on the first line of each entry,
 * the chunk on the next, metadata last.
 */

import type { MetadataMap } from "../vectorstore";
import type { RetrievalResult } from "./retriever";

/** Metadata fields shown in the summary line, in this order */
const METADATA_FIELDS = [
  "source",
  "chunkIndex",
  "totalChunks",
  "agentName",
  "category",
  "complexity",
];

/**
 * Formats search results.
 *
 * Example output:
 *   Found 2 results in "code_context" collection:
 *
 *   1. /repo/docs/auth.md:0 (distance: 0.65, excellent)
 *      JWT tokens are refreshed by...
 *      Metadata: source=/repo/docs/auth.md, chunkIndex=0, totalChunks=3
 *
 * @param label - Collection name, or several joined with ", "
 */
export function formatSearchResults(results: RetrievalResult[], label: string): string {
  if (results.length === 0) {
    return `No results found in "${label}" collection.`;
  }

  const header = `Found ${results.length} result${results.length === 1 ? "" : "s"} in "${label}" collection:\n`;

  const formatted = results.map((result, index) => {
    const origin = label.includes(",") ? ` [${result.collection}]` : "";
    const lines = [
      `${index + 1}. ${result.id}${origin} (distance: ${result.distance.toFixed(2)}, ${result.quality})`,
      `   ${result.text}`,
    ];

    const metadataLine = formatMetadata(result.metadata);
    if (metadataLine) {
      lines.push(`   Metadata: ${metadataLine}`);
    }
    return lines.join("\n");
  });

  return header + "\n" + formatted.join("\n\n");
}

/**
 * Known fields first, then nothing else: chunk metadata carries a dozen
 * keys and most of them repeat the source path.
 */
function formatMetadata(metadata: MetadataMap): string {
  return METADATA_FIELDS.filter((key) => metadata[key] !== undefined && metadata[key] !== "")
    .map((key) => `${key}=${metadata[key]}`)
    .join(", ");
}
