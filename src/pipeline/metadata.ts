/**
 * metadata.ts - Per-chunk metadata records
 *
 * Builds the metadata stored next to every chunk, and flattens it into the
 * scalar map Chroma accepts.
 *
 * Two pure functions:
 * - buildChunkMetadata(): the closed base record (source, filename, folder,
 *   fileType, chunkIndex, totalChunks) plus an extension map
 * - flattenMetadata(): validates the record with zod and merges the
 *   extensions into one flat map
 *
 * List-valued attributes (techStack, languages, tools) become comma-separated
 * strings, matching how Chroma metadata has to be flat.
 */

import path from "node:path";
import { z } from "zod";
import type { MetadataMap, MetadataScalar } from "../vectorstore";
import type { AgentAttributes, BaseChunkMetadata, ChunkMetadata } from "./types";

/** Longest description stored in metadata */
export const MAX_DESCRIPTION_LENGTH = 500;

const BASE_FIELDS: ReadonlySet<string> = new Set<keyof BaseChunkMetadata>([
  "source",
  "filename",
  "folder",
  "fileType",
  "chunkIndex",
  "totalChunks",
]);

const ScalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

export const ChunkMetadataSchema = z.object({
  source: z.string().min(1, "source must be a non-empty path"),
  filename: z.string(),
  folder: z.string(),
  fileType: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  totalChunks: z.number().int().positive(),
  extensions: z
    .record(ScalarSchema)
    .superRefine((extensions, ctx) => {
      for (const key of Object.keys(extensions)) {
        if (BASE_FIELDS.has(key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `extension "${key}" would overwrite a base field`,
          });
        }
      }
    }),
});

/**
 * Final extension of a file, lower-cased, with the dot.
 * Compound agent extensions classify by their last part: "x.agent.md" → ".md".
 */
export function fileTypeOf(documentPath: string): string {
  return path.extname(documentPath).toLowerCase();
}

/**
 * Builds the metadata record for one chunk.
 *
 * @param documentPath - Absolute path of the owning document
 * @param extensions - Additional scalar fields (agent attributes, tags)
 */
export function buildChunkMetadata(
  documentPath: string,
  chunkIndex: number,
  totalChunks: number,
  extensions: Record<string, MetadataScalar> = {}
): ChunkMetadata {
  return {
    source: documentPath,
    filename: path.basename(documentPath),
    folder: path.basename(path.dirname(documentPath)),
    fileType: fileTypeOf(documentPath),
    chunkIndex,
    totalChunks,
    extensions: { ...extensions },
  };
}

/**
 * Validates a metadata record and flattens it into a scalar map.
 *
 * @throws ZodError when a field has the wrong type, a number is not finite,
 *   or an extension key shadows a base field
 */
export function flattenMetadata(metadata: ChunkMetadata): MetadataMap {
  const { extensions, ...base } = ChunkMetadataSchema.parse(metadata);
  return { ...extensions, ...base };
}

/**
 * Turns agent attributes into extension fields.
 *
 * Empty values are kept as empty strings so every agent chunk has the same
 * keys, which keeps category and complexity filters predictable.
 */
export function agentExtensions(
  attributes: AgentAttributes
): Record<string, MetadataScalar> {
  return {
    agentName: attributes.agentName,
    description: attributes.description.slice(0, MAX_DESCRIPTION_LENGTH),
    model: attributes.model,
    category: attributes.category,
    complexity: attributes.complexity,
    techStack: attributes.techStack.join(","),
    languages: attributes.languages.join(","),
    tools: attributes.tools.join(","),
  };
}
