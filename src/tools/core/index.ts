/**
 * Core search tools - Shared logic for all interfaces
 *
 * Usage:
 *   import { searchDocuments, searchDocumentsSchema } from "./tools/core";
 */

export {
  searchDocuments,
  searchDocumentsSchema,
  searchDocumentsDescription,
  searchAgentsByCategory,
  searchAgentsSchema,
  searchAgentsDescription,
  type SearchDocumentsInput,
  type SearchAgentsInput,
  type ToolResult,
} from "./document-search";
