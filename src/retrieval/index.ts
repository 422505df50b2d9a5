/**
 * Retrieval module - search, filters, calibration and result formatting
 */

export {
  Retriever,
  NO_CONTEXT,
  type RetrievalResult,
  type RetrieverOptions,
} from "./retriever";

export {
  buildWhereFilter,
  validateQuery,
  DEFAULT_LIMIT,
  MAX_LIMIT,
  type MetadataFilter,
  type QueryOptions,
  type ValidatedQuery,
} from "./query";

export {
  classifyDistance,
  parseDistanceBands,
  validateDistanceBands,
  DEFAULT_DISTANCE_BANDS,
  LEGACY_DISTANCE_BANDS,
  type DistanceBands,
  type QualityTier,
} from "./calibration";

export { formatSearchResults } from "./format-results";

export {
  queryAgents,
  formatAgentMatches,
  DEFAULT_AGENT_THRESHOLD,
  type AgentMatch,
  type AgentQueryOptions,
  type AgentQueryResult,
} from "./agent-query";
