/**
 * audit/index.ts - Public API for agent collection audits
 *
 * Usage:
 *   import { auditAgents, formatAuditReport } from "./audit";
 */

export {
  auditAgents,
  analyzeCoverage,
  findConsolidationCandidates,
  loadAgentProfiles,
  profilesFromChunks,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_CHUNK_LIMIT,
  type AgentProfile,
  type AuditOptions,
  type AuditSummary,
  type ConsolidationCandidate,
  type ConsolidationOptions,
  type CountEntry,
  type CoverageAnalysis,
} from "./auditor";

export { formatAuditReport } from "./report";
